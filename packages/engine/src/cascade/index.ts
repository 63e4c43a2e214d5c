export { CascadeEngine, validateTranscript } from "./engine";
