export { TranscriptParser, type TranscriptParseResult } from "./parser";
