export {
	isPhasePayload,
	type BasePayload,
	type BusPayload,
	type ErrorPayload,
	type LogPayload,
	type PhasePayload,
	type EventHandler,
} from "./types";

export { PipelineEventBus } from "./pipeline-event-bus";
