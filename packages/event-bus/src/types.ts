import { PhaseEvent, type LogLevel, type PipelineEvent, type PipelinePhase, type UserErrorMessage } from "@coursecheck/constants";

/**
 * Fields shared by every payload emitted through the pipeline event bus.
 * Every payload carries two orthogonal dimensions: event (what happened) and level (severity).
 */
export interface BasePayload {
	event: PipelineEvent;
	level: LogLevel;
	phase: PipelinePhase;
	timestamp: number;
}

/**
 * Payload for ERROR-level events: represents a pipeline error with user-facing message.
 */
export interface ErrorPayload extends BasePayload {
	level: LogLevel.ERROR;
	path: string;
	message: string;
	code: string;
	userMessage: UserErrorMessage;
}

/**
 * Payload for WARN, INFO, and DEBUG-level events: carries a log message with optional context.
 */
export interface LogPayload extends BasePayload {
	level: LogLevel.WARN | LogLevel.INFO | LogLevel.DEBUG;
	message: string;
	context?: Record<string, unknown>;
}

/**
 * Payload for phase boundary events: marks PHASE_START and PHASE_END.
 */
export interface PhasePayload extends BasePayload {
	event: PhaseEvent;
	level: LogLevel.INFO;
	stats?: Record<string, number>;
}

/**
 * Any payload the bus can carry.
 */
export type BusPayload = ErrorPayload | LogPayload | PhasePayload;

/**
 * Callback type for event subscribers.
 */
export type EventHandler = (payload: BusPayload) => void;

export function isPhasePayload(payload: BusPayload): payload is PhasePayload {
	return payload.event === PhaseEvent.PHASE_START || payload.event === PhaseEvent.PHASE_END;
}
