/**
 * Log severity level, orthogonal to event types.
 */
export enum LogLevel {
	ERROR = "ERROR",
	WARN = "WARN",
	INFO = "INFO",
	DEBUG = "DEBUG",
}

/**
 * Pipeline phase boundary markers.
 */
export enum PhaseEvent {
	PHASE_START = "PHASE_START",
	PHASE_END = "PHASE_END",
}

/**
 * IO module events.
 */
export enum IoEvent {
	FILE_DISCOVERY = "FILE_DISCOVERY",
	FILE_READ = "FILE_READ",
	REPORT_WRITE = "REPORT_WRITE",
}

/**
 * Parser and engine events.
 */
export enum ValidationEvent {
	CATALOG_LOAD = "CATALOG_LOAD",
	TRANSCRIPT_PARSE = "TRANSCRIPT_PARSE",
	TRANSCRIPT_VALIDATION = "TRANSCRIPT_VALIDATION",
}

/**
 * Union of all event types.
 */
export type PipelineEvent = PhaseEvent | IoEvent | ValidationEvent;
