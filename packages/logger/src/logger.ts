import { Logger, type ILogObj } from "tslog";

/**
 * Structured fields attached to a pipeline log line.
 * `file` is the catalog, transcript or report the line is about.
 */
export interface AppLogObj extends ILogObj {
	phase?: string;
	file?: string;
	studentId?: string;
	code?: string;
	[key: string]: unknown;
}

/**
 * Log verbosity mode.
 */
export type LogMode = "silent" | "error" | "info" | "debug";

const MIN_LEVELS: Record<LogMode, number> = {
	silent: 7,
	error: 5,
	info: 3,
	debug: 2,
};

/**
 * Where JSON log lines go. Anything with a `write(string)` works; the CLI
 * passes stderr so stdout carries only report output.
 */
export interface LogSink {
	write(line: string): unknown;
}

/**
 * Build the structured fields for one log line from a phase and the loose
 * context a bus payload carries. A `path` becomes `file`; a string
 * `studentId` is kept as is; everything else passes through.
 */
export function logFields(phase: string, context: Record<string, unknown> = {}): AppLogObj {
	const { path, studentId, ...rest } = context;
	const fields: AppLogObj = { ...rest, phase };
	if (typeof path === "string") {
		fields.file = path;
	}
	if (typeof studentId === "string" && studentId !== "") {
		fields.studentId = studentId;
	}
	return fields;
}

/**
 * Create a logger with human-readable pretty output.
 */
export function createLogger(name: string, mode: LogMode = "info"): Logger<AppLogObj> {
	return new Logger<AppLogObj>({
		name,
		type: mode === "silent" ? "hidden" : "pretty",
		minLevel: MIN_LEVELS[mode],
		hideLogPositionForProduction: true,
	});
}

/**
 * Create a logger that writes one JSON object per line to `sink`.
 */
export function createJsonLogger(
	name: string,
	mode: LogMode = "debug",
	sink: LogSink = process.stdout,
): Logger<AppLogObj> {
	return new Logger<AppLogObj>({
		name,
		type: mode === "silent" ? "hidden" : "json",
		minLevel: MIN_LEVELS[mode],
		hideLogPositionForProduction: true,
		overwrite: {
			transportJSON: (json) => {
				sink.write(`${JSON.stringify(json)}\n`);
			},
		},
	});
}
