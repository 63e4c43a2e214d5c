import type { UserErrorMessage } from "./types";

/**
 * Batch pipeline execution phases.
 */
export enum PipelinePhase {
	CATALOG = "catalog",
	DISCOVERY = "discovery",
	READ = "read",
	PARSE = "parse",
	VALIDATE = "validate",
	WRITE = "write",
}

/**
 * Human-readable labels for each pipeline phase, used in log messages.
 */
export const PipelinePhaseLabels: Record<PipelinePhase, string> = {
	[PipelinePhase.CATALOG]: "Catalog",
	[PipelinePhase.DISCOVERY]: "Discovery",
	[PipelinePhase.READ]: "Read",
	[PipelinePhase.PARSE]: "Parse",
	[PipelinePhase.VALIDATE]: "Validate",
	[PipelinePhase.WRITE]: "Write",
};

export const PipelineErrors = {
	CATALOG_FAILURE: (file: string, message: string): UserErrorMessage => [
		`Failed to load course catalog "${file}"`,
		message,
		"No transcript was validated",
	],
	PARSE_FAILURE: (file: string, message: string): UserErrorMessage => [
		`Failed to parse transcript "${file}"`,
		message,
	],
	VALIDATE_FAILURE: (file: string, message: string): UserErrorMessage => [
		`Validation aborted for "${file}"`,
		message,
	],
	WRITE_FAILURE: (file: string, message: string): UserErrorMessage => [
		`Failed to write report "${file}"`,
		message,
	],
} as const;
