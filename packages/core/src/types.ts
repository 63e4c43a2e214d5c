import type { Logger, AppLogObj } from "@coursecheck/logger";
import type { CreditLimits, ValidationResult } from "@coursecheck/engine";
import type { PipelinePhase, UserErrorMessage } from "@coursecheck/constants";

/**
 * Report output format.
 */
export type ReportFormat = "text" | "json";

/**
 * Configuration for pipeline execution.
 */
export interface PipelineConfig {
    /**
     * Transcript paths (files or directories).
     */
    paths: string[];
    /**
     * Course catalog file.
     */
    catalogPath: string;
    /**
     * Glob patterns to include.
     * Defaults to ["**\/*.json"]
     */
    include?: string[];
    /**
     * Glob patterns to exclude.
     * Defaults to ["**\/node_modules\/**"]
     */
    exclude?: string[];
    /**
     * File count warning threshold.
     * Defaults to 10000
     */
    maxFiles?: number;
    /**
     * Max file size in MB.
     * Defaults to 10
     */
    maxFileSizeMb?: number;
    /**
     * Typical credit caps. Defaults to 22 regular / 9 summer.
     */
    creditLimits?: CreditLimits;
    /**
     * Defaults to "text".
     */
    format?: ReportFormat;
    /**
     * Directory reports are written to. If omitted, the write phase is skipped.
     */
    outputDir?: string;
    /**
     * Transcripts validated at once, 1 to 32. Defaults to 4.
     */
    workers?: number;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG = {
    include: ["**/*.json"],
    exclude: ["**/node_modules/**"],
    maxFiles: 10000,
    maxFileSizeMb: 10,
    format: "text",
    workers: 4,
} as const;

export const MAX_WORKERS = 32;

/**
 * One validated transcript.
 */
export interface TranscriptReport {
    /**
     * Absolute transcript file path.
     */
    source: string;
    studentId: string;
    result: ValidationResult;
    /**
     * Rendered report in the configured format.
     */
    content: string;
    /**
     * Where the report was written, when it was.
     */
    outputPath?: string;
    /**
     * Parser warnings: malformed registrations, semester order.
     */
    warnings: string[];
}

/**
 * Aggregated statistics for pipeline run.
 */
export interface PipelineStats {
    filesDiscovered: number;
    filesRead: number;
    transcriptsParsed: number;
    transcriptsValidated: number;
    reportsWritten: number;
    /**
     * Invalid registrations across all transcripts.
     */
    invalidRegistrations: number;
    notFoundRegistrations: number;
    creditWarnings: number;
    errorsCount: number;
}

/**
 * Error that occurred during pipeline execution.
 */
export interface PipelineError {
    /**
     * Phase where error occurred.
     */
    phase: PipelinePhase;
    /**
     * File path where error occurred.
     */
    path: string;
    /**
     * Raw system error message.
     */
    message: string;
    /**
     * System or domain error code (e.g., ENOENT, INVALID_JSON).
     */
    code: string;
    /**
     * Human-friendly error description.
     */
    userMessage: UserErrorMessage;
}

/**
 * Aggregate result from pipeline.
 */
export interface PipelineResult {
    /**
     * Validated transcripts, in discovery order.
     */
    reports: TranscriptReport[];
    /**
     * Errors by phase.
     */
    errors: PipelineError[];
    /**
     * Aggregated statistics.
     */
    stats: PipelineStats;
}

/**
 * Pipeline contract for injectable pipeline implementations.
 */
export interface Pipeline {
    run(config: PipelineConfig, logger: Logger<AppLogObj>): Promise<PipelineResult>;
}
