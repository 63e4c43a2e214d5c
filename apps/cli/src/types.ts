import type { ReportFormat } from "@coursecheck/core";

/**
 * CLI subcommand identifying which operation to perform.
 */
export enum Command {
    VALIDATE = "validate",
    BATCH = "batch",
}

/**
 * Exit codes for CLI process.
 */
export enum ExitCode {
    SUCCESS = 0,
    VALIDATION_ERROR = 1,
    CONFIG_ERROR = 2,
}

/**
 * Parsed CLI arguments.
 */
export interface ParseOptions {
    command: Command;
    paths: string[];
    catalogPath?: string;
    configPath?: string;
    outputDir?: string;
    format?: ReportFormat;
    verbose: boolean;
    quiet: boolean;
    json: boolean;
    serial: boolean;
    workers?: number;
    noConfig: boolean;
    include: string[];
    exclude: string[];
    help: boolean;
    version: boolean;
}

/**
 * Output mode for formatting.
 */
export type OutputMode = "normal" | "verbose" | "quiet" | "json";
