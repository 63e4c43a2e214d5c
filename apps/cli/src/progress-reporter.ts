import type { PipelineError, PipelineResult, TranscriptReport } from "@coursecheck/core";
import { Command, type OutputMode } from "./types";

/**
 * Formats pipeline output for the terminal based on command and mode.
 */
export class ProgressReporter {
    private mode: OutputMode;

    constructor(mode: OutputMode = "normal") {
        this.mode = mode;
    }

    /**
     * Display command-specific output once the pipeline has finished.
     */
    complete(command: Command, result: PipelineResult): void {
        if (this.mode === "json") {
            this.completeJson(command, result);
            return;
        }

        if (command === Command.VALIDATE && this.mode !== "quiet") {
            for (const report of result.reports) {
                console.log(report.content);
            }
        }

        if (this.mode === "verbose") {
            const details = this.formatVerboseDetails(result.reports);
            if (details) {
                console.log(details);
            }
        }

        if (this.mode !== "quiet") {
            console.log(command === Command.BATCH ? this.formatBatchResult(result) : this.formatValidateResult(result));
        }
    }

    /**
     * Display an error.
     */
    error(error: PipelineError): void {
        if (this.mode === "json") {
            console.log(JSON.stringify({ type: "error", error }));
        } else {
            console.error(this.formatError(error));
        }
    }

    private completeJson(command: Command, result: PipelineResult): void {
        for (const report of result.reports) {
            console.log(
                JSON.stringify({
                    type: "report",
                    source: report.source,
                    studentId: report.studentId,
                    outputPath: report.outputPath,
                    result: report.result,
                }),
            );
        }
        console.log(JSON.stringify({ type: "complete", command, stats: result.stats }));
    }

    formatValidateResult(result: PipelineResult): string {
        const { stats } = result;
        return (
            `Validation complete: ${stats.transcriptsValidated} transcript(s), ` +
            `${stats.invalidRegistrations} invalid, ${stats.notFoundRegistrations} not found, ` +
            `${stats.errorsCount} error(s)`
        );
    }

    formatBatchResult(result: PipelineResult): string {
        const lines = [this.formatValidateResult(result), `Reports written: ${result.stats.reportsWritten}`];
        for (const report of result.reports) {
            if (report.outputPath) {
                lines.push(`  ${report.outputPath}`);
            }
        }
        return lines.join("\n");
    }

    private formatVerboseDetails(reports: readonly TranscriptReport[]): string | undefined {
        if (reports.length === 0) {
            return undefined;
        }

        const lines = ["Per-transcript details:"];
        for (const report of reports) {
            const { stats } = report.result;
            lines.push(
                `  ${report.source} (${report.studentId || "no id"}) — ` +
                    `${stats.registrationsChecked} checked, ${stats.invalidCount} invalid, ${stats.notFoundCount} not found`,
            );
            for (const warning of report.warnings) {
                lines.push(`    ! ${warning}`);
            }
        }
        return lines.join("\n");
    }

    private formatError(error: PipelineError): string {
        if (this.mode === "quiet") {
            return `[${error.phase}] ${error.path}: ${error.message}`;
        }
        const userLines = error.userMessage.join("\n  ");
        return `[${error.phase}] ${error.path}: ${userLines}\n  ${error.message}`;
    }
}
