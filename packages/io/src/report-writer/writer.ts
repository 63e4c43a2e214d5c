import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { IoEvent, PipelineErrors, PipelinePhase } from "@coursecheck/constants";
import type { PipelineEventBus } from "@coursecheck/event-bus";
import { errorCode } from "../file-discovery/discovery";

const UNSAFE_FILE_CHARS = /[^A-Za-z0-9._-]+/g;

/**
 * Turns a student id or file stem into a safe file name fragment.
 */
export function reportFileStem(value: string): string {
	return value.trim().replace(UNSAFE_FILE_CHARS, "_");
}

/**
 * Writes rendered reports into one output directory.
 */
export class ReportWriter {
	constructor(private readonly outputDir: string) {}

	/**
	 * @returns the written path, or undefined when the write failed (reported on the bus)
	 */
	async write(fileName: string, content: string, bus?: PipelineEventBus): Promise<string | undefined> {
		const target = join(this.outputDir, fileName);
		try {
			await mkdir(this.outputDir, { recursive: true });
			await writeFile(target, content, "utf-8");
			bus?.emitDebug(IoEvent.REPORT_WRITE, PipelinePhase.WRITE, "Report written", { path: target });
			return target;
		} catch (error: unknown) {
			const message = error instanceof Error ? error.message : "Error writing report";
			bus?.emitError(IoEvent.REPORT_WRITE, PipelinePhase.WRITE, {
				path: target,
				message,
				code: errorCode(error) ?? "WRITE_FAILED",
				userMessage: PipelineErrors.WRITE_FAILURE(target, message),
			});
			return undefined;
		}
	}
}
