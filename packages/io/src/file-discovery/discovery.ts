import { readFile, stat } from "node:fs/promises";
import { extname, resolve } from "node:path";
import fg from "fast-glob";
import { DiscoveryErrors, IoEvent, PipelinePhase, type UserErrorMessage } from "@coursecheck/constants";
import type { PipelineEventBus } from "@coursecheck/event-bus";
import {
	type DiscoveredFiles,
	type DiscoveryConfig,
	type DiscoveryError,
	type FileContents,
	SkipReason,
} from "./types";

const utf8 = new TextDecoder("utf-8", { fatal: true });

export function errorCode(error: unknown): string | undefined {
	if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
		return error.code;
	}
	return undefined;
}

/**
 * Transcript file discovery and reading.
 */
export class FileDiscovery {
	/**
	 * Discover files based on the provided configuration.
	 * A root that is itself a file is taken as the only candidate.
	 */
	public async discover(config: DiscoveryConfig, bus?: PipelineEventBus): Promise<DiscoveredFiles> {
		const result: DiscoveredFiles = {
			files: [],
			skipped: [],
			exceededFileLimit: false,
		};

		let errorCount = 0;

		try {
			const rootDir = resolve(config.rootDir);

			// 0. Validate root path exists before scanning
			const rootStats = await this.statRoot(rootDir, config.rootDir);
			if ("code" in rootStats) {
				bus?.emitError(IoEvent.FILE_DISCOVERY, PipelinePhase.DISCOVERY, rootStats);
				return result;
			}

			bus?.emitInfo(IoEvent.FILE_DISCOVERY, PipelinePhase.DISCOVERY, "Discovering files", {
				rootDir,
				patterns: config.include.length,
			});

			// 1. Expand glob patterns
			const candidates = rootStats.isFile
				? [rootDir]
				: await this.applyGlobPatterns(config.include, rootDir);
			const excluded = rootStats.isFile
				? new Set<string>()
				: new Set(await this.applyGlobPatterns(config.exclude, rootDir));

			// 2. Filter and validate
			errorCount = await this.filterFiles(candidates, excluded, result, bus);

			// 3. Check for empty result
			if (result.files.length === 0 && errorCount === 0) {
				bus?.emitError(IoEvent.FILE_DISCOVERY, PipelinePhase.DISCOVERY, {
					path: config.rootDir,
					message: "No transcript files found",
					code: "EMPTY_DIRECTORY",
					userMessage: DiscoveryErrors.EMPTY_DIRECTORY,
				});
			}

			// 4. Limit check
			this.validateFileLimit(result, config.maxFiles);
		} catch (error: unknown) {
			const message = error instanceof Error ? error.message : "Unknown error during discovery";
			const code = errorCode(error) ?? "UNKNOWN";
			bus?.emitError(IoEvent.FILE_DISCOVERY, PipelinePhase.DISCOVERY, {
				path: config.rootDir,
				message,
				code,
				userMessage: this.toUserMessage(code),
			});
		}

		bus?.emitInfo(IoEvent.FILE_DISCOVERY, PipelinePhase.DISCOVERY, "Discovery complete", {
			filesFound: result.files.length,
			filesSkipped: result.skipped.length,
		});

		return result;
	}

	/**
	 * Read file contents with validation.
	 */
	public async readFiles(files: string[], maxFileSizeMb: number = 10, bus?: PipelineEventBus): Promise<FileContents> {
		const result: FileContents = {
			contents: [],
			skipped: [],
		};

		bus?.emitInfo(IoEvent.FILE_READ, PipelinePhase.READ, "Reading files", { fileCount: files.length, maxFileSizeMb });

		for (const filePath of files) {
			try {
				const sizeInMb = (await stat(filePath)).size / (1024 * 1024);

				if (sizeInMb > maxFileSizeMb) {
					result.skipped.push({
						path: filePath,
						reason: SkipReason.TOO_LARGE,
					});
					bus?.emitWarn(IoEvent.FILE_READ, PipelinePhase.READ, "File skipped: exceeds size limit", {
						path: filePath,
						reason: "too_large",
						sizeMb: +sizeInMb.toFixed(2),
						maxFileSizeMb,
					});
					continue;
				}

				const content = this.decode(await readFile(filePath));
				if (content === undefined) {
					bus?.emitError(IoEvent.FILE_READ, PipelinePhase.READ, {
						path: filePath,
						message: "Invalid UTF-8 encoding",
						code: "INVALID_ENCODING",
						userMessage: this.toUserMessage("INVALID_ENCODING"),
					});
					continue;
				}

				result.contents.push({
					path: filePath,
					content,
				});
				bus?.emitDebug(IoEvent.FILE_READ, PipelinePhase.READ, "Read file", { path: filePath });
			} catch (error: unknown) {
				const message = error instanceof Error ? error.message : "Error reading file";
				const code = errorCode(error) ?? "EACCES";
				bus?.emitError(IoEvent.FILE_READ, PipelinePhase.READ, {
					path: filePath,
					message,
					code,
					userMessage: this.toUserMessage(code),
				});
			}
		}

		bus?.emitInfo(IoEvent.FILE_READ, PipelinePhase.READ, "Read complete", {
			filesRead: result.contents.length,
			filesSkipped: result.skipped.length,
		});

		return result;
	}

	private decode(bytes: Uint8Array): string | undefined {
		try {
			return utf8.decode(bytes);
		} catch {
			return undefined;
		}
	}

	private async statRoot(rootDir: string, originalPath: string): Promise<{ isFile: boolean } | DiscoveryError> {
		try {
			const stats = await stat(rootDir);
			return { isFile: stats.isFile() };
		} catch (error: unknown) {
			const code = errorCode(error) ?? "ENOENT";
			return {
				path: originalPath,
				message: `Path does not exist: ${rootDir}`,
				code,
				userMessage: this.toUserMessage(code),
			};
		}
	}

	private async applyGlobPatterns(patterns: string[], rootDir: string): Promise<string[]> {
		if (patterns.length === 0) return [];

		try {
			const matches = await fg(patterns, {
				cwd: rootDir,
				onlyFiles: true,
				absolute: true,
				dot: true,
			});
			return [...new Set(matches.map((match) => resolve(match)))].sort();
		} catch (error: unknown) {
			const message = error instanceof Error ? error.message : `Invalid glob pattern: ${patterns.join(", ")}`;
			throw Object.assign(new Error(message), {
				code: "INVALID_GLOB_SYNTAX",
			});
		}
	}

	private async filterFiles(
		files: string[],
		excluded: ReadonlySet<string>,
		result: DiscoveredFiles,
		bus?: PipelineEventBus,
	): Promise<number> {
		let errorCount = 0;

		for (const filePath of files) {
			if (this.isSkipped(filePath, excluded, result, bus)) {
				continue;
			}

			const error = await this.validateAndIncludeFile(filePath, result);
			if (error) {
				bus?.emitError(IoEvent.FILE_DISCOVERY, PipelinePhase.DISCOVERY, error);
				errorCount++;
			}
		}

		return errorCount;
	}

	private isSkipped(
		filePath: string,
		excluded: ReadonlySet<string>,
		result: DiscoveredFiles,
		bus?: PipelineEventBus,
	): boolean {
		if (extname(filePath).toLowerCase() !== ".json") {
			result.skipped.push({
				path: filePath,
				reason: SkipReason.NOT_JSON,
			});
			bus?.emitWarn(IoEvent.FILE_DISCOVERY, PipelinePhase.DISCOVERY, "File skipped: not a JSON file", {
				path: filePath,
				reason: "not_json",
			});
			return true;
		}

		if (excluded.has(filePath)) {
			result.skipped.push({
				path: filePath,
				reason: SkipReason.EXCLUDED_PATTERN,
			});
			bus?.emitWarn(IoEvent.FILE_DISCOVERY, PipelinePhase.DISCOVERY, "File skipped: matched exclusion pattern", {
				path: filePath,
				reason: "excluded_pattern",
			});
			return true;
		}

		return false;
	}

	private async validateAndIncludeFile(filePath: string, result: DiscoveredFiles): Promise<DiscoveryError | null> {
		try {
			await stat(filePath);
			// Size is checked when the file is read
			result.files.push(filePath);
			return null;
		} catch (error: unknown) {
			const message = error instanceof Error ? error.message : "Error accessing file";
			const code = errorCode(error) ?? "EACCES";
			return {
				path: filePath,
				message,
				code,
				userMessage: this.toUserMessage(code),
			};
		}
	}

	private validateFileLimit(result: DiscoveredFiles, limit: number): void {
		if (result.files.length > limit) {
			result.exceededFileLimit = true;
		}
	}

	private toUserMessage(code: string): UserErrorMessage {
		switch (code) {
			case "ENOENT":
				return DiscoveryErrors.PATH_NOT_FOUND;
			case "EACCES":
				return DiscoveryErrors.PERMISSION_DENIED;
			case "INVALID_ENCODING":
				return DiscoveryErrors.INVALID_ENCODING;
			case "INVALID_GLOB_SYNTAX":
				return DiscoveryErrors.INVALID_GLOB_SYNTAX;
			default:
				return DiscoveryErrors.UNEXPECTED_ERROR;
		}
	}
}
