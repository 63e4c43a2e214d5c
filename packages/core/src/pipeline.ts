import { readFile } from "node:fs/promises";
import { basename, extname, resolve } from "node:path";
import {
    DEFAULT_ENGINE_OPTIONS,
    CascadeEngine,
    type CourseCatalog,
    type EngineOptions,
} from "@coursecheck/engine";
import { FileDiscovery, ReportWriter, errorCode, reportFileStem, type FileContent } from "@coursecheck/io";
import { CatalogLoadError, CatalogParser, TranscriptParseError, TranscriptParser } from "@coursecheck/parser";
import { renderJsonReport, renderTextReport } from "@coursecheck/report";
import {
    IoEvent,
    LogLevel,
    PhaseEvent,
    PipelineErrors,
    PipelinePhase,
    ValidationEvent,
} from "@coursecheck/constants";
import { PipelineEventBus } from "@coursecheck/event-bus";
import type { Logger, AppLogObj } from "@coursecheck/logger";
import { mapWithLimit } from "./concurrency";
import { ErrorSubscriber } from "./error-subscriber";
import { LogSubscriber } from "./log-subscriber";
import {
    DEFAULT_CONFIG,
    MAX_WORKERS,
    type Pipeline,
    type PipelineConfig,
    type PipelineResult,
    type PipelineStats,
    type ReportFormat,
    type TranscriptReport,
} from "./types";

interface ResolvedConfig {
    include: string[];
    exclude: string[];
    maxFiles: number;
    maxFileSizeMb: number;
    format: ReportFormat;
    workers: number;
    engineOptions: Readonly<EngineOptions>;
}

function messageOf(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Batch orchestrator:
 * catalog → discovery → read → (parse → validate → render → write) per transcript.
 *
 * The catalog is loaded once and shared read-only by every transcript. A
 * catalog failure stops the run before discovery; any other failure is
 * reported for its own file and the remaining transcripts continue.
 */
export class ValidationPipeline implements Pipeline {
    private readonly fileDiscovery = new FileDiscovery();
    private readonly catalogParser = new CatalogParser();
    private readonly transcriptParser = new TranscriptParser();

    constructor(private readonly clock: () => Date = () => new Date()) {}

    /**
     * Run the full validation pipeline.
     */
    async run(config: PipelineConfig, logger: Logger<AppLogObj>): Promise<PipelineResult> {
        const bus = new PipelineEventBus();
        const logSubscriber = new LogSubscriber(logger);
        const errorSubscriber = new ErrorSubscriber();
        bus.onAll((event) => logSubscriber.handle(event));
        bus.onLevel(LogLevel.ERROR, (event) => errorSubscriber.handle(event));

        const resolved = this.resolveConfig(config);
        const stats: PipelineStats = {
            filesDiscovered: 0,
            filesRead: 0,
            transcriptsParsed: 0,
            transcriptsValidated: 0,
            reportsWritten: 0,
            invalidRegistrations: 0,
            notFoundRegistrations: 0,
            creditWarnings: 0,
            errorsCount: 0,
        };

        // Phase 0: Catalog
        bus.emitPhase(PhaseEvent.PHASE_START, PipelinePhase.CATALOG);
        const catalog = await this.loadCatalog(config.catalogPath, bus);
        bus.emitPhase(PhaseEvent.PHASE_END, PipelinePhase.CATALOG, { courses: catalog?.size ?? 0 });

        if (!catalog) {
            stats.errorsCount = errorSubscriber.count;
            return { reports: [], errors: errorSubscriber.errors, stats };
        }

        // Phase 1: Discovery
        bus.emitPhase(PhaseEvent.PHASE_START, PipelinePhase.DISCOVERY);
        const files = await this.discover(config.paths, resolved, bus);
        stats.filesDiscovered = files.length;
        bus.emitPhase(PhaseEvent.PHASE_END, PipelinePhase.DISCOVERY, { files: files.length });

        // Phase 2: Read
        bus.emitPhase(PhaseEvent.PHASE_START, PipelinePhase.READ);
        const { contents } = await this.fileDiscovery.readFiles(files, resolved.maxFileSizeMb, bus);
        stats.filesRead = contents.length;
        bus.emitPhase(PhaseEvent.PHASE_END, PipelinePhase.READ, { files: contents.length });

        // Phase 3: Parse → validate → render → write, bounded per transcript
        bus.emitPhase(PhaseEvent.PHASE_START, PipelinePhase.VALIDATE, { workers: resolved.workers });
        const engine = new CascadeEngine(catalog, resolved.engineOptions);
        const writer = config.outputDir === undefined ? undefined : new ReportWriter(resolve(config.outputDir));
        const generatedAt = this.clock();

        const processed = await mapWithLimit(contents, resolved.workers, (file) =>
            this.processTranscript(file, engine, writer, resolved.format, generatedAt, bus),
        );

        const reports: TranscriptReport[] = [];
        for (const outcome of processed) {
            if (outcome.parsed) stats.transcriptsParsed++;
            if (!outcome.report) continue;

            reports.push(outcome.report);
            const { result } = outcome.report;
            stats.transcriptsValidated++;
            stats.invalidRegistrations += result.stats.invalidCount;
            stats.notFoundRegistrations += result.stats.notFoundCount;
            stats.creditWarnings += result.stats.creditWarnings;
            if (outcome.report.outputPath !== undefined) stats.reportsWritten++;
        }
        bus.emitPhase(PhaseEvent.PHASE_END, PipelinePhase.VALIDATE, {
            validated: stats.transcriptsValidated,
            invalid: stats.invalidRegistrations,
        });

        stats.errorsCount = errorSubscriber.count;
        return { reports, errors: errorSubscriber.errors, stats };
    }

    private resolveConfig(config: PipelineConfig): ResolvedConfig {
        const workers = Math.trunc(config.workers ?? DEFAULT_CONFIG.workers);
        return {
            include: config.include ?? [...DEFAULT_CONFIG.include],
            exclude: config.exclude ?? [...DEFAULT_CONFIG.exclude],
            maxFiles: config.maxFiles ?? DEFAULT_CONFIG.maxFiles,
            maxFileSizeMb: config.maxFileSizeMb ?? DEFAULT_CONFIG.maxFileSizeMb,
            format: config.format ?? DEFAULT_CONFIG.format,
            workers: Math.min(MAX_WORKERS, Math.max(1, workers)),
            engineOptions: Object.freeze({
                creditLimits: Object.freeze({ ...(config.creditLimits ?? DEFAULT_ENGINE_OPTIONS.creditLimits) }),
            }),
        };
    }

    /**
     * Phase 0: Read and decode the catalog. Undefined when it cannot be used.
     */
    private async loadCatalog(catalogPath: string, bus: PipelineEventBus): Promise<CourseCatalog | undefined> {
        const path = resolve(catalogPath);

        let content: string;
        try {
            content = await readFile(path, "utf-8");
        } catch (error) {
            const message = messageOf(error);
            bus.emitError(ValidationEvent.CATALOG_LOAD, PipelinePhase.CATALOG, {
                path,
                message,
                code: errorCode(error) ?? "EACCES",
                userMessage: PipelineErrors.CATALOG_FAILURE(path, message),
            });
            return undefined;
        }

        try {
            const { catalog, warnings } = this.catalogParser.parse(content, path);
            for (const warning of warnings) {
                bus.emitWarn(ValidationEvent.CATALOG_LOAD, PipelinePhase.CATALOG, warning.message, { path });
            }
            bus.emitInfo(ValidationEvent.CATALOG_LOAD, PipelinePhase.CATALOG, "Catalog loaded", {
                path,
                courses: catalog.size,
            });
            return catalog;
        } catch (error) {
            if (!(error instanceof CatalogLoadError)) throw error;
            bus.emitError(ValidationEvent.CATALOG_LOAD, PipelinePhase.CATALOG, {
                path,
                message: error.message,
                code: error.code,
                userMessage: PipelineErrors.CATALOG_FAILURE(path, error.message),
            });
            return undefined;
        }
    }

    /**
     * Phase 1: Discover transcript files under every path, first occurrence wins.
     */
    private async discover(paths: string[], config: ResolvedConfig, bus: PipelineEventBus): Promise<string[]> {
        const seen = new Set<string>();

        for (const rootDir of paths) {
            const result = await this.fileDiscovery.discover(
                {
                    rootDir,
                    include: config.include,
                    exclude: config.exclude,
                    maxFiles: config.maxFiles,
                    maxFileSizeMb: config.maxFileSizeMb,
                },
                bus,
            );

            if (result.exceededFileLimit) {
                bus.emitWarn(IoEvent.FILE_DISCOVERY, PipelinePhase.DISCOVERY, "File count exceeds limit", {
                    path: rootDir,
                    files: result.files.length,
                    maxFiles: config.maxFiles,
                });
            }

            for (const file of result.files) {
                seen.add(file);
            }
        }

        return [...seen];
    }

    private async processTranscript(
        file: FileContent,
        engine: CascadeEngine,
        writer: ReportWriter | undefined,
        format: ReportFormat,
        generatedAt: Date,
        bus: PipelineEventBus,
    ): Promise<{ parsed: boolean; report?: TranscriptReport }> {
        // Parse
        let parsed: ReturnType<TranscriptParser["parse"]>;
        try {
            parsed = this.transcriptParser.parse(file.content, file.path);
        } catch (error) {
            if (!(error instanceof TranscriptParseError)) throw error;
            bus.emitError(ValidationEvent.TRANSCRIPT_PARSE, PipelinePhase.PARSE, {
                path: file.path,
                message: error.message,
                code: error.code,
                userMessage: PipelineErrors.PARSE_FAILURE(file.path, error.message),
            });
            return { parsed: false };
        }

        const warnings = parsed.warnings.map((warning) => warning.message);
        for (const warning of parsed.warnings) {
            bus.emitWarn(ValidationEvent.TRANSCRIPT_PARSE, PipelinePhase.PARSE, warning.message, {
                path: file.path,
                at: warning.path,
            });
        }

        // Validate
        let result: ReturnType<CascadeEngine["validate"]>;
        try {
            result = engine.validate(parsed.transcript);
        } catch (error) {
            const message = messageOf(error);
            bus.emitError(ValidationEvent.TRANSCRIPT_VALIDATION, PipelinePhase.VALIDATE, {
                path: file.path,
                message,
                code: "VALIDATION_FAILED",
                userMessage: PipelineErrors.VALIDATE_FAILURE(file.path, message),
            });
            return { parsed: true };
        }

        bus.emitDebug(ValidationEvent.TRANSCRIPT_VALIDATION, PipelinePhase.VALIDATE, "Transcript validated", {
            path: file.path,
            studentId: result.student.id,
            invalid: result.stats.invalidCount,
            notFound: result.stats.notFoundCount,
        });

        // Render
        const content = format === "json" ? renderJsonReport(result) : renderTextReport(result, { generatedAt });
        const report: TranscriptReport = {
            source: file.path,
            studentId: result.student.id,
            result,
            content,
            warnings,
        };

        // Write
        if (writer) {
            const outputPath = await writer.write(reportFileName(result.student.id, file.path, format), content, bus);
            if (outputPath !== undefined) {
                report.outputPath = outputPath;
            }
        }

        return { parsed: true, report };
    }
}

/**
 * `validation_report_<studentId>.<ext>`, or the transcript's base name when it has no id.
 */
export function reportFileName(studentId: string, sourcePath: string, format: ReportFormat): string {
    const stem = reportFileStem(studentId) || reportFileStem(basename(sourcePath, extname(sourcePath)));
    return `validation_report_${stem}.${format === "json" ? "json" : "txt"}`;
}
