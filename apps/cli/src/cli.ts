import { extname } from "node:path";
import type { Pipeline, PipelineConfig, PipelineResult } from "@coursecheck/core";
import { CLIErrors } from "@coursecheck/constants";
import { createLogger, createJsonLogger, type LogMode } from "@coursecheck/logger";
import { createProgram, parseArgs } from "./args";
import { ConfigLoader, DEFAULT_CONFIG, type FileConfig } from "./config-loader";
import { ProgressReporter } from "./progress-reporter";
import { Command, ExitCode, type OutputMode, type ParseOptions } from "./types";

const LOG_MODE_MAP: Record<OutputMode, LogMode> = {
    quiet: "error",
    normal: "error",
    verbose: "debug",
    json: "error",
};

/**
 * Main CLI class.
 */
export class CLI {
    private pipeline: Pipeline;

    constructor(pipeline: Pipeline) {
        this.pipeline = pipeline;
    }

    /**
     * Run CLI with given arguments.
     * @returns Exit code
     */
    async run(args: string[]): Promise<number> {
        // Default logger until the output mode is known
        let logger = createLogger("coursecheck", "info");
        let options: ParseOptions;

        // Parse CLI arguments (unknown flags, missing subcommand, conflicting options → CONFIG_ERROR)
        try {
            options = parseArgs(args);
        } catch (error) {
            logger.error(error instanceof Error ? error.message : String(error));
            return ExitCode.CONFIG_ERROR;
        }

        if (options.help) {
            console.log(createProgram().helpInformation());
            return ExitCode.SUCCESS;
        }

        if (options.version) {
            console.log(createProgram().version());
            return ExitCode.SUCCESS;
        }

        // Recreate logger with user's output mode; JSON log lines go to stderr
        const mode = this.getOutputMode(options);
        logger = mode === "json"
            ? createJsonLogger("coursecheck", LOG_MODE_MAP[mode], process.stderr)
            : createLogger("coursecheck", LOG_MODE_MAP[mode]);

        let config: PipelineConfig;
        try {
            config = await this.buildConfig(options.command, options);
        } catch (error) {
            logger.error(`Config error: ${error instanceof Error ? error.message : String(error)}`);
            return ExitCode.CONFIG_ERROR;
        }

        const result = await this.pipeline.run(config, logger);

        const reporter = new ProgressReporter(mode);
        for (const error of result.errors) {
            reporter.error(error);
        }
        reporter.complete(options.command, result);

        return this.getExitCode(result);
    }

    /**
     * Build PipelineConfig based on command and options.
     * - VALIDATE: no outputDir, reports go to stdout
     * - BATCH: outputDir from --out, config, or the default
     */
    async buildConfig(command: Command, options: ParseOptions): Promise<PipelineConfig> {
        let baseConfig: FileConfig;

        if (options.noConfig) {
            baseConfig = { ...DEFAULT_CONFIG };
        } else {
            const configPath = options.configPath ?? ConfigLoader.findConfigFile();
            baseConfig = await ConfigLoader.load(configPath);
        }

        const { catalogPath, outputDir, ...merged } = ConfigLoader.mergeWithCLI(baseConfig, options);

        // A single transcript file must be JSON
        const [singlePath] = options.paths;
        if (options.paths.length === 1 && singlePath !== undefined) {
            const ext = extname(singlePath);
            if (ext && ext.toLowerCase() !== ".json") {
                throw new Error(CLIErrors.NOT_JSON(singlePath));
            }
        }

        if (!catalogPath) {
            throw new Error(CLIErrors.CATALOG_REQUIRED);
        }

        const config: PipelineConfig = {
            ...merged,
            paths: options.paths,
            catalogPath,
        };

        if (command === Command.BATCH) {
            config.outputDir = outputDir ?? DEFAULT_CONFIG.outputDir;
        }

        return config;
    }

    private getOutputMode(options: ParseOptions): OutputMode {
        if (options.json) return "json";
        if (options.quiet) return "quiet";
        if (options.verbose) return "verbose";
        return "normal";
    }

    private getExitCode(result: PipelineResult): number {
        if (result.errors.length > 0) {
            return ExitCode.VALIDATION_ERROR;
        }

        if (result.stats.filesDiscovered === 0) {
            return ExitCode.VALIDATION_ERROR;
        }

        if (result.stats.invalidRegistrations > 0) {
            return ExitCode.VALIDATION_ERROR;
        }

        return ExitCode.SUCCESS;
    }
}
