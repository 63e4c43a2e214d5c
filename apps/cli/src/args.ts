import {
    Command as CommanderProgram,
    CommanderError,
    InvalidArgumentError,
} from "commander";
import { CLIDescriptions, CLIErrors } from "@coursecheck/constants";
import type { ReportFormat } from "@coursecheck/core";
import { Command, type ParseOptions } from "./types";

export const VERSION = "0.1.0";

/**
 * Collect repeatable option values into an array.
 */
function collect(value: string, previous: string[]): string[] {
    return [...previous, value];
}

/**
 * Parse and validate --workers value.
 */
function parseWorkers(value: string): number {
    const n = Number.parseInt(value, 10);
    if (Number.isNaN(n) || n < 1 || n > 32) {
        throw new InvalidArgumentError("must be between 1 and 32");
    }
    return n;
}

function parseFormat(value: string): ReportFormat {
    if (value === "text" || value === "json") {
        return value;
    }
    throw new InvalidArgumentError(CLIErrors.INVALID_FORMAT(value));
}

/**
 * Add shared options to a subcommand.
 */
function addSharedOptions(cmd: CommanderProgram): CommanderProgram {
    return cmd
        .option("--catalog <path>", "course catalog JSON file")
        .option("--config <path>", "use specific config file")
        .option("--no-config", "skip config file loading")
        .option(
            "--include <pattern>",
            "inclusion patterns (replaces defaults, repeatable)",
            collect,
            [],
        )
        .option(
            "--exclude <pattern>",
            "additional exclusion patterns (repeatable)",
            collect,
            [],
        )
        .option(
            "--workers <n>",
            "transcripts validated at once (1-32, default: 4)",
            parseWorkers,
        )
        .option("--format <format>", "report format: text or json", parseFormat)
        .option("--out <dir>", "report output directory (batch command)")
        .option("-v, --verbose", "show detailed output", false)
        .option("-q, --quiet", "show errors only", false)
        .option("--json", "output as JSON lines", false)
        .option("--serial", "validate transcripts one at a time", false);
}

/**
 * Create the commander program with all subcommands.
 */
export function createProgram(): CommanderProgram {
    const program = new CommanderProgram();
    program
        .name("coursecheck")
        .description(CLIDescriptions.PROGRAM)
        .version(VERSION)
        .exitOverride()
        .configureOutput({
            writeOut: () => {},
            writeErr: () => {},
        });

    addSharedOptions(
        program
            .command(Command.VALIDATE)
            .description(CLIDescriptions.VALIDATE)
            .argument("[paths...]", "transcript files or directories"),
    );

    addSharedOptions(
        program
            .command(Command.BATCH)
            .description(CLIDescriptions.BATCH)
            .argument("[paths...]", "transcript files or directories"),
    );

    return program;
}

function optionalString(value: unknown): string | undefined {
    return typeof value === "string" ? value : undefined;
}

function stringList(value: unknown): string[] {
    return Array.isArray(value) ? value.filter((item): item is string => typeof item === "string") : [];
}

/**
 * Map commander-parsed options to our ParseOptions type.
 */
function buildParseOptions(
    command: Command,
    paths: string[],
    opts: Record<string, unknown>,
): ParseOptions {
    // Post-parse validation: conflicting flags
    if (opts.verbose === true && opts.quiet === true) {
        throw new Error(CLIErrors.CONFLICTING_FLAGS);
    }

    const format = opts.format;
    const workers = opts.workers;

    return {
        command,
        paths: paths.length > 0 ? paths : ["."],
        catalogPath: optionalString(opts.catalog),
        configPath: optionalString(opts.config),
        outputDir: optionalString(opts.out),
        format: format === "text" || format === "json" ? format : undefined,
        verbose: opts.verbose === true,
        quiet: opts.quiet === true,
        json: opts.json === true,
        serial: opts.serial === true,
        workers: typeof workers === "number" ? workers : undefined,
        noConfig: opts.config === false,
        include: stringList(opts.include),
        exclude: stringList(opts.exclude),
        help: false,
        version: false,
    };
}

function flagOnly(flag: "help" | "version"): ParseOptions {
    return {
        command: Command.VALIDATE,
        paths: ["."],
        verbose: false,
        quiet: false,
        json: false,
        serial: false,
        noConfig: false,
        include: [],
        exclude: [],
        help: flag === "help",
        version: flag === "version",
    };
}

/**
 * Parse CLI arguments into ParseOptions using commander.
 *
 * @param args - Command-line arguments (without program name)
 * @throws Error if unknown flag, missing value, or invalid subcommand
 */
export function parseArgs(args: string[]): ParseOptions {
    const program = createProgram();

    let result: ParseOptions | undefined;

    for (const cmd of program.commands) {
        const name = cmd.name();
        const command = name === Command.VALIDATE ? Command.VALIDATE : name === Command.BATCH ? Command.BATCH : undefined;
        if (!command) continue;

        cmd.action((paths: string[], opts: Record<string, unknown>) => {
            result = buildParseOptions(command, paths, opts);
        });
    }

    try {
        program.parse(args, { from: "user" });
    } catch (err) {
        if (err instanceof CommanderError) {
            if (err.code === "commander.helpDisplayed") {
                return flagOnly("help");
            }
            // Bare program name: commander prints help and exits with an error
            if (err.code === "commander.help") {
                throw new Error(CLIErrors.MISSING_SUBCOMMAND);
            }
            if (err.code === "commander.version") {
                return flagOnly("version");
            }
            // Map commander error messages to our format
            throw new Error(err.message.replace(/^error: /, ""));
        }
        throw err;
    }

    if (!result) {
        throw new Error(CLIErrors.MISSING_SUBCOMMAND);
    }

    return result;
}
