import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it, vi } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { Pipeline, PipelineConfig, PipelineResult, PipelineStats } from "@coursecheck/core";
import type { Logger, AppLogObj } from "@coursecheck/logger";
import { PipelinePhase } from "@coursecheck/constants";
import { CLI } from "../src/cli";
import { Command, ExitCode, type ParseOptions } from "../src/types";

// ============================================================
// Mock Pipeline
// ============================================================

function createMockStats(overrides?: Partial<PipelineStats>): PipelineStats {
    return {
        filesDiscovered: 1,
        filesRead: 1,
        transcriptsParsed: 1,
        transcriptsValidated: 1,
        reportsWritten: 0,
        invalidRegistrations: 0,
        notFoundRegistrations: 0,
        creditWarnings: 0,
        errorsCount: 0,
        ...overrides,
    };
}

function createMockResult(overrides?: Partial<PipelineResult>): PipelineResult {
    return {
        reports: [],
        errors: [],
        stats: createMockStats(),
        ...overrides,
    };
}

function createMockPipeline(result: PipelineResult = createMockResult()) {
    const calls: { config: PipelineConfig; logger: Logger<AppLogObj> }[] = [];
    const pipeline: Pipeline = {
        async run(config: PipelineConfig, logger: Logger<AppLogObj>): Promise<PipelineResult> {
            calls.push({ config, logger });
            return result;
        },
    };
    return { pipeline, calls };
}

function options(overrides: Partial<ParseOptions> = {}): ParseOptions {
    return {
        command: Command.VALIDATE,
        paths: ["."],
        verbose: false,
        quiet: false,
        json: false,
        serial: false,
        noConfig: true,
        include: [],
        exclude: [],
        help: false,
        version: false,
        ...overrides,
    };
}

describe("CLI", () => {
    let testDir: string;

    beforeAll(async () => {
        testDir = await mkdtemp(join(tmpdir(), "coursecheck-cli-"));
    });

    afterAll(async () => {
        await rm(testDir, { recursive: true, force: true });
    });

    beforeEach(() => {
        vi.spyOn(console, "log").mockImplementation(() => {});
        vi.spyOn(console, "error").mockImplementation(() => {});
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    // ============================================================
    // Feature: Help and Version
    // ============================================================

    describe("Help and Version", () => {
        it("should print help and succeed", async () => {
            const { pipeline, calls } = createMockPipeline();
            const exitCode = await new CLI(pipeline).run(["--help"]);

            expect(exitCode).toBe(ExitCode.SUCCESS);
            expect(calls).toHaveLength(0);
            expect(String(vi.mocked(console.log).mock.calls[0]?.[0])).toContain("Usage: coursecheck");
        });

        it("should print the version and succeed", async () => {
            const { pipeline } = createMockPipeline();
            const exitCode = await new CLI(pipeline).run(["--version"]);

            expect(exitCode).toBe(ExitCode.SUCCESS);
            expect(vi.mocked(console.log).mock.calls[0]).toEqual(["0.1.0"]);
        });
    });

    // ============================================================
    // Feature: Argument and Config Errors
    // ============================================================

    describe("Config Errors", () => {
        it("should return CONFIG_ERROR for missing subcommand", async () => {
            const { pipeline } = createMockPipeline();
            expect(await new CLI(pipeline).run([])).toBe(ExitCode.CONFIG_ERROR);
        });

        it("should return CONFIG_ERROR for unknown subcommand", async () => {
            const { pipeline } = createMockPipeline();
            expect(await new CLI(pipeline).run(["sync", testDir])).toBe(ExitCode.CONFIG_ERROR);
        });

        it("should return CONFIG_ERROR without a catalog", async () => {
            const { pipeline, calls } = createMockPipeline();
            expect(await new CLI(pipeline).run(["validate", testDir, "--no-config", "-q"])).toBe(ExitCode.CONFIG_ERROR);
            expect(calls).toHaveLength(0);
        });

        it("should return CONFIG_ERROR for an invalid config file", async () => {
            const configPath = join(testDir, "bad-config.json");
            await writeFile(configPath, "{ nope");
            const { pipeline } = createMockPipeline();

            const exitCode = await new CLI(pipeline).run(["validate", testDir, "--config", configPath, "-q"]);

            expect(exitCode).toBe(ExitCode.CONFIG_ERROR);
        });
    });

    // ============================================================
    // Feature: Command-Specific Config Building (buildConfig)
    // ============================================================

    describe("buildConfig", () => {
        it("should leave outputDir unset for VALIDATE", async () => {
            const { pipeline } = createMockPipeline();
            const config = await new CLI(pipeline).buildConfig(
                Command.VALIDATE,
                options({ catalogPath: "courses.json", outputDir: "out" }),
            );

            expect(config.outputDir).toBeUndefined();
            expect(config.catalogPath).toBe("courses.json");
            expect(config.paths).toEqual(["."]);
        });

        it("should default outputDir for BATCH", async () => {
            const { pipeline } = createMockPipeline();
            const config = await new CLI(pipeline).buildConfig(
                Command.BATCH,
                options({ command: Command.BATCH, catalogPath: "courses.json" }),
            );

            expect(config.outputDir).toBe("reports");
            expect(config.include).toEqual(["**/*.json"]);
            expect(config.creditLimits).toEqual({ regular: 22, summer: 9 });
        });

        it("should take --out for BATCH", async () => {
            const { pipeline } = createMockPipeline();
            const config = await new CLI(pipeline).buildConfig(
                Command.BATCH,
                options({ command: Command.BATCH, catalogPath: "courses.json", outputDir: "elsewhere" }),
            );

            expect(config.outputDir).toBe("elsewhere");
        });

        it("should reject a single non-JSON file", async () => {
            const { pipeline } = createMockPipeline();

            await expect(
                new CLI(pipeline).buildConfig(Command.VALIDATE, options({ paths: ["notes.txt"], catalogPath: "c.json" })),
            ).rejects.toThrow('Not a transcript file: "notes.txt". Expected .json extension');
        });

        it("should read the catalog from a config file", async () => {
            const configPath = join(testDir, "with-catalog.json");
            await writeFile(configPath, JSON.stringify({ catalog: "courses.json", limits: { regular: 18 } }));
            const { pipeline } = createMockPipeline();

            const config = await new CLI(pipeline).buildConfig(
                Command.VALIDATE,
                options({ noConfig: false, configPath }),
            );

            expect(config.catalogPath).toBe(join(testDir, "courses.json"));
            expect(config.creditLimits).toEqual({ regular: 18, summer: 9 });
        });
    });

    // ============================================================
    // Feature: JSON Logging
    // ============================================================

    describe("JSON Logging", () => {
        it("should hand the pipeline a JSON logger at error level", async () => {
            const { pipeline, calls } = createMockPipeline();

            await new CLI(pipeline).run(["validate", ".", "--no-config", "--catalog", "courses.json", "--json"]);

            expect(calls[0]?.logger.settings.type).toBe("json");
            expect(calls[0]?.logger.settings.minLevel).toBe(5);
        });

        it("should write a config error to stderr as one JSON line", async () => {
            const write = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
            const { pipeline, calls } = createMockPipeline();

            const code = await new CLI(pipeline).run(["validate", ".", "--no-config", "--json"]);

            expect(code).toBe(ExitCode.CONFIG_ERROR);
            expect(calls).toHaveLength(0);
            const lines = write.mock.calls.map(([chunk]) => String(chunk)).filter((line) => line.includes("Config error"));
            expect(lines).toHaveLength(1);
            const parsed: unknown = JSON.parse(lines[0] ?? "");
            expect(parsed).toMatchObject({
                0: "Config error: Course catalog required. Use --catalog or set catalog in config",
                _meta: { logLevelName: "ERROR" },
            });
        });
    });

    // ============================================================
    // Feature: Exit Codes
    // ============================================================

    describe("Exit Codes", () => {
        const args = ["validate", ".", "--no-config", "--catalog", "courses.json", "-q"];

        it("should return SUCCESS when every registration is valid", async () => {
            const { pipeline, calls } = createMockPipeline();

            expect(await new CLI(pipeline).run(args)).toBe(ExitCode.SUCCESS);
            expect(calls[0]?.config.catalogPath).toBe("courses.json");
        });

        it("should return VALIDATION_ERROR for invalid registrations", async () => {
            const { pipeline } = createMockPipeline(
                createMockResult({ stats: createMockStats({ invalidRegistrations: 2 }) }),
            );

            expect(await new CLI(pipeline).run(args)).toBe(ExitCode.VALIDATION_ERROR);
        });

        it("should return VALIDATION_ERROR when no transcripts were found", async () => {
            const { pipeline } = createMockPipeline(createMockResult({ stats: createMockStats({ filesDiscovered: 0 }) }));

            expect(await new CLI(pipeline).run(args)).toBe(ExitCode.VALIDATION_ERROR);
        });

        it("should return VALIDATION_ERROR and print pipeline errors", async () => {
            const { pipeline } = createMockPipeline(
                createMockResult({
                    errors: [
                        {
                            phase: PipelinePhase.PARSE,
                            path: "/t/broken.json",
                            message: "Invalid JSON: Unexpected token",
                            code: "INVALID_JSON",
                            userMessage: ["Failed to parse transcript \"/t/broken.json\""],
                        },
                    ],
                }),
            );

            expect(await new CLI(pipeline).run(args)).toBe(ExitCode.VALIDATION_ERROR);
            expect(vi.mocked(console.error).mock.calls[0]).toEqual([
                "[parse] /t/broken.json: Invalid JSON: Unexpected token",
            ]);
        });

        it("should pass --serial to the pipeline as one worker", async () => {
            const { pipeline, calls } = createMockPipeline();

            await new CLI(pipeline).run([...args, "--serial", "--workers", "8"]);

            expect(calls[0]?.config.workers).toBe(1);
        });
    });
});
