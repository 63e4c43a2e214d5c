import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { PipelinePhase } from "@coursecheck/constants";
import { createLogger } from "@coursecheck/logger";
import { ValidationPipeline, reportFileName } from "../src/pipeline";
import type { PipelineConfig } from "../src/types";

const logger = createLogger("pipeline-test", "silent");
const clock = () => new Date(2024, 0, 2, 3, 4, 5);

function transcriptJson(id: string, semesters: unknown[]): string {
    return JSON.stringify({
        student_info: { id, name: "Test Student", field_of_study: "Test Engineering", date_admission: "2020-06-01" },
        semesters,
    });
}

function semester(type: string, year: string, courses: unknown[]) {
    return { semester_type: type, year, sem_gpa: null, cum_gpa: null, courses };
}

describe("ValidationPipeline", () => {
    let testDir: string;
    let catalogPath: string;
    let transcriptDir: string;
    const pipeline = new ValidationPipeline(clock);

    function config(overrides: Partial<PipelineConfig> = {}): PipelineConfig {
        return { paths: [transcriptDir], catalogPath, ...overrides };
    }

    beforeAll(async () => {
        testDir = await mkdtemp(join(tmpdir(), "coursecheck-core-"));
        transcriptDir = join(testDir, "transcripts");
        await mkdir(transcriptDir, { recursive: true });

        catalogPath = join(testDir, "catalog.json");
        await writeFile(
            catalogPath,
            JSON.stringify({
                program: "Test Engineering",
                industrial_engineering_courses: [
                    { code: "01206221", name: "Intro to Things", credits: "3(3-0-6)", prerequisites: [] },
                    { code: "01206321", name: "Next Things", credits: "3(3-0-6)", prerequisites: ["01206221"] },
                ],
            }),
        );

        await writeFile(
            join(transcriptDir, "alice.json"),
            transcriptJson("6500000001", [
                semester("First", "2020", [{ code: "01206221", name: "Intro to Things", grade: "A", credits: 3 }]),
                semester("Second", "2020", [{ code: "01206321", name: "Next Things", grade: "B", credits: 3 }]),
            ]),
        );
        await writeFile(
            join(transcriptDir, "bob.json"),
            transcriptJson("6500000002", [
                semester("First", "2020", [{ code: "01206321", name: "Next Things", grade: "C", credits: 3 }]),
            ]),
        );
        await writeFile(join(transcriptDir, "broken.json"), "{ not json");
        await writeFile(
            join(transcriptDir, "no-id.json"),
            transcriptJson("", [
                semester("First", "2021", [{ code: "99999999", name: "Unknown Course", grade: "A", credits: 3 }]),
            ]),
        );
        await writeFile(join(transcriptDir, "notes.txt"), "not a transcript");
    });

    afterAll(async () => {
        await rm(testDir, { recursive: true, force: true });
    });

    describe("batch run", () => {
        it("should validate every readable transcript and write one report each", async () => {
            const outputDir = join(testDir, "out-batch");
            const result = await pipeline.run(config({ outputDir }), logger);

            expect(result.reports.map((report) => report.studentId)).toEqual(["6500000001", "6500000002", ""]);
            expect(result.stats).toEqual({
                filesDiscovered: 4,
                filesRead: 4,
                transcriptsParsed: 3,
                transcriptsValidated: 3,
                reportsWritten: 3,
                invalidRegistrations: 1,
                notFoundRegistrations: 1,
                creditWarnings: 0,
                errorsCount: 1,
            });
            expect(result.reports.map((report) => report.outputPath)).toEqual([
                join(outputDir, "validation_report_6500000001.txt"),
                join(outputDir, "validation_report_6500000002.txt"),
                join(outputDir, "validation_report_no-id.txt"),
            ]);
        });

        it("should write the rendered report content", async () => {
            const outputDir = join(testDir, "out-content");
            const result = await pipeline.run(config({ outputDir }), logger);
            const bob = result.reports[1];

            const written = await readFile(join(outputDir, "validation_report_6500000002.txt"), "utf-8");
            expect(written).toBe(bob?.content);
            expect(written.split("\n")[2]).toBe("Generated: 2024-01-02 03:04:05");
            expect(bob?.result.invalidRegistrations[0]?.reason).toBe("Prerequisite 01206221 not satisfied");
        });

        it("should report a transcript that fails to parse and continue", async () => {
            const result = await pipeline.run(config(), logger);

            expect(result.errors).toHaveLength(1);
            expect(result.errors[0]?.phase).toBe(PipelinePhase.PARSE);
            expect(result.errors[0]?.code).toBe("INVALID_JSON");
            expect(result.errors[0]?.path).toBe(join(transcriptDir, "broken.json"));
            expect(result.errors[0]?.userMessage[0]).toBe(
                `Failed to parse transcript "${join(transcriptDir, "broken.json")}"`,
            );
        });

        it("should skip the write phase without an output directory", async () => {
            const result = await pipeline.run(config(), logger);

            expect(result.stats.reportsWritten).toBe(0);
            expect(result.reports.every((report) => report.outputPath === undefined)).toBe(true);
        });

        it("should render JSON reports when asked", async () => {
            const outputDir = join(testDir, "out-json");
            const result = await pipeline.run(config({ format: "json", outputDir }), logger);
            const alice = result.reports[0];

            expect(alice?.outputPath).toBe(join(outputDir, "validation_report_6500000001.json"));
            const written = JSON.parse(await readFile(join(outputDir, "validation_report_6500000001.json"), "utf-8"));
            expect(written.stats.validCount).toBe(2);
            expect(written.student.id).toBe("6500000001");
        });

        it("should give the same reports whatever the worker count", async () => {
            const serial = await pipeline.run(config({ workers: 1 }), logger);
            const parallel = await pipeline.run(config({ workers: 8 }), logger);

            expect(parallel.reports.map((report) => report.content)).toEqual(
                serial.reports.map((report) => report.content),
            );
        });

        it("should apply configured credit limits", async () => {
            const result = await pipeline.run(config({ creditLimits: { regular: 2, summer: 9 } }), logger);

            expect(result.stats.creditWarnings).toBe(4);
            expect(result.reports[0]?.result.semesters[0]?.creditWarning).toBe(
                "NOTICE: Exceeds typical 2 credits for regular semester (registered: 3)",
            );
        });
    });

    describe("catalog failures", () => {
        it("should stop before discovery when the catalog is missing", async () => {
            const missing = join(testDir, "missing.json");
            const result = await pipeline.run(config({ catalogPath: missing }), logger);

            expect(result.reports).toEqual([]);
            expect(result.stats.filesDiscovered).toBe(0);
            expect(result.errors).toHaveLength(1);
            expect(result.errors[0]?.phase).toBe(PipelinePhase.CATALOG);
            expect(result.errors[0]?.code).toBe("ENOENT");
            expect(result.errors[0]?.userMessage).toEqual([
                `Failed to load course catalog "${missing}"`,
                result.errors[0]?.message,
                "No transcript was validated",
            ]);
        });

        it("should stop when a catalog record is invalid", async () => {
            const badCatalog = join(testDir, "bad-catalog.json");
            await writeFile(badCatalog, JSON.stringify([{ name: "No Code", credits: 3 }]));

            const result = await pipeline.run(config({ catalogPath: badCatalog }), logger);

            expect(result.reports).toEqual([]);
            expect(result.errors.map((error) => error.code)).toEqual(["INVALID_RECORD"]);
        });
    });
});

describe("reportFileName", () => {
    it("should name the report after the student id", () => {
        expect(reportFileName("6500000001", "/data/a.json", "text")).toBe("validation_report_6500000001.txt");
        expect(reportFileName("6500000001", "/data/a.json", "json")).toBe("validation_report_6500000001.json");
    });

    it("should fall back to the transcript base name", () => {
        expect(reportFileName("", "/data/student one.json", "text")).toBe("validation_report_student_one.txt");
    });

    it("should replace characters unsafe in file names", () => {
        expect(reportFileName("65/00 01", "/data/a.json", "text")).toBe("validation_report_65_00_01.txt");
    });
});
