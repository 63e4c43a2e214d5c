import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { PipelineResult, TranscriptReport } from "@coursecheck/core";
import { CourseCatalog, validateTranscript } from "@coursecheck/engine";
import { PipelinePhase } from "@coursecheck/constants";
import { ProgressReporter } from "../src/progress-reporter";
import { Command } from "../src/types";

const catalog = new CourseCatalog([
    { code: "01206221", name: "Intro to Things", credits: "3", prerequisites: [], corequisites: [], prerequisiteGroups: [] },
]);

function report(overrides: Partial<TranscriptReport> = {}): TranscriptReport {
    const result = validateTranscript(
        {
            student: { id: "6500000001", name: "Test Student", fieldOfStudy: "", admissionDate: "" },
            semesters: [
                {
                    type: "First",
                    year: "2020",
                    semesterGpa: null,
                    cumulativeGpa: null,
                    registrations: [{ code: "01206221", name: "Intro to Things", grade: "A", credits: 3 }],
                },
            ],
        },
        catalog,
    );
    return {
        source: "/t/a.json",
        studentId: "6500000001",
        result,
        content: "REPORT TEXT\n",
        warnings: [],
        ...overrides,
    };
}

function pipelineResult(reports: TranscriptReport[]): PipelineResult {
    return {
        reports,
        errors: [],
        stats: {
            filesDiscovered: reports.length,
            filesRead: reports.length,
            transcriptsParsed: reports.length,
            transcriptsValidated: reports.length,
            reportsWritten: reports.filter((r) => r.outputPath !== undefined).length,
            invalidRegistrations: 0,
            notFoundRegistrations: 0,
            creditWarnings: 0,
            errorsCount: 0,
        },
    };
}

describe("ProgressReporter", () => {
    let printed: unknown[][];

    beforeEach(() => {
        printed = [];
        vi.spyOn(console, "log").mockImplementation((...args: unknown[]) => {
            printed.push(args);
        });
        vi.spyOn(console, "error").mockImplementation(() => {});
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it("should print each report then the summary for validate", () => {
        new ProgressReporter("normal").complete(Command.VALIDATE, pipelineResult([report()]));

        expect(printed).toEqual([
            ["REPORT TEXT\n"],
            ["Validation complete: 1 transcript(s), 0 invalid, 0 not found, 0 error(s)"],
        ]);
    });

    it("should list written files for batch", () => {
        new ProgressReporter("normal").complete(
            Command.BATCH,
            pipelineResult([report({ outputPath: "/out/validation_report_6500000001.txt" })]),
        );

        expect(printed).toEqual([
            [
                "Validation complete: 1 transcript(s), 0 invalid, 0 not found, 0 error(s)\n" +
                    "Reports written: 1\n" +
                    "  /out/validation_report_6500000001.txt",
            ],
        ]);
    });

    it("should print nothing in quiet mode", () => {
        new ProgressReporter("quiet").complete(Command.VALIDATE, pipelineResult([report()]));

        expect(printed).toEqual([]);
    });

    it("should add per-transcript details in verbose mode", () => {
        new ProgressReporter("verbose").complete(
            Command.BATCH,
            pipelineResult([report({ warnings: ["Semester First 2020 is listed after Second 2020; order kept as given"] })]),
        );

        expect(printed[0]).toEqual([
            "Per-transcript details:\n" +
                "  /t/a.json (6500000001) — 1 checked, 0 invalid, 0 not found\n" +
                "    ! Semester First 2020 is listed after Second 2020; order kept as given",
        ]);
    });

    it("should emit JSON lines in json mode", () => {
        new ProgressReporter("json").complete(Command.VALIDATE, pipelineResult([report()]));

        expect(printed).toHaveLength(2);
        const first = JSON.parse(String(printed[0]?.[0]));
        expect(first.type).toBe("report");
        expect(first.studentId).toBe("6500000001");
        expect(first.result.stats.validCount).toBe(1);
        expect(JSON.parse(String(printed[1]?.[0])).type).toBe("complete");
    });

    it("should format errors with the user message", () => {
        new ProgressReporter("normal").error({
            phase: PipelinePhase.WRITE,
            path: "/out/x.txt",
            message: "EACCES: permission denied",
            code: "EACCES",
            userMessage: ['Failed to write report "/out/x.txt"', "EACCES: permission denied"],
        });

        expect(vi.mocked(console.error).mock.calls[0]).toEqual([
            '[write] /out/x.txt: Failed to write report "/out/x.txt"\n  EACCES: permission denied\n  EACCES: permission denied',
        ]);
    });
});
