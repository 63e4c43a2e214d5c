import fc from "fast-check";
import { describe, expect, it } from "vitest";
import { CourseCatalog } from "../src/catalog";
import { CascadeEngine, validateTranscript } from "../src/cascade";
import { GRADES, isPassing } from "../src/grades";
import {
    ReasonKind,
    SEMESTER_TYPES,
    VerdictStatus,
    type CourseCatalogEntry,
    type CourseRegistration,
    type Semester,
    type Transcript,
    type ValidationResult,
} from "../src/types";
import { catalogOf, course, reg, semester, transcript } from "./fixtures";

const CATALOG_CODES = ["C0", "C1", "C2", "C3", "C4", "C5"];
const ALL_CODES = [...CATALOG_CODES, "U1", "U2"];

// The primary list only points at lower-numbered courses; groups may point at
// any other course, so same-semester cycles occur.
const catalogArb: fc.Arbitrary<CourseCatalogEntry[]> = fc.tuple(
    ...CATALOG_CODES.map((code, index) =>
        fc.record({
            prerequisites: fc.subarray(CATALOG_CODES.slice(0, index)),
            groups: fc.array(
                fc.record({
                    courses: fc.subarray(CATALOG_CODES.filter((other) => other !== code), { minLength: 1 }),
                    concurrentAllowed: fc.boolean(),
                }),
                { maxLength: 2 },
            ),
        }).map(({ prerequisites, groups }) => course(code, prerequisites, groups)),
    ),
);

const registrationArb: fc.Arbitrary<CourseRegistration> = fc.record({
    code: fc.constantFrom(...ALL_CODES),
    name: fc.constant("Generated"),
    grade: fc.constantFrom(...GRADES),
    credits: fc.integer({ min: 0, max: 6 }),
});

const semesterArb: fc.Arbitrary<Semester> = fc.record({
    type: fc.constantFrom(...SEMESTER_TYPES),
    year: fc.constantFrom("2020", "2021", "2022"),
    semesterGpa: fc.constant(null),
    cumulativeGpa: fc.constant(null),
    registrations: fc.array(registrationArb, { maxLength: 8 }),
});

const transcriptArb: fc.Arbitrary<Transcript> = fc
    .array(semesterArb, { maxLength: 5 })
    .map((semesters) => transcript(...semesters));

function statuses(result: ValidationResult): string[][] {
    return result.semesters.map((summary) =>
        summary.rows.map((row) => `${row.code}|${row.grade}|${row.credits}|${row.verdict.status}`).sort(),
    );
}

describe("CascadeEngine - Property Tests", () => {
    it("should give every registration exactly one verdict", () => {
        fc.assert(
            fc.property(catalogArb, transcriptArb, (entries, input) => {
                const result = validateTranscript(input, new CourseCatalog(entries));
                const total = input.semesters.reduce((sum, s) => sum + s.registrations.length, 0);

                expect(result.semesters.map((s) => s.rows.length)).toEqual(
                    input.semesters.map((s) => s.registrations.length),
                );
                expect(result.stats.registrationsChecked).toBe(total);
                expect(result.stats.validCount + result.stats.invalidCount + result.stats.notFoundCount).toBe(total);
            }),
        );
    });

    it("should always accept courses without requirements", () => {
        const open = new CourseCatalog(CATALOG_CODES.map((code) => course(code)));

        fc.assert(
            fc.property(transcriptArb, (input) => {
                const result = validateTranscript(input, open);

                for (const row of result.semesters.flatMap((s) => s.rows)) {
                    const expected = open.has(row.code) ? VerdictStatus.VALID : VerdictStatus.NOT_FOUND;
                    expect(row.verdict.status).toBe(expected);
                }
            }),
        );
    });

    it("should never turn a credit overload into an invalid verdict", () => {
        fc.assert(
            fc.property(catalogArb, transcriptArb, (entries, input) => {
                const catalog = new CourseCatalog(entries);
                const relaxed = new CascadeEngine(catalog, { creditLimits: { regular: 1000, summer: 1000 } });
                const strict = new CascadeEngine(catalog, { creditLimits: { regular: 0, summer: 0 } });

                expect(statuses(strict.validate(input))).toEqual(statuses(relaxed.validate(input)));
            }),
        );
    });

    it("should not depend on registration order inside a semester", () => {
        fc.assert(
            fc.property(catalogArb, transcriptArb, (entries, input) => {
                const catalog = new CourseCatalog(entries);
                const reversed = transcript(
                    ...input.semesters.map((s) => ({ ...s, registrations: [...s.registrations].reverse() })),
                );

                expect(statuses(validateTranscript(reversed, catalog))).toEqual(
                    statuses(validateTranscript(input, catalog)),
                );
            }),
        );
    });

    it("should cascade invalidity down a chain of any length", () => {
        const passingGrades = GRADES.filter((grade) => isPassing(grade));

        fc.assert(
            fc.property(fc.array(fc.constantFrom(...passingGrades), { minLength: 1, maxLength: 10 }), (grades) => {
                const codes = ["L0", ...grades.map((_, index) => `L${index + 1}`)];
                const catalog = catalogOf(
                    ...codes.map((code, index) => course(code, index === 0 ? [] : [`L${index - 1}`])),
                );
                // L0 is never taken, so L1 is invalid and roots the chain.
                const semesters = grades.map((grade, index) =>
                    semester("First", String(2020 + index), [reg(`L${index + 1}`, grade)]),
                );

                const result = validateTranscript(transcript(...semesters), catalog);
                const rows = result.semesters.map((summary) => summary.rows[0]);

                expect(rows[0]?.verdict).toEqual({
                    status: VerdictStatus.INVALID,
                    reason: {
                        kind: ReasonKind.PREREQUISITE,
                        message: "Prerequisite L0 not satisfied",
                        courses: ["L0"],
                        cascade: false,
                    },
                });
                rows.slice(1).forEach((row, index) => {
                    expect(row?.verdict).toEqual({
                        status: VerdictStatus.INVALID,
                        reason: {
                            kind: ReasonKind.PREREQUISITE,
                            message: `Prerequisite L${index + 1} is invalid (First ${2020 + index})`,
                            courses: [`L${index + 1}`],
                            cascade: true,
                        },
                    });
                });
                expect(result.stats.invalidCount).toBe(grades.length);
            }),
        );
    });

    it("should be deterministic", () => {
        fc.assert(
            fc.property(catalogArb, transcriptArb, (entries, input) => {
                const catalog = new CourseCatalog(entries);
                expect(validateTranscript(input, catalog)).toEqual(validateTranscript(input, catalog));
            }),
            { numRuns: 50 },
        );
    });
});
