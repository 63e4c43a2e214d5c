import type { CreditCheck } from "../credit";
import { academicStatus, calculateGpa, type GradedCredits } from "../gpa";
import {
    VerdictStatus,
    type AcademicStanding,
    type CourseRow,
    type InvalidRegistrationRecord,
    type NotFoundRecord,
    type Semester,
    type SemesterSummary,
    type StudentInfo,
    type ValidationResult,
} from "../types";

/**
 * Everything the engine decided about one semester.
 */
export interface SemesterEvaluation {
    index: number;
    label: string;
    semester: Semester;
    rows: readonly CourseRow[];
    credit: CreditCheck;
}

function deepFreeze<T>(value: T): T {
    if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
        for (const nested of Object.values(value)) {
            deepFreeze(nested);
        }
        Object.freeze(value);
    }
    return value;
}

function isCounted(row: CourseRow): boolean {
    return row.verdict.status !== VerdictStatus.INVALID;
}

/**
 * Tallies semester evaluations into a single result.
 * Semesters must be added in transcript order.
 */
export class ValidationReportAggregator {
    private readonly summaries: SemesterSummary[] = [];
    private readonly invalid: InvalidRegistrationRecord[] = [];
    private readonly notFound: NotFoundRecord[] = [];
    private readonly cumulative: GradedCredits[] = [];
    private readonly cumulativeCounted: GradedCredits[] = [];
    private lastCumulativeGpa: number | null = null;
    private creditWarnings = 0;
    private registrations = 0;
    private valid = 0;

    constructor(private readonly student: StudentInfo) {}

    add(evaluation: SemesterEvaluation): void {
        const { index, label, semester, rows, credit } = evaluation;

        this.cumulative.push(...rows);
        this.cumulativeCounted.push(...rows.filter(isCounted));

        for (const row of rows) {
            this.registrations++;
            switch (row.verdict.status) {
                case VerdictStatus.VALID:
                    this.valid++;
                    break;
                case VerdictStatus.NOT_FOUND:
                    this.notFound.push({ semesterIndex: index, semester: label, code: row.code, name: row.name });
                    break;
                case VerdictStatus.INVALID: {
                    const { reason } = row.verdict;
                    this.invalid.push({
                        semesterIndex: index,
                        semester: label,
                        code: row.code,
                        name: row.name,
                        grade: row.grade,
                        kind: reason.kind,
                        reason: reason.message,
                        courses: reason.courses,
                        cascade: reason.cascade,
                    });
                    break;
                }
            }
        }

        if (credit.warning !== undefined) {
            this.creditWarnings++;
        }

        const summary: SemesterSummary = {
            index,
            label,
            type: semester.type,
            year: semester.year,
            semesterGpa: semester.semesterGpa,
            cumulativeGpa: semester.cumulativeGpa,
            totalCredits: credit.total,
            creditLimit: credit.limit,
            recomputedGpa: {
                semester: calculateGpa(rows),
                cumulative: calculateGpa(this.cumulative),
            },
            excludingInvalidGpa: {
                semester: calculateGpa(rows.filter(isCounted)),
                cumulative: calculateGpa(this.cumulativeCounted),
            },
            hasInvalid: rows.some((row) => !isCounted(row)),
            rows,
        };
        if (credit.warning !== undefined) {
            summary.creditWarning = credit.warning;
        }

        this.summaries.push(summary);
        this.lastCumulativeGpa = semester.cumulativeGpa;
    }

    build(): ValidationResult {
        const standing: AcademicStanding = { currentGpa: this.lastCumulativeGpa };
        if (this.lastCumulativeGpa !== null) {
            standing.status = academicStatus(this.lastCumulativeGpa);
        }

        const bySemester = new Map<number, { semesterIndex: number; semester: string; records: InvalidRegistrationRecord[] }>();
        for (const record of this.invalid) {
            const group = bySemester.get(record.semesterIndex);
            if (group) {
                group.records.push(record);
            } else {
                bySemester.set(record.semesterIndex, {
                    semesterIndex: record.semesterIndex,
                    semester: record.semester,
                    records: [record],
                });
            }
        }

        const result: ValidationResult = {
            student: { ...this.student },
            standing,
            stats: {
                semestersAnalyzed: this.summaries.length,
                registrationsChecked: this.registrations,
                validCount: this.valid,
                invalidCount: this.invalid.length,
                notFoundCount: this.notFound.length,
                creditWarnings: this.creditWarnings,
            },
            semesters: [...this.summaries],
            invalidRegistrations: [...this.invalid],
            invalidBySemester: [...bySemester.values()],
            notFound: [...this.notFound],
        };
        return deepFreeze(result);
    }
}
