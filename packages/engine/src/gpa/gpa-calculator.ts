import { GRADE_POINTS, isGrade } from "../grades";
import { AcademicStatus } from "../types";

export interface GradedCredits {
    grade: string;
    credits: number;
}

/**
 * Credit-weighted grade point average rounded to two decimals.
 * Grades without points (W, P, N, anything unknown) are skipped; 0 when nothing counts.
 */
export function calculateGpa(items: Iterable<GradedCredits>): number {
    let points = 0;
    let credits = 0;

    for (const item of items) {
        if (!isGrade(item.grade)) continue;
        const value = GRADE_POINTS[item.grade];
        if (value === undefined) continue;
        points += value * item.credits;
        credits += item.credits;
    }

    if (credits === 0) return 0;
    return Math.round((points / credits) * 100) / 100;
}

const STATUS_THRESHOLDS: readonly [number, AcademicStatus][] = [
    [1.5, AcademicStatus.CRITICAL],
    [1.75, AcademicStatus.WARNING],
    [2.0, AcademicStatus.PROBATION],
];

export function academicStatus(gpa: number): AcademicStatus {
    for (const [below, status] of STATUS_THRESHOLDS) {
        if (gpa < below) return status;
    }
    return AcademicStatus.NORMAL;
}
