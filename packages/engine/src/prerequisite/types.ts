import type { Grade } from "../grades";
import type { InvalidReason, Verdict } from "../types";

/**
 * A committed registration from a strictly earlier semester.
 */
export interface Attempt {
    semesterIndex: number;
    semesterLabel: string;
    grade: Grade;
    verdict: Verdict;
}

/**
 * A registration in the semester being validated.
 * `verdict()` returns undefined until that registration's verdict has
 * settled; one that never settles is part of a cycle inside the semester.
 */
export interface SiblingRegistration {
    grade: Grade;
    verdict(): Verdict | undefined;
}

/**
 * What the resolver may see of the semester under validation.
 */
export interface SemesterContext {
    index: number;
    label: string;
    siblings(code: string): readonly SiblingRegistration[];
}

/**
 * One way to satisfy a requirement: every course is needed.
 */
export interface PrerequisitePath {
    /** "prerequisites" for the primary list, "group N" otherwise. */
    label: string;
    courses: readonly string[];
    concurrentAllowed: boolean;
}

export type Resolution =
    | { satisfied: true; note: string }
    | { satisfied: false; reason: InvalidReason };

/**
 * Outcome of checking one prerequisite course inside a path.
 */
export type CourseCheck =
    | { satisfied: true; concurrent: boolean }
    | { satisfied: false; message: string; cascade: boolean };

/**
 * Outcome of the concurrent-registration policy for one prerequisite.
 * `not_applicable` means the policy has nothing to say and the
 * prerequisite is judged on earlier semesters alone.
 */
export type ConcurrentDecision =
    | { kind: "allowed" }
    | { kind: "denied"; message: string; cascade: boolean }
    | { kind: "not_applicable" };
