import type { Grade } from "./grades";

// ─── Transcript ───

export const SEMESTER_TYPES = ["First", "Second", "Summer"] as const;

export type SemesterType = (typeof SEMESTER_TYPES)[number];

export interface StudentInfo {
    id: string;
    name: string;
    fieldOfStudy: string;
    admissionDate: string;
}

/**
 * One attempt at a course in one semester.
 */
export interface CourseRegistration {
    code: string;
    /** Display only. */
    name: string;
    grade: Grade;
    credits: number;
}

/**
 * A registration whose source record could not be decoded.
 * Fields hold whatever could be recovered; `issues` says what was wrong.
 */
export interface MalformedRegistration {
    code: string;
    name: string;
    rawGrade: string;
    credits: number;
    issues: readonly string[];
}

export type RegistrationEntry = CourseRegistration | MalformedRegistration;

export interface Semester {
    type: SemesterType;
    year: string;
    semesterGpa: number | null;
    cumulativeGpa: number | null;
    registrations: readonly RegistrationEntry[];
}

/**
 * A student's full registration history. Semesters are in chronological
 * order; the engine relies on that order and never re-sorts.
 */
export interface Transcript {
    student: StudentInfo;
    semesters: readonly Semester[];
}

export function isMalformed(entry: RegistrationEntry): entry is MalformedRegistration {
    return "issues" in entry;
}

export function semesterLabel(semester: Pick<Semester, "type" | "year">): string {
    return `${semester.type} ${semester.year}`;
}

// ─── Catalog ───

/**
 * An alternative set of prerequisites: every course in the set is required.
 */
export interface PrerequisiteGroup {
    courses: readonly string[];
    /** Courses of this group may be taken in the same semester as the dependent course. */
    concurrentAllowed: boolean;
}

export interface CourseCatalogEntry {
    code: string;
    name: string;
    /** Display form, e.g. "3(3-0-6)". */
    credits: string;
    prerequisites: readonly string[];
    /** Recorded only; not validated. */
    corequisites: readonly string[];
    prerequisiteGroups: readonly PrerequisiteGroup[];
}

// ─── Verdicts ───

export enum VerdictStatus {
    VALID = "valid",
    INVALID = "invalid",
    NOT_FOUND = "not_found",
}

export enum ReasonKind {
    PREREQUISITE = "prerequisite",
    PREREQUISITE_GROUP = "prerequisite_group",
    DATA_ERROR = "data_error",
}

export interface InvalidReason {
    kind: ReasonKind;
    message: string;
    /** Prerequisite codes the reason refers to. */
    courses: readonly string[];
    /** True when the registration is invalid only because a prerequisite attempt was itself invalid. */
    cascade: boolean;
}

export interface ValidVerdict {
    status: VerdictStatus.VALID;
    note: string;
}

export interface InvalidVerdict {
    status: VerdictStatus.INVALID;
    reason: InvalidReason;
}

export interface NotFoundVerdict {
    status: VerdictStatus.NOT_FOUND;
}

export type Verdict = ValidVerdict | InvalidVerdict | NotFoundVerdict;

// ─── Options ───

export interface CreditLimits {
    /** Cap for First and Second semesters. */
    regular: number;
    summer: number;
}

/**
 * Everything the engine reads besides the transcript and catalog.
 */
export interface EngineOptions {
    creditLimits: CreditLimits;
}

export const DEFAULT_ENGINE_OPTIONS: Readonly<EngineOptions> = Object.freeze({
    creditLimits: Object.freeze({ regular: 22, summer: 9 }),
});

// ─── Result ───

export enum AcademicStatus {
    CRITICAL = "CRITICAL",
    WARNING = "WARNING",
    PROBATION = "PROBATION",
    NORMAL = "NORMAL",
}

export interface GpaPair {
    semester: number;
    cumulative: number;
}

export interface CourseRow {
    code: string;
    name: string;
    /** Raw grade text for malformed rows. */
    grade: string;
    credits: number;
    verdict: Verdict;
}

export interface SemesterSummary {
    index: number;
    label: string;
    type: SemesterType;
    year: string;
    /** As printed on the transcript. */
    semesterGpa: number | null;
    cumulativeGpa: number | null;
    totalCredits: number;
    creditLimit: number;
    creditWarning?: string;
    /** Recomputed from every graded registration. */
    recomputedGpa: GpaPair;
    /** Recomputed leaving out invalid registrations. */
    excludingInvalidGpa: GpaPair;
    hasInvalid: boolean;
    rows: readonly CourseRow[];
}

export interface InvalidRegistrationRecord {
    semesterIndex: number;
    semester: string;
    code: string;
    name: string;
    grade: string;
    kind: ReasonKind;
    reason: string;
    courses: readonly string[];
    cascade: boolean;
}

export interface NotFoundRecord {
    semesterIndex: number;
    semester: string;
    code: string;
    name: string;
}

export interface ValidationStats {
    semestersAnalyzed: number;
    registrationsChecked: number;
    validCount: number;
    invalidCount: number;
    notFoundCount: number;
    creditWarnings: number;
}

export interface AcademicStanding {
    /** Cumulative GPA of the last semester, as printed on the transcript. */
    currentGpa: number | null;
    status?: AcademicStatus;
}

export interface ValidationResult {
    student: StudentInfo;
    standing: AcademicStanding;
    stats: ValidationStats;
    semesters: readonly SemesterSummary[];
    invalidRegistrations: readonly InvalidRegistrationRecord[];
    invalidBySemester: readonly {
        semesterIndex: number;
        semester: string;
        records: readonly InvalidRegistrationRecord[];
    }[];
    notFound: readonly NotFoundRecord[];
}
