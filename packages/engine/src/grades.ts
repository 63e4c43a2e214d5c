/**
 * Every grade a registration can carry.
 */
export const GRADES = ["A", "B+", "B", "C+", "C", "D+", "D", "F", "W", "P", "N"] as const;

export type Grade = (typeof GRADES)[number];

/**
 * How a grade counts toward a prerequisite requirement.
 */
export enum GradeClass {
    PASSING = "passing",
    FAILING = "failing",
    /** W (withdrawn) and N (not graded yet) neither pass nor fail. */
    NON_CONTRIBUTING = "non_contributing",
}

const GRADE_CLASSES: Record<Grade, GradeClass> = {
    "A": GradeClass.PASSING,
    "B+": GradeClass.PASSING,
    "B": GradeClass.PASSING,
    "C+": GradeClass.PASSING,
    "C": GradeClass.PASSING,
    "D+": GradeClass.PASSING,
    "D": GradeClass.PASSING,
    "P": GradeClass.PASSING,
    "F": GradeClass.FAILING,
    "W": GradeClass.NON_CONTRIBUTING,
    "N": GradeClass.NON_CONTRIBUTING,
};

/**
 * Grade points used for GPA. W, P and N carry no points.
 */
export const GRADE_POINTS: Partial<Record<Grade, number>> = {
    "A": 4.0,
    "B+": 3.5,
    "B": 3.0,
    "C+": 2.5,
    "C": 2.0,
    "D+": 1.5,
    "D": 1.0,
    "F": 0.0,
};

const GRADE_SET: ReadonlySet<string> = new Set(GRADES);

export function isGrade(value: string): value is Grade {
    return GRADE_SET.has(value);
}

export function classifyGrade(grade: Grade): GradeClass {
    return GRADE_CLASSES[grade];
}

export function isPassing(grade: Grade): boolean {
    return GRADE_CLASSES[grade] === GradeClass.PASSING;
}

export function isFailing(grade: Grade): boolean {
    return GRADE_CLASSES[grade] === GradeClass.FAILING;
}

/**
 * Passing or failing grades decide a prerequisite; W and N do not.
 */
export function isContributing(grade: Grade): boolean {
    return GRADE_CLASSES[grade] !== GradeClass.NON_CONTRIBUTING;
}
