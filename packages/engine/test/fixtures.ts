import { CourseCatalog } from "../src/catalog";
import type { Grade } from "../src/grades";
import type {
    CourseCatalogEntry,
    CourseRegistration,
    PrerequisiteGroup,
    RegistrationEntry,
    Semester,
    SemesterType,
    Transcript,
} from "../src/types";

export function course(
    code: string,
    prerequisites: string[] = [],
    prerequisiteGroups: PrerequisiteGroup[] = [],
): CourseCatalogEntry {
    return {
        code,
        name: `Course ${code}`,
        credits: "3(3-0-6)",
        prerequisites,
        corequisites: [],
        prerequisiteGroups,
    };
}

export function catalogOf(...entries: CourseCatalogEntry[]): CourseCatalog {
    return new CourseCatalog(entries);
}

export function reg(code: string, grade: Grade, credits = 3): CourseRegistration {
    return { code, name: `Course ${code}`, grade, credits };
}

export function semester(
    type: SemesterType,
    year: string,
    registrations: RegistrationEntry[],
    cumulativeGpa: number | null = null,
): Semester {
    return { type, year, semesterGpa: null, cumulativeGpa, registrations };
}

export function transcript(...semesters: Semester[]): Transcript {
    return {
        student: { id: "6500000001", name: "Test Student", fieldOfStudy: "Test Engineering", admissionDate: "2020-06-01" },
        semesters,
    };
}

/** Catalog of the worked scenarios: 01206321 requires 01206221. */
export function basicCatalog(): CourseCatalog {
    return catalogOf(course("01206221"), course("01206321", ["01206221"]));
}
