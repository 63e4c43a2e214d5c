import { isPassing } from "../grades";
import { ReasonKind, VerdictStatus, type CourseCatalogEntry, type InvalidReason } from "../types";
import { ConcurrentRegistrationPolicy } from "./concurrent-policy";
import type { RegistrationHistory } from "./history";
import type { CourseCheck, PrerequisitePath, Resolution, SemesterContext } from "./types";

interface PathFailure {
    path: PrerequisitePath;
    courses: string[];
    messages: string[];
    cascade: boolean;
}

/**
 * Split a catalog entry's requirement into alternative paths.
 * The primary prerequisite list is one path; every prerequisite group is another.
 */
export function prerequisitePaths(entry: CourseCatalogEntry): PrerequisitePath[] {
    const paths: PrerequisitePath[] = [];

    if (entry.prerequisites.length > 0) {
        paths.push({ label: "prerequisites", courses: entry.prerequisites, concurrentAllowed: false });
    }

    entry.prerequisiteGroups.forEach((group, index) => {
        paths.push({
            label: `group ${index + 1}`,
            courses: group.courses,
            concurrentAllowed: group.concurrentAllowed,
        });
    });

    return paths;
}

/**
 * Decides whether a course's prerequisite requirement is satisfied, given
 * the history of strictly earlier semesters and the registrations of the
 * current one.
 *
 * The requirement is an OR over paths and an AND within a path. A course in
 * a path counts when its governing earlier attempt passed and that attempt
 * was not itself invalid, or when the concurrent policy accepts a
 * registration of it in the current semester.
 */
export class PrerequisiteResolver {
    private readonly policy: ConcurrentRegistrationPolicy;

    constructor(policy: ConcurrentRegistrationPolicy = new ConcurrentRegistrationPolicy()) {
        this.policy = policy;
    }

    resolve(entry: CourseCatalogEntry, history: RegistrationHistory, context: SemesterContext): Resolution {
        const paths = prerequisitePaths(entry);
        if (paths.length === 0) {
            return { satisfied: true, note: "No prerequisites required" };
        }

        const failures: PathFailure[] = [];
        for (const path of paths) {
            const failure = this.resolvePath(path, history, context);
            if (!failure.failed) {
                return { satisfied: true, note: this.describeSatisfied(path, failure.concurrent, paths.length > 1) };
            }
            failures.push(failure.detail);
        }

        return { satisfied: false, reason: this.toReason(entry, failures) };
    }

    private resolvePath(
        path: PrerequisitePath,
        history: RegistrationHistory,
        context: SemesterContext,
    ): { failed: false; concurrent: string[] } | { failed: true; detail: PathFailure } {
        const concurrent: string[] = [];
        const detail: PathFailure = { path, courses: [], messages: [], cascade: true };

        for (const code of path.courses) {
            const check = this.checkCourse(code, path.concurrentAllowed, history, context);
            if (check.satisfied) {
                if (check.concurrent) concurrent.push(code);
                continue;
            }
            detail.courses.push(code);
            detail.messages.push(check.message);
            detail.cascade = detail.cascade && check.cascade;
        }

        if (detail.courses.length === 0) {
            return { failed: false, concurrent };
        }
        return { failed: true, detail };
    }

    private checkCourse(
        code: string,
        concurrentAllowed: boolean,
        history: RegistrationHistory,
        context: SemesterContext,
    ): CourseCheck {
        const governing = history.governing(code);
        const latest = history.latest(code);

        if (governing && isPassing(governing.grade)) {
            if (governing.verdict.status === VerdictStatus.INVALID) {
                return {
                    satisfied: false,
                    message: `Prerequisite ${code} is invalid (${governing.semesterLabel})`,
                    cascade: true,
                };
            }
            return { satisfied: true, concurrent: false };
        }

        const decision = this.policy.evaluate(code, concurrentAllowed, governing, latest, context);
        switch (decision.kind) {
            case "allowed":
                return { satisfied: true, concurrent: true };
            case "denied":
                return { satisfied: false, message: decision.message, cascade: decision.cascade };
            case "not_applicable":
                break;
        }

        if (latest?.grade === "W") {
            return {
                satisfied: false,
                message: `Prerequisite ${code} was withdrawn (W) in ${latest.semesterLabel} and has not been passed`,
                cascade: false,
            };
        }
        if (latest?.grade === "N") {
            return {
                satisfied: false,
                message: `Prerequisite ${code} not satisfied (not graded yet in ${latest.semesterLabel})`,
                cascade: false,
            };
        }
        if (governing) {
            return {
                satisfied: false,
                message: `Prerequisite ${code} not satisfied (failed in ${governing.semesterLabel})`,
                cascade: false,
            };
        }
        return { satisfied: false, message: `Prerequisite ${code} not satisfied`, cascade: false };
    }

    private describeSatisfied(path: PrerequisitePath, concurrent: string[], hasAlternatives: boolean): string {
        const base = hasAlternatives ? `Prerequisite ${path.label} satisfied` : "All prerequisites satisfied";
        if (concurrent.length === 0) {
            return base;
        }
        return `${base} (concurrent registration: ${concurrent.join(", ")})`;
    }

    private toReason(entry: CourseCatalogEntry, failures: PathFailure[]): InvalidReason {
        const courses = [...new Set(failures.flatMap((f) => f.courses))];
        const cascade = failures.every((f) => f.cascade);

        const only = failures[0];
        if (entry.prerequisiteGroups.length === 0 && only && failures.length === 1) {
            return {
                kind: ReasonKind.PREREQUISITE,
                message: only.messages.join("; "),
                courses,
                cascade,
            };
        }

        const details = failures.map((f) => `${f.path.label}: ${f.messages.join("; ")}`).join(" | ");
        return {
            kind: ReasonKind.PREREQUISITE_GROUP,
            message: `No prerequisite group is satisfied (${details})`,
            courses,
            cascade,
        };
    }
}
