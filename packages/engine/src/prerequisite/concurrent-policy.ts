import { VerdictStatus } from "../types";
import type { Attempt, ConcurrentDecision, SemesterContext, SiblingRegistration } from "./types";

/**
 * Decides whether a prerequisite may be taken in the same semester as the
 * course that depends on it.
 *
 * Two routes grant it:
 * - failed retake: the governing earlier attempt is exactly F and the
 *   prerequisite is registered again this semester;
 * - group concurrency: the path allows concurrent registration, no earlier
 *   failure needed.
 *
 * Either way a same-semester registration graded W grants nothing, and a
 * same-semester registration that is itself invalid passes its invalidity on.
 */
export class ConcurrentRegistrationPolicy {
    evaluate(
        code: string,
        concurrentAllowed: boolean,
        governing: Attempt | undefined,
        latest: Attempt | undefined,
        context: SemesterContext,
    ): ConcurrentDecision {
        const siblings = context.siblings(code);
        if (siblings.length === 0) {
            return { kind: "not_applicable" };
        }

        const failedBefore = governing?.grade === "F";
        if (!failedBefore && !concurrentAllowed) {
            if (latest?.grade === "W") {
                return {
                    kind: "denied",
                    message: `Prerequisite ${code} was withdrawn (W) in ${latest.semesterLabel}; not eligible for concurrent registration`,
                    cascade: false,
                };
            }
            return {
                kind: "denied",
                message: `Prerequisite ${code} not satisfied for concurrent registration`,
                cascade: false,
            };
        }

        const active = siblings.filter((sibling) => sibling.grade !== "W");
        if (active.length === 0) {
            return {
                kind: "denied",
                message: `Prerequisite ${code} was withdrawn (W) in this semester`,
                cascade: false,
            };
        }

        return this.crossReference(code, active);
    }

    /**
     * The concurrent registration counts only if at least one non-withdrawn
     * sibling registration of the prerequisite is not invalid.
     */
    private crossReference(code: string, active: readonly SiblingRegistration[]): ConcurrentDecision {
        let circular = false;
        for (const sibling of active) {
            const verdict = sibling.verdict();
            if (verdict === undefined) {
                circular = true;
                continue;
            }
            if (verdict.status !== VerdictStatus.INVALID) {
                return { kind: "allowed" };
            }
        }

        if (circular) {
            return {
                kind: "denied",
                message: `Prerequisite ${code} forms a circular requirement in this semester`,
                cascade: false,
            };
        }
        return {
            kind: "denied",
            message: `Prerequisite ${code} is invalid in this semester`,
            cascade: true,
        };
    }
}
