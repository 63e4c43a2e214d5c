import { isContributing } from "../grades";
import type { Attempt } from "./types";

/**
 * Running map from course code to every committed attempt, oldest first.
 * Only semesters strictly before the one being validated are ever recorded,
 * so every attempt here is an earlier attempt.
 */
export class RegistrationHistory {
    private attempts = new Map<string, Attempt[]>();

    record(code: string, attempt: Attempt): void {
        const list = this.attempts.get(code);
        if (list) {
            list.push(attempt);
        } else {
            this.attempts.set(code, [attempt]);
        }
    }

    attemptsOf(code: string): readonly Attempt[] {
        return this.attempts.get(code) ?? [];
    }

    /**
     * Most recent attempt of any grade.
     */
    latest(code: string): Attempt | undefined {
        const list = this.attempts.get(code);
        return list?.[list.length - 1];
    }

    /**
     * Most recent attempt with a passing or failing grade. This attempt
     * decides whether the course counts as passed: a later pass supersedes
     * an earlier fail and the other way round.
     */
    governing(code: string): Attempt | undefined {
        const list = this.attempts.get(code);
        if (!list) return undefined;
        for (let i = list.length - 1; i >= 0; i--) {
            const attempt = list[i];
            if (attempt && isContributing(attempt.grade)) {
                return attempt;
            }
        }
        return undefined;
    }

    get size(): number {
        return this.attempts.size;
    }
}
