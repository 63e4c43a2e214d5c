import type { CreditLimits, Semester } from "../types";

export interface CreditCheck {
    total: number;
    limit: number;
    /** Present only when the total is strictly above the limit. */
    warning?: string;
}

/**
 * Compares a semester's registered load with the typical cap for its type.
 * Every registration counts, withdrawn and unknown courses included.
 * An overload is a notice on the semester and never affects a verdict.
 */
export class CreditLimitChecker {
    constructor(private readonly limits: CreditLimits) {}

    limitFor(semester: Pick<Semester, "type">): number {
        return semester.type === "Summer" ? this.limits.summer : this.limits.regular;
    }

    check(semester: Semester): CreditCheck {
        const total = semester.registrations.reduce((sum, registration) => sum + registration.credits, 0);
        const limit = this.limitFor(semester);

        if (total <= limit) {
            return { total, limit };
        }

        const warning =
            semester.type === "Summer"
                ? `NOTICE: Exceeds typical ${limit} credits for summer (registered: ${total})`
                : `NOTICE: Exceeds typical ${limit} credits for regular semester (registered: ${total})`;
        return { total, limit, warning };
    }
}
