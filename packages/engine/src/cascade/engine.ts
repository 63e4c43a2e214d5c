import type { CourseCatalog } from "../catalog";
import { CreditLimitChecker } from "../credit";
import { PrerequisiteResolver, RegistrationHistory, type SemesterContext, type SiblingRegistration } from "../prerequisite";
import { ValidationReportAggregator, type SemesterEvaluation } from "../report";
import {
    DEFAULT_ENGINE_OPTIONS,
    ReasonKind,
    VerdictStatus,
    isMalformed,
    semesterLabel,
    type CourseRegistration,
    type CourseRow,
    type EngineOptions,
    type RegistrationEntry,
    type Semester,
    type Transcript,
    type ValidationResult,
    type Verdict,
} from "../types";

/**
 * Validates one semester's registrations against the history of every
 * earlier semester.
 *
 * Verdicts settle in rounds. Each round judges every unsettled registration
 * against the verdicts settled in earlier rounds only, so the order of
 * registrations inside the semester never changes the outcome. A valid
 * verdict settles at once; an invalid one settles only when it did not
 * consult an unsettled sibling. Registrations still unsettled once a round
 * settles nothing new depend on each other in a cycle and stay invalid.
 */
class SemesterPass implements SemesterContext {
    readonly label: string;
    private readonly settled = new Map<number, Verdict>();
    private readonly byCode = new Map<string, number[]>();
    private consultedUnsettled = false;

    constructor(
        readonly index: number,
        private readonly semester: Semester,
        private readonly catalog: CourseCatalog,
        private readonly history: RegistrationHistory,
        private readonly resolver: PrerequisiteResolver,
    ) {
        this.label = semesterLabel(semester);
        semester.registrations.forEach((entry, position) => {
            if (isMalformed(entry)) return;
            const positions = this.byCode.get(entry.code);
            if (positions) {
                positions.push(position);
            } else {
                this.byCode.set(entry.code, [position]);
            }
        });
    }

    siblings(code: string): readonly SiblingRegistration[] {
        const siblings: SiblingRegistration[] = [];
        for (const position of this.byCode.get(code) ?? []) {
            const entry = this.semester.registrations[position];
            if (!entry || isMalformed(entry)) continue;
            siblings.push({ grade: entry.grade, verdict: () => this.settledAt(position) });
        }
        return siblings;
    }

    run(): { entry: RegistrationEntry; verdict: Verdict }[] {
        let unsettled = new Map<number, Verdict>();

        for (;;) {
            const round = new Map<number, Verdict>();
            unsettled = new Map();

            this.semester.registrations.forEach((entry, position) => {
                if (this.settled.has(position)) return;
                this.consultedUnsettled = false;
                const verdict = this.judge(entry);
                if (verdict.status !== VerdictStatus.INVALID || !this.consultedUnsettled) {
                    round.set(position, verdict);
                } else {
                    unsettled.set(position, verdict);
                }
            });

            if (round.size === 0) break;
            for (const [position, verdict] of round) {
                this.settled.set(position, verdict);
            }
        }

        return this.semester.registrations.map((entry, position) => {
            const verdict = this.settled.get(position) ?? unsettled.get(position);
            if (verdict === undefined) {
                throw new Error(`Registration ${position} in ${this.label} was left unresolved`);
            }
            return { entry, verdict };
        });
    }

    private settledAt(position: number): Verdict | undefined {
        const verdict = this.settled.get(position);
        if (verdict === undefined) {
            this.consultedUnsettled = true;
        }
        return verdict;
    }

    private judge(entry: RegistrationEntry): Verdict {
        if (isMalformed(entry)) {
            return {
                status: VerdictStatus.INVALID,
                reason: {
                    kind: ReasonKind.DATA_ERROR,
                    message: `Malformed registration: ${entry.issues.join("; ")}`,
                    courses: [],
                    cascade: false,
                },
            };
        }

        const catalogEntry = this.catalog.lookup(entry.code);
        if (!catalogEntry) {
            return { status: VerdictStatus.NOT_FOUND };
        }

        if (entry.grade === "W") {
            return { status: VerdictStatus.VALID, note: "Course was withdrawn" };
        }
        if (entry.grade === "N") {
            return { status: VerdictStatus.VALID, note: "Course not graded yet" };
        }

        const resolution = this.resolver.resolve(catalogEntry, this.history, this);
        if (resolution.satisfied) {
            return { status: VerdictStatus.VALID, note: resolution.note };
        }
        return { status: VerdictStatus.INVALID, reason: resolution.reason };
    }
}

/**
 * Single forward pass over a transcript's semesters.
 *
 * Each semester is judged against the attempts of strictly earlier
 * semesters; its registrations join the history only after all of its
 * verdicts exist. An invalid attempt stays in the history with its
 * verdict, so anything that later depends on it is invalid too, however
 * long the chain.
 */
export class CascadeEngine {
    private readonly resolver: PrerequisiteResolver;
    private readonly creditChecker: CreditLimitChecker;

    constructor(
        private readonly catalog: CourseCatalog,
        options: Readonly<EngineOptions> = DEFAULT_ENGINE_OPTIONS,
        resolver: PrerequisiteResolver = new PrerequisiteResolver(),
    ) {
        this.resolver = resolver;
        this.creditChecker = new CreditLimitChecker(options.creditLimits);
    }

    evaluate(transcript: Transcript): SemesterEvaluation[] {
        const history = new RegistrationHistory();
        const evaluations: SemesterEvaluation[] = [];

        transcript.semesters.forEach((semester, index) => {
            const pass = new SemesterPass(index, semester, this.catalog, history, this.resolver);
            const judged = pass.run();

            const rows: CourseRow[] = judged.map(({ entry, verdict }) => ({
                code: entry.code,
                name: entry.name,
                grade: isMalformed(entry) ? entry.rawGrade : entry.grade,
                credits: entry.credits,
                verdict,
            }));

            for (const { entry, verdict } of judged) {
                if (isMalformed(entry)) continue;
                this.commit(history, entry, index, pass.label, verdict);
            }

            evaluations.push({
                index,
                label: pass.label,
                semester,
                rows,
                credit: this.creditChecker.check(semester),
            });
        });

        return evaluations;
    }

    validate(transcript: Transcript): ValidationResult {
        const aggregator = new ValidationReportAggregator(transcript.student);
        for (const evaluation of this.evaluate(transcript)) {
            aggregator.add(evaluation);
        }
        return aggregator.build();
    }

    private commit(
        history: RegistrationHistory,
        entry: CourseRegistration,
        semesterIndex: number,
        label: string,
        verdict: Verdict,
    ): void {
        history.record(entry.code, { semesterIndex, semesterLabel: label, grade: entry.grade, verdict });
    }
}

/**
 * Validates a transcript against a catalog. Pure: the same inputs always
 * give an equal, frozen result.
 */
export function validateTranscript(
    transcript: Transcript,
    catalog: CourseCatalog,
    options: Readonly<EngineOptions> = DEFAULT_ENGINE_OPTIONS,
): ValidationResult {
    return new CascadeEngine(catalog, options).validate(transcript);
}
