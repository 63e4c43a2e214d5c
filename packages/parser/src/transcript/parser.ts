import {
	SEMESTER_TYPES,
	semesterLabel,
	type MalformedRegistration,
	type RegistrationEntry,
	type Semester,
	type Transcript,
} from "@coursecheck/engine";
import type { z } from "zod";
import { TranscriptParseError, TranscriptParseErrorCode } from "../errors";
import { describeIssues, looseRecordSchema, registrationSchema, semesterSchema, transcriptSchema } from "../schemas";
import { ErrorSeverity, type ParseIssue } from "../types";

export interface TranscriptParseResult {
	transcript: Transcript;
	/** Malformed registrations and out-of-order semesters. */
	warnings: ParseIssue[];
	malformedCount: number;
}

type SemesterRecord = z.infer<typeof semesterSchema>;

function salvageCredits(value: unknown): number {
	const credits = typeof value === "string" ? Number(value.trim() || Number.NaN) : value;
	return typeof credits === "number" && Number.isFinite(credits) && credits >= 0 ? credits : 0;
}

/**
 * TranscriptParser decodes one student's transcript file.
 *
 * The header and every semester must decode, or the transcript is rejected.
 * A single registration that fails to decode becomes a MalformedRegistration
 * and the rest of the transcript is kept. Semesters stay in file order; an
 * order that is not chronological is only reported.
 */
export class TranscriptParser {
	/**
	 * @throws TranscriptParseError when the header or a semester cannot be decoded
	 */
	parse(content: string, sourceFile: string): TranscriptParseResult {
		const data = this.parseJson(content, sourceFile);

		const decoded = transcriptSchema.safeParse(data);
		if (!decoded.success) {
			throw new TranscriptParseError(
				TranscriptParseErrorCode.INVALID_STRUCTURE,
				`Invalid transcript: ${describeIssues(decoded.error).join("; ")}`,
				sourceFile,
			);
		}

		const warnings: ParseIssue[] = [];
		let malformedCount = 0;

		const semesters = decoded.data.semesters.map((record, semesterIndex): Semester => {
			const registrations = record.courses.map((raw, courseIndex): RegistrationEntry => {
				const path = `semesters[${semesterIndex}].courses[${courseIndex}]`;
				const registration = registrationSchema.safeParse(raw);
				if (registration.success) {
					return registration.data;
				}

				malformedCount++;
				const malformed = this.toMalformed(raw, registration.error);
				const message = `Malformed registration ${malformed.code || "(no code)"}: ${malformed.issues.join("; ")}`;
				warnings.push({ message, path, severity: ErrorSeverity.WARNING });
				return malformed;
			});

			return this.toSemester(record, registrations);
		});

		warnings.push(...this.checkChronology(semesters));

		const { student_info: info } = decoded.data;
		const transcript: Transcript = {
			student: {
				id: info.id,
				name: info.name,
				fieldOfStudy: info.field_of_study,
				admissionDate: info.date_admission,
			},
			semesters,
		};

		return { transcript, warnings, malformedCount };
	}

	private parseJson(content: string, sourceFile: string): unknown {
		try {
			return JSON.parse(content);
		} catch (error) {
			throw new TranscriptParseError(
				TranscriptParseErrorCode.INVALID_JSON,
				`Invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
				sourceFile,
			);
		}
	}

	private toSemester(record: SemesterRecord, registrations: RegistrationEntry[]): Semester {
		return {
			type: record.semester_type,
			year: record.year,
			semesterGpa: record.sem_gpa,
			cumulativeGpa: record.cum_gpa,
			registrations,
		};
	}

	/**
	 * Salvages what it can from a registration that failed its schema.
	 */
	private toMalformed(raw: unknown, error: z.ZodError): MalformedRegistration {
		const fields = looseRecordSchema.safeParse(raw);
		const issues = error.issues.map((issue) => issue.message);
		if (!fields.success) {
			return { code: "", name: "", rawGrade: "", credits: 0, issues: ["registration must be an object"] };
		}

		const { code, name, grade, credits } = fields.data;
		return {
			code: typeof code === "string" ? code.trim() : "",
			name: typeof name === "string" ? name.trim() : "",
			rawGrade: typeof grade === "string" || typeof grade === "number" ? String(grade).trim() : "",
			credits: salvageCredits(credits),
			issues,
		};
	}

	private checkChronology(semesters: readonly Semester[]): ParseIssue[] {
		const issues: ParseIssue[] = [];
		let previous: { key: number; label: string } | undefined;

		semesters.forEach((semester, index) => {
			const year = Number(semester.year);
			if (!Number.isFinite(year)) return;

			const key = year * SEMESTER_TYPES.length + SEMESTER_TYPES.indexOf(semester.type);
			const label = semesterLabel(semester);
			if (previous && key < previous.key) {
				issues.push({
					message: `Semester ${label} is listed after ${previous.label}; order kept as given`,
					path: `semesters[${index}]`,
					severity: ErrorSeverity.WARNING,
				});
			}
			previous = { key, label };
		});

		return issues;
	}
}
