import { GRADES, SEMESTER_TYPES, isGrade, type Grade } from "@coursecheck/engine";
import { z } from "zod";

const courseCodeList = z
	.array(z.string().trim().min(1))
	.nullish()
	.transform((codes) => codes ?? []);

export const prerequisiteGroupSchema = z.object({
	courses: z.array(z.string().trim().min(1)),
	concurrent_allowed: z.boolean().default(false),
});

export const courseRecordSchema = z.object({
	code: z.string().trim().min(1, "Course code is required"),
	name: z.string().trim().default(""),
	credits: z.union([z.string(), z.number()]).transform(String),
	prerequisites: courseCodeList,
	corequisites: courseCodeList,
	prerequisite_groups: z
		.array(prerequisiteGroupSchema)
		.nullish()
		.transform((groups) => groups ?? []),
});

export type CourseRecord = z.infer<typeof courseRecordSchema>;

const numericText = z
	.string()
	.trim()
	.regex(/^\d+(\.\d+)?$/)
	.transform(Number);

const gpaSchema = z
	.union([z.number(), numericText, z.literal(""), z.null()])
	.optional()
	.transform((gpa) => (typeof gpa === "number" ? gpa : null));

const textOrNumber = z.union([z.string().trim(), z.number()]).transform(String);

export const studentInfoSchema = z.object({
	id: textOrNumber.default(""),
	name: z.string().trim().default(""),
	field_of_study: z.string().trim().default(""),
	date_admission: z.string().trim().default(""),
});

export const semesterSchema = z.object({
	semester: z.string().optional(),
	semester_type: z.enum(SEMESTER_TYPES),
	year: z.union([z.string().trim().min(1), z.number().int()]).transform(String),
	sem_gpa: gpaSchema,
	cum_gpa: gpaSchema,
	courses: z.array(z.unknown()).default([]),
});

export const transcriptSchema = z.object({
	student_info: studentInfoSchema,
	semesters: z.array(semesterSchema),
});

export type TranscriptRecord = z.infer<typeof transcriptSchema>;

const CREDITS_MESSAGE = "credits must be a non-negative number";

export const registrationSchema = z.object({
	code: z
		.string({ required_error: "missing course code", invalid_type_error: "missing course code" })
		.trim()
		.min(1, "missing course code"),
	name: z.string().trim().default(""),
	grade: z
		.string({ required_error: "missing grade", invalid_type_error: "grade must be text" })
		.trim()
		.toUpperCase()
		.refine((grade): grade is Grade => isGrade(grade), (grade) => ({
			message: `unknown grade "${grade}" (expected one of ${GRADES.join(", ")})`,
		})),
	credits: z
		.union([z.number(), numericText], { errorMap: () => ({ message: CREDITS_MESSAGE }) })
		.pipe(z.number().nonnegative(CREDITS_MESSAGE)),
});

/** Any JSON object, for reading fields out of a record that failed its schema. */
export const looseRecordSchema = z.record(z.unknown());

/**
 * Flattens zod issues into "path: message" lines.
 */
export function describeIssues(error: z.ZodError): string[] {
	return error.issues.map((issue) => {
		const path = formatPath(issue.path);
		return path ? `${path}: ${issue.message}` : issue.message;
	});
}

export function formatPath(segments: readonly (string | number)[]): string {
	return segments.reduce<string>((path, segment) => {
		if (typeof segment === "number") return `${path}[${segment}]`;
		return path ? `${path}.${segment}` : segment;
	}, "");
}
