import { CourseCatalog, type CourseCatalogEntry } from "@coursecheck/engine";
import { CatalogLoadError, CatalogLoadErrorCode } from "../errors";
import { courseRecordSchema, describeIssues, looseRecordSchema, type CourseRecord } from "../schemas";
import { ErrorSeverity, type ParseIssue } from "../types";

/**
 * A raw course record together with where it sits in the catalog file.
 */
interface LocatedRecord {
	path: string;
	value: unknown;
}

export interface CatalogParseResult {
	catalog: CourseCatalog;
	/** Decoded entries in file order, duplicates included. */
	entries: CourseCatalogEntry[];
	warnings: ParseIssue[];
}

/**
 * CatalogParser decodes a course catalog file.
 *
 * Accepts either a bare array of course records or an object whose values are
 * course lists (`industrial_engineering_courses`, `other_related_courses`, ...)
 * or objects of named course lists (`gen_ed_courses.{category}`). Other values
 * at either level are metadata and are ignored.
 *
 * Any record that fails to decode fails the whole catalog.
 */
export class CatalogParser {
	/**
	 * @throws CatalogLoadError when the content is not a usable catalog
	 */
	parse(content: string, sourceFile: string): CatalogParseResult {
		const data = this.parseJson(content, sourceFile);
		const records = this.locateRecords(data, sourceFile);

		if (records.length === 0) {
			throw new CatalogLoadError(
				CatalogLoadErrorCode.EMPTY_CATALOG,
				"Catalog contains no course records",
				sourceFile,
			);
		}

		const entries: CourseCatalogEntry[] = [];
		const warnings: ParseIssue[] = [];
		const seen = new Map<string, string>();

		for (const record of records) {
			const entry = this.toEntry(this.decodeRecord(record, sourceFile));
			const previous = seen.get(entry.code);
			if (previous !== undefined) {
				const message = `Duplicate course code ${entry.code} at ${record.path} replaces the entry at ${previous}`;
				warnings.push({ message, path: record.path, severity: ErrorSeverity.WARNING });
			}
			seen.set(entry.code, record.path);
			entries.push(entry);
		}

		return { catalog: new CourseCatalog(entries), entries, warnings };
	}

	private parseJson(content: string, sourceFile: string): unknown {
		try {
			return JSON.parse(content);
		} catch (error) {
			throw new CatalogLoadError(
				CatalogLoadErrorCode.INVALID_JSON,
				`Invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
				sourceFile,
			);
		}
	}

	private locateRecords(data: unknown, sourceFile: string): LocatedRecord[] {
		if (Array.isArray(data)) {
			return data.map((value, index) => ({ path: `[${index}]`, value }));
		}

		const root = looseRecordSchema.safeParse(data);
		if (!root.success) {
			throw new CatalogLoadError(
				CatalogLoadErrorCode.INVALID_STRUCTURE,
				"Catalog must be an array of courses or an object of course lists",
				sourceFile,
			);
		}

		const records: LocatedRecord[] = [];
		for (const [key, value] of Object.entries(root.data)) {
			if (Array.isArray(value)) {
				value.forEach((item, index) => records.push({ path: `${key}[${index}]`, value: item }));
				continue;
			}

			const nested = looseRecordSchema.safeParse(value);
			if (!nested.success) continue;

			for (const [category, list] of Object.entries(nested.data)) {
				if (!Array.isArray(list)) continue;
				list.forEach((item, index) =>
					records.push({ path: `${key}.${category}[${index}]`, value: item }),
				);
			}
		}
		return records;
	}

	private decodeRecord(record: LocatedRecord, sourceFile: string): CourseRecord {
		const result = courseRecordSchema.safeParse(record.value);
		if (!result.success) {
			throw new CatalogLoadError(
				CatalogLoadErrorCode.INVALID_RECORD,
				`Invalid course record at ${record.path}: ${describeIssues(result.error).join("; ")}`,
				sourceFile,
			);
		}
		return result.data;
	}

	private toEntry(record: CourseRecord): CourseCatalogEntry {
		return {
			code: record.code,
			name: record.name,
			credits: record.credits,
			prerequisites: record.prerequisites,
			corequisites: record.corequisites,
			prerequisiteGroups: record.prerequisite_groups.map((group) => ({
				courses: group.courses,
				concurrentAllowed: group.concurrent_allowed,
			})),
		};
	}
}
