import type { CourseCatalogEntry } from "../types";

/**
 * Read-only lookup of course metadata by code.
 * Built once before validation and shared by every transcript pass.
 */
export class CourseCatalog {
    private readonly courses: ReadonlyMap<string, CourseCatalogEntry>;

    /**
     * A later entry with the same code replaces an earlier one.
     */
    constructor(entries: Iterable<CourseCatalogEntry>) {
        const courses = new Map<string, CourseCatalogEntry>();
        for (const entry of entries) {
            courses.set(entry.code, Object.freeze({ ...entry }));
        }
        this.courses = courses;
    }

    lookup(code: string): CourseCatalogEntry | undefined {
        return this.courses.get(code);
    }

    has(code: string): boolean {
        return this.courses.has(code);
    }

    get size(): number {
        return this.courses.size;
    }

    codes(): string[] {
        return [...this.courses.keys()];
    }

    entries(): CourseCatalogEntry[] {
        return [...this.courses.values()];
    }
}
