/**
 * Severity level of a parse issue.
 */
export enum ErrorSeverity {
	ERROR = "error",
	WARNING = "warning",
	INFO = "info",
}

/**
 * A problem noticed while decoding a file that did not stop the decode.
 */
export interface ParseIssue {
	message: string;
	/** JSON path of the offending value, e.g. "semesters[1].courses[3]"; empty if file-level */
	path: string;
	severity: ErrorSeverity;
}
