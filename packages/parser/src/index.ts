export { CatalogParser, type CatalogParseResult } from "./catalog";
export { TranscriptParser, type TranscriptParseResult } from "./transcript";
export {
	CatalogLoadError,
	CatalogLoadErrorCode,
	TranscriptParseError,
	TranscriptParseErrorCode,
} from "./errors";
export { ErrorSeverity, type ParseIssue } from "./types";
export {
	courseRecordSchema,
	registrationSchema,
	transcriptSchema,
	type CourseRecord,
	type TranscriptRecord,
} from "./schemas";
