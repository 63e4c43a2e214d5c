/**
 * Error codes for catalog loading.
 */
export enum CatalogLoadErrorCode {
	INVALID_JSON = "INVALID_JSON",
	INVALID_STRUCTURE = "INVALID_STRUCTURE",
	INVALID_RECORD = "INVALID_RECORD",
	EMPTY_CATALOG = "EMPTY_CATALOG",
}

/**
 * The catalog could not be used. Fatal for every transcript validated against it.
 */
export class CatalogLoadError extends Error {
	constructor(
		public readonly code: CatalogLoadErrorCode,
		message: string,
		public readonly path: string,
	) {
		super(message);
		this.name = "CatalogLoadError";
	}
}

/**
 * Error codes for transcript parsing.
 */
export enum TranscriptParseErrorCode {
	INVALID_JSON = "INVALID_JSON",
	INVALID_STRUCTURE = "INVALID_STRUCTURE",
}

/**
 * The transcript header or a semester could not be decoded. Fatal for that
 * transcript only.
 */
export class TranscriptParseError extends Error {
	constructor(
		public readonly code: TranscriptParseErrorCode,
		message: string,
		public readonly path: string,
	) {
		super(message);
		this.name = "TranscriptParseError";
	}
}
