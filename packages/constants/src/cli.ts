export const CLIErrors = {
	MISSING_SUBCOMMAND:
		"Missing subcommand. Usage: coursecheck <validate|batch> <path>",
	CONFLICTING_FLAGS:
		"Conflicting flags: --verbose and --quiet cannot be used together",
	CATALOG_REQUIRED:
		"Course catalog required. Use --catalog or set catalog in config",
	NOT_JSON: (path: string) =>
		`Not a transcript file: "${path}". Expected .json extension`,
	INVALID_FORMAT: (format: string) =>
		`Unknown report format "${format}". Available: text, json`,
} as const;

export const CLIDescriptions = {
	PROGRAM: "Validate course registration histories against a course catalog",
	VALIDATE: "Validate transcripts and print the reports",
	BATCH: "Validate transcripts and write one report per student",
} as const;
