/**
 * Human-friendly error description, one line per entry.
 * The first line is the headline; following lines add detail.
 */
export type UserErrorMessage = readonly string[];
