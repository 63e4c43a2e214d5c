import type { ValidationResult } from '@coursecheck/engine';

/**
 * Render a ValidationResult as pretty-printed JSON, newline-terminated.
 */
export function renderJsonReport(result: ValidationResult): string {
  return `${JSON.stringify(result, null, 2)}\n`;
}
