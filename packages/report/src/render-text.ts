/**
 * Text Report Renderer
 *
 * Renders a ValidationResult as the plain-text validation report.
 *
 * Sections: header → student information → validation summary
 * → semester details → invalid registration details → courses not in catalog
 */

import {
  AcademicStatus,
  ReasonKind,
  VerdictStatus,
  type CourseRow,
  type InvalidRegistrationRecord,
  type NotFoundRecord,
  type SemesterSummary,
  type ValidationResult,
} from '@coursecheck/engine';
import { columns, formatGpa, formatTimestamp, truncateName } from './format';
import type { TextReportOptions } from './types';

const COURSE_COLUMNS = [10, 40, 7, 8] as const;
const NOT_FOUND_COLUMNS = [10, 40] as const;

const STATUS_LABELS: Record<AcademicStatus, string> = {
  [AcademicStatus.CRITICAL]: 'CRITICAL (GPA < 1.50)',
  [AcademicStatus.WARNING]: 'WARNING (GPA < 1.75)',
  [AcademicStatus.PROBATION]: 'PROBATION (GPA < 2.00)',
  [AcademicStatus.NORMAL]: 'NORMAL',
};

const REASON_LABELS: Record<ReasonKind, string> = {
  [ReasonKind.PREREQUISITE]: 'Prerequisite',
  [ReasonKind.PREREQUISITE_GROUP]: 'Prerequisite group',
  [ReasonKind.DATA_ERROR]: 'Data error',
};

/**
 * Render a ValidationResult to report text, newline-terminated.
 */
export function renderTextReport(result: ValidationResult, options: TextReportOptions = {}): string {
  const width = options.width ?? 80;
  const rule = '-'.repeat(width);
  const lines: string[] = [];

  renderHeader(lines, options.generatedAt ?? new Date(), width);
  renderStudent(lines, result, rule);
  renderSummary(lines, result, rule);
  renderSemesters(lines, result.semesters, rule);
  renderInvalidDetails(lines, result.invalidBySemester, rule);
  renderNotFound(lines, result.notFound, rule);

  return `${lines.join('\n')}\n`;
}

// ---- Section renderers ----

function renderHeader(lines: string[], generatedAt: Date, width: number): void {
  const banner = '='.repeat(width);
  lines.push(banner, 'COURSE REGISTRATION VALIDATION REPORT', `Generated: ${formatTimestamp(generatedAt)}`, banner, '');
}

function renderStudent(lines: string[], result: ValidationResult, rule: string): void {
  const { student, standing } = result;
  lines.push(
    'STUDENT INFORMATION',
    rule,
    `Student ID:        ${student.id || 'Unknown'}`,
    `Name:              ${student.name || 'Unknown'}`,
    `Field of Study:    ${student.fieldOfStudy || 'Unknown'}`,
    `Date of Admission: ${student.admissionDate || 'Unknown'}`,
    `Current GPA:       ${standing.currentGpa === null ? 'N/A' : formatGpa(standing.currentGpa)}`,
  );
  if (standing.status) {
    lines.push(`Academic Status:   ${STATUS_LABELS[standing.status]}`);
  }
  lines.push('');
}

function renderSummary(lines: string[], result: ValidationResult, rule: string): void {
  const { stats } = result;
  lines.push(
    'VALIDATION SUMMARY',
    rule,
    `Semesters Analyzed:    ${stats.semestersAnalyzed}`,
    `Registrations Checked: ${stats.registrationsChecked}`,
    `Invalid Registrations: ${stats.invalidCount}`,
    `Courses Not Found:     ${stats.notFoundCount}`,
    `Credit Warnings:       ${stats.creditWarnings}`,
    '',
  );
}

function renderSemesters(lines: string[], semesters: readonly SemesterSummary[], rule: string): void {
  lines.push('SEMESTER DETAILS', rule);

  for (const semester of semesters) {
    lines.push('', semester.label, '-'.repeat(semester.label.length));
    lines.push(`Total Credits: ${semester.totalCredits}`);
    lines.push(
      `Overall - Semester GPA: ${formatGpa(semester.recomputedGpa.semester)}, Cumulative GPA: ${formatGpa(semester.recomputedGpa.cumulative)}`,
    );
    if (semester.hasInvalid) {
      lines.push(
        `Valid only - Semester GPA: ${formatGpa(semester.excludingInvalidGpa.semester)}, Cumulative GPA: ${formatGpa(semester.excludingInvalidGpa.cumulative)}`,
      );
    }
    if (semester.creditWarning) {
      lines.push(semester.creditWarning);
    }

    lines.push('', 'Courses:', columns(['Code', 'Name', 'Grade', 'Credits', 'Status'], COURSE_COLUMNS), rule);
    for (const row of semester.rows) {
      renderCourseRow(lines, row);
    }
  }
}

function renderCourseRow(lines: string[], row: CourseRow): void {
  const cells = [row.code, truncateName(row.name), row.grade, String(row.credits), statusLabel(row)];
  lines.push(columns(cells, COURSE_COLUMNS));
  if (row.verdict.status === VerdictStatus.INVALID) {
    lines.push(`  → Issue: ${row.verdict.reason.message}`);
  }
}

function statusLabel(row: CourseRow): string {
  switch (row.verdict.status) {
    case VerdictStatus.VALID:
      return row.grade === 'W' ? 'WITHDRAWN' : 'Valid';
    case VerdictStatus.INVALID:
      return 'INVALID';
    case VerdictStatus.NOT_FOUND:
      return 'NOT FOUND';
  }
}

function renderInvalidDetails(
  lines: string[],
  groups: ValidationResult['invalidBySemester'],
  rule: string,
): void {
  if (groups.length === 0) return;

  lines.push('', '', 'INVALID REGISTRATIONS DETAILS', rule);
  for (const group of groups) {
    lines.push('', `Semester: ${group.semester}`);
    for (const record of group.records) {
      renderInvalidRecord(lines, record);
    }
  }
}

function renderInvalidRecord(lines: string[], record: InvalidRegistrationRecord): void {
  lines.push(
    `  • Course: ${record.code} - ${record.name || 'Unknown'}`,
    `    Type: ${REASON_LABELS[record.kind]}${record.cascade ? ' (cascade)' : ''}`,
    `    Reason: ${record.reason}`,
  );
}

function renderNotFound(lines: string[], records: readonly NotFoundRecord[], rule: string): void {
  if (records.length === 0) return;

  lines.push(
    '',
    '',
    'COURSES NOT IN COURSE DATA',
    rule,
    'The following courses were not found in the course data file and could not be validated.',
    'Please check prerequisites manually for these courses:',
    '',
    columns(['Code', 'Name', 'Semester'], NOT_FOUND_COLUMNS),
    '-'.repeat(70),
  );
  for (const record of records) {
    lines.push(columns([record.code, truncateName(record.name), record.semester], NOT_FOUND_COLUMNS));
  }
}
