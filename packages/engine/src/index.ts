export * from "./types";
export * from "./grades";
export { CourseCatalog } from "./catalog";
export * from "./prerequisite";
export { CreditLimitChecker, type CreditCheck } from "./credit";
export { academicStatus, calculateGpa, type GradedCredits } from "./gpa";
export { ValidationReportAggregator, type SemesterEvaluation } from "./report";
export { CascadeEngine, validateTranscript } from "./cascade";
