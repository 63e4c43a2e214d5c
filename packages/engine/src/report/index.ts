export { ValidationReportAggregator, type SemesterEvaluation } from "./aggregator";
