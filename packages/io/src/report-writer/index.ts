export { ReportWriter, reportFileStem } from "./writer";
