export { academicStatus, calculateGpa, type GradedCredits } from "./gpa-calculator";
