export { ConcurrentRegistrationPolicy } from "./concurrent-policy";
export { RegistrationHistory } from "./history";
export { PrerequisiteResolver, prerequisitePaths } from "./resolver";
export type {
    Attempt,
    ConcurrentDecision,
    CourseCheck,
    PrerequisitePath,
    Resolution,
    SemesterContext,
    SiblingRegistration,
} from "./types";
