export type { UserErrorMessage } from "./types";
export { DiscoveryErrors } from "./discovery";
export { PipelinePhase, PipelinePhaseLabels, PipelineErrors } from "./pipeline";
export { CLIErrors, CLIDescriptions } from "./cli";
export { LogLevel, PhaseEvent, IoEvent, ValidationEvent, type PipelineEvent } from "./events";
