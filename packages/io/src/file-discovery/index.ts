export { FileDiscovery, errorCode } from "./discovery";
export {
	SkipReason,
	type DiscoveredFiles,
	type DiscoveryConfig,
	type DiscoveryError,
	type FileContent,
	type FileContents,
	type SkippedFile,
} from "./types";
