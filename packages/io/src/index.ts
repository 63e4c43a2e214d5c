export * from "./file-discovery";
export * from "./report-writer";
