export * from "./types";
export { ValidationPipeline, reportFileName } from "./pipeline";
export { LogSubscriber } from "./log-subscriber";
export { ErrorSubscriber } from "./error-subscriber";
export { mapWithLimit } from "./concurrency";
