export { Logger } from "tslog";
export { createLogger, createJsonLogger, logFields, type AppLogObj, type LogMode, type LogSink } from "./logger";
