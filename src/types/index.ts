export * from "./logger";
export * from "./codeSpace";
export * from "./probe";
export * from "./extractor";
export * from "./record";
export * from "./store";
export * from "./runLock";
export * from "./config";
export * from "./orchestration";
export * from "./clients/http";
