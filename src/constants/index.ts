export * from "./logger";
export * from "./codeSpace";
export * from "./probe";
export * from "./extractor";
export * from "./store";
export * from "./runner";
export * from "./runLock";
export * from "./clients/http";
