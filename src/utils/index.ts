/**
 * Utils barrel exports
 */

export * from "./errors";
export * from "./sleep";
export * from "./text";
