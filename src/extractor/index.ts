export { AudioPageExtractor, cleanTitle, parseCounter } from "./audioPageExtractor";
export { parseDuration, formatDuration } from "./duration";
