export type { MetadataExtractor } from "./metadataExtractor";
export type { RecordStore } from "./recordStore";
