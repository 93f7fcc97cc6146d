export { runCrawl } from "./crawlOrchestrator";
export type { CrawlDependencies, CrawlOptions } from "./crawlOrchestrator";
export { runConfiguredCrawl } from "./crawlRunner";
export type { CrawlRunResult, CrawlRunOptions } from "./crawlRunner";
export { outcomeToRecord, classifyRecordStatus } from "./outcomeToRecord";
export { createRunState, applyBatchToState, withPhase } from "./runState";
export { CrawlHaltedError } from "./crawlErrors";
