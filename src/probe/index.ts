export { ProbeExecutor } from "./probeExecutor";
export type { ProbeExecutorOptions } from "./probeExecutor";
export { RetryPolicy, parseRetryAfter } from "./retryPolicy";
export {
  buildProbeUrl,
  classifyFailure,
  isNotFoundStatus,
  sameCodeRedirectTarget,
} from "./classify";
