export { filterUnsettled, takeBatches } from "./resumeFilter";
