export { loadCrawlerConfig, ConfigError } from "./crawlerConfig";
