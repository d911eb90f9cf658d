export { RateLimitMonitor } from "./rateLimitMonitor";
export type { RateLimitMonitorOptions } from "./rateLimitMonitor";
export { parseRateLimitHeaders } from "./rateLimitHeaders";
