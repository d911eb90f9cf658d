export { BulkOrchestrator } from "./bulkOrchestrator";
export type { BulkOrchestratorConfig } from "./bulkOrchestrator";
export { RunTracker } from "./runTracker";
export { BulkRunAbortedError, BulkRunValidationError } from "./errors";
