export { executeBatches, EMPTY_STATS, type DrawBackend, type DrawStats } from "./DrawExecutor";
