// Library entry point
// For CLI usage, run: cheevo-scan --config <path>

export * from "./types.js"
export * from "./errors.js"
export * from "./config.js"
export * from "./platforms.js"
export * from "./library.js"
export * from "./hasher.js"
export * from "./report.js"
export * from "./setup.js"
export * from "./hashmap.js"
export {
	CatalogClient,
	type CatalogSource,
	type CatalogClientOptions,
} from "./core/catalog/api.js"
export {
	matchOne,
	findCatalogMatches,
	type MatchContext,
	type MatchHooks,
} from "./core/match.js"
export { runPipeline, type PipelineOptions } from "./core/pipeline.js"
export { summarizeResults, type RunStats, type SystemStats } from "./core/stats.js"
export type { PipelineEvent } from "./core/types.js"
