export {
    ExternalDataAggregator,
    createAggregator,
    retryPolicyFromConfig,
    type AggregatorDeps,
    type WebSearchSource,
    type AstronomySource,
    type ResearchSource,
} from './orchestrator.js';
export { ResultCache } from './cache.js';
export { InMemorySink, ConsoleSink, type MemorySink, type MemoryKey } from './memory.js';
export { SPACE_KEYWORDS, isSpaceQuery, selectSummarySource, type SummarySource } from './router.js';
export type { CompositeResult, ResearchPaper } from './types.js';
export { loadConfig, type Config } from '../config.js';
