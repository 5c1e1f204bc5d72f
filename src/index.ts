export * from "./types.js";
export { NoPriceDataError } from "./errors.js";
export { segmentMoves, type SegmentOptions } from "./pipeline/segment.js";
export {
  enrichSpans,
  type EnrichOptions,
  type EnrichReport,
  type EnrichState,
} from "./pipeline/enrich.js";
export {
  OpenAiCauseSummarizer,
  type CauseSummarizer,
  type SummaryInput,
} from "./pipeline/summarize.js";
export { IntervalPacer, immediatePacer, type Pacer } from "./pipeline/pacer.js";
export {
  GoogleNewsLookup,
  searchNews,
  type NewsLookup,
  type NewsQuery,
} from "./providers/news.js";
export { YahooPriceProvider, type PriceProvider } from "./providers/prices.js";
export {
  FileAnnotationStore,
  MemoryAnnotationStore,
  type AnnotationStore,
} from "./db/AnnotationStore.js";
export { FilePriceStore, type PriceCache } from "./db/PriceStore.js";
export { clearCache } from "./db/cache.js";
export { renderChart } from "./render/chart.js";
export { runAnnotate, defaultDeps, type AnnotateOptions } from "./run.js";
