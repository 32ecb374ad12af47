export {
  canonicalize,
  decodePercentEscapes,
  InvalidUrlError,
  tryCanonicalize
} from "./canonical-url.js";
export {
  createDefaultRegistry,
  createDefaultSources,
  SOURCE_DOMAINS,
  SourceRegistry,
  type RegistryEntry
} from "./registry.js";
export {
  EARTH_RADIUS_KM,
  findNearestSource,
  haversineKm,
  type Coordinates,
  type NearestSource
} from "./geo.js";
export {
  describeSource,
  isExtractionSuccess,
  type ExtractedArticle,
  type HtmlFetcher,
  type NewsSource,
  type SourceDescriptor,
  type SourceLocation,
  type SourceOptions
} from "./types.js";
export { shuffled } from "./lib/shuffle.js";
export { fetchHtml, createHtmlFetcher } from "./lib/fetch-html.js";
export * from "./adapters/index.js";
