export { DocumentStoreClient, toSortParam, DEFAULT_TIMEOUT_MS } from './client.js';
export type { StoreClientOptions, SearchOptions, HttpMethod, UrlParams, FetchLike } from './client.js';
export { JsonCodec, DEFAULT_OFFLOAD_THRESHOLD } from './json-codec.js';
export {
  termQuery,
  freeTextQuery,
  rawQuery,
  andQuery,
  serializeFragment,
  buildFacets,
  buildRequestBody,
  parseQuery,
  MATCH_EVERYTHING,
} from './query.js';
export type {
  TermQuery,
  FreeTextQuery,
  RawQuery,
  AndQuery,
  QueryFragment,
  FieldEquals,
  TermValue,
} from './query.js';
export { LazyResultSet, DEFAULT_PAGE_SIZE } from './result-set.js';
export type { IndexTarget, ResultStats } from './result-set.js';
export { parseSearchResponse } from './response-schema.js';
export type { FacetTerm, FacetResult, ParsedSearchResponse } from './response-schema.js';
export { DocumentManager, IndexAdmin } from './manager.js';
