/**
 * geo-harvest
 *
 * Bounded-concurrency address harvesting over postal-code ranges, plus a
 * bus-stop feed import, exported as GeoParquet datasets.
 *
 * @packageDocumentation
 */

// Core types and errors
export type {
  PostalKey,
  RawAddressRecord,
  PartialReason,
  KeyFetchOutcome,
  CompleteOutcome,
  EmptyOutcome,
  PartialOutcome,
  OutcomeStatus,
  OutcomeSummary,
  AggregateResult,
  HarvestProgress,
} from './core/types.js';

export {
  RangeValidationError,
  HarvestConfigError,
  ConfigValidationError,
  MissingCredentialError,
  ExportError,
} from './core/errors.js';

export {
  UndiciTransport,
  HTTPError,
  HTTPTimeoutError,
  HTTPNetworkError,
  type HttpTransport,
  type TransportRequestOptions,
  type TransportResponse,
} from './core/http-transport.js';

export { createLogger, type LogSink, type LogLevel } from './core/utils/logger.js';

// Address harvest
export {
  formatPostalKey,
  validatePostalRange,
  buildPostalKeys,
  parsePostalBound,
} from './addresses/postal-range.js';

export {
  PostalCodeFetcher,
  backoffDelayMs,
  isTransientStatus,
  type KeyFetcher,
  type PostalFetcherConfig,
} from './addresses/postal-code-fetcher.js';

export {
  HarvestController,
  formatProgressLine,
  type HarvestControllerConfig,
  type HarvestRunResult,
  type ProgressListener,
} from './addresses/harvest-controller.js';

export { aggregateOutcomes, flattenRecords, summarizeOutcomes } from './addresses/aggregate.js';

export {
  runAddressHarvest,
  addressExportTarget,
  type AddressHarvestRequest,
  type AddressHarvestDeps,
  type AddressHarvestReport,
} from './addresses/range-driver.js';

// Bus stops
export type { BusStop, BusStopParseResult } from './bus-stops/types.js';
export { parseBusStopXml } from './bus-stops/feed-parser.js';
export {
  runBusStopHarvest,
  fetchBusStopFeed,
  BUS_STOP_EXPORT_TARGET,
  type BusStopHarvestConfig,
  type BusStopHarvestReport,
} from './bus-stops/bus-stop-harvest.js';

// Export
export type {
  GeoTable,
  GeoRow,
  ColumnSpec,
  TableWriter,
  DatasetUploader,
  DatasetExporter,
  ExportTarget,
  ExportReceipt,
} from './export/types.js';
export { buildAddressTable, buildBusStopTable } from './export/geo-table.js';
export { GeoParquetWriter, buildGeoMetadata } from './export/geoparquet-writer.js';
export { HubDatasetUploader } from './export/hub-uploader.js';
export { ExportPipeline } from './export/export-pipeline.js';

// Resilience
export { RequestRateLimiter, createRateLimiter } from './resilience/rate-limiter.js';
export { Bulkhead, createBulkhead } from './resilience/bulkhead.js';
export { CompletionQueue } from './resilience/completion-queue.js';
export { TokenBucket } from './resilience/token-bucket.js';
