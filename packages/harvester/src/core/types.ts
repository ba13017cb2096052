/**
 * geo-harvest Core Types
 *
 * Shared types for the postal-code harvest pipeline: keys, raw records,
 * per-key fetch outcomes, and aggregate results.
 */

/**
 * Six-digit zero-padded postal code (e.g. "000123")
 */
export type PostalKey = string;

/**
 * One address hit as returned by the search API.
 *
 * Opaque to the fetcher. Only the export step interprets specific fields
 * (LATITUDE, LONGITUDE).
 */
export type RawAddressRecord = Readonly<Record<string, unknown>>;

/**
 * Why a key stopped before reaching the API's last page
 */
export type PartialReason = 'permanent_status' | 'retries_exhausted' | 'unexpected_error';

interface OutcomeBase {
  readonly key: PostalKey;
  readonly records: readonly RawAddressRecord[];
  /** Pages whose response was accepted */
  readonly pagesFetched: number;
  /** HTTP attempts issued, retries included */
  readonly requests: number;
}

/**
 * Last page reached with at least one record
 */
export interface CompleteOutcome extends OutcomeBase {
  readonly status: 'complete';
}

/**
 * Last page reached, API reported no hits
 */
export interface EmptyOutcome extends OutcomeBase {
  readonly status: 'empty';
}

/**
 * Fetch stopped early; records holds whatever was collected before the stop
 */
export interface PartialOutcome extends OutcomeBase {
  readonly status: 'partial';
  readonly reason: PartialReason;
  /** Page the fetch stopped on */
  readonly page: number;
  /** Status code or error message of the final failure */
  readonly detail: string;
}

export type KeyFetchOutcome = CompleteOutcome | EmptyOutcome | PartialOutcome;

export type OutcomeStatus = KeyFetchOutcome['status'];

/**
 * Per-run outcome counts
 */
export interface OutcomeSummary {
  readonly keys: number;
  readonly complete: number;
  readonly empty: number;
  readonly partial: number;
  readonly records: number;
  readonly partialKeys: ReadonlyArray<{
    readonly key: PostalKey;
    readonly reason: PartialReason;
    readonly detail: string;
  }>;
}

export type AggregateResult =
  | { readonly kind: 'no_data'; readonly summary: OutcomeSummary }
  | {
      readonly kind: 'records';
      readonly records: readonly RawAddressRecord[];
      readonly summary: OutcomeSummary;
    };

/**
 * Progress snapshot emitted by the harvest controller
 */
export interface HarvestProgress {
  readonly completed: number;
  readonly total: number;
  readonly last: KeyFetchOutcome;
}
