/**
 * Result aggregation
 *
 * Flattens per-key outcomes into one record set. Records keep their identity;
 * order within a key is page order, order across keys is completion order.
 */

import type {
  AggregateResult,
  KeyFetchOutcome,
  OutcomeSummary,
  RawAddressRecord,
} from '../core/types.js';

export function flattenRecords(
  perKey: ReadonlyArray<readonly RawAddressRecord[]>
): RawAddressRecord[] {
  const records: RawAddressRecord[] = [];
  for (const list of perKey) {
    records.push(...list);
  }
  return records;
}

export function summarizeOutcomes(outcomes: readonly KeyFetchOutcome[]): OutcomeSummary {
  let complete = 0;
  let empty = 0;
  let records = 0;
  const partialKeys: Array<OutcomeSummary['partialKeys'][number]> = [];

  for (const outcome of outcomes) {
    records += outcome.records.length;
    switch (outcome.status) {
      case 'complete':
        complete++;
        break;
      case 'empty':
        empty++;
        break;
      case 'partial':
        partialKeys.push({ key: outcome.key, reason: outcome.reason, detail: outcome.detail });
        break;
    }
  }

  return {
    keys: outcomes.length,
    complete,
    empty,
    partial: partialKeys.length,
    records,
    partialKeys,
  };
}

/**
 * @returns `no_data` when every key yielded zero records
 */
export function aggregateOutcomes(outcomes: readonly KeyFetchOutcome[]): AggregateResult {
  const summary = summarizeOutcomes(outcomes);
  const records = flattenRecords(outcomes.map((outcome) => outcome.records));

  if (records.length === 0) {
    return { kind: 'no_data', summary };
  }

  return { kind: 'records', records, summary };
}
