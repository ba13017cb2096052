/**
 * Address harvest driver
 *
 * Owns one run over a closed postal-code range: key generation, the harvest
 * controller, aggregation, and the hand-off to export. Fetch-level failures
 * never fail the run; export failures always do.
 */

import type { OutcomeSummary } from '../core/types.js';
import { createLogger, type LogSink } from '../core/utils/logger.js';
import { buildAddressTable } from '../export/geo-table.js';
import type { DatasetExporter, ExportReceipt, ExportTarget } from '../export/types.js';
import { aggregateOutcomes } from './aggregate.js';
import type { HarvestRunResult } from './harvest-controller.js';
import { buildPostalKeys, formatPostalKey } from './postal-range.js';

export interface AddressHarvestRequest {
  readonly start: number;
  readonly end: number;
}

export interface AddressHarvestDeps {
  readonly controller: { run(keys: readonly string[]): Promise<HarvestRunResult> };
  readonly exporter: DatasetExporter;
  readonly log?: LogSink;
}

export interface AddressHarvestReport {
  readonly start: string;
  readonly end: string;
  readonly summary: OutcomeSummary;
  readonly peakConcurrency: number;
  readonly durationMs: number;
  /** null when the range produced no records and nothing was exported */
  readonly exported: ExportReceipt | null;
}

/**
 * addresses_000001_000999.parquet, uploaded under chunks/
 */
export function addressExportTarget(start: number, end: number): ExportTarget {
  const fileName = `addresses_${formatPostalKey(start)}_${formatPostalKey(end)}.parquet`;
  return { fileName, pathInRepo: `chunks/${fileName}` };
}

export async function runAddressHarvest(
  request: AddressHarvestRequest,
  deps: AddressHarvestDeps
): Promise<AddressHarvestReport> {
  const log = deps.log ?? createLogger({ module: 'address-harvest' });
  const keys = buildPostalKeys(request.start, request.end);
  const start = formatPostalKey(request.start);
  const end = formatPostalKey(request.end);

  log.info('Starting address harvest', { start, end, keys: keys.length });
  const run = await deps.controller.run(keys);
  const aggregate = aggregateOutcomes(run.outcomes);

  const base = {
    start,
    end,
    summary: aggregate.summary,
    peakConcurrency: run.peakConcurrency,
    durationMs: run.durationMs,
  };

  if (aggregate.kind === 'no_data') {
    log.warn('No data for range, skipping export', { start, end, partial: aggregate.summary.partial });
    return { ...base, exported: null };
  }

  const table = buildAddressTable(aggregate.records);
  const exported = await deps.exporter.export(table, addressExportTarget(request.start, request.end));

  return { ...base, exported };
}
