/**
 * Bus-stop harvest: one-shot download of the static XML feed, parse, export.
 * Unlike the postal-code pipeline there is no retry budget: any failure is
 * fatal for the run.
 */

import { HTTPError, type HttpTransport } from '../core/http-transport.js';
import { createLogger, type LogSink } from '../core/utils/logger.js';
import { buildBusStopTable } from '../export/geo-table.js';
import type { DatasetExporter, ExportReceipt, ExportTarget } from '../export/types.js';
import { parseBusStopXml } from './feed-parser.js';

export const BUS_STOP_EXPORT_TARGET: ExportTarget = {
  fileName: 'bus_stops.parquet',
  pathInRepo: 'bus_stops.parquet',
};

export interface BusStopHarvestConfig {
  readonly feedUrl: string;
  readonly timeoutMs: number;
}

export interface BusStopHarvestDeps {
  readonly transport: HttpTransport;
  readonly exporter: DatasetExporter;
  readonly log?: LogSink;
}

export interface BusStopHarvestReport {
  readonly stops: number;
  readonly skipped: number;
  readonly exported: ExportReceipt | null;
}

/**
 * @throws HTTPError when the feed answers with anything but 200
 */
export async function fetchBusStopFeed(
  transport: HttpTransport,
  config: BusStopHarvestConfig
): Promise<string> {
  const response = await transport.get(config.feedUrl, { timeoutMs: config.timeoutMs });
  if (response.status !== 200) {
    throw new HTTPError(`HTTP ${response.status} fetching bus-stop feed`, response.status, config.feedUrl);
  }
  return response.text();
}

export async function runBusStopHarvest(
  config: BusStopHarvestConfig,
  deps: BusStopHarvestDeps
): Promise<BusStopHarvestReport> {
  const log = deps.log ?? createLogger({ module: 'bus-stops' });

  log.info('Downloading bus-stop feed', { url: config.feedUrl });
  const xml = await fetchBusStopFeed(deps.transport, config);
  const { stops, skipped } = parseBusStopXml(xml);

  if (skipped > 0) {
    log.warn('Skipped bus stops with non-numeric coordinates', { skipped });
  }

  if (stops.length === 0) {
    log.warn('Bus-stop feed contained no usable entries, skipping export');
    return { stops: 0, skipped, exported: null };
  }

  const exported = await deps.exporter.export(buildBusStopTable(stops), BUS_STOP_EXPORT_TARGET);
  return { stops: stops.length, skipped, exported };
}
