/**
 * Production collaborators for the CLI commands
 *
 * Commands receive these through a factory so tests can substitute an
 * in-process transport, writer and uploader.
 */

import type { HttpTransport } from '../../core/http-transport.js';
import { UndiciTransport } from '../../core/http-transport.js';
import type { LogSink } from '../../core/utils/logger.js';
import { ExportPipeline } from '../../export/export-pipeline.js';
import { GeoParquetWriter } from '../../export/geoparquet-writer.js';
import { HubDatasetUploader } from '../../export/hub-uploader.js';
import type { DatasetExporter, DatasetUploader, TableWriter } from '../../export/types.js';
import type { HarvestConfig } from './config.js';
import type { CLILogger } from './logger.js';

export interface CommandContext {
  readonly config: HarvestConfig;
  readonly logger: CLILogger;
}

export const USER_AGENT = 'geo-harvest/0.1';

export interface HarvestServices {
  readonly transport: HttpTransport;
  readonly writer: TableWriter;
  readonly uploader: DatasetUploader;
}

export type ServicesFactory = (config: HarvestConfig, log: LogSink) => HarvestServices;

export const createServices: ServicesFactory = (config, log) => ({
  transport: new UndiciTransport({ connections: config.concurrency, userAgent: USER_AGENT }),
  writer: new GeoParquetWriter(),
  uploader: new HubDatasetUploader(
    { repoId: config.dataset.repoId, accessToken: config.credentials.uploadToken },
    undefined,
    log
  ),
});

export function createExporter(
  config: HarvestConfig,
  services: HarvestServices,
  log: LogSink
): DatasetExporter {
  return new ExportPipeline(
    { outputDir: config.output.dir, upload: config.output.upload },
    services.writer,
    services.uploader,
    log
  );
}
