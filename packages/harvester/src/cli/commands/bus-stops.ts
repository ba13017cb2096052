/**
 * bus-stops
 *
 * Download the static bus-stop feed and export it as one GeoParquet file.
 */

import { ExportError, toError } from '../../core/errors.js';
import { runBusStopHarvest, type BusStopHarvestReport } from '../../bus-stops/bus-stop-harvest.js';
import { EXIT_CODES, type ExitCode } from '../lib/exit-codes.js';
import { formatBytes } from '../lib/logger.js';
import {
  createExporter,
  createServices,
  type CommandContext,
  type ServicesFactory,
} from '../lib/services.js';

export async function busStopsCommand(
  context: CommandContext,
  servicesFactory: ServicesFactory = createServices
): Promise<ExitCode> {
  const { config, logger } = context;

  logger.commandStart('bus-stops', {
    feed: config.busStops.feedUrl,
    upload: config.output.upload,
  });

  const services = servicesFactory(config, logger);
  let report: BusStopHarvestReport;
  try {
    report = await runBusStopHarvest(
      { feedUrl: config.busStops.feedUrl, timeoutMs: config.timeout },
      {
        transport: services.transport,
        exporter: createExporter(config, services, logger),
        log: logger,
      }
    );
  } catch (error) {
    const err = toError(error);
    logger.error(err.message, err instanceof ExportError ? { stage: err.stage } : undefined);
    logger.commandEnd(false);
    return EXIT_CODES.ERRORS;
  } finally {
    await services.transport.close();
  }

  if (report.exported === null) {
    logger.warn('No bus stops found in feed', { skipped: report.skipped });
    logger.commandEnd(true, { exported: false });
    return EXIT_CODES.WARNINGS;
  }

  const { file, upload } = report.exported;
  logger.info(`Wrote ${report.stops.toLocaleString('en-US')} bus stops to ${file.path}`, {
    skipped: report.skipped,
    size: formatBytes(file.bytes),
  });
  if (upload) {
    logger.info(`Uploaded to ${upload.repoId}:${upload.pathInRepo}`, {
      ...(upload.commitUrl && { commit: upload.commitUrl }),
    });
  }

  logger.commandEnd(true, { exported: true, file: file.path });
  return EXIT_CODES.SUCCESS;
}
