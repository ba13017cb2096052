/**
 * addresses <start> <end>
 *
 * Harvest every postal code in the closed range and export the combined
 * records as one GeoParquet file.
 */

import { ExportError, RangeValidationError, toError } from '../../core/errors.js';
import { PostalCodeFetcher } from '../../addresses/postal-code-fetcher.js';
import { HarvestController } from '../../addresses/harvest-controller.js';
import { parsePostalBound, validatePostalRange, formatPostalKey } from '../../addresses/postal-range.js';
import { runAddressHarvest, type AddressHarvestReport } from '../../addresses/range-driver.js';
import { RequestRateLimiter } from '../../resilience/rate-limiter.js';
import { EXIT_CODES, type ExitCode } from '../lib/exit-codes.js';
import { formatBytes, formatDuration, type CLILogger } from '../lib/logger.js';
import {
  createExporter,
  createServices,
  type CommandContext,
  type ServicesFactory,
} from '../lib/services.js';

/** Partial keys listed in human output before truncating */
const MAX_LISTED_PARTIAL = 20;

export interface AddressesCommandOptions {
  readonly start: string;
  readonly end: string;
}

export async function addressesCommand(
  options: AddressesCommandOptions,
  context: CommandContext,
  servicesFactory: ServicesFactory = createServices
): Promise<ExitCode> {
  const { config, logger } = context;

  let start: number;
  let end: number;
  try {
    start = parsePostalBound(options.start, 'start');
    end = parsePostalBound(options.end, 'end');
    validatePostalRange(start, end);
  } catch (error) {
    if (error instanceof RangeValidationError) {
      logger.error(`Invalid range: ${error.message}`);
      return EXIT_CODES.CONFIG_ERROR;
    }
    throw error;
  }

  const label = `${formatPostalKey(start)}-${formatPostalKey(end)}`;
  logger.commandStart('addresses', {
    range: label,
    keys: end - start + 1,
    concurrency: config.concurrency,
    rate: config.rateLimit.requestsPerSecond,
    upload: config.output.upload,
  });

  const services = servicesFactory(config, logger);
  const fetcher = new PostalCodeFetcher(
    {
      searchUrl: config.search.baseUrl,
      timeoutMs: config.timeout,
      maxAttempts: config.search.maxAttempts,
      backoffBaseMs: config.search.backoffBaseMs,
      backoffConstantMs: config.search.backoffConstantMs,
      authToken: config.search.useAuth ? config.credentials.searchToken : undefined,
    },
    services.transport,
    new RequestRateLimiter(config.rateLimit),
    logger
  );
  const controller = new HarvestController(
    { concurrency: config.concurrency, progressInterval: config.progressInterval, label },
    fetcher,
    logger
  );

  let report: AddressHarvestReport;
  try {
    report = await runAddressHarvest(
      { start, end },
      { controller, exporter: createExporter(config, services, logger), log: logger }
    );
  } catch (error) {
    const err = toError(error);
    logger.error(err.message, err instanceof ExportError ? { stage: err.stage } : undefined);
    logger.commandEnd(false);
    return EXIT_CODES.ERRORS;
  } finally {
    await services.transport.close();
  }

  printReport(report, logger);

  if (report.exported === null) {
    logger.warn(`No data for range ${label}`);
    logger.commandEnd(true, { exported: false });
    return EXIT_CODES.WARNINGS;
  }

  logger.commandEnd(true, { exported: true, file: report.exported.file.path });
  return EXIT_CODES.SUCCESS;
}

function printReport(report: AddressHarvestReport, logger: CLILogger): void {
  const { summary } = report;

  logger.info('Harvest summary', {
    keys: summary.keys,
    complete: summary.complete,
    empty: summary.empty,
    partial: summary.partial,
    records: summary.records,
    peakConcurrency: report.peakConcurrency,
    duration: formatDuration(report.durationMs),
  });

  if (report.exported) {
    const { file, upload } = report.exported;
    logger.info(`Wrote ${file.rows.toLocaleString('en-US')} rows to ${file.path}`, {
      size: formatBytes(file.bytes),
    });
    if (upload) {
      logger.info(`Uploaded to ${upload.repoId}:${upload.pathInRepo}`, {
        ...(upload.commitUrl && { commit: upload.commitUrl }),
      });
    }
  }

  if (summary.partialKeys.length > 0) {
    const rows = logger.isJson
      ? summary.partialKeys
      : summary.partialKeys.slice(0, MAX_LISTED_PARTIAL);
    logger.warn(`${summary.partialKeys.length} postal code(s) returned partial data`);
    logger.table(
      rows.map((entry) => ({ key: entry.key, reason: entry.reason, detail: entry.detail })),
      ['key', 'reason', 'detail']
    );
    if (rows.length < summary.partialKeys.length) {
      logger.warn(`... and ${summary.partialKeys.length - rows.length} more`);
    }
  }
}
