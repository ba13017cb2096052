#!/usr/bin/env tsx
/**
 * geo-harvest CLI Entry Point
 *
 * Harvests address records for postal-code ranges and the bus-stop feed,
 * writes GeoParquet files and uploads them to a dataset repository.
 *
 * @module geo-harvest-cli
 */

import { Command, InvalidArgumentError } from 'commander';
import { config as loadDotenv } from 'dotenv';
import { existsSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { loadConfig } from '../src/cli/lib/config.js';
import { createCLILogger } from '../src/cli/lib/logger.js';
import { EXIT_CODES } from '../src/cli/lib/exit-codes.js';
import type { CommandContext } from '../src/cli/lib/services.js';
import { registerHarvestCommands } from '../src/cli/commands/index.js';

// ============================================================================
// Global State
// ============================================================================

// Type alias, not interface: opts<T>() requires an index signature
type GlobalOptions = {
  readonly verbose?: boolean;
  readonly json?: boolean;
  readonly config?: string;
  readonly timeout?: number;
  readonly concurrency?: number;
  readonly rate?: number;
  readonly outputDir?: string;
  readonly upload?: boolean;
};

interface GlobalContext extends CommandContext {
  readonly startTime: number;
}

let globalContext: GlobalContext | null = null;

function getGlobalContext(): GlobalContext {
  if (!globalContext) {
    throw new Error('Global context not initialized. Call initializeContext first.');
  }
  return globalContext;
}

// ============================================================================
// CLI Setup
// ============================================================================

/**
 * package.json sits one level up from bin/ and two from dist/bin/
 */
function getVersion(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  for (const candidate of [join(here, '..', 'package.json'), join(here, '..', '..', 'package.json')]) {
    if (!existsSync(candidate)) continue;
    const parsed: unknown = JSON.parse(readFileSync(candidate, 'utf-8'));
    if (typeof parsed === 'object' && parsed !== null && 'version' in parsed) {
      return typeof parsed.version === 'string' ? parsed.version : '0.0.0';
    }
  }
  return '0.0.0';
}

function parseNumberOption(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

async function initializeContext(options: GlobalOptions): Promise<GlobalContext> {
  const startTime = Date.now();

  const config = await loadConfig({
    configPath: options.config,
    overrides: {
      verbose: options.verbose,
      json: options.json,
      timeout: options.timeout,
      concurrency: options.concurrency,
      rate: options.rate,
      outputDir: options.outputDir,
      // commander defaults --no-upload to true; only an explicit flag overrides
      upload: options.upload === false ? false : undefined,
    },
  });

  const logger = createCLILogger({
    level: config.verbose ? 'debug' : 'info',
    json: config.json,
  });

  logger.debug('Configuration loaded', {
    configPath: config.configPath,
    concurrency: config.concurrency,
    timeout: config.timeout,
    rate: config.rateLimit.requestsPerSecond,
    outputDir: config.output.dir,
    upload: config.output.upload,
  });

  globalContext = { config, logger, startTime };
  return globalContext;
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('geo-harvest')
    .description('Harvest address and bus-stop data into GeoParquet datasets')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Output as JSON (machine-readable)')
    .option('--config <path>', 'Path to config file (default: .geo-harvestrc)')
    .option('--concurrency <n>', 'Postal codes fetched in parallel', parseNumberOption)
    .option('--timeout <ms>', 'Per-request timeout in milliseconds', parseNumberOption)
    .option('--rate <rps>', 'Search API requests per second', parseNumberOption)
    .option('--output-dir <dir>', 'Directory for written parquet files')
    .option('--no-upload', 'Write files locally without uploading')
    .hook('preAction', async (thisCommand) => {
      try {
        await initializeContext(thisCommand.opts<GlobalOptions>());
      } catch (error) {
        console.error(
          `Configuration error: ${error instanceof Error ? error.message : String(error)}`
        );
        process.exit(EXIT_CODES.CONFIG_ERROR);
      }
    });

  registerHarvestCommands(program, getGlobalContext);

  return program;
}

// ============================================================================
// Main Entry Point
// ============================================================================

async function main(): Promise<void> {
  loadDotenv();
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    if (globalContext) {
      globalContext.logger.error('Command failed', {
        error: error instanceof Error ? error.message : String(error),
        duration_ms: Date.now() - globalContext.startTime,
      });
    } else {
      console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    }
    process.exitCode = EXIT_CODES.ERRORS;
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.ERRORS);
});
