/**
 * Harvest Commands Index
 *
 * Registers the harvest subcommands on the root program:
 * - addresses: postal-code range to GeoParquet
 * - bus-stops: bus-stop feed to GeoParquet
 *
 * Each action stores its exit code on the process; nothing here calls
 * process.exit, so pending log output and sockets drain first.
 */

import type { Command } from 'commander';
import type { CommandContext } from '../lib/services.js';
import { addressesCommand } from './addresses.js';
import { busStopsCommand } from './bus-stops.js';

export type ContextProvider = () => CommandContext;

export function registerAddressesCommand(program: Command, getContext: ContextProvider): void {
  program
    .command('addresses')
    .description('Harvest every address in a postal-code range')
    .argument('<start>', 'First postal code (1-6 digits)')
    .argument('<end>', 'Last postal code, inclusive')
    .action(async (start: string, end: string) => {
      process.exitCode = await addressesCommand({ start, end }, getContext());
    });
}

export function registerBusStopsCommand(program: Command, getContext: ContextProvider): void {
  program
    .command('bus-stops')
    .description('Download the bus-stop feed and export it')
    .action(async () => {
      process.exitCode = await busStopsCommand(getContext());
    });
}

export function registerHarvestCommands(program: Command, getContext: ContextProvider): void {
  registerAddressesCommand(program, getContext);
  registerBusStopsCommand(program, getContext);
}
