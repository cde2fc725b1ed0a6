/**
 * @module program
 * Builds the `syslog-facility` command tree.
 */

import { Command } from 'commander';
import { registerList } from './commands/list.js';
import { registerLookup } from './commands/lookup.js';
import { registerCheckConfig } from './commands/check-config.js';

export const VERSION = '0.1.0';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('syslog-facility')
    .description('Look up and validate RFC 5424 syslog facilities')
    .version(VERSION)
    .option('-c, --config <path>', 'Path to facility.yaml')
    .option('--verbose', 'Show error codes and suggested actions');

  registerList(program);
  registerLookup(program);
  registerCheckConfig(program);

  return program;
}
