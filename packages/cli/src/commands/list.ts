/**
 * @module commands/list
 * `syslog-facility list` — print every facility in code order.
 */

import { Command } from 'commander';
import { values } from '@syslog-facility/core';
import { BOLD, RESET, formatFacility, toFacilityJson } from '../format.js';

export function registerList(program: Command): void {
  program
    .command('list')
    .description('List all syslog facilities in code order')
    .option('--json', 'Print JSON instead of a table')
    .action((opts: { json?: boolean }) => {
      const facilities = values();
      if (opts.json) {
        console.log(JSON.stringify(facilities.map(toFacilityJson), null, 2));
        return;
      }
      console.log(`${BOLD}Code  Label     Description${RESET}`);
      for (const facility of facilities) {
        console.log(formatFacility(facility));
      }
    });
}
