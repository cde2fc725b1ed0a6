/**
 * @module commands/lookup
 * `syslog-facility lookup <value>` — resolve a numerical code or a label.
 */

import { Command } from 'commander';
import { FacilityError, fromLabel, fromNumericalCodeText, type Facility } from '@syslog-facility/core';
import { GRAY, RESET, formatError, formatFacility, toFacilityJson } from '../format.js';

const DIGITS_RE = /^-?\d+$/;

/** Digit input (optionally signed) is a numerical code; anything else is an exact label. */
export function lookupFacility(value: string): Facility | undefined {
  return DIGITS_RE.test(value) ? fromNumericalCodeText(value) : fromLabel(value);
}

export function registerLookup(program: Command): void {
  program
    .command('lookup')
    .description('Resolve a facility from its numerical code or label')
    .argument('<value>', 'Numerical code (0-23) or uppercase label')
    .option('--json', 'Print JSON instead of text')
    .allowUnknownOption()
    .action((value: string, opts: { json?: boolean }) => {
      const verbose = program.opts<{ verbose?: boolean }>().verbose ?? false;

      let facility: Facility | undefined;
      try {
        facility = lookupFacility(value);
      } catch (err) {
        if (err instanceof FacilityError) {
          program.error(formatError(err, verbose), { exitCode: 1, code: err.code });
        }
        throw err;
      }

      if (opts.json) {
        console.log(JSON.stringify(facility ? toFacilityJson(facility) : null, null, 2));
      } else if (facility) {
        console.log(formatFacility(facility));
      } else {
        console.log(`${GRAY}No facility given${RESET}`);
      }
    });
}
