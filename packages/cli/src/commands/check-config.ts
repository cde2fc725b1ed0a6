/**
 * @module commands/check-config
 * `syslog-facility check-config` — load facility.yaml and show what it resolves to.
 */

import { Command } from 'commander';
import { FacilityError, loadFacilityConfig, type FacilityConfig } from '@syslog-facility/core';
import { BOLD, GRAY, RESET, formatError, formatFacilityRef } from '../format.js';

export function registerCheckConfig(program: Command): void {
  program
    .command('check-config')
    .description('Validate the facility configuration file')
    .action(async () => {
      const { config: configPath, verbose = false } = program.opts<{ config?: string; verbose?: boolean }>();

      let config: FacilityConfig;
      try {
        config = await loadFacilityConfig(configPath);
      } catch (err) {
        if (err instanceof FacilityError) {
          program.error(formatError(err, verbose), { exitCode: 1, code: err.code });
        }
        throw err;
      }

      const facility = config.facility ? formatFacilityRef(config.facility) : `${GRAY}(none)${RESET}`;
      const accept = config.accept.length > 0
        ? config.accept.map(formatFacilityRef).join(', ')
        : `${GRAY}(all)${RESET}`;

      console.log(`${BOLD}Configuration: ${config.path}${RESET}`);
      console.log(`  version:  ${config.version}`);
      console.log(`  facility: ${facility}`);
      console.log(`  accept:   ${accept}`);
    });
}
