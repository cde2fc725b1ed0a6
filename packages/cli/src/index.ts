#!/usr/bin/env node
/**
 * @module @syslog-facility/cli
 * CLI entry point. Parses process.argv via Commander.js.
 */

import { createProgram } from './program.js';

await createProgram().parseAsync();
