/**
 * @module format
 * Plain-text rendering of facilities and errors for the terminal.
 */

import type { Facility, FacilityError } from '@syslog-facility/core';

// ── ANSI colours ──────────────────────────────────────────────────────
export const RED = '\x1b[31m';
export const YELLOW = '\x1b[33m';
export const GRAY = '\x1b[90m';
export const BOLD = '\x1b[1m';
export const RESET = '\x1b[0m';

/** `" 4  AUTH      Security/authorization messages"` */
export function formatFacility(facility: Facility): string {
  const code = String(facility.numericalCode).padStart(2);
  return `${code}  ${facility.label.padEnd(8)}  ${facility.description}`;
}

/** `"LOCAL0 (16)"` */
export function formatFacilityRef(facility: Facility): string {
  return `${facility.label} (${facility.numericalCode})`;
}

export function toFacilityJson(facility: Facility): { numericalCode: number; label: string; description: string } {
  return {
    numericalCode: facility.numericalCode,
    label: facility.label,
    description: facility.description,
  };
}

/** Error message, followed by suggested actions when `verbose` is set. */
export function formatError(err: FacilityError, verbose: boolean): string {
  const lines = [`${RED}${err.message}${RESET}`];
  if (verbose) {
    lines.push(`${GRAY}[${err.code}]${RESET}`);
    for (const action of err.structuredError.suggestedActions) {
      lines.push(`  ${YELLOW}→${RESET} ${action}`);
    }
  }
  return lines.join('\n');
}
