/**
 * @module facility/types
 * Facility value type and result shapes shared by the registry and filter.
 */

import type { FacilityError, InvalidFacilityCodeError, InvalidFacilityLabelError } from '../errors.js';

/** Canonical RFC 5427 textual labels, in code order. */
export const FACILITY_LABELS = [
  'KERN',
  'USER',
  'MAIL',
  'DAEMON',
  'AUTH',
  'SYSLOG',
  'LPR',
  'NEWS',
  'UUCP',
  'CRON',
  'AUTHPRIV',
  'FTP',
  'NTP',
  'AUDIT',
  'ALERT',
  'CLOCK',
  'LOCAL0',
  'LOCAL1',
  'LOCAL2',
  'LOCAL3',
  'LOCAL4',
  'LOCAL5',
  'LOCAL6',
  'LOCAL7',
] as const;

export type FacilityLabel = (typeof FACILITY_LABELS)[number];

/** One syslog facility. Instances are frozen and shared process-wide. */
export interface Facility {
  /** RFC 5424 numerical code, 0–23. */
  readonly numericalCode: number;
  readonly label: FacilityLabel;
  readonly description: string;
}

/** Ascending order by numerical code. */
export type FacilityComparator = (a: Facility, b: Facility) => number;

export type CodeLookupResult =
  | { ok: true; facility: Facility }
  | { ok: false; error: InvalidFacilityCodeError };

/** `facility` is undefined when the label was absent or empty. */
export type LabelLookupResult =
  | { ok: true; facility: Facility | undefined }
  | { ok: false; error: InvalidFacilityLabelError };

export type FacilityClassification =
  | { status: 'accepted'; facility: Facility }
  | { status: 'rejected'; facility: Facility }
  | { status: 'malformed'; error: FacilityError };
