/**
 * @module facility/filter
 * Accept-list filter for ingestion pipelines.
 *
 * An invalid facility code marks one record as malformed; it never
 * escapes as an exception and never stops the stream.
 */

import { InvalidFacilityLabelError } from '../errors.js';
import { facilityRegistry } from './registry.js';
import type { Facility, FacilityClassification } from './types.js';

export class FacilityFilter {
  private readonly accepted: ReadonlySet<Facility>;

  /**
   * @param accept Facilities to accept; absent or empty accepts all.
   * @throws {InvalidFacilityCodeError | InvalidFacilityLabelError} when an
   *   entry is unknown, or its code and label name different facilities
   */
  constructor(accept: readonly Facility[] = []) {
    const canonical = accept.map(canonicalize);
    this.accepted = new Set(canonical.length > 0 ? canonical : facilityRegistry.values());
  }

  accepts(facility: Facility): boolean {
    return this.accepted.has(facility);
  }

  /** Classify a raw numerical code taken from a PRI header. */
  classify(code: number): FacilityClassification {
    const result = facilityRegistry.tryFromNumericalCode(code);
    if (!result.ok) {
      return { status: 'malformed', error: result.error };
    }
    return this.accepts(result.facility)
      ? { status: 'accepted', facility: result.facility }
      : { status: 'rejected', facility: result.facility };
  }

  /** Accepted facilities in code order. */
  facilities(): Facility[] {
    return [...this.accepted].sort(facilityRegistry.comparator());
  }
}

function canonicalize(facility: Facility): Facility {
  const byCode = facilityRegistry.fromNumericalCode(facility.numericalCode);
  const byLabel = facilityRegistry.fromLabel(facility.label);
  if (byLabel !== byCode) {
    throw new InvalidFacilityLabelError(facility.label);
  }
  return byCode;
}
