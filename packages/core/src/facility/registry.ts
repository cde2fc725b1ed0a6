/**
 * @module facility/registry
 * Process-wide catalog of the 24 RFC 5424 syslog facilities.
 *
 * Resolves a facility from its numerical code (as extracted from a PRI
 * header by an upstream parser) or from its textual label (as found in
 * configuration). Lookups never coerce: anything outside the table is
 * rejected with a typed error.
 */

import { InvalidFacilityCodeError, InvalidFacilityLabelError } from '../errors.js';
import { FACILITIES } from './table.js';
import {
  FACILITY_LABELS,
  type CodeLookupResult,
  type Facility,
  type FacilityComparator,
  type FacilityLabel,
  type LabelLookupResult,
} from './types.js';

const FACILITY_COUNT = 24;
const LABEL_RE = /^[A-Z][A-Z0-9]*$/;
const CODE_TEXT_RE = /^(0|[1-9]\d*)$/;

const byNumericalCode: FacilityComparator = (a, b) => a.numericalCode - b.numericalCode;

// =====================================================================
// Table Validation
// =====================================================================

/**
 * Check a candidate facility table against the registry invariants.
 *
 * @returns One message per violation; empty when the table is valid.
 */
export function validateFacilityTable(facilities: readonly Facility[]): string[] {
  const errors: string[] = [];
  if (facilities.length !== FACILITY_COUNT) {
    errors.push(`expected ${FACILITY_COUNT} facilities, got ${facilities.length}`);
  }

  const codes = new Set<number>();
  const labels = new Set<string>();
  facilities.forEach((facility, index) => {
    const prefix = `facilities[${index}]`;
    const { numericalCode, label } = facility;
    if (!Number.isInteger(numericalCode) || numericalCode < 0 || numericalCode >= FACILITY_COUNT) {
      errors.push(`${prefix}.numericalCode must be an integer in [0, ${FACILITY_COUNT - 1}]`);
    } else if (codes.has(numericalCode)) {
      errors.push(`${prefix}.numericalCode duplicate: ${numericalCode}`);
    }
    codes.add(numericalCode);

    if (!LABEL_RE.test(label)) {
      errors.push(`${prefix}.label must be non-empty uppercase ASCII`);
    } else if (labels.has(label)) {
      errors.push(`${prefix}.label duplicate: ${label}`);
    }
    labels.add(label);
  });
  return errors;
}

// =====================================================================
// FacilityRegistry
// =====================================================================

/**
 * Immutable registry with a code index and a label index.
 *
 * There is exactly one instance, {@link facilityRegistry}, built when the
 * module loads. Every method is synchronous and side-effect free.
 */
export class FacilityRegistry {
  private readonly sorted: readonly Facility[];
  private readonly codeIndex: ReadonlyMap<number, Facility>;
  private readonly labelIndex: ReadonlyMap<string, Facility>;

  private constructor(facilities: readonly Facility[]) {
    const errors = validateFacilityTable(facilities);
    if (errors.length > 0) {
      throw new Error(`Facility table validation failed: ${errors.join('; ')}`);
    }
    this.sorted = Object.freeze([...facilities].sort(byNumericalCode));
    this.codeIndex = new Map(this.sorted.map((f): [number, Facility] => [f.numericalCode, f]));
    this.labelIndex = new Map(this.sorted.map((f): [string, Facility] => [f.label, f]));
  }

  static readonly instance = new FacilityRegistry(FACILITY_LABELS.map((name) => FACILITIES[name]));

  /**
   * Resolve a numerical code.
   *
   * @throws {InvalidFacilityCodeError} when `code` is not one of 0–23
   */
  fromNumericalCode(code: number): Facility {
    const facility = this.codeIndex.get(code);
    if (!facility) {
      throw new InvalidFacilityCodeError(code);
    }
    return facility;
  }

  /**
   * Resolve a numerical code written as decimal text, e.g. a CLI argument.
   *
   * Only canonical non-negative integers are parsed; leading zeros, signs
   * and values past `Number.MAX_SAFE_INTEGER` are rejected with the text
   * exactly as given.
   *
   * @throws {InvalidFacilityCodeError}
   */
  fromNumericalCodeText(text: string): Facility {
    const code = CODE_TEXT_RE.test(text) ? Number(text) : NaN;
    if (!Number.isSafeInteger(code)) {
      throw new InvalidFacilityCodeError(text);
    }
    return this.fromNumericalCode(code);
  }

  /**
   * Resolve a textual label. Matching is exact and case-sensitive.
   *
   * `null`, `undefined` and `""` mean "no facility given" and return
   * `undefined` rather than throwing.
   *
   * @throws {InvalidFacilityLabelError} when a non-empty label is unknown
   */
  fromLabel(label: string | null | undefined): Facility | undefined {
    if (label === null || label === undefined || label === '') {
      return undefined;
    }
    const facility = this.labelIndex.get(label);
    if (!facility) {
      throw new InvalidFacilityLabelError(label);
    }
    return facility;
  }

  tryFromNumericalCode(code: number): CodeLookupResult {
    try {
      return { ok: true, facility: this.fromNumericalCode(code) };
    } catch (err) {
      if (err instanceof InvalidFacilityCodeError) {
        return { ok: false, error: err };
      }
      throw err;
    }
  }

  tryFromLabel(label: string | null | undefined): LabelLookupResult {
    try {
      return { ok: true, facility: this.fromLabel(label) };
    } catch (err) {
      if (err instanceof InvalidFacilityLabelError) {
        return { ok: false, error: err };
      }
      throw err;
    }
  }

  isFacilityCode(value: unknown): value is number {
    return typeof value === 'number' && this.codeIndex.has(value);
  }

  isFacilityLabel(value: unknown): value is FacilityLabel {
    return typeof value === 'string' && this.labelIndex.has(value);
  }

  /** All facilities in ascending code order. */
  values(): readonly Facility[] {
    return this.sorted;
  }

  comparator(): FacilityComparator {
    return byNumericalCode;
  }

  get size(): number {
    return this.sorted.length;
  }
}

export const facilityRegistry: FacilityRegistry = FacilityRegistry.instance;

// =====================================================================
// Free functions bound to the process-wide registry
// =====================================================================

export function fromNumericalCode(code: number): Facility {
  return facilityRegistry.fromNumericalCode(code);
}

export function fromNumericalCodeText(text: string): Facility {
  return facilityRegistry.fromNumericalCodeText(text);
}

export function fromLabel(label: string | null | undefined): Facility | undefined {
  return facilityRegistry.fromLabel(label);
}

export function tryFromNumericalCode(code: number): CodeLookupResult {
  return facilityRegistry.tryFromNumericalCode(code);
}

export function tryFromLabel(label: string | null | undefined): LabelLookupResult {
  return facilityRegistry.tryFromLabel(label);
}

export function isFacilityCode(value: unknown): value is number {
  return facilityRegistry.isFacilityCode(value);
}

export function isFacilityLabel(value: unknown): value is FacilityLabel {
  return facilityRegistry.isFacilityLabel(value);
}

export function numericalCode(facility: Facility): number {
  return facility.numericalCode;
}

export function label(facility: Facility): FacilityLabel {
  return facility.label;
}

export function comparator(): FacilityComparator {
  return facilityRegistry.comparator();
}

export function values(): readonly Facility[] {
  return facilityRegistry.values();
}
