/**
 * Unit tests for facility/registry.
 *
 * Covers: code and label lookup, absent-label handling, accessors,
 * ordering, non-throwing variants and table validation.
 */

import { describe, it, expect } from 'vitest';
import {
  FacilityRegistry,
  facilityRegistry,
  validateFacilityTable,
  fromNumericalCode,
  fromNumericalCodeText,
  fromLabel,
  tryFromNumericalCode,
  tryFromLabel,
  isFacilityCode,
  isFacilityLabel,
  numericalCode,
  label,
  comparator,
  values,
} from '../../../src/facility/registry.js';
import { FACILITIES } from '../../../src/facility/table.js';
import { FACILITY_LABELS, type Facility } from '../../../src/facility/types.js';
import {
  FacilityError,
  InvalidFacilityCodeError,
  InvalidFacilityLabelError,
} from '../../../src/errors.js';

const ALL_CODES = Array.from({ length: 24 }, (_, i) => i);

describe('facility registry', () => {
  describe('fromNumericalCode', () => {
    it('should resolve every code in [0, 23]', () => {
      for (const code of ALL_CODES) {
        expect(fromNumericalCode(code).numericalCode).toBe(code);
      }
    });

    it('should resolve 4 to AUTH', () => {
      const facility = fromNumericalCode(4);
      expect(facility.numericalCode).toBe(4);
      expect(facility.label).toBe('AUTH');
    });

    it('should resolve 16 to LOCAL0', () => {
      expect(fromNumericalCode(16)).toBe(FACILITIES.LOCAL0);
    });

    it('should reject 24 with the offending value in the message', () => {
      expect(() => fromNumericalCode(24)).toThrow(InvalidFacilityCodeError);
      expect(() => fromNumericalCode(24)).toThrow("Invalid facility '24'");
    });

    it.each([-1, -100, 24, 99, 1000])('should reject out-of-range code %d', (code) => {
      expect(() => fromNumericalCode(code)).toThrow(InvalidFacilityCodeError);
    });

    it('should reject non-integer values', () => {
      expect(() => fromNumericalCode(4.5)).toThrow("Invalid facility '4.5'");
      expect(() => fromNumericalCode(Number.NaN)).toThrow("Invalid facility 'NaN'");
    });

    it('should expose the offending value and code on the error', () => {
      try {
        fromNumericalCode(99);
        expect.unreachable('fromNumericalCode(99) should throw');
      } catch (err) {
        expect(err).toBeInstanceOf(FacilityError);
        if (err instanceof InvalidFacilityCodeError) {
          expect(err.value).toBe(99);
          expect(err.code).toBe('INVALID_FACILITY_CODE');
          expect(err.category).toBe('validation');
          expect(err.message).toBe("Invalid facility '99'");
        }
      }
    });
  });

  describe('fromNumericalCodeText', () => {
    it('should resolve canonical decimal text', () => {
      expect(fromNumericalCodeText('0')).toBe(FACILITIES.KERN);
      expect(fromNumericalCodeText('16')).toBe(FACILITIES.LOCAL0);
    });

    it.each(['04', '0016', '-1', '+4', '4.0', ' 4', ''])('should reject %j with the text as given', (text) => {
      expect(() => fromNumericalCodeText(text)).toThrow(InvalidFacilityCodeError);
      expect(() => fromNumericalCodeText(text)).toThrow(`Invalid facility '${text}'`);
    });

    it('should report digits beyond the safe integer range verbatim', () => {
      try {
        fromNumericalCodeText('99999999999999999999');
        expect.unreachable('fromNumericalCodeText should throw');
      } catch (err) {
        expect(err).toBeInstanceOf(InvalidFacilityCodeError);
        if (err instanceof InvalidFacilityCodeError) {
          expect(err.value).toBe('99999999999999999999');
          expect(err.message).toBe("Invalid facility '99999999999999999999'");
        }
      }
    });

    it('should report an unknown canonical code as a number', () => {
      try {
        fromNumericalCodeText('24');
        expect.unreachable('fromNumericalCodeText should throw');
      } catch (err) {
        expect(err).toBeInstanceOf(InvalidFacilityCodeError);
        if (err instanceof InvalidFacilityCodeError) {
          expect(err.value).toBe(24);
        }
      }
    });
  });

  describe('fromLabel', () => {
    it('should resolve every canonical label', () => {
      for (const name of FACILITY_LABELS) {
        expect(fromLabel(name)?.label).toBe(name);
      }
    });

    it('should resolve CRON to code 9', () => {
      const facility = fromLabel('CRON');
      expect(facility?.numericalCode).toBe(9);
      expect(facility?.label).toBe('CRON');
    });

    it('should return undefined for absent or empty input', () => {
      expect(fromLabel(undefined)).toBeUndefined();
      expect(fromLabel(null)).toBeUndefined();
      expect(fromLabel('')).toBeUndefined();
    });

    it('should match case-sensitively', () => {
      expect(() => fromLabel('cron')).toThrow(InvalidFacilityLabelError);
      expect(() => fromLabel('cron')).toThrow("Invalid facility 'cron'");
    });

    it('should not trim surrounding whitespace', () => {
      expect(() => fromLabel(' CRON')).toThrow("Invalid facility ' CRON'");
      expect(() => fromLabel('CRON ')).toThrow(InvalidFacilityLabelError);
    });

    it('should reject unknown labels', () => {
      try {
        fromLabel('BOGUS');
        expect.unreachable('fromLabel("BOGUS") should throw');
      } catch (err) {
        expect(err).toBeInstanceOf(InvalidFacilityLabelError);
        if (err instanceof InvalidFacilityLabelError) {
          expect(err.value).toBe('BOGUS');
          expect(err.code).toBe('INVALID_FACILITY_LABEL');
          expect(err.details).toEqual({ value: 'BOGUS' });
        }
      }
    });
  });

  describe('round trip', () => {
    it('should map every facility back to itself by code and by label', () => {
      for (const facility of values()) {
        expect(fromNumericalCode(numericalCode(facility))).toBe(facility);
        expect(fromLabel(label(facility))).toBe(facility);
      }
    });
  });

  describe('table invariants', () => {
    it('should hold exactly 24 facilities', () => {
      expect(values()).toHaveLength(24);
      expect(facilityRegistry.size).toBe(24);
    });

    it('should have pairwise distinct codes and labels', () => {
      const all = values();
      expect(new Set(all.map((f) => f.numericalCode)).size).toBe(24);
      expect(new Set(all.map((f) => f.label)).size).toBe(24);
    });

    it('should freeze facilities and the value list', () => {
      expect(Object.isFrozen(FACILITIES.KERN)).toBe(true);
      expect(Object.isFrozen(values())).toBe(true);
    });

    it('should expose a single registry instance', () => {
      expect(facilityRegistry).toBe(FacilityRegistry.instance);
    });
  });

  describe('comparator', () => {
    it('should sort all facilities into codes 0..23', () => {
      const shuffled = [...values()].reverse();
      const sorted = shuffled.sort(comparator());
      expect(sorted.map((f) => f.numericalCode)).toEqual(ALL_CODES);
    });

    it('should order strictly by code', () => {
      const cmp = comparator();
      expect(cmp(FACILITIES.KERN, FACILITIES.USER)).toBeLessThan(0);
      expect(cmp(FACILITIES.LOCAL7, FACILITIES.CRON)).toBeGreaterThan(0);
      expect(cmp(FACILITIES.NTP, FACILITIES.NTP)).toBe(0);
    });

    it('should return values already in comparator order', () => {
      expect(values().map((f) => f.label).slice(0, 4)).toEqual(['KERN', 'USER', 'MAIL', 'DAEMON']);
      expect(values()[23]?.label).toBe('LOCAL7');
    });
  });

  describe('non-throwing lookups', () => {
    it('should wrap a valid code in an ok result', () => {
      expect(tryFromNumericalCode(9)).toEqual({ ok: true, facility: FACILITIES.CRON });
    });

    it('should return the error for an invalid code', () => {
      const result = tryFromNumericalCode(42);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(InvalidFacilityCodeError);
        expect(result.error.message).toBe("Invalid facility '42'");
      }
    });

    it('should keep absent labels as an ok result without a facility', () => {
      expect(tryFromLabel('')).toEqual({ ok: true, facility: undefined });
      expect(tryFromLabel('MAIL')).toEqual({ ok: true, facility: FACILITIES.MAIL });
    });

    it('should return the error for an unknown label', () => {
      const result = tryFromLabel('mail');
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.value).toBe('mail');
      }
    });
  });

  describe('type guards', () => {
    it('should recognise valid codes only', () => {
      expect(isFacilityCode(0)).toBe(true);
      expect(isFacilityCode(23)).toBe(true);
      expect(isFacilityCode(24)).toBe(false);
      expect(isFacilityCode('4')).toBe(false);
    });

    it('should recognise canonical labels only', () => {
      expect(isFacilityLabel('LOCAL3')).toBe(true);
      expect(isFacilityLabel('local3')).toBe(false);
      expect(isFacilityLabel(3)).toBe(false);
    });
  });

  describe('validateFacilityTable', () => {
    const canonical: Facility[] = [...values()];

    it('should accept the canonical table', () => {
      expect(validateFacilityTable(canonical)).toEqual([]);
    });

    it('should report a missing facility', () => {
      expect(validateFacilityTable(canonical.slice(1))).toEqual(['expected 24 facilities, got 23']);
    });

    it('should report duplicate codes and labels', () => {
      const table = [...canonical];
      table[1] = { numericalCode: 0, label: 'KERN', description: 'duplicate' };
      expect(validateFacilityTable(table)).toEqual([
        'facilities[1].numericalCode duplicate: 0',
        'facilities[1].label duplicate: KERN',
      ]);
    });

    it('should report out-of-range codes', () => {
      const table = [...canonical];
      table[23] = { numericalCode: 24, label: 'LOCAL7', description: 'out of range' };
      expect(validateFacilityTable(table)).toEqual([
        'facilities[23].numericalCode must be an integer in [0, 23]',
      ]);
    });
  });
});
