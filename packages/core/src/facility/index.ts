export {
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
} from './registry.js';
export { FacilityFilter } from './filter.js';
export { FACILITIES } from './table.js';
export { FACILITY_LABELS } from './types.js';
export type {
  Facility,
  FacilityLabel,
  FacilityComparator,
  CodeLookupResult,
  LabelLookupResult,
  FacilityClassification,
} from './types.js';
