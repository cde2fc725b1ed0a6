// @syslog-facility/core - facility registry

// Facility Registry
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
  FacilityFilter,
  FACILITIES,
  FACILITY_LABELS,
} from './facility/index.js';
export type {
  Facility,
  FacilityLabel,
  FacilityComparator,
  CodeLookupResult,
  LabelLookupResult,
  FacilityClassification,
} from './facility/index.js';

// Errors
export {
  ERROR_METADATA,
  createStructuredError,
  FacilityError,
  InvalidFacilityCodeError,
  InvalidFacilityLabelError,
} from './errors.js';
export type { FacilityErrorCode, ErrorCategory, StructuredError } from './errors.js';

// Config Loader
export {
  loadFacilityConfig,
  resolveFacilityRef,
  FacilityConfigSchema,
  FacilityRefSchema,
  DEFAULT_CONFIG_FILES,
} from './config-loader.js';
export type { FacilityConfig, RawFacilityConfig, LoadConfigOptions } from './config-loader.js';

// Variable Resolver
export { resolveVariables, resolveObjectVariables } from './variable-resolver.js';
export type { EnvContext } from './variable-resolver.js';
