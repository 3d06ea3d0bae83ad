// Sample-id markers used by the lab's naming convention (matched after normalization)
export const DEFAULT_MARKERS = {
  blank: 'BLANK',
  calibrationVerification: 'ICV',
  calibrationBlank: 'ICB',
  referencePrefix: 'SRM_',
  duplicate: 'DUP',
} as const;

// QC acceptance windows (% recovery, inclusive)
export const DEFAULT_BANDS = {
  calibration: { low: 90, high: 110 },
  reference: { low: 80, high: 120 },
} as const;

// MassHunter writes this under every analyte header
export const UNIT_LABEL = 'Conc.';

// Metadata columns are only searched for among the first few headers
export const HEADER_SEARCH_DEPTH = 5;

// Blank cells among the first headers that mark a grouping row above the real header
export const GROUPING_ROW_MIN_BLANKS = 3;

export const DETECTION_LIMIT_MULTIPLIER = 3;

// Reference certificates are in mg/kg, working unit is µg/kg
export const REFERENCE_UNIT_FACTOR = 1000;

// ppb → ppm
export const PPM_DIVISOR = 1000;

// Column aliases accepted in the auxiliary tables (compared lower-cased)
export const COLUMN_ALIASES = {
  sampleId: ['sample_id', 'sample', 'sample id', 'sampleid'],
  df: ['df', 'dilution_factor', 'dilution factor', 'dilution'],
  element: ['element'],
  calibrationTarget: ['icv_target', 'calibration_target'],
  referenceTarget: ['ref_target', 'srm_target', 'reference_target'],
  referenceName: ['ref_name', 'reference_name', 'crm_name'],
  targetValue: ['target_value', 'target'],
} as const;

export const ACQ_TIME_KEYWORDS = ['date', 'time', 'acq'];
export const SAMPLE_KEYWORDS = ['sample', 'name'];

// Element symbol as written in channel headers and certificate sheets
export const ELEMENT_SYMBOL_PATTERN = /^[A-Z][a-z]{0,2}$/;
