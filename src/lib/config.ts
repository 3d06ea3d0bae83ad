import { z } from 'zod';
import {
  DEFAULT_BANDS,
  DEFAULT_MARKERS,
  HEADER_SEARCH_DEPTH,
  UNIT_LABEL,
} from './constants';
import { ConfigError } from './errors';

const BandSchema = z
  .object({
    low: z.number().finite(),
    high: z.number().finite(),
  })
  .refine(band => band.low <= band.high, { message: 'band low must not exceed high' });

const MarkerSchema = z
  .string()
  .trim()
  .min(1)
  .transform(s => s.toUpperCase());

export const BatchConfigSchema = z.object({
  markers: z
    .object({
      blank: MarkerSchema.default(DEFAULT_MARKERS.blank),
      calibrationVerification: MarkerSchema.default(DEFAULT_MARKERS.calibrationVerification),
      calibrationBlank: MarkerSchema.default(DEFAULT_MARKERS.calibrationBlank),
      referencePrefix: MarkerSchema.default(DEFAULT_MARKERS.referencePrefix),
      duplicate: MarkerSchema.default(DEFAULT_MARKERS.duplicate),
    })
    .default({}),
  bands: z
    .object({
      calibration: BandSchema.default(DEFAULT_BANDS.calibration),
      reference: BandSchema.default(DEFAULT_BANDS.reference),
    })
    .default({}),
  // 'ppm' divides corrected values by 1000, 'ppb' keeps the instrument unit
  outputUnit: z.enum(['ppm', 'ppb']).default('ppm'),
  unitLabel: z.string().default(UNIT_LABEL),
  headerSearchDepth: z.number().int().positive().default(HEADER_SEARCH_DEPTH),
});

export type BatchConfig = z.infer<typeof BatchConfigSchema>;
export type BatchConfigInput = z.input<typeof BatchConfigSchema>;
export type OutputUnit = BatchConfig['outputUnit'];
export type Markers = BatchConfig['markers'];
export type QcBands = BatchConfig['bands'];

/**
 * Merge overrides onto the defaults and validate.
 */
export function resolveConfig(input: BatchConfigInput = {}): BatchConfig {
  const parsed = BatchConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigError(`Invalid batch configuration: ${issues.join('; ')}`, issues);
  }
  return parsed.data;
}

export const DEFAULT_CONFIG: BatchConfig = resolveConfig();
