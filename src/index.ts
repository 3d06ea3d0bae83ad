export { processBatch } from './lib/pipeline';
export type { BatchInputs, BatchResult, ProcessOptions } from './lib/pipeline';
export { readBatchInputs, readTableSource } from './lib/files';
export type { BatchPaths } from './lib/files';
export { csvSource } from './lib/tables';
export type { TableSource } from './lib/tables';
export { resolveConfig, DEFAULT_CONFIG } from './lib/config';
export type { BatchConfig, BatchConfigInput, OutputUnit } from './lib/config';
export { BatchError, ConfigError, HeaderCollisionError, SchemaError } from './lib/errors';
export { logger, Logger } from './lib/logger';
export type { Diagnostic, PipelineStage } from './lib/diagnostics';
export { normalizeSampleId, classifySample, extractReferenceName } from './lib/sampleId';
export { parseChannelHeader, parseChannelHeaders } from './lib/channels';
export { loadInstrumentExport, reshapeExport } from './lib/parser';
export {
  loadCalibrationTargets,
  loadDilutionFactors,
  loadReferenceAssignments,
  loadReferenceValues,
  convertWideReferenceValues,
} from './lib/inputs';
export { computeBlankStatistics } from './lib/statistics';
export { correctConcentrations } from './lib/chemistry';
export { computeRecoveries } from './lib/recovery';
export { selectBestChannels } from './lib/channelSelection';
export { classifyBelowDetection } from './lib/detection';
export { pivotByElement, sampleResults, summarizeBatch } from './lib/report';
export { createBatchStore } from './store/batchStore';
export type { BatchStore } from './store/batchStore';
export type * from './lib/types';
