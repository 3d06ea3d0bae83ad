import { createStore } from 'zustand/vanilla';
import type { BatchConfigInput, OutputUnit } from '@/lib/config';
import { processBatch, type BatchResult } from '@/lib/pipeline';
import type { TableSource } from '@/lib/tables';

interface BatchState {
  // Inputs
  instrumentExport: TableSource | null;
  dilutionFactors: TableSource | null;
  calibrationTargets: TableSource | null;
  referenceValues: TableSource | null;
  referenceAssignments: TableSource | null;
  config: BatchConfigInput;

  // Output of the last run
  result: BatchResult | null;
  error: string | null;

  // Actions
  setInstrumentExport: (source: TableSource) => void;
  setDilutionFactors: (source: TableSource) => void;
  setCalibrationTargets: (source: TableSource) => void;
  setReferenceValues: (source: TableSource | null) => void;
  setReferenceAssignments: (source: TableSource | null) => void;
  setOutputUnit: (unit: OutputUnit) => void;
  missingInputs: () => string[];
  run: () => BatchResult | null;
  reset: () => void;
}

const initialState = {
  instrumentExport: null,
  dilutionFactors: null,
  calibrationTargets: null,
  referenceValues: null,
  referenceAssignments: null,
  config: {},
  result: null,
  error: null,
};

export type BatchStore = ReturnType<typeof createBatchStore>;

export const createBatchStore = () =>
  createStore<BatchState>((set, get) => ({
    ...initialState,

    // Any input change invalidates the previous result
    setInstrumentExport: source => set({ instrumentExport: source, result: null, error: null }),
    setDilutionFactors: source => set({ dilutionFactors: source, result: null, error: null }),
    setCalibrationTargets: source => set({ calibrationTargets: source, result: null, error: null }),
    setReferenceValues: source => set({ referenceValues: source, result: null, error: null }),
    setReferenceAssignments: source =>
      set({ referenceAssignments: source, result: null, error: null }),

    setOutputUnit: unit => {
      set({ config: { ...get().config, outputUnit: unit }, result: null, error: null });
    },

    missingInputs: () => {
      const { instrumentExport, dilutionFactors, calibrationTargets } = get();
      const missing: string[] = [];
      if (!instrumentExport) missing.push('instrument export');
      if (!dilutionFactors) missing.push('dilution factors');
      if (!calibrationTargets) missing.push('calibration targets');
      return missing;
    },

    run: () => {
      const state = get();
      const missing = state.missingInputs();
      if (!state.instrumentExport || !state.dilutionFactors || !state.calibrationTargets) {
        set({ result: null, error: `Missing input: ${missing.join(', ')}` });
        return null;
      }

      try {
        const result = processBatch(
          {
            instrumentExport: state.instrumentExport,
            dilutionFactors: state.dilutionFactors,
            calibrationTargets: state.calibrationTargets,
            referenceValues: state.referenceValues,
            referenceAssignments: state.referenceAssignments,
          },
          { config: state.config }
        );
        set({ result, error: null });
        return result;
      } catch (err) {
        set({ result: null, error: err instanceof Error ? err.message : 'Batch processing failed' });
        return null;
      }
    },

    reset: () => set({ ...initialState }),
  }));
