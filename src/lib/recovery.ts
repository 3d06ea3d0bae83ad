import { DEFAULT_CONFIG, type Markers } from './config';
import type { ReferenceTable } from './inputs';
import { extractReferenceName, isCalibrationVerification, isReferenceMaterial } from './sampleId';
import type {
  CalibrationTarget,
  CorrectedMeasurement,
  RecoveryRecord,
  RecoveryTables,
  ReferenceAssignment,
} from './types';

/**
 * Percent recovery; null when either side is missing or the target is not positive.
 */
export function percentRecovery(corrected: number | null, target: number | null): number | null {
  if (corrected === null || target === null || target <= 0) return null;
  return (corrected / target) * 100;
}

export interface RecoveryInputs {
  calibrationTargets: readonly CalibrationTarget[];
  referenceValues?: ReferenceTable | null;
  referenceAssignments?: readonly ReferenceAssignment[];
  markers?: Markers;
}

const namedKey = (name: string, element: string) => `${name}\u0000${element}`;

/**
 * Resolves the certified target for a reference-material row.
 *
 * Priority:
 * 1. named reference table, reference name from the assignment table or the sample id
 * 2. unnamed reference table, joined on element
 * 3. reference target column of the calibration target table
 */
class ReferenceTargetResolver {
  private readonly named = new Map<string, number>();
  private readonly byElement = new Map<string, number>();
  private readonly assignments: Map<string, string>;

  constructor(
    private readonly inputs: RecoveryInputs,
    private readonly prefix: string
  ) {
    this.assignments = new Map(
      (inputs.referenceAssignments ?? []).map((a): [string, string] => [a.sampleId, a.referenceName])
    );

    const table = inputs.referenceValues;
    if (table) {
      for (const v of table.values) {
        if (table.named) {
          if (v.referenceName === null) continue;
          const key = namedKey(v.referenceName, v.element);
          if (!this.named.has(key)) this.named.set(key, v.targetValue);
        } else if (!this.byElement.has(v.element)) {
          this.byElement.set(v.element, v.targetValue);
        }
      }
    } else {
      for (const t of inputs.calibrationTargets) {
        if (t.referenceTarget !== null && !this.byElement.has(t.element)) {
          this.byElement.set(t.element, t.referenceTarget);
        }
      }
    }
  }

  referenceName(sampleId: string): string | null {
    return this.assignments.get(sampleId) ?? extractReferenceName(sampleId, this.prefix);
  }

  resolve(sampleId: string, element: string): { referenceName: string | null; target: number | null } {
    if (this.inputs.referenceValues?.named) {
      const referenceName = this.referenceName(sampleId);
      const target =
        referenceName === null ? null : this.named.get(namedKey(referenceName, element)) ?? null;
      return { referenceName, target };
    }
    return { referenceName: null, target: this.byElement.get(element) ?? null };
  }
}

/**
 * ICV and reference-material recoveries from the corrected table.
 * ICV rows: sample id contains the ICV marker, target joined by element.
 * Reference rows: sample id starts with the reference prefix.
 */
export function computeRecoveries(
  corrected: readonly CorrectedMeasurement[],
  inputs: RecoveryInputs
): RecoveryTables {
  const markers = inputs.markers ?? DEFAULT_CONFIG.markers;

  const icvTargets = new Map<string, number | null>();
  for (const t of inputs.calibrationTargets) {
    if (!icvTargets.has(t.element)) icvTargets.set(t.element, t.calibrationTarget);
  }

  const calibration: RecoveryRecord[] = corrected
    .filter(m => isCalibrationVerification(m.sampleId, markers))
    .map((m): RecoveryRecord => {
      const target = icvTargets.get(m.element) ?? null;
      return {
        kind: 'calibration-verification',
        sampleId: m.sampleId,
        channelId: m.channelId,
        element: m.element,
        referenceName: null,
        corrected: m.corrected,
        target,
        recovery: percentRecovery(m.corrected, target),
      };
    });

  const resolver = new ReferenceTargetResolver(inputs, markers.referencePrefix);
  const reference: RecoveryRecord[] = corrected
    .filter(m => isReferenceMaterial(m.sampleId, markers))
    .map((m): RecoveryRecord => {
      const { referenceName, target } = resolver.resolve(m.sampleId, m.element);
      return {
        kind: 'reference-material',
        sampleId: m.sampleId,
        channelId: m.channelId,
        element: m.element,
        referenceName,
        corrected: m.corrected,
        target,
        recovery: percentRecovery(m.corrected, target),
      };
    });

  return { calibration, reference };
}
