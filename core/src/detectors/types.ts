import type { DetectorCategory, DetectorResult, OfficerRecord } from '../types';

// One independent signal source: a pure function of the normalized pair and the options.
export interface SignalDetector {
  readonly category: DetectorCategory;
  detect(a: OfficerRecord, b: OfficerRecord): DetectorResult;
}

export function noSignal(): DetectorResult {
  return { points: 0, reasons: [] };
}

// Display order independent of which officer was passed first
export function orderedPair(x: string, y: string): [string, string] {
  return x <= y ? [x, y] : [y, x];
}
