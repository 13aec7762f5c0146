import { ageGapYears } from '../dates';
import type { ScoringOptions } from '../options';
import type { DetectorResult, OfficerRecord } from '../types';
import { noSignal, type SignalDetector } from './types';

export class AgeSignalDetector implements SignalDetector {
  readonly category = 'age' as const;

  constructor(private readonly options: Readonly<ScoringOptions>) {}

  detect(a: OfficerRecord, b: OfficerRecord): DetectorResult {
    if (!a.dateOfBirth || !b.dateOfBirth) return noSignal();
    const { siblingAgeRange, generationalAgeGap, points } = this.options;
    const gap = ageGapYears(a.dateOfBirth, b.dateOfBirth);
    // Gaps strictly between the two thresholds are ambiguous and score nothing
    if (gap <= siblingAgeRange) {
      return { points: points.siblingAgeGap, reasons: [`Age gap of ${gap.toFixed(1)} years suggests possible siblings`] };
    }
    if (gap >= generationalAgeGap) {
      return { points: points.parentChildAgeGap, reasons: [`Age gap of ${gap.toFixed(1)} years suggests possible parent-child relationship`] };
    }
    return noSignal();
  }
}
