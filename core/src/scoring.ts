import { logger as rootLogger } from './logger';
import { normalizeOfficer } from './normalize';
import { resolveOptions, type ConfigureOptions, type ScoringOptions } from './options';
import type { Confidence, ConnectionScoreResult, OfficerRecord, SignalBreakdown } from './types';
import { AddressSignalDetector } from './detectors/addressSignal';
import { AgeSignalDetector } from './detectors/ageSignal';
import { AppointmentSignalDetector } from './detectors/appointmentSignal';
import { CompanyNameSignalDetector } from './detectors/companyNameSignal';
import { NameSignalDetector } from './detectors/nameSignal';
import type { SignalDetector } from './detectors/types';

const logger = rootLogger.child({ component: 'scorer' });

export function roundScore(n: number): number {
  return Math.round(n * 10_000) / 10_000;
}

export function confidenceFor(score: number, cuts: ScoringOptions['confidenceCuts']): Confidence {
  if (score < cuts.low) return 'low';
  if (score < cuts.high) return 'medium';
  return 'high';
}

export class ConnectionScorer {
  // Invocation order fixes the order of reasons in every result
  private readonly detectors: readonly SignalDetector[];

  constructor(readonly options: Readonly<ScoringOptions>) {
    this.detectors = [
      new NameSignalDetector(options),
      new AgeSignalDetector(options),
      new AppointmentSignalDetector(options),
      new AddressSignalDetector(options),
      new CompanyNameSignalDetector(options),
    ];
  }

  score(recordA: unknown, recordB: unknown): ConnectionScoreResult {
    return this.scoreNormalized(normalizeOfficer(recordA), normalizeOfficer(recordB));
  }

  scoreNormalized(a: OfficerRecord, b: OfficerRecord): ConnectionScoreResult {
    const signals: SignalBreakdown[] = this.detectors.map((detector) => {
      const res = detector.detect(a, b);
      const points = roundScore(res.points * this.options.weights[detector.category]);
      return { category: detector.category, points, reasons: points > 0 ? [...res.reasons] : [] };
    });
    let total = roundScore(signals.reduce((sum, s) => sum + s.points, 0));
    if (this.options.maxScore !== null && total > this.options.maxScore) total = this.options.maxScore;
    const confidence = confidenceFor(total, this.options.confidenceCuts);
    logger.debug('Connection scored', { a: a.fullName, b: b.fullName, totalScore: total, confidence });
    return {
      totalScore: total,
      confidence,
      reasons: signals.flatMap((s) => s.reasons),
      signals,
    };
  }
}

// Validates options once and returns a scorer safe to share across any number of calls.
export function configure(options: ConfigureOptions = {}): ConnectionScorer {
  return new ConnectionScorer(resolveOptions(options));
}
