import { MalformedRecordError } from './errors';
import { logger as rootLogger } from './logger';
import { normalizeOfficer } from './normalize';
import type { ConnectionScorer } from './scoring';
import type { ConnectionScoreResult, OfficerRecord } from './types';

const logger = rootLogger.child({ component: 'batch' });

export type PairOutcome = { a: number; b: number; result: ConnectionScoreResult };
export type RecordFailure = { index: number; error: MalformedRecordError };

// Scores every unordered pair (i < j) of a group. A malformed record is
// reported once and only the pairs involving it are skipped.
export function scoreGroup(
  records: readonly unknown[],
  scorer: ConnectionScorer,
  opts: { minScore?: number } = {}
): { pairs: PairOutcome[]; failures: RecordFailure[] } {
  const failures: RecordFailure[] = [];
  const normalized: (OfficerRecord | null)[] = records.map((raw, index) => {
    try {
      return normalizeOfficer(raw);
    } catch (err) {
      if (!(err instanceof MalformedRecordError)) throw err;
      logger.warn('Skipping malformed officer record', { index, issues: err.issues });
      failures.push({ index, error: err });
      return null;
    }
  });
  const pairs: PairOutcome[] = [];
  for (let i = 0; i < normalized.length; i++) {
    const a = normalized[i];
    if (!a) continue;
    for (let j = i + 1; j < normalized.length; j++) {
      const b = normalized[j];
      if (!b) continue;
      const result = scorer.scoreNormalized(a, b);
      if (opts.minScore !== undefined && result.totalScore < opts.minScore) continue;
      pairs.push({ a: i, b: j, result });
    }
  }
  logger.info('Officer group scored', { records: records.length, pairs: pairs.length, failures: failures.length });
  return { pairs, failures };
}
