import { token_sort_ratio } from 'fuzzball';
import type { ScoringOptions } from '../options';
import type { DetectorResult, OfficerRecord } from '../types';
import { noSignal, orderedPair, type SignalDetector } from './types';

export function surnameSimilarity(a: string, b: string): number {
  if (!a || !b) return 0;
  return token_sort_ratio(a, b);
}

export class NameSignalDetector implements SignalDetector {
  readonly category = 'name' as const;

  constructor(private readonly options: Readonly<ScoringOptions>) {}

  detect(a: OfficerRecord, b: OfficerRecord): DetectorResult {
    const { points: award, surnameSimilarityThreshold, surnameScoring } = this.options;
    const result = noSignal();
    const ratio = surnameSimilarity(a.surnameKey, b.surnameKey);
    if (a.surnameKey && b.surnameKey && ratio >= surnameSimilarityThreshold) {
      result.points += surnameScoring === 'scaled' ? (award.surnameMatch * ratio) / 100 : award.surnameMatch;
      const [x, y] = orderedPair(a.surname, b.surname);
      result.reasons.push(`Similar surnames: ${x} / ${y} (similarity ${ratio})`);
    }
    const otherKeys = new Map(b.middleNameKeys.map((key, i): [string, string] => [key, b.middleNames[i]]));
    a.middleNameKeys.forEach((key, i) => {
      // initials are too common to count
      if (key.length < 2) return;
      const other = otherKeys.get(key);
      if (other === undefined) return;
      result.points += award.sharedMiddleName;
      result.reasons.push(`Shared middle name: ${orderedPair(a.middleNames[i], other)[0]}`);
    });
    return result;
  }
}
