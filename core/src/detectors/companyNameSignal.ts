import { normNamePart } from '../normalize';
import type { ScoringOptions } from '../options';
import type { DetectorResult, OfficerRecord } from '../types';
import { noSignal, type SignalDetector } from './types';

const CORPORATE_SUFFIXES = new Set([
  'LIMITED', 'LTD', 'PLC', 'LLP', 'LP', 'LLC', 'INC', 'CIC', 'CO', 'COMPANY', 'CORP', 'CORPORATION', 'CYF', 'CYFYNGEDIG', 'CCC',
]);

// Same folding as the name keys, so "Müller" and "MULLER" agree
export function nameTokens(s: string): string[] {
  return normNamePart(s)
    .replace(/['’]/g, '')
    .split(/[^\p{L}\p{N}]+/u)
    .filter(Boolean);
}

// Upper-cased tokens with trailing corporate suffixes ("... (UK) LTD") removed
export function companyTokens(companyName: string): string[] {
  const tokens = nameTokens(companyName);
  while (tokens.length > 1 && CORPORATE_SUFFIXES.has(tokens[tokens.length - 1])) tokens.pop();
  return tokens;
}

export function containsTokenRun(haystack: string[], needle: string[]): boolean {
  if (needle.length === 0 || needle.length > haystack.length) return false;
  for (let i = 0; i + needle.length <= haystack.length; i++) {
    if (needle.every((t, j) => haystack[i + j] === t)) return true;
  }
  return false;
}

export class CompanyNameSignalDetector implements SignalDetector {
  readonly category = 'companyName' as const;

  constructor(private readonly options: Readonly<ScoringOptions>) {}

  // Checked in both directions; each direction is separate evidence
  detect(a: OfficerRecord, b: OfficerRecord): DetectorResult {
    const result = noSignal();
    for (const [holder, other] of [[a, b], [b, a]] as const) {
      const reason = this.match(holder, other);
      if (!reason) continue;
      result.points += this.options.points.companyNameMatch;
      result.reasons.push(reason);
    }
    return result;
  }

  private match(holder: OfficerRecord, other: OfficerRecord): string | null {
    if (!holder.companyName) return null;
    const tokens = companyTokens(holder.companyName);
    const candidates: [string, string][] = [
      ['Surname', other.surnameKey],
      ...other.middleNameKeys.map((key): [string, string] => ['Middle name', key]),
    ];
    for (const [label, name] of candidates) {
      const needle = nameTokens(name);
      // single letters are initials, not evidence
      if (needle.join('').length < 2) continue;
      if (containsTokenRun(tokens, needle)) {
        return `${label} ${needle.join(' ')} of ${other.fullName} found in company name ${holder.companyName}`;
      }
    }
    return null;
  }
}
