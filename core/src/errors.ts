import type { ZodIssue } from 'zod';

export function formatIssues(issues: readonly ZodIssue[]): string[] {
  return issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

// Raised by the normalizer when a record has no usable identity (full_name)
export class MalformedRecordError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Malformed officer record: ${issues.join('; ')}`);
    this.name = 'MalformedRecordError';
  }
}

// Raised by configure() only; never while scoring
export class InvalidConfigurationError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid scoring configuration: ${issues.join('; ')}`);
    this.name = 'InvalidConfigurationError';
  }
}
