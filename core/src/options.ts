import { z } from 'zod';
import { config } from './config';
import { InvalidConfigurationError, formatIssues } from './errors';
import type { DetectorCategory } from './types';

export type SyncTolerance = 'same_month' | { days: number };

export type SignalPoints = {
  surnameMatch: number;
  sharedMiddleName: number;
  siblingAgeGap: number;
  parentChildAgeGap: number;
  concurrentService: number;
  historicalSharedCompany: number;
  synchronizedTiming: number;
  exactAddress: number;
  nearbyAddress: number;
  companyNameMatch: number;
};

export type ScoringOptions = {
  surnameSimilarityThreshold: number;
  surnameScoring: 'flat' | 'scaled';
  siblingAgeRange: number;
  generationalAgeGap: number;
  synchronizationTolerance: SyncTolerance;
  // meters
  addressProximityThreshold: number;
  confidenceCuts: { low: number; high: number };
  maxScore: number | null;
  points: SignalPoints;
  weights: Record<DetectorCategory, number>;
};

export type ConfigureOptions = Partial<Omit<ScoringOptions, 'points' | 'weights' | 'confidenceCuts'>> & {
  points?: Partial<SignalPoints>;
  weights?: Partial<Record<DetectorCategory, number>>;
  confidenceCuts?: Partial<ScoringOptions['confidenceCuts']>;
};

export const DEFAULT_POINTS: SignalPoints = {
  surnameMatch: 20,
  sharedMiddleName: 15,
  siblingAgeGap: 10,
  parentChildAgeGap: 15,
  concurrentService: 20,
  historicalSharedCompany: 10,
  synchronizedTiming: 10,
  exactAddress: 25,
  nearbyAddress: 15,
  companyNameMatch: 10,
};

export const DEFAULT_WEIGHTS: Record<DetectorCategory, number> = {
  name: 1,
  age: 1,
  appointment: 1,
  address: 1,
  companyName: 1,
};

function envTolerance(raw: string): SyncTolerance {
  if (raw === 'same_month') return 'same_month';
  return { days: Number(raw) };
}

export function defaultOptions(): ScoringOptions {
  return {
    surnameSimilarityThreshold: config.surnameSimilarityThreshold,
    surnameScoring: 'flat',
    siblingAgeRange: config.siblingAgeRange,
    generationalAgeGap: config.generationalAgeGap,
    synchronizationTolerance: envTolerance(config.syncTolerance),
    addressProximityThreshold: config.addressProximityMeters,
    confidenceCuts: { low: config.confidenceLowCut, high: config.confidenceHighCut },
    maxScore: config.maxScore,
    points: { ...DEFAULT_POINTS },
    weights: { ...DEFAULT_WEIGHTS },
  };
}

const nonNegative = z.number().finite().nonnegative();

const optionsSchema = z
  .object({
    surnameSimilarityThreshold: z.number().finite().min(0).max(100),
    surnameScoring: z.enum(['flat', 'scaled']),
    siblingAgeRange: nonNegative,
    generationalAgeGap: nonNegative,
    synchronizationTolerance: z.union([z.literal('same_month'), z.object({ days: z.number().int().nonnegative() })]),
    addressProximityThreshold: z.number().finite().positive(),
    confidenceCuts: z.object({ low: nonNegative, high: nonNegative }),
    maxScore: z.number().finite().positive().nullable(),
    points: z.object({
      surnameMatch: nonNegative,
      sharedMiddleName: nonNegative,
      siblingAgeGap: nonNegative,
      parentChildAgeGap: nonNegative,
      concurrentService: nonNegative,
      historicalSharedCompany: nonNegative,
      synchronizedTiming: nonNegative,
      exactAddress: nonNegative,
      nearbyAddress: nonNegative,
      companyNameMatch: nonNegative,
    }),
    weights: z.object({
      name: nonNegative,
      age: nonNegative,
      appointment: nonNegative,
      address: nonNegative,
      companyName: nonNegative,
    }),
  })
  .superRefine((o, ctx) => {
    if (o.generationalAgeGap <= o.siblingAgeRange) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['generationalAgeGap'], message: 'must be greater than siblingAgeRange' });
    }
    if (o.confidenceCuts.high <= o.confidenceCuts.low) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['confidenceCuts', 'high'], message: 'must be greater than confidenceCuts.low' });
    }
    if (o.maxScore !== null && o.maxScore < o.confidenceCuts.high) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['maxScore'], message: 'must not be below confidenceCuts.high' });
    }
  });

function deepFreeze(o: ScoringOptions): Readonly<ScoringOptions> {
  Object.freeze(o.confidenceCuts);
  Object.freeze(o.points);
  Object.freeze(o.weights);
  if (typeof o.synchronizationTolerance === 'object') Object.freeze(o.synchronizationTolerance);
  return Object.freeze(o);
}

function defined(o: object | undefined): Record<string, unknown> {
  return Object.fromEntries(Object.entries(o ?? {}).filter(([, v]) => v !== undefined));
}

// Merges caller options over the environment defaults and validates once.
export function resolveOptions(options: ConfigureOptions = {}): Readonly<ScoringOptions> {
  const base = defaultOptions();
  const merged = {
    ...base,
    ...defined(options),
    confidenceCuts: { ...base.confidenceCuts, ...defined(options.confidenceCuts) },
    points: { ...base.points, ...defined(options.points) },
    weights: { ...base.weights, ...defined(options.weights) },
  };
  const parsed = optionsSchema.safeParse(merged);
  if (!parsed.success) throw new InvalidConfigurationError(formatIssues(parsed.error.issues));
  return deepFreeze(parsed.data);
}
