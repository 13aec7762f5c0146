import dotenv from 'dotenv';
dotenv.config();

export const config = {
  nodeEnv: process.env.NODE_ENV || 'development',
  logLevel: process.env.LOG_LEVEL || 'info',
  // Scoring defaults; callers override per scorer through configure()
  surnameSimilarityThreshold: Number(process.env.SURNAME_SIMILARITY_THRESHOLD || 85),
  siblingAgeRange: Number(process.env.SIBLING_AGE_RANGE || 3),
  generationalAgeGap: Number(process.env.GENERATIONAL_AGE_GAP || 30),
  // "same_month" or a whole number of days
  syncTolerance: (process.env.SYNC_TOLERANCE || 'same_month').trim().toLowerCase(),
  addressProximityMeters: Number(process.env.ADDRESS_PROXIMITY_METERS || 500),
  confidenceLowCut: Number(process.env.CONFIDENCE_LOW_CUT || 30),
  confidenceHighCut: Number(process.env.CONFIDENCE_HIGH_CUT || 60),
  maxScore: process.env.MAX_SCORE ? Number(process.env.MAX_SCORE) : null,
  // Geocoding adapter retries
  geocodeMaxRetries: Number(process.env.GEOCODE_MAX_RETRIES || 2),
  geocodeMinTimeoutMs: Number(process.env.GEOCODE_MIN_TIMEOUT_MS || 400),
};
