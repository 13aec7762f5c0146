import pRetry from 'p-retry';
import { config } from './config';
import { logger as rootLogger } from './logger';
import type { Coordinates, RawOfficerRecord } from './types';

const logger = rootLogger.child({ component: 'geocode' });

// External collaborator: resolves a free-text address to coordinates, null when unknown.
export interface Geocoder {
  geocode(fullAddress: string): Promise<Coordinates | null>;
}

export type GeocodeStatus = 'resolved' | 'not_found' | 'skipped' | 'failed';

export type GeocodeOutcome = { record: RawOfficerRecord; status: GeocodeStatus; error?: Error };

export type GeocodeOptions = { retries?: number; minTimeout?: number };

// Fills in coordinates before scoring. The input record is not modified.
export async function attachCoordinates(raw: RawOfficerRecord, geocoder: Geocoder, opts: GeocodeOptions = {}): Promise<GeocodeOutcome> {
  const address = raw.address;
  const fullAddress = address?.full_address?.trim();
  if (!address || !fullAddress || (address.latitude != null && address.longitude != null)) {
    return { record: raw, status: 'skipped' };
  }
  try {
    const coords = await pRetry(() => geocoder.geocode(fullAddress), {
      retries: opts.retries ?? config.geocodeMaxRetries,
      minTimeout: opts.minTimeout ?? config.geocodeMinTimeoutMs,
      onFailedAttempt: (err) => {
        logger.warn('Geocode attempt failed', { address: fullAddress, attempt: err.attemptNumber, retriesLeft: err.retriesLeft, err: err.message });
      },
    });
    if (!coords) return { record: raw, status: 'not_found' };
    return {
      record: { ...raw, address: { ...address, latitude: coords.latitude, longitude: coords.longitude } },
      status: 'resolved',
    };
  } catch (e) {
    const error = e instanceof Error ? e : new Error(String(e));
    logger.error('Geocoding failed; proximity signal unavailable for record', { name: raw.full_name, err: error.message });
    return { record: raw, status: 'failed', error };
  }
}
