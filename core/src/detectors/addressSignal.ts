import { getPreciseDistance } from 'geolib';
import type { ScoringOptions } from '../options';
import type { Coordinates, DetectorResult, OfficerRecord } from '../types';
import { noSignal, type SignalDetector } from './types';

export function distanceMeters(a: Coordinates, b: Coordinates): number {
  return getPreciseDistance(a, b);
}

export class AddressSignalDetector implements SignalDetector {
  readonly category = 'address' as const;

  constructor(private readonly options: Readonly<ScoringOptions>) {}

  detect(a: OfficerRecord, b: OfficerRecord): DetectorResult {
    if (!a.address || !b.address) return noSignal();
    const { points, addressProximityThreshold } = this.options;
    if (a.address.addressKey && a.address.addressKey === b.address.addressKey) {
      return { points: points.exactAddress, reasons: ['Exact address match'] };
    }
    if (!a.address.coordinates || !b.address.coordinates) return noSignal();
    const meters = distanceMeters(a.address.coordinates, b.address.coordinates);
    if (meters > addressProximityThreshold) return noSignal();
    return { points: points.nearbyAddress, reasons: [`Nearby addresses (approx. ${Math.round(meters)} m apart)`] };
  }
}
