export * from './types';
export * from './config';
export * from './logger';
export * from './errors';
export * from './dates';
export * from './normalize';
export * from './options';
export * from './scoring';
export * from './batch';
export * from './geocode';
export { NameSignalDetector, surnameSimilarity } from './detectors/nameSignal';
export { AgeSignalDetector } from './detectors/ageSignal';
export { AppointmentSignalDetector, tenureOf, tenuresOverlap, withinTolerance } from './detectors/appointmentSignal';
export { AddressSignalDetector, distanceMeters } from './detectors/addressSignal';
export { CompanyNameSignalDetector, companyTokens } from './detectors/companyNameSignal';
export type { SignalDetector } from './detectors/types';
