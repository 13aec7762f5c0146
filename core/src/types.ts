// A calendar date; day is null when the source only gives year and month.
export type CalendarDate = { year: number; month: number; day: number | null };

// Appointment start: exact, a not-later-than bound (registry "appointed_before"), or unknown.
export type FuzzyDate =
  | { kind: 'exact'; value: CalendarDate }
  | { kind: 'not_later_than'; value: CalendarDate }
  | { kind: 'unknown' };

export type Coordinates = { latitude: number; longitude: number };

export type RoleRecord = {
  companyNumber: string;
  roleType: string;
  appointment: FuzzyDate;
  // null = no resignation on file, presumed still active
  resignedOn: CalendarDate | null;
};

export type AddressRecord = {
  fullAddress: string;
  addressKey: string;
  coordinates: Coordinates | null;
};

// Canonical officer produced by normalizeOfficer(); display fields keep source casing.
export type OfficerRecord = {
  fullName: string;
  surname: string;
  surnameKey: string;
  middleNames: string[];
  middleNameKeys: string[];
  dateOfBirth: CalendarDate | null;
  roles: RoleRecord[];
  address: AddressRecord | null;
  companyName: string | null;
};

export type RawDate = string | Date | { year: number; month: number; day?: number | null } | null;

export type RawRoleRecord = {
  company_number: string | number;
  role_type?: string | null;
  appointed_on?: RawDate;
  appointed_before?: RawDate;
  resigned_on?: RawDate;
};

export type RawAddressRecord = {
  full_address?: string | null;
  latitude?: number | null;
  longitude?: number | null;
};

// Shape handed over by ingestion adapters (registry bulk files, APIs).
export type RawOfficerRecord = {
  full_name: string;
  middle_names?: string[];
  surname?: string;
  date_of_birth?: RawDate;
  roles?: RawRoleRecord[];
  address?: RawAddressRecord | null;
  company_name?: string | null;
};

export type DetectorCategory = 'name' | 'age' | 'appointment' | 'address' | 'companyName';

export type DetectorResult = { points: number; reasons: string[] };

export type Confidence = 'low' | 'medium' | 'high';

export type SignalBreakdown = { category: DetectorCategory; points: number; reasons: string[] };

export type ConnectionScoreResult = {
  totalScore: number;
  confidence: Confidence;
  reasons: string[];
  signals: SignalBreakdown[];
};
