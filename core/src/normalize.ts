import { z } from 'zod';
import { parseCalendarDate } from './dates';
import { MalformedRecordError, formatIssues } from './errors';
import type { AddressRecord, Coordinates, FuzzyDate, OfficerRecord, RoleRecord } from './types';

export function normNamePart(s?: string | null): string {
  return (s || '')
    .toString()
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/\./g, '')
    .trim()
    .replace(/\s+/g, ' ')
    .toUpperCase();
}

// Leading honorifics dropped from forenames
const TITLES = new Set(['MR', 'MRS', 'MS', 'MISS', 'MX', 'DR', 'SIR', 'DAME', 'LORD', 'LADY', 'PROF', 'REV']);

export function splitFullName(fullName: string): { forenames: string[]; surname: string } {
  let forenames: string[];
  let surname: string;
  const comma = fullName.indexOf(',');
  if (comma >= 0) {
    // registry listing style: "GREGORY, William John"
    surname = fullName.slice(0, comma).trim().replace(/\s+/g, ' ');
    forenames = fullName.slice(comma + 1).split(/[\s,]+/).filter(Boolean);
  } else {
    const tokens = fullName.split(/\s+/).filter(Boolean);
    surname = tokens.length > 0 ? tokens[tokens.length - 1] : '';
    forenames = tokens.slice(0, -1);
  }
  while (forenames.length > 0 && TITLES.has(normNamePart(forenames[0]))) forenames = forenames.slice(1);
  return { forenames, surname };
}

export function cleanText(v?: string | null): string | null {
  if (!v) return null;
  const s = v.trim().replace(/\s+/g, ' ');
  return s || null;
}

export function addressKey(addr: string): string {
  return addr.trim().replace(/\s*,\s*/g, ', ').replace(/\s+/g, ' ').toUpperCase();
}

export function normalizeCompanyNumber(n: string | number): string {
  const s = String(n).trim().toUpperCase();
  return /^\d{1,7}$/.test(s) ? s.padStart(8, '0') : s;
}

const rawDateSchema = z
  .union([z.string(), z.date(), z.object({ year: z.number(), month: z.number(), day: z.number().nullish() })])
  .nullish()
  .catch(null);

const rawRoleSchema = z.object({
  company_number: z.union([z.string(), z.number()]).transform(normalizeCompanyNumber).pipe(z.string().min(1)),
  role_type: z.string().nullish().catch(null),
  appointed_on: rawDateSchema,
  appointed_before: rawDateSchema,
  resigned_on: rawDateSchema,
});

const coordinateSchema = (limit: number) => z.number().finite().min(-limit).max(limit).nullish().catch(null);

const rawAddressSchema = z.object({
  full_address: z.string().nullish().catch(null),
  latitude: coordinateSchema(90),
  longitude: coordinateSchema(180),
});

const rawOfficerSchema = z.object({
  full_name: z.string({ required_error: 'full_name is required' }).trim().min(1, 'full_name must not be empty'),
  middle_names: z.array(z.string()).nullish().catch(null),
  surname: z.string().nullish().catch(null),
  date_of_birth: rawDateSchema,
  roles: z.array(z.unknown()).nullish().catch(null),
  address: rawAddressSchema.nullish().catch(null),
  company_name: z.string().nullish().catch(null),
});

function toRole(raw: unknown): RoleRecord | null {
  const parsed = rawRoleSchema.safeParse(raw);
  if (!parsed.success) return null;
  const r = parsed.data;
  const appointedOn = parseCalendarDate(r.appointed_on);
  const appointedBefore = parseCalendarDate(r.appointed_before);
  let appointment: FuzzyDate = { kind: 'unknown' };
  if (appointedOn) appointment = { kind: 'exact', value: appointedOn };
  else if (appointedBefore) appointment = { kind: 'not_later_than', value: appointedBefore };
  return {
    companyNumber: r.company_number,
    roleType: (r.role_type || '').trim() || 'unknown',
    appointment,
    resignedOn: parseCalendarDate(r.resigned_on),
  };
}

function toAddress(raw: z.infer<typeof rawAddressSchema> | null | undefined): AddressRecord | null {
  if (!raw) return null;
  const fullAddress = cleanText(raw.full_address);
  const coordinates: Coordinates | null =
    raw.latitude != null && raw.longitude != null ? { latitude: raw.latitude, longitude: raw.longitude } : null;
  if (!fullAddress && !coordinates) return null;
  return { fullAddress: fullAddress || '', addressKey: fullAddress ? addressKey(fullAddress) : '', coordinates };
}

function uniqueNames(names: string[]): { display: string[]; keys: string[] } {
  const display: string[] = [];
  const keys: string[] = [];
  for (const n of names) {
    const key = normNamePart(n);
    if (!key || keys.includes(key)) continue;
    keys.push(key);
    display.push(n.trim().replace(/\s+/g, ' '));
  }
  return { display, keys };
}

// Canonicalizes one raw officer mapping. Only a missing or empty full_name is
// fatal; every other field degrades to "signal unavailable".
export function normalizeOfficer(raw: unknown): OfficerRecord {
  const parsed = rawOfficerSchema.safeParse(raw);
  if (!parsed.success) throw new MalformedRecordError(formatIssues(parsed.error.issues));
  const r = parsed.data;
  const fullName = r.full_name.replace(/\s+/g, ' ');
  const split = splitFullName(fullName);
  const surname = (r.surname || '').trim() || split.surname;
  // An explicit list (even empty) wins over names derived from full_name
  const middle = uniqueNames(r.middle_names ?? split.forenames.slice(1));
  const roles = (r.roles || []).map(toRole).filter((role): role is RoleRecord => role !== null);
  return {
    fullName,
    surname,
    surnameKey: normNamePart(surname),
    middleNames: middle.display,
    middleNameKeys: middle.keys,
    dateOfBirth: parseCalendarDate(r.date_of_birth),
    roles,
    address: toAddress(r.address),
    companyName: cleanText(r.company_name),
  };
}
