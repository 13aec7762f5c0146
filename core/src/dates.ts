import dayjs, { Dayjs } from 'dayjs';
import utc from 'dayjs/plugin/utc';
import customParseFormat from 'dayjs/plugin/customParseFormat';
import { z } from 'zod';
import type { CalendarDate } from './types';

dayjs.extend(utc);
dayjs.extend(customParseFormat);

const DAY_MS = 86_400_000;

const registryDateSchema = z.object({ year: z.number(), month: z.number(), day: z.number().nullish() });

const DAY_FORMATS = ['YYYY-MM-DD', 'DD/MM/YYYY'] as const;
const MONTH_FORMATS = ['YYYY-MM', 'MM/YYYY'] as const;

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

function fromParts(year: number, month: number, day: number | null): CalendarDate | null {
  if (![year, month].every(Number.isInteger) || (day !== null && !Number.isInteger(day))) return null;
  if (year < 1000 || year > 9999) return null;
  const d = dayjs.utc(`${year}-${pad(month)}-${pad(day ?? 1)}`, 'YYYY-MM-DD', true);
  if (!d.isValid()) return null;
  return { year, month, day };
}

function fromDayjs(d: Dayjs, precision: 'day' | 'month'): CalendarDate | null {
  return fromParts(d.year(), d.month() + 1, precision === 'day' ? d.date() : null);
}

// Accepts full dates, year-month partial dates, Date instances and registry
// objects ({ year, month, day? }). Anything else is absent.
export function parseCalendarDate(input: unknown): CalendarDate | null {
  if (input == null) return null;
  if (input instanceof Date) {
    if (isNaN(input.getTime())) return null;
    return fromParts(input.getUTCFullYear(), input.getUTCMonth() + 1, input.getUTCDate());
  }
  if (typeof input === 'object') {
    const parsed = registryDateSchema.safeParse(input);
    if (!parsed.success) return null;
    return fromParts(parsed.data.year, parsed.data.month, parsed.data.day ?? null);
  }
  if (typeof input !== 'string') return null;
  let s = input.trim();
  if (!s) return null;
  // ISO timestamps: keep the date part
  if (/^\d{4}-\d{2}-\d{2}T/.test(s)) s = s.slice(0, 10);
  for (const f of DAY_FORMATS) {
    const d = dayjs.utc(s, f, true);
    if (d.isValid()) return fromDayjs(d, 'day');
  }
  for (const f of MONTH_FORMATS) {
    const d = dayjs.utc(s, f, true);
    if (d.isValid()) return fromDayjs(d, 'month');
  }
  return null;
}

export function formatCalendarDate(d: CalendarDate): string {
  const ym = `${d.year}-${pad(d.month)}`;
  return d.day === null ? ym : `${ym}-${pad(d.day)}`;
}

function toDayjs(d: CalendarDate): Dayjs {
  return dayjs.utc(`${d.year}-${pad(d.month)}-${pad(d.day ?? 1)}`, 'YYYY-MM-DD');
}

// Inclusive span of epoch day numbers the date may denote (a whole month for month precision).
export function dayRange(d: CalendarDate): { first: number; last: number } {
  const start = toDayjs(d);
  const end = d.day === null ? start.endOf('month').startOf('day') : start;
  return { first: Math.round(start.valueOf() / DAY_MS), last: Math.round(end.valueOf() / DAY_MS) };
}

export function monthIndex(d: CalendarDate): number {
  return d.year * 12 + (d.month - 1);
}

// Absolute gap in fractional years at the precision both dates support.
export function ageGapYears(a: CalendarDate, b: CalendarDate): number {
  if (a.day !== null && b.day !== null) {
    return Math.abs(toDayjs(a).diff(toDayjs(b), 'year', true));
  }
  return Math.abs(monthIndex(a) - monthIndex(b)) / 12;
}

export function sameMonth(a: CalendarDate, b: CalendarDate): boolean {
  return a.year === b.year && a.month === b.month;
}

// Largest possible distance in days between two dates, given their precision.
export function maxDayDistance(a: CalendarDate, b: CalendarDate): number {
  const ra = dayRange(a);
  const rb = dayRange(b);
  return Math.max(Math.abs(ra.last - rb.first), Math.abs(rb.last - ra.first));
}
