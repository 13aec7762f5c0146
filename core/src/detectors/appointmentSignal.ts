import { dayRange, formatCalendarDate, maxDayDistance, sameMonth } from '../dates';
import type { ScoringOptions, SyncTolerance } from '../options';
import type { CalendarDate, DetectorResult, OfficerRecord, RoleRecord } from '../types';
import { noSignal, type SignalDetector } from './types';

// Conservative tenure in epoch days: the latest start the data allows and the
// earliest end. Infinity stands for "still serving".
export type Tenure = { start: number; end: number };

export function tenureOf(role: RoleRecord): Tenure {
  const end = role.resignedOn ? dayRange(role.resignedOn).first : Infinity;
  // unknown start: only known to be serving on its last day
  const start = role.appointment.kind === 'unknown' ? end : dayRange(role.appointment.value).last;
  return { start, end };
}

export function tenuresOverlap(a: Tenure, b: Tenure): boolean {
  return Math.max(a.start, b.start) <= Math.min(a.end, b.end);
}

export function withinTolerance(a: CalendarDate, b: CalendarDate, tolerance: SyncTolerance): boolean {
  if (tolerance === 'same_month') return sameMonth(a, b);
  return maxDayDistance(a, b) <= tolerance.days;
}

function rolesByCompany(roles: RoleRecord[]): Map<string, RoleRecord[]> {
  const byCompany = new Map<string, RoleRecord[]>();
  for (const role of roles) {
    const list = byCompany.get(role.companyNumber);
    if (list) list.push(role);
    else byCompany.set(role.companyNumber, [role]);
  }
  return byCompany;
}

type EventKind = 'appointment' | 'resignation';

type TimedEvent = { kind: EventKind; date: CalendarDate; companyNumber: string };

// Exact appointments and resignations. A not-later-than bound says nothing
// about the month, so it never takes part.
function timedEvents(o: OfficerRecord): TimedEvent[] {
  const out: TimedEvent[] = [];
  for (const r of o.roles) {
    if (r.appointment.kind === 'exact') out.push({ kind: 'appointment', date: r.appointment.value, companyNumber: r.companyNumber });
    if (r.resignedOn) out.push({ kind: 'resignation', date: r.resignedOn, companyNumber: r.companyNumber });
  }
  return out;
}

function describe(e: TimedEvent): string {
  return `${formatCalendarDate(e.date)} (${e.companyNumber})`;
}

// "appointment" for two appointments, "resignation/appointment" for a handover
function syncReason(ea: TimedEvent, eb: TimedEvent): string {
  const key = (e: TimedEvent) => `${describe(e)} ${e.kind}`;
  const [first, second] = key(ea) <= key(eb) ? [ea, eb] : [eb, ea];
  const kinds = first.kind === second.kind ? first.kind : `${first.kind}/${second.kind}`;
  return `Synchronized ${kinds} timing: ${describe(first)} and ${describe(second)}`;
}

export class AppointmentSignalDetector implements SignalDetector {
  readonly category = 'appointment' as const;

  constructor(private readonly options: Readonly<ScoringOptions>) {}

  detect(a: OfficerRecord, b: OfficerRecord): DetectorResult {
    const result = noSignal();
    this.sharedCompanies(a, b, result);
    this.synchronizedTiming(timedEvents(a), timedEvents(b), result);
    // Contextual notes carry no points and are only reported alongside real evidence
    if (result.points === 0) return noSignal();
    result.reasons.push(...multipleRoleNotes(a), ...multipleRoleNotes(b));
    return result;
  }

  // One award per shared company number, however many role pairs it has
  private sharedCompanies(a: OfficerRecord, b: OfficerRecord, result: DetectorResult): void {
    const { points } = this.options;
    const rolesB = rolesByCompany(b.roles);
    for (const [companyNumber, rolesA] of rolesByCompany(a.roles)) {
      const others = rolesB.get(companyNumber);
      if (!others) continue;
      const concurrent = rolesA.some((ra) => others.some((rb) => tenuresOverlap(tenureOf(ra), tenureOf(rb))));
      if (concurrent) {
        result.points += points.concurrentService;
        result.reasons.push(`Concurrent service at company ${companyNumber}`);
      } else {
        result.points += points.historicalSharedCompany;
        result.reasons.push(`Historical shared company ${companyNumber} (tenures do not overlap)`);
      }
    }
  }

  // Any pair of events, so a resignation answered by an appointment counts as well
  private synchronizedTiming(eventsA: TimedEvent[], eventsB: TimedEvent[], result: DetectorResult): void {
    const { points, synchronizationTolerance } = this.options;
    for (const ea of eventsA) {
      for (const eb of eventsB) {
        if (!withinTolerance(ea.date, eb.date, synchronizationTolerance)) continue;
        result.points += points.synchronizedTiming;
        result.reasons.push(syncReason(ea, eb));
      }
    }
  }
}

function multipleRoleNotes(o: OfficerRecord): string[] {
  const notes: string[] = [];
  for (const [companyNumber, roles] of rolesByCompany(o.roles)) {
    if (roles.length < 2) continue;
    notes.push(`Multiple roles held by ${o.fullName} at company ${companyNumber} (${roles.map((r) => r.roleType).join(', ')})`);
  }
  return notes;
}
