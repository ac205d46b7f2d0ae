import { CalendarSummary } from '../types/calendar';
import { Slot } from '../types/slot';
import type { ScheduleView } from '../services/clinic.service';
import { formatDateHeading } from './slotTime';

const RULE = '-'.repeat(70);
const LABEL_WIDTH = 12;

function groupByDate(slots: Slot[]): Map<string, Slot[]> {
  const groups = new Map<string, Slot[]>();
  for (const slot of slots) {
    const group = groups.get(slot.date) ?? [];
    group.push(slot);
    groups.set(slot.date, group);
  }
  return groups;
}

function renderSlot(slot: Slot): string[] {
  const label = `[${slot.status.toUpperCase()}]`.padEnd(LABEL_WIDTH);
  const lines = [`${label}${slot.time}  Volunteer: ${slot.volunteer_name}`];

  if (slot.status === 'booked') {
    const indent = ' '.repeat(LABEL_WIDTH);
    lines.push(`${indent}Student: ${slot.student_email}`, `${indent}Subject: ${slot.subject}`);
  }
  return lines;
}

export function renderSchedule(view: ScheduleView): string {
  const lines = ['CODING CLINIC CALENDAR'];
  const { clinic_calendar, student_calendar } = view.config;
  if (clinic_calendar) {
    lines.push(`Clinic calendar: ${clinic_calendar} | Student calendar: ${student_calendar ?? 'not set'}`);
  }
  lines.push('');

  if (view.slots.length === 0) {
    const filtered = Boolean(view.filter.date || view.filter.status);
    lines.push(filtered ? 'No bookings found for your filters' : 'No bookings found');
    return lines.join('\n');
  }

  for (const [date, slots] of groupByDate(view.slots)) {
    lines.push(formatDateHeading(date), RULE);
    for (const slot of slots) {
      lines.push(...renderSlot(slot));
    }
    lines.push('');
  }

  const { available, booked, total } = view.summary;
  lines.push(RULE, `Summary: ${available} Available | ${booked} Booked | ${total} Total`);
  return lines.join('\n');
}

export function renderCalendars(calendars: CalendarSummary[]): string {
  if (calendars.length === 0) return 'No calendars found';

  const lines = [`Found ${calendars.length} calendar(s):`, ''];
  for (const calendar of calendars) {
    lines.push(calendar.primary ? `${calendar.summary} (primary)` : calendar.summary, `  ID: ${calendar.id}`);
  }
  return lines.join('\n');
}

/** Bulleted calendar list used inside error messages. */
export function formatCalendarList(calendars: CalendarSummary[]): string {
  if (calendars.length === 0) return '  (no calendars visible to this account)';
  return calendars
    .map((calendar) => `  • ${calendar.summary}: ${calendar.id}${calendar.primary ? ' (primary)' : ''}`)
    .join('\n');
}
