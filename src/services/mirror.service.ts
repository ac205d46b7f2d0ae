import { CalendarAdapter, CalendarSummary, EventReminder } from '../types/calendar';
import { Slot } from '../types/slot';
import { slotWindow } from '../utils/slotTime';

export interface MirrorSettings {
  timezone: string;
  slotMinutes: number;
}

const REMINDERS: EventReminder[] = [
  { method: 'email', minutes: 60 },
  { method: 'popup', minutes: 30 },
];

export interface EventDetails {
  title: string;
  description: string;
  attendees: string[];
}

export function describeSlot(slot: Slot): EventDetails {
  const volunteer = `${slot.volunteer_name} (${slot.volunteer_email})`;

  if (slot.status === 'booked') {
    return {
      title: `Coding Clinic: ${slot.subject}`,
      description: [
        `Subject: ${slot.subject}`,
        '',
        `Description: ${slot.description}`,
        '',
        `Student: ${slot.student_email}`,
        `Volunteer: ${volunteer}`,
      ].join('\n'),
      attendees: [slot.student_email, slot.volunteer_email],
    };
  }

  return {
    title: `Coding Clinic - Available (Volunteer: ${slot.volunteer_name})`,
    description: `Volunteer: ${volunteer}`,
    attendees: [slot.volunteer_email],
  };
}

/**
 * Keeps the calendar representation of each slot in step with the ledger.
 * The mirror never touches the store; callers record the returned ids.
 */
export class CalendarMirror {
  constructor(
    private adapter: CalendarAdapter,
    private settings: MirrorSettings
  ) {}

  async createEvent(calendarId: string, slot: Slot): Promise<string> {
    const { start, end } = slotWindow(slot.date, slot.time, this.settings.timezone, this.settings.slotMinutes);

    return this.adapter.createEvent({
      calendarId,
      ...describeSlot(slot),
      start,
      end,
      timezone: this.settings.timezone,
      reminders: REMINDERS,
    });
  }

  async deleteEvent(calendarId: string, eventId: string): Promise<void> {
    await this.adapter.deleteEvent(calendarId, eventId);
  }

  async listCalendars(): Promise<CalendarSummary[]> {
    return this.adapter.listCalendars();
  }
}
