import { v4 as uuidv4 } from 'uuid';
import { CalendarAdapter, CalendarEventInput, CalendarSummary } from '../../types/calendar';
import { logger } from '../../utils/logger';

export const OFFLINE_CALENDARS: CalendarSummary[] = [
  { id: 'primary', summary: 'Offline calendar', primary: true },
];

/**
 * Stands in for a calendar service when running without credentials.
 * Nothing leaves the machine; events only get an identifier.
 */
export class OfflineCalendarAdapter implements CalendarAdapter {
  constructor(private calendars: CalendarSummary[] = OFFLINE_CALENDARS) {}

  async createEvent(event: CalendarEventInput): Promise<string> {
    const eventId = `offline-${uuidv4()}`;
    logger.info('Offline calendar event recorded', {
      eventId,
      calendarId: event.calendarId,
      title: event.title,
      start: event.start,
    });
    return eventId;
  }

  async deleteEvent(calendarId: string, eventId: string): Promise<void> {
    logger.info('Offline calendar event dropped', { eventId, calendarId });
  }

  async listCalendars(): Promise<CalendarSummary[]> {
    return [...this.calendars];
  }
}
