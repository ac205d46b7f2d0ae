import { google, calendar_v3 } from 'googleapis';
import { CalendarAdapter, CalendarEventInput, CalendarSummary } from '../../types/calendar';
import { AppError, RemoteServiceError, toError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { GoogleAuthorizer } from './google.auth';

const SERVICE = 'GoogleCalendar';

export function httpStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('status' in error && typeof error.status === 'number') return error.status;
  if ('code' in error && typeof error.code === 'number') return error.code;
  if (
    'response' in error &&
    typeof error.response === 'object' &&
    error.response !== null &&
    'status' in error.response &&
    typeof error.response.status === 'number'
  ) {
    return error.response.status;
  }
  return undefined;
}

function wrap(operation: string, error: unknown): AppError {
  if (error instanceof AppError) return error;
  return new RemoteServiceError(SERVICE, operation, toError(error));
}

export class GoogleCalendarAdapter implements CalendarAdapter {
  private calendar?: calendar_v3.Calendar;

  constructor(private authorizer: GoogleAuthorizer) {}

  // Authorization is deferred so read-only commands never open a consent flow.
  private async api(): Promise<calendar_v3.Calendar> {
    if (!this.calendar) {
      const auth = await this.authorizer.authorize().catch((error: unknown) => {
        throw wrap('authorize', error);
      });
      this.calendar = google.calendar({ version: 'v3', auth });
    }
    return this.calendar;
  }

  async createEvent(event: CalendarEventInput): Promise<string> {
    const calendar = await this.api();

    try {
      const result = await calendar.events.insert({
        calendarId: event.calendarId,
        sendUpdates: 'all',
        requestBody: {
          summary: event.title,
          description: event.description,
          start: { dateTime: event.start, timeZone: event.timezone },
          end: { dateTime: event.end, timeZone: event.timezone },
          attendees: event.attendees.map((email) => ({ email })),
          reminders: {
            useDefault: false,
            overrides: event.reminders.map(({ method, minutes }) => ({ method, minutes })),
          },
        },
      });

      const eventId = result.data.id;
      if (!eventId) {
        throw new Error('response did not include an event id');
      }

      logger.info('Google Calendar event created', { eventId, calendarId: event.calendarId });
      return eventId;
    } catch (error) {
      throw wrap('events.insert', error);
    }
  }

  async deleteEvent(calendarId: string, eventId: string): Promise<void> {
    const calendar = await this.api();

    try {
      await calendar.events.delete({ calendarId, eventId, sendUpdates: 'all' });
      logger.info('Google Calendar event deleted', { eventId, calendarId });
    } catch (error) {
      const status = httpStatus(error);
      if (status === 404 || status === 410) {
        logger.warn('Google Calendar event already gone', { eventId, calendarId, status });
        return;
      }
      throw wrap('events.delete', error);
    }
  }

  async listCalendars(): Promise<CalendarSummary[]> {
    const calendar = await this.api();
    const calendars: CalendarSummary[] = [];

    try {
      let pageToken: string | undefined;
      do {
        const result = await calendar.calendarList.list({ pageToken });
        for (const item of result.data.items ?? []) {
          if (!item.id) continue;
          calendars.push({ id: item.id, summary: item.summary ?? item.id, primary: item.primary === true });
        }
        pageToken = result.data.nextPageToken ?? undefined;
      } while (pageToken);
    } catch (error) {
      throw wrap('calendarList.list', error);
    }

    logger.debug('Google calendars listed', { count: calendars.length });
    return calendars;
  }
}
