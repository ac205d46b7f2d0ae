jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

import { CalendarFactory } from '../../src/services/calendar/calendar.adapter';
import { GoogleCalendarAdapter } from '../../src/services/calendar/google.adapter';
import { OFFLINE_CALENDARS, OfflineCalendarAdapter } from '../../src/services/calendar/offline.adapter';
import { CalendarConfig } from '../../src/types/calendar';
import { logger } from '../../src/utils/logger';

const config: CalendarConfig = {
  credentialsFile: '/tmp/clinic/secrets/credentials.json',
  tokenFile: '/tmp/clinic/secrets/token.json',
  oauthPort: 0,
};

describe('CalendarFactory', () => {
  it('creates a Google adapter without authorizing up front', () => {
    expect(CalendarFactory.create('google', config)).toBeInstanceOf(GoogleCalendarAdapter);
  });

  it('creates an offline adapter', () => {
    expect(CalendarFactory.create('offline', config)).toBeInstanceOf(OfflineCalendarAdapter);
  });

  it('rejects unknown providers', () => {
    expect(() => CalendarFactory.create('outlook', config)).toThrow('Unsupported calendar provider: outlook');
  });
});

describe('OfflineCalendarAdapter', () => {
  const adapter = new OfflineCalendarAdapter();

  it('hands out distinct offline event ids', async () => {
    const event = {
      calendarId: 'primary',
      title: 'Coding Clinic - Available (Volunteer: Alex)',
      description: 'Volunteer: Alex (alex@example.com)',
      start: '2026-02-15T10:00:00+02:00',
      end: '2026-02-15T10:30:00+02:00',
      timezone: 'Africa/Johannesburg',
      attendees: ['alex@example.com'],
      reminders: [],
    };

    const first = await adapter.createEvent(event);
    const second = await adapter.createEvent(event);

    expect(first).toMatch(/^offline-[0-9a-f-]{36}$/);
    expect(second).not.toBe(first);
    expect(logger.info).toHaveBeenCalledWith(
      'Offline calendar event recorded',
      expect.objectContaining({ eventId: first, calendarId: 'primary' })
    );
  });

  it('accepts deletes of any event', async () => {
    await expect(adapter.deleteEvent('primary', 'offline-gone')).resolves.toBeUndefined();
  });

  it('lists the offline calendar', async () => {
    await expect(adapter.listCalendars()).resolves.toEqual(OFFLINE_CALENDARS);
  });
});
