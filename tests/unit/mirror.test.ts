import { CalendarMirror, describeSlot } from '../../src/services/mirror.service';
import { AvailableSlot, BookedSlot } from '../../src/types/slot';
import { CLINIC_CALENDAR, FakeCalendar } from '../helpers/fakeCalendar';

const available: AvailableSlot = {
  date: '2026-02-15',
  time: '10:00',
  status: 'available',
  volunteer_name: 'Alex',
  volunteer_email: 'alex@example.com',
  event_id: null,
};

const booked: BookedSlot = {
  ...available,
  status: 'booked',
  student_email: 'sam@example.com',
  subject: 'Git help',
  description: 'Merge conflicts',
  booked_at: '2026-02-10T08:00:00.000Z',
};

describe('describeSlot', () => {
  it('describes an open volunteer slot', () => {
    expect(describeSlot(available)).toEqual({
      title: 'Coding Clinic - Available (Volunteer: Alex)',
      description: 'Volunteer: Alex (alex@example.com)',
      attendees: ['alex@example.com'],
    });
  });

  it('describes a booked session', () => {
    expect(describeSlot(booked)).toEqual({
      title: 'Coding Clinic: Git help',
      description:
        'Subject: Git help\n\nDescription: Merge conflicts\n\nStudent: sam@example.com\nVolunteer: Alex (alex@example.com)',
      attendees: ['sam@example.com', 'alex@example.com'],
    });
  });
});

describe('CalendarMirror', () => {
  let calendar: FakeCalendar;
  let mirror: CalendarMirror;

  beforeEach(() => {
    calendar = new FakeCalendar();
    mirror = new CalendarMirror(calendar, { timezone: 'Africa/Johannesburg', slotMinutes: 45 });
  });

  it('creates an event spanning the configured slot length', async () => {
    const eventId = await mirror.createEvent(CLINIC_CALENDAR, booked);

    expect(eventId).toBe('evt-1');
    expect(calendar.created).toEqual([
      {
        calendarId: CLINIC_CALENDAR,
        title: 'Coding Clinic: Git help',
        description:
          'Subject: Git help\n\nDescription: Merge conflicts\n\nStudent: sam@example.com\nVolunteer: Alex (alex@example.com)',
        attendees: ['sam@example.com', 'alex@example.com'],
        start: '2026-02-15T10:00:00+02:00',
        end: '2026-02-15T10:45:00+02:00',
        timezone: 'Africa/Johannesburg',
        reminders: [
          { method: 'email', minutes: 60 },
          { method: 'popup', minutes: 30 },
        ],
      },
    ]);
  });

  it('passes deletions and calendar listings through', async () => {
    await mirror.deleteEvent(CLINIC_CALENDAR, 'evt-9');

    expect(calendar.deleted).toEqual(['evt-9']);
    expect((await mirror.listCalendars()).map((c) => c.id)).toEqual(['students@example.com', 'clinic@example.com']);
  });
});
