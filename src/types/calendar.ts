export interface EventReminder {
  method: 'email' | 'popup';
  minutes: number;
}

export interface CalendarEventInput {
  calendarId: string;
  title: string;
  description: string;
  start: string;
  end: string;
  timezone: string;
  attendees: string[];
  reminders: EventReminder[];
}

export interface CalendarSummary {
  id: string;
  summary: string;
  primary: boolean;
}

/**
 * Capability surface of an external calendar service. Implementations
 * raise RemoteServiceError on network, credential or API failures.
 */
export interface CalendarAdapter {
  createEvent(event: CalendarEventInput): Promise<string>;
  deleteEvent(calendarId: string, eventId: string): Promise<void>;
  listCalendars(): Promise<CalendarSummary[]>;
}

export interface CalendarConfig {
  credentialsFile: string;
  tokenFile: string;
  oauthPort: number;
}
