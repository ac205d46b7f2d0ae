import { CalendarSummary } from '../types/calendar';
import { ClinicConfig, ResolvedClinicConfig } from '../types/config';
import { AvailableSlot, BookedSlot, Slot, SlotFilter, SlotSummary } from '../types/slot';
import { formatCalendarList } from '../utils/format';
import { DuplicateSlotError, NotFoundError, ValidationError, toError } from '../utils/errors';
import { logger } from '../utils/logger';
import {
  BookInput,
  CancelInput,
  SetupInput,
  ViewInput,
  VolunteerInput,
  bookInputSchema,
  cancelInputSchema,
  parseInput,
  setupInputSchema,
  viewFilterSchema,
  volunteerInputSchema,
} from '../utils/validation';
import { ConfigStore } from './config.store';
import { CalendarMirror } from './mirror.service';
import { SlotStore } from './slot.store';

export interface ClinicDependencies {
  slots: SlotStore;
  config: ConfigStore;
  mirror: CalendarMirror;
  now?: () => Date;
}

export interface ScheduleView {
  slots: Slot[];
  summary: SlotSummary;
  filter: SlotFilter;
  config: ClinicConfig;
}

export function summarize(slots: Slot[]): SlotSummary {
  const booked = slots.filter((slot) => slot.status === 'booked').length;
  return { available: slots.length - booked, booked, total: slots.length };
}

// Ledgers written by hand or by older versions may hold mixed-case addresses.
export function sameEmail(a: string, b: string): boolean {
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}

/**
 * Command handlers. Remote events are created before the ledger changes,
 * so a failed calendar call leaves the ledger untouched.
 */
export class ClinicService {
  private now: () => Date;

  constructor(private deps: ClinicDependencies) {
    this.now = deps.now ?? (() => new Date());
  }

  async setup(input: SetupInput): Promise<ResolvedClinicConfig> {
    const { student, clinic } = parseInput(setupInputSchema, input);
    const calendars = await this.deps.mirror.listCalendars();
    const known = new Set(calendars.map((calendar) => calendar.id));

    const checks: Array<[string, string]> = [
      ['Student', student],
      ['Clinic', clinic],
    ];
    for (const [label, id] of checks) {
      if (!known.has(id)) {
        throw new ValidationError(
          `${label} calendar '${id}' not found. Available calendars:\n${formatCalendarList(calendars)}`,
          label.toLowerCase()
        );
      }
    }

    const config: ResolvedClinicConfig = { student_calendar: student, clinic_calendar: clinic };
    await this.deps.config.save(config);
    return config;
  }

  async view(input: ViewInput = {}): Promise<ScheduleView> {
    const filter = parseInput(viewFilterSchema, input);
    const slots = await this.deps.slots.list(filter);
    const config = await this.deps.config.load();
    return { slots, summary: summarize(slots), filter, config };
  }

  async listCalendars(): Promise<CalendarSummary[]> {
    return this.deps.mirror.listCalendars();
  }

  async volunteer(input: VolunteerInput): Promise<AvailableSlot> {
    const { date, time, name, email } = parseInput(volunteerInputSchema, input);
    const { clinic_calendar } = await this.deps.config.require();

    const existing = await this.deps.slots.find(date, time);
    if (existing) {
      throw new DuplicateSlotError(
        date,
        time,
        sameEmail(existing.volunteer_email, email)
          ? `You already volunteered for ${date} at ${time}`
          : `Slot ${date} at ${time} already has volunteer: ${existing.volunteer_name}`
      );
    }

    const slot: AvailableSlot = {
      date,
      time,
      status: 'available',
      volunteer_name: name,
      volunteer_email: email,
      event_id: null,
    };
    const eventId = await this.deps.mirror.createEvent(clinic_calendar, slot);
    const saved = await this.commit(clinic_calendar, eventId, () =>
      this.deps.slots.insert({ ...slot, event_id: eventId })
    );

    logger.info('Volunteer slot created', { date, time, eventId });
    return saved;
  }

  async book(input: BookInput): Promise<BookedSlot> {
    const { date, time, subject, description, email } = parseInput(bookInputSchema, input);
    const { clinic_calendar } = await this.deps.config.require();

    const slot = await this.deps.slots.find(date, time);
    if (!slot) {
      throw new NotFoundError(`No slot found for ${date} at ${time}. Run "clinic view --date ${date}" to see open slots.`);
    }
    if (slot.status === 'booked') {
      throw new ValidationError(`Slot ${date} at ${time} is already booked`);
    }

    const booking: BookedSlot = {
      date,
      time,
      status: 'booked',
      volunteer_name: slot.volunteer_name,
      volunteer_email: slot.volunteer_email,
      student_email: email,
      subject,
      description,
      booked_at: this.now().toISOString(),
      event_id: null,
    };
    const eventId = await this.deps.mirror.createEvent(clinic_calendar, booking);
    const saved = await this.commit(clinic_calendar, eventId, () =>
      this.deps.slots.update(date, time, () => ({ ...booking, event_id: eventId }))
    );

    if (slot.event_id) {
      await this.discardEvent(clinic_calendar, slot.event_id, 'volunteer event replaced by booking');
    }

    logger.info('Session booked', { date, time, eventId });
    return saved;
  }

  async cancelBooking(input: CancelInput): Promise<AvailableSlot> {
    const { date, time, email } = parseInput(cancelInputSchema, input);
    const { clinic_calendar } = await this.deps.config.require();

    const slot = await this.deps.slots.find(date, time);
    if (!slot) {
      throw new NotFoundError(`No slot found for ${date} at ${time}`);
    }
    if (slot.status !== 'booked') {
      throw new ValidationError(`Slot ${date} at ${time} is not booked`);
    }
    if (!sameEmail(slot.student_email, email)) {
      throw new ValidationError('This is not your booking', 'email');
    }

    const reopened: AvailableSlot = {
      date,
      time,
      status: 'available',
      volunteer_name: slot.volunteer_name,
      volunteer_email: slot.volunteer_email,
      event_id: null,
    };
    const eventId = await this.deps.mirror.createEvent(clinic_calendar, reopened);
    const saved = await this.commit(clinic_calendar, eventId, () =>
      this.deps.slots.update(date, time, () => ({ ...reopened, event_id: eventId }))
    );

    if (slot.event_id) {
      await this.discardEvent(clinic_calendar, slot.event_id, 'booking cancelled');
    }

    logger.info('Booking cancelled', { date, time, eventId });
    return saved;
  }

  async cancelVolunteer(input: CancelInput): Promise<Slot> {
    const { date, time, email } = parseInput(cancelInputSchema, input);
    const { clinic_calendar } = await this.deps.config.require();

    const slot = await this.deps.slots.find(date, time);
    if (!slot) {
      throw new NotFoundError(`No slot found for ${date} at ${time}`);
    }
    if (!sameEmail(slot.volunteer_email, email)) {
      throw new ValidationError('This is not your volunteer slot', 'email');
    }
    if (slot.status === 'booked') {
      throw new ValidationError(
        `Cannot cancel: slot is booked by ${slot.student_email}. Ask them to cancel their booking first.`
      );
    }

    if (slot.event_id) {
      await this.deps.mirror.deleteEvent(clinic_calendar, slot.event_id);
    }
    const removed = await this.deps.slots.remove(date, time);

    logger.info('Volunteer slot cancelled', { date, time });
    return removed;
  }

  // Runs the ledger write for a freshly created event; the event is dropped if the write fails.
  private async commit<T>(calendarId: string, eventId: string, write: () => Promise<T>): Promise<T> {
    try {
      return await write();
    } catch (error) {
      await this.discardEvent(calendarId, eventId, 'ledger update failed');
      throw error;
    }
  }

  private async discardEvent(calendarId: string, eventId: string, reason: string): Promise<void> {
    try {
      await this.deps.mirror.deleteEvent(calendarId, eventId);
    } catch (error) {
      logger.warn('Could not delete calendar event', {
        calendarId,
        eventId,
        reason,
        error: toError(error).message,
      });
    }
  }
}
