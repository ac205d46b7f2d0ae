import { DateTime } from 'luxon';
import { ValidationError } from './errors';
import { DATE_FORMAT, TIME_FORMAT } from './validation';

export interface SlotWindow {
  start: string;
  end: string;
}

export function slotWindow(date: string, time: string, timezone: string, minutes: number): SlotWindow {
  const start = DateTime.fromFormat(`${date} ${time}`, `${DATE_FORMAT} ${TIME_FORMAT}`, { zone: timezone });
  if (!start.isValid) {
    throw new ValidationError(`Invalid slot start ${date} ${time}: ${start.invalidExplanation ?? start.invalidReason}`);
  }

  return {
    start: start.toISO({ suppressMilliseconds: true }),
    end: start.plus({ minutes }).toISO({ suppressMilliseconds: true }),
  };
}

/** e.g. "Sunday, February 15, 2026" */
export function formatDateHeading(date: string): string {
  return DateTime.fromFormat(date, DATE_FORMAT, { locale: 'en-US' }).toFormat('cccc, LLLL dd, yyyy');
}
