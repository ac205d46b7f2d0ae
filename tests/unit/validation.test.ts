import { ValidationError } from '../../src/utils/errors';
import { formatDateHeading, slotWindow } from '../../src/utils/slotTime';
import {
  bookInputSchema,
  parseInput,
  viewFilterSchema,
  volunteerInputSchema,
} from '../../src/utils/validation';

function validationMessage(run: () => unknown): string {
  try {
    run();
  } catch (error) {
    if (error instanceof ValidationError) return error.message;
    throw error;
  }
  throw new Error('expected a ValidationError');
}

describe('input validation', () => {
  const volunteer = { date: '2026-02-15', time: '10:00', name: 'Alex', email: 'alex@example.com' };

  it('accepts a well-formed volunteer request and normalizes it', () => {
    expect(
      parseInput(volunteerInputSchema, { date: ' 2026-02-15 ', time: '10:00', name: ' Alex ', email: 'Alex@Example.COM' })
    ).toEqual(volunteer);
  });

  it('rejects dates that are not YYYY-MM-DD', () => {
    expect(validationMessage(() => parseInput(volunteerInputSchema, { ...volunteer, date: '15/02/2026' }))).toBe(
      'Invalid date: must be a date in YYYY-MM-DD format'
    );
  });

  it('rejects dates that do not exist', () => {
    expect(validationMessage(() => parseInput(volunteerInputSchema, { ...volunteer, date: '2026-02-30' }))).toBe(
      'Invalid date: is not a real calendar date'
    );
  });

  it.each(['24:00', '9:00', '10:60', '10am'])('rejects time %s', (time) => {
    expect(validationMessage(() => parseInput(volunteerInputSchema, { ...volunteer, time }))).toBe(
      'Invalid time: must be a 24-hour time in HH:MM format'
    );
  });

  it('rejects malformed emails', () => {
    expect(validationMessage(() => parseInput(volunteerInputSchema, { ...volunteer, email: 'alex' }))).toBe(
      'Invalid email: must be a valid email address'
    );
  });

  it('requires a non-blank subject', () => {
    const error = (() => {
      try {
        parseInput(bookInputSchema, { ...volunteer, subject: '   ', description: 'Loops' });
      } catch (caught) {
        return caught;
      }
      return null;
    })();

    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({ field: 'subject', message: 'Invalid subject: is required', exitCode: 2 });
  });

  it('accepts an empty view filter and rejects unknown statuses', () => {
    expect(parseInput(viewFilterSchema, {})).toEqual({});
    expect(validationMessage(() => parseInput(viewFilterSchema, { status: 'empty' }))).toMatch(/^Invalid status: /);
  });
});

describe('slot time helpers', () => {
  it('computes a slot window in the clinic timezone', () => {
    expect(slotWindow('2026-02-15', '10:00', 'Africa/Johannesburg', 30)).toEqual({
      start: '2026-02-15T10:00:00+02:00',
      end: '2026-02-15T10:30:00+02:00',
    });
  });

  it('rolls a late slot over midnight', () => {
    expect(slotWindow('2026-02-15', '23:45', 'UTC', 30)).toEqual({
      start: '2026-02-15T23:45:00Z',
      end: '2026-02-16T00:15:00Z',
    });
  });

  it('formats a date heading', () => {
    expect(formatDateHeading('2026-02-15')).toBe('Sunday, February 15, 2026');
  });
});
