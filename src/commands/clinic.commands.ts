import { Command, Option } from 'commander';
import { ClinicService } from '../services/clinic.service';
import { SlotStatus } from '../types/slot';
import { renderCalendars, renderSchedule } from '../utils/format';
import { handleCommandError } from './errorHandler';

export interface CommandIO {
  writeOut: (text: string) => void;
  writeErr: (text: string) => void;
}

export const processIO: CommandIO = {
  writeOut: (text) => process.stdout.write(text),
  writeErr: (text) => process.stderr.write(text),
};

interface SlotOptions {
  date: string;
  time: string;
}

const EXAMPLES = `
Examples:
  # Setup (first time only)
  $ clinic setup --student you@example.com --clinic clinic@example.com

  # View all bookings, one date, or only open slots
  $ clinic view
  $ clinic view --date 2026-02-15
  $ clinic view --status available

  # Volunteer for a slot
  $ clinic volunteer --date 2026-02-15 --time 10:00 --name "Your Name" --email you@example.com

  # Book a slot
  $ clinic book --date 2026-02-15 --time 10:00 --subject "Git help" --description "Stuck on a merge conflict" --email student@example.com

  # Cancel your booking or your volunteer slot
  $ clinic cancel-booking --date 2026-02-15 --time 10:00 --email student@example.com
  $ clinic cancel-volunteer --date 2026-02-15 --time 10:00 --email you@example.com
`;

function slotCommand(program: Command, name: string, description: string): Command {
  return program
    .command(name)
    .description(description)
    .requiredOption('--date <date>', 'Date (YYYY-MM-DD)')
    .requiredOption('--time <time>', 'Time (HH:MM)');
}

export function buildProgram(service: ClinicService, io: CommandIO = processIO): Command {
  const print = (...lines: string[]) => io.writeOut(`${lines.join('\n')}\n`);

  const program = new Command();
  program
    .name('clinic')
    .description('Coding clinic booking system')
    .configureOutput({ writeOut: io.writeOut, writeErr: io.writeErr })
    .exitOverride()
    .addHelpText('after', EXAMPLES);

  program
    .command('setup')
    .description('Select the student and clinic calendars')
    .requiredOption('--student <id>', 'Student calendar ID')
    .requiredOption('--clinic <id>', 'Clinic calendar ID')
    .action(async (options: { student: string; clinic: string }) => {
      const config = await service.setup(options);
      print(
        `Student calendar: ${config.student_calendar}`,
        `Clinic calendar: ${config.clinic_calendar}`,
        'Configuration saved'
      );
    });

  program
    .command('view')
    .description('View bookings')
    .option('--date <date>', 'Filter by date (YYYY-MM-DD)')
    .addOption(new Option('--status <status>', 'Filter by status').choices(['available', 'booked']))
    .action(async (options: { date?: string; status?: SlotStatus }) => {
      print(renderSchedule(await service.view(options)));
    });

  slotCommand(program, 'volunteer', 'Volunteer for a slot')
    .requiredOption('--name <name>', 'Your name')
    .requiredOption('--email <email>', 'Your email')
    .action(async (options: SlotOptions & { name: string; email: string }) => {
      const slot = await service.volunteer(options);
      print(`Volunteered for ${slot.date} at ${slot.time}`, 'Event created in calendar', 'Status: AVAILABLE');
    });

  slotCommand(program, 'book', 'Book a slot')
    .requiredOption('--subject <subject>', 'Subject/topic')
    .requiredOption('--description <description>', 'Description of help needed')
    .requiredOption('--email <email>', 'Your email')
    .action(async (options: SlotOptions & { subject: string; description: string; email: string }) => {
      const slot = await service.book(options);
      print(
        `Booked session with ${slot.volunteer_name}`,
        `Date: ${slot.date} at ${slot.time}`,
        `Subject: ${slot.subject}`,
        'Calendar event created'
      );
    });

  slotCommand(program, 'cancel-booking', 'Cancel a booking')
    .requiredOption('--email <email>', 'Your email')
    .action(async (options: SlotOptions & { email: string }) => {
      const slot = await service.cancelBooking(options);
      print(`Cancelled booking for ${slot.date} at ${slot.time}`, 'Slot now available again');
    });

  slotCommand(program, 'cancel-volunteer', 'Cancel volunteer slot')
    .requiredOption('--email <email>', 'Your email')
    .action(async (options: SlotOptions & { email: string }) => {
      const slot = await service.cancelVolunteer(options);
      print(`Cancelled volunteer slot for ${slot.date} at ${slot.time}`, 'Slot removed from calendar');
    });

  program
    .command('calendars')
    .description('List the calendars this account can see')
    .action(async () => {
      print(renderCalendars(await service.listCalendars()));
    });

  return program;
}

/** Parses `args` (user arguments, without the node and script entries) and returns the exit code. */
export async function runCommand(service: ClinicService, args: string[], io: CommandIO = processIO): Promise<number> {
  const program = buildProgram(service, io);
  try {
    await program.parseAsync(args, { from: 'user' });
    return 0;
  } catch (error) {
    return handleCommandError(error, io.writeErr);
  }
}
