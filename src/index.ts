#!/usr/bin/env node
import { env, paths } from './config/env';
import { runCommand } from './commands/clinic.commands';
import { CalendarFactory } from './services/calendar/calendar.adapter';
import { ClinicService } from './services/clinic.service';
import { ConfigStore } from './services/config.store';
import { CalendarMirror } from './services/mirror.service';
import { SlotStore } from './services/slot.store';
import { logger } from './utils/logger';

export function createClinicService(): ClinicService {
  const adapter = CalendarFactory.create(env.CALENDAR_PROVIDER, {
    credentialsFile: env.GOOGLE_CREDENTIALS_FILE,
    tokenFile: env.GOOGLE_TOKEN_FILE,
    oauthPort: env.GOOGLE_OAUTH_PORT,
  });

  return new ClinicService({
    slots: new SlotStore(paths.bookings),
    config: new ConfigStore(paths.config),
    mirror: new CalendarMirror(adapter, {
      timezone: env.CLINIC_TIMEZONE,
      slotMinutes: env.CLINIC_SLOT_MINUTES,
    }),
  });
}

/**
 * Runs one command and records its exit code. The process is left to exit on
 * its own so pending writes, such as a refreshed OAuth token, can finish.
 */
export async function main(args: string[], service: ClinicService = createClinicService()): Promise<void> {
  logger.debug('Clinic scheduler starting', {
    dataDir: env.CLINIC_DATA_DIR,
    provider: env.CALENDAR_PROVIDER,
  });

  process.exitCode = await runCommand(service, args);
}

if (require.main === module) {
  main(process.argv.slice(2)).catch((error: Error) => {
    logger.error('Failed to run command', { error: error.message });
    process.exitCode = 1;
  });
}
