import os from 'os';
import path from 'path';
import dotenv from 'dotenv';
import { IANAZone } from 'luxon';
import { z } from 'zod';

dotenv.config();

const optionalString = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().min(1).optional()
);

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).optional(),
  CLINIC_DATA_DIR: optionalString,
  CLINIC_TIMEZONE: z
    .string()
    .refine((zone) => IANAZone.isValidZone(zone), { message: 'Unknown IANA timezone' })
    .default('Africa/Johannesburg'),
  CLINIC_SLOT_MINUTES: z.coerce.number().int().positive().default(30),
  CALENDAR_PROVIDER: z.enum(['google', 'offline']).default('google'),
  GOOGLE_CREDENTIALS_FILE: optionalString,
  GOOGLE_TOKEN_FILE: optionalString,
  GOOGLE_OAUTH_PORT: z.coerce.number().int().min(0).max(65535).default(0),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('❌ Invalid environment variables:', parsed.error.flatten().fieldErrors);
  process.exit(1);
}

const dataDir = parsed.data.CLINIC_DATA_DIR ?? path.join(os.homedir(), '.clinic-scheduler');
const secretsDir = path.join(dataDir, 'secrets');

export const env = {
  ...parsed.data,
  CLINIC_DATA_DIR: dataDir,
  GOOGLE_CREDENTIALS_FILE: parsed.data.GOOGLE_CREDENTIALS_FILE ?? path.join(secretsDir, 'credentials.json'),
  GOOGLE_TOKEN_FILE: parsed.data.GOOGLE_TOKEN_FILE ?? path.join(secretsDir, 'token.json'),
};

export const paths = {
  bookings: path.join(dataDir, 'bookings.json'),
  config: path.join(dataDir, 'clinic_config.json'),
};
