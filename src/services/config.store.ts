import { ClinicConfig, ResolvedClinicConfig } from '../types/config';
import { ConfigMissingError, StoreError } from '../utils/errors';
import { readJsonFile, writeJsonFile } from '../utils/jsonFile';
import { logger } from '../utils/logger';
import { clinicConfigSchema } from '../utils/validation';

const EMPTY_CONFIG: ClinicConfig = { student_calendar: null, clinic_calendar: null };

export class ConfigStore {
  constructor(private filePath: string) {}

  async load(): Promise<ClinicConfig> {
    const data = await readJsonFile(this.filePath);
    if (data === undefined) return { ...EMPTY_CONFIG };

    const parsed = clinicConfigSchema.safeParse(data);
    if (!parsed.success) {
      throw new StoreError(`${this.filePath} is not a valid clinic configuration`, this.filePath);
    }
    return parsed.data;
  }

  async save(config: ClinicConfig): Promise<void> {
    await writeJsonFile(this.filePath, config);
    logger.info('Clinic configuration saved', { path: this.filePath });
  }

  /** Loads the configuration, failing unless `setup` has stored both calendars. */
  async require(): Promise<ResolvedClinicConfig> {
    const { student_calendar, clinic_calendar } = await this.load();
    if (!student_calendar || !clinic_calendar) {
      throw new ConfigMissingError();
    }
    return { student_calendar, clinic_calendar };
  }
}
