import { CalendarAdapter, CalendarConfig } from '../../types/calendar';
import { GoogleCalendarAdapter } from './google.adapter';
import { GoogleAuthorizer } from './google.auth';
import { OfflineCalendarAdapter } from './offline.adapter';

export class CalendarFactory {
  static create(provider: string, config: CalendarConfig): CalendarAdapter {
    switch (provider) {
      case 'google':
        return new GoogleCalendarAdapter(
          new GoogleAuthorizer({
            credentialsFile: config.credentialsFile,
            tokenFile: config.tokenFile,
            port: config.oauthPort,
          })
        );
      case 'offline':
        return new OfflineCalendarAdapter();
      default:
        throw new Error(`Unsupported calendar provider: ${provider}`);
    }
  }
}
