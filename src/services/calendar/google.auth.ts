import type { Server } from 'http';
import express from 'express';
import { Credentials, OAuth2Client } from 'google-auth-library';
import { z } from 'zod';
import { ConfigMissingError, RemoteServiceError, StoreError, toError } from '../../utils/errors';
import { readJsonFile, writeJsonFile } from '../../utils/jsonFile';
import { logger } from '../../utils/logger';

export const CALENDAR_SCOPES = ['https://www.googleapis.com/auth/calendar'];
export const CALLBACK_PATH = '/oauth2callback';

const oauthClientSchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
});

// Google Cloud Console downloads either an "installed" or a "web" client.
const clientSecretsSchema = z
  .object({ installed: oauthClientSchema.optional(), web: oauthClientSchema.optional() })
  .transform((value) => value.installed ?? value.web)
  .pipe(oauthClientSchema);

const tokenSchema = z.object({
  access_token: z.string().nullish(),
  refresh_token: z.string().nullish(),
  expiry_date: z.number().nullish(),
  token_type: z.string().nullish(),
  id_token: z.string().nullish(),
  scope: z.string().optional(),
});

type OAuthClientSecrets = z.infer<typeof oauthClientSchema>;

export interface GoogleAuthOptions {
  credentialsFile: string;
  tokenFile: string;
  port: number;
  /** Where the consent URL is shown to the user. */
  prompt?: (authUrl: string) => void;
}

function printConsentUrl(authUrl: string): void {
  process.stderr.write(`Open this URL in your browser to authorize calendar access:\n\n  ${authUrl}\n\n`);
}

function listen(app: express.Express, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, '127.0.0.1', () => resolve(server));
    server.once('error', reject);
  });
}

/**
 * OAuth2 installed-app flow for Google Calendar. Tokens are cached in a
 * local JSON file and refreshed tokens are written back to it.
 */
export class GoogleAuthorizer {
  constructor(private options: GoogleAuthOptions) {}

  async authorize(): Promise<OAuth2Client> {
    const secrets = await this.loadClientSecrets();
    const cached = await this.loadToken();

    if (cached?.refresh_token) {
      const client = new OAuth2Client({ clientId: secrets.client_id, clientSecret: secrets.client_secret });
      client.setCredentials(cached);
      this.persistRefreshedTokens(client, cached);
      logger.debug('Using cached Google token', { tokenFile: this.options.tokenFile });
      return client;
    }

    return this.runConsentFlow(secrets);
  }

  private async loadClientSecrets(): Promise<OAuthClientSecrets> {
    const { credentialsFile } = this.options;
    const data = await readJsonFile(credentialsFile);
    if (data === undefined) {
      throw new ConfigMissingError(
        `Google OAuth client file not found at ${credentialsFile}. Download it from the Google Cloud Console.`
      );
    }

    const parsed = clientSecretsSchema.safeParse(data);
    if (!parsed.success) {
      throw new StoreError(`${credentialsFile} does not contain an OAuth client id and secret`, credentialsFile);
    }
    return parsed.data;
  }

  private async loadToken(): Promise<Credentials | null> {
    const data = await readJsonFile(this.options.tokenFile);
    if (data === undefined) return null;

    const parsed = tokenSchema.safeParse(data);
    if (!parsed.success) {
      logger.warn('Ignoring unreadable Google token cache', { tokenFile: this.options.tokenFile });
      return null;
    }
    return parsed.data;
  }

  private async saveToken(tokens: Credentials): Promise<void> {
    await writeJsonFile(this.options.tokenFile, tokens);
    logger.debug('Google token cached', { tokenFile: this.options.tokenFile });
  }

  private persistRefreshedTokens(client: OAuth2Client, current: Credentials): void {
    client.on('tokens', (tokens: Credentials) => {
      // A refresh response omits the refresh token, so merge over what we had.
      const merged: Credentials = { ...current, ...tokens, refresh_token: tokens.refresh_token ?? current.refresh_token };
      this.saveToken(merged).catch((error: unknown) => {
        logger.warn('Failed to cache refreshed Google token', { error: toError(error).message });
      });
    });
  }

  private async runConsentFlow(secrets: OAuthClientSecrets): Promise<OAuth2Client> {
    const app = express();
    const codeReceived = new Promise<string>((resolve, reject) => {
      app.get(CALLBACK_PATH, (req, res) => {
        res.set('Connection', 'close');
        const { code, error } = req.query;
        if (typeof error === 'string') {
          res.status(400).send('Authorization was denied. You can close this window.');
          reject(new Error(`authorization denied: ${error}`));
          return;
        }
        if (typeof code !== 'string') {
          res.status(400).send('Missing authorization code.');
          return;
        }
        res.send('Authorization complete. You can close this window and return to the terminal.');
        resolve(code);
      });
    });

    const server = await listen(app, this.options.port);
    try {
      const address = server.address();
      const port = typeof address === 'object' && address ? address.port : this.options.port;
      const client = new OAuth2Client({
        clientId: secrets.client_id,
        clientSecret: secrets.client_secret,
        redirectUri: `http://127.0.0.1:${port}${CALLBACK_PATH}`,
      });

      const authUrl = client.generateAuthUrl({
        access_type: 'offline',
        scope: CALENDAR_SCOPES,
        prompt: 'consent', // Force consent so Google returns a refresh token
      });
      (this.options.prompt ?? printConsentUrl)(authUrl);

      let tokens: Credentials;
      try {
        const code = await codeReceived;
        ({ tokens } = await client.getToken(code));
      } catch (error) {
        throw new RemoteServiceError('GoogleOAuth', 'getToken', toError(error));
      }

      client.setCredentials(tokens);
      await this.saveToken(tokens);
      this.persistRefreshedTokens(client, tokens);
      logger.info('Google Calendar authorized', { tokenFile: this.options.tokenFile });
      return client;
    } finally {
      server.close();
    }
  }
}
