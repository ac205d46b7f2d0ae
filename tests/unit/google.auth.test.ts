import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';

jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

import { CALENDAR_SCOPES, GoogleAuthorizer } from '../../src/services/calendar/google.auth';
import { ConfigMissingError, RemoteServiceError, StoreError } from '../../src/utils/errors';

const CLIENT_SECRETS = {
  installed: {
    client_id: 'test-client-id.apps.googleusercontent.com',
    client_secret: 'test-secret',
    redirect_uris: ['http://localhost'],
  },
};

async function waitForFile(filePath: string, predicate: (content: string) => boolean): Promise<string> {
  for (let attempt = 0; attempt < 50; attempt++) {
    const content = await fs.readFile(filePath, 'utf8').catch(() => '');
    if (predicate(content)) return content;
    await new Promise((resolve) => setTimeout(resolve, 20));
  }
  throw new Error(`timed out waiting for ${filePath}`);
}

describe('GoogleAuthorizer', () => {
  let dir: string;
  let credentialsFile: string;
  let tokenFile: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'clinic-auth-'));
    credentialsFile = path.join(dir, 'secrets', 'credentials.json');
    tokenFile = path.join(dir, 'secrets', 'token.json');
    await fs.mkdir(path.dirname(credentialsFile), { recursive: true });
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('explains where to get the OAuth client file when it is missing', async () => {
    await fs.rm(credentialsFile, { force: true });
    const authorizer = new GoogleAuthorizer({ credentialsFile, tokenFile, port: 0 });

    await expect(authorizer.authorize()).rejects.toBeInstanceOf(ConfigMissingError);
    await expect(authorizer.authorize()).rejects.toThrow(`Google OAuth client file not found at ${credentialsFile}`);
  });

  it('rejects a client file without an id and secret', async () => {
    await fs.writeFile(credentialsFile, JSON.stringify({ installed: { client_id: 'only-id' } }));
    const authorizer = new GoogleAuthorizer({ credentialsFile, tokenFile, port: 0 });

    await expect(authorizer.authorize()).rejects.toBeInstanceOf(StoreError);
  });

  it('reuses a cached token and writes refreshed tokens back', async () => {
    await fs.writeFile(credentialsFile, JSON.stringify(CLIENT_SECRETS));
    await fs.writeFile(
      tokenFile,
      JSON.stringify({ access_token: 'old-access', refresh_token: 'test-refresh', expiry_date: 1 })
    );
    const prompt = jest.fn();
    const authorizer = new GoogleAuthorizer({ credentialsFile, tokenFile, port: 0, prompt });

    const client = await authorizer.authorize();

    expect(prompt).not.toHaveBeenCalled();
    expect(client.credentials.refresh_token).toBe('test-refresh');

    client.emit('tokens', { access_token: 'new-access', expiry_date: 2 });
    const saved = JSON.parse(await waitForFile(tokenFile, (content) => content.includes('new-access')));
    expect(saved).toEqual({ access_token: 'new-access', refresh_token: 'test-refresh', expiry_date: 2 });
  });

  it('runs the consent flow on a loopback server and reports a denied consent', async () => {
    await fs.writeFile(credentialsFile, JSON.stringify(CLIENT_SECRETS));
    let callback: Promise<Response> | undefined;
    let consentUrl = '';
    const authorizer = new GoogleAuthorizer({
      credentialsFile,
      tokenFile,
      port: 0,
      prompt: (authUrl) => {
        consentUrl = authUrl;
        const redirectUri = new URL(authUrl).searchParams.get('redirect_uri');
        callback = fetch(`${redirectUri}?error=access_denied`);
      },
    });

    const attempt = authorizer.authorize();
    await expect(attempt).rejects.toBeInstanceOf(RemoteServiceError);
    await expect(attempt).rejects.toThrow('GoogleOAuth.getToken failed: authorization denied: access_denied');

    const params = new URL(consentUrl).searchParams;
    expect(params.get('access_type')).toBe('offline');
    expect(params.get('scope')).toBe(CALENDAR_SCOPES.join(' '));
    expect(params.get('redirect_uri')).toMatch(/^http:\/\/127\.0\.0\.1:\d+\/oauth2callback$/);

    const response = await callback;
    expect(response?.status).toBe(400);
    await expect(fs.readFile(tokenFile, 'utf8')).rejects.toThrow();
  });
});
