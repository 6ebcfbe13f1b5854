import { mkdtemp, readFile, rm, stat, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { google } from 'googleapis';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  createGmailConnector,
  GMAIL_SCOPES,
  loadClientSecrets,
  loadSavedToken,
  resolveCredentialState,
  saveToken,
  scopesFor,
  type ConsentFlow
} from '../auth.js';

const NOW = Date.parse('2026-10-05T10:00:00Z');

describe('resolveCredentialState', () => {
  it('asks for consent without credentials', () => {
    expect(resolveCredentialState(null, NOW)).toBe('consent');
  });

  it('accepts an unexpired access token', () => {
    expect(resolveCredentialState({ access_token: 'test-access', expiry_date: NOW + 3_600_000 }, NOW)).toBe('valid');
    expect(resolveCredentialState({ access_token: 'test-access' }, NOW)).toBe('valid');
  });

  it('refreshes an expired token that has a refresh token', () => {
    const credentials = { access_token: 'test-access', refresh_token: 'test-refresh', expiry_date: NOW - 1 };
    expect(resolveCredentialState(credentials, NOW)).toBe('refresh');
  });

  it('treats a token about to expire as expired', () => {
    const credentials = { access_token: 'test-access', refresh_token: 'test-refresh', expiry_date: NOW + 30_000 };
    expect(resolveCredentialState(credentials, NOW)).toBe('refresh');
  });

  it('asks for consent when expired without a refresh token', () => {
    expect(resolveCredentialState({ access_token: 'test-access', expiry_date: NOW - 1 }, NOW)).toBe('consent');
  });
});

describe('scopesFor', () => {
  it('adds the full mail scope only for permanent deletes', () => {
    expect(scopesFor('trash')).toEqual(GMAIL_SCOPES);
    expect(scopesFor('permanent')).toEqual([...GMAIL_SCOPES, 'https://mail.google.com/']);
  });
});

describe('credential files', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'gmail-auth-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads installed and web client secrets', async () => {
    const installed = path.join(dir, 'installed.json');
    await writeFile(installed, JSON.stringify({ installed: { client_id: 'test-id', client_secret: 'test-secret' } }));
    expect(await loadClientSecrets(installed)).toEqual({ clientId: 'test-id', clientSecret: 'test-secret' });

    const web = path.join(dir, 'web.json');
    await writeFile(web, JSON.stringify({ web: { client_id: 'web-id', client_secret: 'test-secret' } }));
    expect(await loadClientSecrets(web)).toEqual({ clientId: 'web-id', clientSecret: 'test-secret' });
  });

  it('fails clearly when the client secrets file is missing', async () => {
    const missing = path.join(dir, 'credentials.json');
    await expect(loadClientSecrets(missing)).rejects.toThrow(`OAuth client secrets not found at ${missing}`);
  });

  it('rejects a secrets file without a client', async () => {
    const file = path.join(dir, 'bad.json');
    await writeFile(file, JSON.stringify({ other: {} }));
    await expect(loadClientSecrets(file)).rejects.toThrow('expected an "installed" or "web" client');
  });

  it('treats a missing or corrupt token as no credential', async () => {
    expect(await loadSavedToken(path.join(dir, 'token.json'))).toBeNull();

    const corrupt = path.join(dir, 'corrupt.json');
    await writeFile(corrupt, '{not json');
    expect(await loadSavedToken(corrupt)).toBeNull();

    const wrongShape = path.join(dir, 'wrong.json');
    await writeFile(wrongShape, JSON.stringify({ access_token: 42 }));
    expect(await loadSavedToken(wrongShape)).toBeNull();
  });

  it('saves a token readable only by the owner and loads it back', async () => {
    const file = path.join(dir, 'token.json');
    const credentials = { access_token: 'test-access', refresh_token: 'test-refresh', expiry_date: NOW };

    await saveToken(file, credentials);

    expect(await loadSavedToken(file)).toEqual(credentials);
    expect(JSON.parse(await readFile(file, 'utf-8'))).toEqual(credentials);
    if (process.platform !== 'win32') {
      expect((await stat(file)).mode & 0o777).toBe(0o600);
    }
  });
});

describe('createGmailConnector', () => {
  const REDIRECT = 'http://localhost:8080/oauth2callback';
  let dir: string;
  let tokenPath: string;
  let credentialsPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'gmail-connector-'));
    tokenPath = path.join(dir, 'token.json');
    credentialsPath = path.join(dir, 'credentials.json');
    await writeFile(credentialsPath, JSON.stringify({ installed: { client_id: 'test-id', client_secret: 'test-secret' } }));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function gmailConfig() {
    return { tokenPath, credentialsPath, oauthPort: 8080, deleteMode: 'trash' as const };
  }

  async function readToken(): Promise<unknown> {
    return JSON.parse(await readFile(tokenPath, 'utf-8'));
  }

  it('refreshes an expired token and writes it back', async () => {
    await writeFile(tokenPath, JSON.stringify({ access_token: 'stale-access', refresh_token: 'test-refresh', expiry_date: Date.now() - 1000 }));
    const refreshed = { access_token: 'fresh-access', refresh_token: 'test-refresh', expiry_date: Date.now() + 3_600_000 };

    const client = new google.auth.OAuth2('test-id', 'test-secret', REDIRECT);
    const getAccessToken = vi.fn(async () => {
      client.setCredentials(refreshed);
      return { token: 'fresh-access' };
    });
    client.getAccessToken = getAccessToken;
    const createClient = vi.fn(() => client);
    const consent = vi.fn<ConsentFlow>();

    const api = await createGmailConnector(gmailConfig(), { createClient, consent })();

    expect(createClient).toHaveBeenCalledWith({ clientId: 'test-id', clientSecret: 'test-secret' }, REDIRECT);
    expect(getAccessToken).toHaveBeenCalledTimes(1);
    expect(consent).not.toHaveBeenCalled();
    expect(await readToken()).toEqual(refreshed);
    expect(api.users.messages).toBeDefined();
  });

  it('uses a valid token without refreshing or asking for consent', async () => {
    const saved = { access_token: 'test-access', refresh_token: 'test-refresh', expiry_date: Date.now() + 3_600_000 };
    await writeFile(tokenPath, JSON.stringify(saved));

    const client = new google.auth.OAuth2('test-id', 'test-secret', REDIRECT);
    const getAccessToken = vi.fn(async () => ({ token: 'unused' }));
    client.getAccessToken = getAccessToken;
    const consent = vi.fn<ConsentFlow>();

    await createGmailConnector(gmailConfig(), { createClient: () => client, consent })();

    expect(getAccessToken).not.toHaveBeenCalled();
    expect(consent).not.toHaveBeenCalled();
    expect(client.credentials).toEqual(saved);
  });

  it('runs the consent flow without a saved token and stores the result', async () => {
    const granted = { access_token: 'granted-access', refresh_token: 'test-refresh', expiry_date: Date.now() + 3_600_000 };
    const client = new google.auth.OAuth2('test-id', 'test-secret', REDIRECT);
    const consent = vi.fn<ConsentFlow>().mockResolvedValue(granted);

    await createGmailConnector(gmailConfig(), { createClient: () => client, consent })();

    expect(consent).toHaveBeenCalledWith(client, 8080, scopesFor('trash'));
    expect(client.credentials).toEqual(granted);
    expect(await readToken()).toEqual(granted);
  });

  it('persists tokens the client refreshes later', async () => {
    const saved = { access_token: 'test-access', refresh_token: 'test-refresh', expiry_date: Date.now() + 3_600_000 };
    await writeFile(tokenPath, JSON.stringify(saved));
    const client = new google.auth.OAuth2('test-id', 'test-secret', REDIRECT);

    await createGmailConnector(gmailConfig(), { createClient: () => client, consent: vi.fn<ConsentFlow>() })();

    const laterExpiry = saved.expiry_date + 3_600_000;
    client.emit('tokens', { access_token: 'later-access', expiry_date: laterExpiry });

    await vi.waitFor(async () => {
      expect(await readToken()).toEqual({ ...saved, access_token: 'later-access', expiry_date: laterExpiry });
    });
  });
});
