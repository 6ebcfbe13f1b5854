/**
 * Gmail OAuth for a local installed-app client.
 *
 * Credentials live in two files relative to the working directory:
 * - credentials.json: the OAuth client secret downloaded from Google Cloud
 * - token.json: the user's access/refresh token, written after consent and on every refresh
 */
import { readFile, writeFile } from 'node:fs/promises';
import Fastify, { type FastifyBaseLogger } from 'fastify';
import open from 'open';
import { google, type Auth } from 'googleapis';
import { z } from 'zod';
import type { DeleteMode, ServerConfig } from '../config/server.js';
import { componentLogger } from '../logger.js';
import type { GmailApi } from './types.js';

const log = componentLogger('oauth');

export const GMAIL_SCOPES = [
  'https://www.googleapis.com/auth/gmail.readonly',
  'https://www.googleapis.com/auth/gmail.send',
  'https://www.googleapis.com/auth/gmail.modify'
];

// messages.delete is only allowed with the full mail scope
const PERMANENT_DELETE_SCOPE = 'https://mail.google.com/';

const CONSENT_TIMEOUT_MS = 5 * 60 * 1000;

// Treat tokens expiring within a minute as expired
const EXPIRY_SKEW_MS = 60 * 1000;

const clientSecretSchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1)
});

const clientSecretsFileSchema = z.union([
  z.object({ installed: clientSecretSchema }).transform(file => file.installed),
  z.object({ web: clientSecretSchema }).transform(file => file.web)
]);

const savedTokenSchema = z.object({
  access_token: z.string().nullish(),
  refresh_token: z.string().nullish(),
  expiry_date: z.number().nullish(),
  scope: z.string().optional(),
  token_type: z.string().nullish(),
  id_token: z.string().nullish()
});

const callbackQuerySchema = z.object({
  code: z.string().min(1).optional(),
  error: z.string().optional()
});

export interface ClientSecrets {
  clientId: string;
  clientSecret: string;
}

export type CredentialState = 'valid' | 'refresh' | 'consent';

export function scopesFor(deleteMode: DeleteMode): string[] {
  return deleteMode === 'permanent' ? [...GMAIL_SCOPES, PERMANENT_DELETE_SCOPE] : [...GMAIL_SCOPES];
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export async function loadClientSecrets(path: string): Promise<ClientSecrets> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) {
      throw new Error(`OAuth client secrets not found at ${path}. Download credentials.json from Google Cloud Console.`);
    }
    throw error;
  }

  const parsed = clientSecretsFileSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new Error(`Invalid OAuth client secrets at ${path}: expected an "installed" or "web" client`);
  }
  return { clientId: parsed.data.client_id, clientSecret: parsed.data.client_secret };
}

/**
 * Load the cached token. A missing or unreadable file means no credential.
 */
export async function loadSavedToken(path: string): Promise<Auth.Credentials | null> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) return null;
    throw error;
  }

  try {
    const parsed = savedTokenSchema.safeParse(JSON.parse(raw));
    if (parsed.success) return parsed.data;
  } catch (error) {
    log.warn({ path, err: error }, 'Cached token is not valid JSON, ignoring it');
    return null;
  }
  log.warn({ path }, 'Cached token has an unexpected shape, ignoring it');
  return null;
}

export async function saveToken(path: string, credentials: Auth.Credentials): Promise<void> {
  await writeFile(path, JSON.stringify(credentials, null, 2), { mode: 0o600 });
}

export function resolveCredentialState(credentials: Auth.Credentials | null, now = Date.now()): CredentialState {
  if (!credentials) return 'consent';

  const notExpired = credentials.expiry_date == null || credentials.expiry_date > now + EXPIRY_SKEW_MS;
  if (credentials.access_token && notExpired) return 'valid';
  if (credentials.refresh_token) return 'refresh';
  return 'consent';
}

/**
 * Run the browser consent flow and resolve with the exchanged tokens.
 * A one-shot Fastify server on `port` receives the redirect.
 */
export async function runConsentFlow(
  client: Auth.OAuth2Client,
  port: number,
  scopes: string[]
): Promise<Auth.Credentials> {
  const fastifyLogger: FastifyBaseLogger = log;
  const app = Fastify({ loggerInstance: fastifyLogger });

  let settle: { resolve: (code: string) => void; reject: (error: Error) => void } | undefined;
  const code = new Promise<string>((resolve, reject) => {
    settle = { resolve, reject };
  });

  app.get('/oauth2callback', async (request, reply) => {
    const query = callbackQuerySchema.safeParse(request.query);
    if (!query.success || !query.data.code) {
      const reason = query.success ? query.data.error ?? 'no code provided' : 'malformed callback';
      settle?.reject(new Error(`OAuth consent failed: ${reason}`));
      return reply.code(400).type('text/plain').send('Authentication failed. You can close this window.');
    }
    settle?.resolve(query.data.code);
    return reply.type('text/plain').send('Authentication successful! You can close this window.');
  });

  await app.listen({ port, host: '127.0.0.1' });

  const timer = setTimeout(() => {
    settle?.reject(new Error('OAuth consent timed out'));
  }, CONSENT_TIMEOUT_MS);

  try {
    const authUrl = client.generateAuthUrl({
      access_type: 'offline',
      prompt: 'consent',
      scope: scopes
    });
    log.info({ authUrl }, 'Open this URL to authorize Gmail access');
    const [, authCode] = await Promise.all([
      open(authUrl).catch((error: unknown) => {
        log.warn({ err: error }, 'Could not open a browser, visit the URL manually');
      }),
      code
    ]);

    const { tokens } = await client.getToken(authCode);
    return tokens;
  } finally {
    clearTimeout(timer);
    await app.close();
  }
}

export type ConsentFlow = (client: Auth.OAuth2Client, port: number, scopes: string[]) => Promise<Auth.Credentials>;

export interface GmailConnectorOptions {
  createClient?: (secrets: ClientSecrets, redirectUri: string) => Auth.OAuth2Client;
  consent?: ConsentFlow;
}

function createOAuthClient(secrets: ClientSecrets, redirectUri: string): Auth.OAuth2Client {
  return new google.auth.OAuth2(secrets.clientId, secrets.clientSecret, redirectUri);
}

/**
 * Build a connector that authenticates and returns a Gmail API handle.
 * Each call goes through the full load/refresh/consent sequence; the adapter
 * caches the result.
 */
export function createGmailConnector(
  config: ServerConfig['gmail'],
  options: GmailConnectorOptions = {}
): () => Promise<GmailApi> {
  const createClient = options.createClient ?? createOAuthClient;
  const consent = options.consent ?? runConsentFlow;

  return async () => {
    const secrets = await loadClientSecrets(config.credentialsPath);
    const client = createClient(secrets, `http://localhost:${config.oauthPort}/oauth2callback`);

    const saved = await loadSavedToken(config.tokenPath);
    const state = resolveCredentialState(saved);

    if (saved && state !== 'consent') {
      client.setCredentials(saved);
    }

    if (state === 'refresh') {
      log.info('Access token expired, refreshing');
      await client.getAccessToken();
      await saveToken(config.tokenPath, client.credentials);
    } else if (state === 'consent') {
      log.info('No usable Gmail token, starting consent flow');
      const tokens = await consent(client, config.oauthPort, scopesFor(config.deleteMode));
      client.setCredentials(tokens);
      await saveToken(config.tokenPath, tokens);
    }

    // Persist tokens the client refreshes on its own later in the process
    client.on('tokens', (tokens) => {
      saveToken(config.tokenPath, { ...client.credentials, ...tokens }).catch((error: unknown) => {
        log.error({ err: error }, 'Failed to persist refreshed Gmail token');
      });
    });

    log.info({ state }, 'Gmail authenticated');
    return google.gmail({ version: 'v1', auth: client });
  };
}
