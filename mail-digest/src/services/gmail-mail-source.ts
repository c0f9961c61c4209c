/**
 * Gmail Mail Source
 * Lists recent INBOX messages and downloads them as raw RFC 822 containers.
 *
 * OAuth tokens are produced outside this service; credentials.json holds the
 * OAuth client and token.json the user tokens. Refreshed tokens are written
 * back to token.json.
 */

import { readFile, writeFile } from 'fs/promises';
import { google } from 'googleapis';
import logger from '../utils/logger.js';
import { UpstreamMailError, toErrorMessage } from '../utils/errors.js';
import type { AppConfig } from '../utils/config-loader.js';
import type { MailSource, RawMessage } from './mail-source.js';

/**
 * The subset of `gmail.users.messages` this source calls
 */
export interface GmailMessagesApi {
  list(params: {
    userId: string;
    labelIds?: string[];
    q?: string;
    maxResults?: number;
  }): Promise<{ data: { messages?: Array<{ id?: string | null }> } }>;
  get(params: {
    userId: string;
    id: string;
    format: 'raw';
  }): Promise<{ data: { id?: string | null; raw?: string | null; snippet?: string | null } }>;
}

// Message downloads running at the same time
export const GMAIL_FETCH_CONCURRENCY = 10;

export type GmailApiFactory = () => Promise<GmailMessagesApi>;

export type GmailOptions = Pick<AppConfig['gmail'], 'includeUpdates' | 'includePromotions'>;

interface OAuthClientSecrets {
  clientId: string;
  clientSecret: string;
  redirectUri?: string;
}

interface StoredToken {
  access_token?: string;
  refresh_token?: string;
  expiry_date?: number;
  token_type?: string;
  scope?: string;
}

function asRecord(value: unknown): Record<string, unknown> | null {
  return typeof value === 'object' && value !== null && !Array.isArray(value) ? { ...value } : null;
}

function optionalString(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' && value ? value : undefined;
}

export function parseClientSecrets(json: string): OAuthClientSecrets {
  const root = asRecord(JSON.parse(json));
  const section = root ? asRecord(root.installed) ?? asRecord(root.web) : null;

  if (!section) {
    throw new Error('credentials file has no "installed" or "web" section');
  }

  const clientId = optionalString(section, 'client_id');
  const clientSecret = optionalString(section, 'client_secret');
  if (!clientId || !clientSecret) {
    throw new Error('credentials file is missing client_id or client_secret');
  }

  const redirectUris = section.redirect_uris;
  const redirectUri = Array.isArray(redirectUris) && typeof redirectUris[0] === 'string' ? redirectUris[0] : undefined;

  return { clientId, clientSecret, redirectUri };
}

export function parseStoredToken(json: string): StoredToken {
  const record = asRecord(JSON.parse(json));
  if (!record) {
    throw new Error('token file is not a JSON object');
  }

  const token: StoredToken = {
    access_token: optionalString(record, 'access_token') ?? optionalString(record, 'token'),
    refresh_token: optionalString(record, 'refresh_token'),
    token_type: optionalString(record, 'token_type'),
    scope: optionalString(record, 'scope')
  };

  if (typeof record.expiry_date === 'number') {
    token.expiry_date = record.expiry_date;
  }

  if (!token.access_token && !token.refresh_token) {
    throw new Error('token file has neither access_token nor refresh_token');
  }

  return token;
}

/**
 * Build the Gmail query excluding the categories the configuration leaves out
 */
export function buildInboxQuery(options: GmailOptions): string | undefined {
  const parts: string[] = [];

  if (!options.includeUpdates) parts.push('-category:updates');
  if (!options.includePromotions) parts.push('-category:promotions');

  return parts.length > 0 ? parts.join(' ') : undefined;
}

/**
 * Authenticated Gmail API client from the credentials and token files
 */
export function createGmailApiFactory(credentialsFile: string, tokenFile: string): GmailApiFactory {
  return async () => {
    const secrets = parseClientSecrets(await readFile(credentialsFile, 'utf-8'));
    const token = parseStoredToken(await readFile(tokenFile, 'utf-8'));

    const auth = new google.auth.OAuth2(secrets.clientId, secrets.clientSecret, secrets.redirectUri);
    auth.setCredentials(token);

    auth.on('tokens', (tokens) => {
      const updated = { ...token, ...tokens };
      writeFile(tokenFile, JSON.stringify(updated, null, 2), 'utf-8')
        .then(() => logger.info('Gmail token refreshed and saved'))
        .catch((error: unknown) => logger.warn('Could not save refreshed Gmail token:', toErrorMessage(error)));
    });

    const gmail = google.gmail({ version: 'v1', auth });

    return {
      list: (params) => gmail.users.messages.list(params),
      get: (params) => gmail.users.messages.get(params)
    };
  };
}

class GmailMailSource implements MailSource {
  readonly name = 'gmail';
  private apiFactory: GmailApiFactory;
  private options: GmailOptions;

  constructor(apiFactory: GmailApiFactory, options: GmailOptions) {
    this.apiFactory = apiFactory;
    this.options = options;
  }

  private async connect(): Promise<GmailMessagesApi> {
    try {
      return await this.apiFactory();
    } catch (error) {
      logger.error('Gmail authentication failed:', toErrorMessage(error));
      throw new UpstreamMailError(`Not authenticated with Gmail: ${toErrorMessage(error)}`, { cause: error });
    }
  }

  async fetchRecent(maxCount: number): Promise<RawMessage[]> {
    const api = await this.connect();
    const q = buildInboxQuery(this.options);

    logger.info(`Fetching up to ${maxCount} Gmail message(s)`);
    logger.debug(`Gmail query: ${q ?? '(none)'}`);

    let ids: string[];
    try {
      const response = await api.list({ userId: 'me', labelIds: ['INBOX'], q, maxResults: maxCount });
      ids = (response.data.messages ?? [])
        .map(m => m.id)
        .filter((id): id is string => typeof id === 'string' && id.length > 0)
        .slice(0, maxCount);
    } catch (error) {
      logger.error('Gmail list request failed:', toErrorMessage(error));
      throw new UpstreamMailError(`Gmail list request failed: ${toErrorMessage(error)}`, { cause: error });
    }

    logger.info(`Found ${ids.length} message(s)`);

    const messages: RawMessage[] = [];
    for (let i = 0; i < ids.length; i += GMAIL_FETCH_CONCURRENCY) {
      const batch = ids.slice(i, i + GMAIL_FETCH_CONCURRENCY);
      messages.push(...(await Promise.all(batch.map(id => this.fetchMessage(api, id)))));
    }

    return messages;
  }

  private async fetchMessage(api: GmailMessagesApi, id: string): Promise<RawMessage> {
    const { data } = await api.get({ userId: 'me', id, format: 'raw' }).catch((error: unknown) => {
      logger.error(`Gmail get request failed for ${id}:`, toErrorMessage(error));
      throw new UpstreamMailError(`Gmail get request failed: ${toErrorMessage(error)}`, { messageId: id, cause: error });
    });

    if (!data.raw) {
      throw new UpstreamMailError('Gmail returned a message without raw content', { messageId: id });
    }

    return {
      id: data.id || id,
      raw: Buffer.from(data.raw, 'base64url'),
      snippet: data.snippet || ''
    };
  }
}

export default GmailMailSource;
