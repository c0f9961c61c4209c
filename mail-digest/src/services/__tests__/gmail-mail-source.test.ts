import { describe, it, expect, vi } from 'vitest';
import GmailMailSource, {
  GMAIL_FETCH_CONCURRENCY,
  buildInboxQuery,
  parseClientSecrets,
  parseStoredToken,
  type GmailMessagesApi
} from '../gmail-mail-source.js';
import { UpstreamMailError } from '../../utils/errors.js';
import { plainEmail } from '../../__tests__/helpers.js';

const OPTIONS = { includeUpdates: true, includePromotions: false };

function fakeApi(messages: Record<string, { raw?: string; snippet?: string }>): GmailMessagesApi {
  return {
    list: vi.fn(async () => ({ data: { messages: Object.keys(messages).map(id => ({ id })) } })),
    get: vi.fn(async ({ id }: { id: string }) => ({ data: { id, ...messages[id] } }))
  };
}

describe('GmailMailSource', () => {
  it('lists the inbox and decodes raw messages', async () => {
    const eml = plainEmail('Invoice attached, due November 2.');
    const api = fakeApi({
      m1: { raw: Buffer.from(eml).toString('base64url'), snippet: 'Invoice attached' },
      m2: { raw: Buffer.from(plainEmail('Second')).toString('base64url') }
    });
    const source = new GmailMailSource(async () => api, OPTIONS);

    const messages = await source.fetchRecent(2);

    expect(api.list).toHaveBeenCalledWith({
      userId: 'me',
      labelIds: ['INBOX'],
      q: '-category:promotions',
      maxResults: 2
    });
    expect(api.get).toHaveBeenCalledWith({ userId: 'me', id: 'm1', format: 'raw' });
    expect(messages.map(m => m.id)).toEqual(['m1', 'm2']);
    expect(messages[0].raw.toString('utf-8')).toBe(eml);
    expect(messages[0].snippet).toBe('Invoice attached');
    expect(messages[1].snippet).toBe('');
  });

  it('downloads a bounded number of messages at once, keeping list order', async () => {
    const ids = Array.from({ length: 25 }, (_, i) => `m${i}`);
    let active = 0;
    let maxActive = 0;

    const api: GmailMessagesApi = {
      list: vi.fn(async () => ({ data: { messages: ids.map(id => ({ id })) } })),
      get: vi.fn(async ({ id }: { id: string }) => {
        active++;
        maxActive = Math.max(maxActive, active);
        await new Promise<void>(resolve => setTimeout(resolve, 1));
        active--;
        return { data: { id, raw: Buffer.from(plainEmail(id)).toString('base64url') } };
      })
    };
    const source = new GmailMailSource(async () => api, OPTIONS);

    const messages = await source.fetchRecent(25);

    expect(messages.map(m => m.id)).toEqual(ids);
    expect(maxActive).toBe(GMAIL_FETCH_CONCURRENCY);
  });

  it('returns nothing for an empty inbox', async () => {
    const source = new GmailMailSource(async () => fakeApi({}), OPTIONS);
    expect(await source.fetchRecent(5)).toEqual([]);
  });

  it('reports missing authentication as a mail error', async () => {
    const source = new GmailMailSource(async () => {
      throw new Error('ENOENT: token.json');
    }, OPTIONS);

    const error = await source.fetchRecent(5).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UpstreamMailError);
    expect(error).toMatchObject({ message: 'Not authenticated with Gmail: ENOENT: token.json' });
  });

  it('reports list failures as mail errors', async () => {
    const api = fakeApi({});
    vi.mocked(api.list).mockRejectedValueOnce(new Error('quota exceeded'));
    const source = new GmailMailSource(async () => api, OPTIONS);

    await expect(source.fetchRecent(5)).rejects.toThrow('Gmail list request failed: quota exceeded');
  });

  it('rejects a message without raw content', async () => {
    const source = new GmailMailSource(async () => fakeApi({ m1: {} }), OPTIONS);

    const error = await source.fetchRecent(1).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UpstreamMailError);
    expect(error).toMatchObject({ messageId: 'm1' });
  });
});

describe('buildInboxQuery', () => {
  it('excludes the categories that are not wanted', () => {
    expect(buildInboxQuery({ includeUpdates: false, includePromotions: false })).toBe(
      '-category:updates -category:promotions'
    );
    expect(buildInboxQuery({ includeUpdates: true, includePromotions: false })).toBe('-category:promotions');
    expect(buildInboxQuery({ includeUpdates: true, includePromotions: true })).toBeUndefined();
  });
});

describe('credential files', () => {
  it('reads installed client secrets', () => {
    const secrets = parseClientSecrets(
      JSON.stringify({
        installed: { client_id: 'test-client', client_secret: 'test-secret', redirect_uris: ['http://localhost'] }
      })
    );
    expect(secrets).toEqual({ clientId: 'test-client', clientSecret: 'test-secret', redirectUri: 'http://localhost' });
  });

  it('rejects secrets without a client section', () => {
    expect(() => parseClientSecrets('{}')).toThrow('credentials file has no "installed" or "web" section');
  });

  it('reads stored tokens written under either access token name', () => {
    expect(parseStoredToken(JSON.stringify({ token: 'test-access', refresh_token: 'test-refresh' }))).toMatchObject({
      access_token: 'test-access',
      refresh_token: 'test-refresh'
    });
    expect(parseStoredToken(JSON.stringify({ access_token: 'test-access', expiry_date: 1700000000000 }))).toMatchObject({
      access_token: 'test-access',
      expiry_date: 1700000000000
    });
  });

  it('rejects a token file without tokens', () => {
    expect(() => parseStoredToken('{"scope":"gmail.readonly"}')).toThrow(
      'token file has neither access_token nor refresh_token'
    );
  });
});
