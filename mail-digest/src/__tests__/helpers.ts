/**
 * Shared fixtures for the test suites
 */

import type { CompletionProvider, CompletionRequest } from '../services/completion-provider.js';
import type { MailSource, RawMessage } from '../services/mail-source.js';
import type { PromptConfigs } from '../services/summary-service.js';

export const TEST_PROMPTS: PromptConfigs = {
  summary: { system_prompt: 'summary-instruction', user_prompt: 'SUMMARY: {{email}}' },
  tone: { system_prompt: 'tone-instruction', user_prompt: 'TONE: {{email}}' }
};

interface Headers {
  subject?: string;
  from?: string;
  date?: string;
}

function headerBlock(headers: Headers, contentType: string): string[] {
  return [
    `From: ${headers.from ?? 'Alice Example <alice@example.com>'}`,
    'To: Bob Example <bob@example.com>',
    `Subject: ${headers.subject ?? 'Quarterly report'}`,
    `Date: ${headers.date ?? 'Mon, 12 Oct 2026 09:30:00 +0000'}`,
    'MIME-Version: 1.0',
    `Content-Type: ${contentType}`
  ];
}

export function plainEmail(body: string, headers: Headers = {}): string {
  return [...headerBlock(headers, 'text/plain; charset=utf-8'), '', body, ''].join('\r\n');
}

export function htmlOnlyEmail(html: string, headers: Headers = {}): string {
  return [...headerBlock(headers, 'text/html; charset=utf-8'), '', html, ''].join('\r\n');
}

export function alternativeEmail(text: string, html: string, headers: Headers = {}): string {
  return [
    ...headerBlock(headers, 'multipart/alternative; boundary="alt-boundary"'),
    '',
    '--alt-boundary',
    'Content-Type: text/plain; charset=utf-8',
    '',
    text,
    '--alt-boundary',
    'Content-Type: text/html; charset=utf-8',
    '',
    html,
    '--alt-boundary--',
    ''
  ].join('\r\n');
}

export function emailWithAttachments(text: string, headers: Headers = {}): string {
  return [
    ...headerBlock(headers, 'multipart/mixed; boundary="mixed-boundary"'),
    '',
    '--mixed-boundary',
    'Content-Type: text/plain; charset=utf-8',
    '',
    text,
    '--mixed-boundary',
    'Content-Type: text/plain; charset=utf-8; name="notes.txt"',
    'Content-Disposition: attachment; filename="notes.txt"',
    '',
    'Attached notes that must not appear in the body.',
    '--mixed-boundary',
    'Content-Type: application/pdf; name="invoice.pdf"',
    'Content-Disposition: attachment; filename="invoice.pdf"',
    'Content-Transfer-Encoding: base64',
    '',
    Buffer.from('%PDF-1.4 fake pdf content').toString('base64'),
    '--mixed-boundary--',
    ''
  ].join('\r\n');
}

export type Responder = (request: CompletionRequest) => string | Promise<string>;

/**
 * Completion provider answering from a function and recording every request
 */
export class FakeCompletionProvider implements CompletionProvider {
  readonly requests: CompletionRequest[] = [];
  private respond: Responder;

  constructor(respond: Responder = (request) => (request.purpose === 'tone' ? 'neutral' : '- summary')) {
    this.respond = respond;
  }

  async send(request: CompletionRequest): Promise<string> {
    this.requests.push(request);
    return this.respond(request);
  }
}

/**
 * Mail source serving a fixed list of messages
 */
export class FakeMailSource implements MailSource {
  readonly name = 'fake';
  readonly requestedCounts: number[] = [];
  private messages: RawMessage[];
  private failure: unknown;

  constructor(messages: RawMessage[], failure?: unknown) {
    this.messages = messages;
    this.failure = failure;
  }

  async fetchRecent(maxCount: number): Promise<RawMessage[]> {
    this.requestedCounts.push(maxCount);
    if (this.failure !== undefined) {
      throw this.failure;
    }
    return this.messages.slice(0, maxCount);
  }
}

export function rawMessage(id: string, eml: string, metadata: Partial<RawMessage> = {}): RawMessage {
  return { id, raw: Buffer.from(eml, 'utf-8'), snippet: '', ...metadata };
}
