/**
 * Urgent Batch Processor
 * Handles the batch request: fetch recent messages, then per message
 * extract text, estimate the deadline, score urgency and summarize.
 *
 * A failing message is reported in its own record; only a mail source
 * failure aborts the batch, and it does so before any message is processed.
 */

import logger from '../utils/logger.js';
import {
  InputError,
  UpstreamCompletionError,
  UpstreamMailError,
  isMailDigestError,
  toErrorMessage
} from '../utils/errors.js';
import { extractEmail, type ExtractedEmail } from '../services/text-extractor.js';
import { computeDaysLeft } from '../services/deadline-scanner.js';
import { scoreUrgency } from '../services/urgency-scorer.js';
import SummaryService, { MAX_EMAIL_CHARS } from '../services/summary-service.js';
import type { MailSource, RawMessage } from '../services/mail-source.js';
import type { UrgentEmailRecord } from '../models/email-digest.js';

export const MAX_BATCH_SIZE = 50;

// Deadlines are looked for near the top of the message only
export const DEADLINE_SCAN_CHARS = 1000;

const SNIPPET_LENGTH = 120;

export interface UrgentBatchDependencies {
  mailSource: MailSource;
  summaryService: SummaryService;
  /** Messages processed at the same time */
  concurrency: number;
  messageTimeoutMs: number;
  now?: () => Date;
}

/**
 * Parse the requested message count
 * @throws InputError unless it is an integer between 1 and MAX_BATCH_SIZE
 */
export function validateMaxCount(value: unknown): number {
  const count = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;

  if (typeof count !== 'number' || !Number.isInteger(count) || count < 1 || count > MAX_BATCH_SIZE) {
    throw new InputError(`max count must be an integer between 1 and ${MAX_BATCH_SIZE}, got ${JSON.stringify(value)}`);
  }

  return count;
}

async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, messageId: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new UpstreamCompletionError(`Processing timed out after ${timeoutMs}ms`, { messageId })),
      timeoutMs
    );
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

function snippetOf(message: RawMessage, body: string): string {
  if (message.snippet) return message.snippet;
  return body.replace(/\s+/g, ' ').trim().slice(0, SNIPPET_LENGTH);
}

function failedRecord(
  message: RawMessage,
  error: unknown,
  email: ExtractedEmail | null,
  now: Date
): UrgentEmailRecord {
  const errorType = isMailDigestError(error) ? error.kind : 'upstream_completion';
  const body = email ? email.body.slice(0, MAX_EMAIL_CHARS) : '';
  const { daysLeft, urgencyLevel } = email
    ? scoreUrgency(computeDaysLeft(body.slice(0, DEADLINE_SCAN_CHARS), now))
    : scoreUrgency(null);

  return {
    id: message.id,
    subject: message.subject || email?.subject || '(no subject)',
    sender: message.sender || email?.sender || '(unknown sender)',
    date: message.date || email?.date || '',
    snippet: snippetOf(message, body),
    daysLeft,
    urgencyLevel,
    summary: '',
    tone: '',
    status: 'error',
    errorType,
    errorMessage: toErrorMessage(error)
  };
}

async function processMessage(
  message: RawMessage,
  deps: UrgentBatchDependencies,
  now: Date
): Promise<UrgentEmailRecord> {
  let email: ExtractedEmail | null = null;

  try {
    email = await extractEmail(message.raw);
    const body = email.body.slice(0, MAX_EMAIL_CHARS);
    const subject = message.subject || email.subject || '(no subject)';

    logger.info(`Processing: ${subject.substring(0, 60)}`);

    const { daysLeft, urgencyLevel } = scoreUrgency(computeDaysLeft(body.slice(0, DEADLINE_SCAN_CHARS), now));
    const { summary, tone } = await withTimeout(deps.summaryService.summarize(body), deps.messageTimeoutMs, message.id);

    return {
      id: message.id,
      subject,
      sender: message.sender || email.sender || '(unknown sender)',
      date: message.date || email.date,
      snippet: snippetOf(message, body),
      daysLeft,
      urgencyLevel,
      summary,
      tone,
      status: 'ok'
    };
  } catch (error) {
    logger.error(`Failed to process message ${message.id}:`, toErrorMessage(error));
    return failedRecord(message, error, email, now);
  }
}

/**
 * Fetch the most recent messages and build one record per message, in source order
 * @throws InputError for an invalid count
 * @throws UpstreamMailError when the mail source fails
 */
export async function fetchUrgentEmails(
  maxCount: unknown,
  deps: UrgentBatchDependencies
): Promise<UrgentEmailRecord[]> {
  const count = validateMaxCount(maxCount);
  const now = deps.now ? deps.now() : new Date();
  const batchSize = Math.max(1, deps.concurrency);

  logger.info(`Fetching ${count} message(s) from ${deps.mailSource.name}`);
  const messages = await deps.mailSource.fetchRecent(count).catch((error: unknown) => {
    logger.error(`Mail source ${deps.mailSource.name} failed:`, toErrorMessage(error));
    throw isMailDigestError(error)
      ? error
      : new UpstreamMailError(`Mail source failed: ${toErrorMessage(error)}`, { cause: error });
  });

  if (messages.length === 0) {
    logger.info('No messages to process');
    return [];
  }

  const records: UrgentEmailRecord[] = [];

  for (let i = 0; i < messages.length; i += batchSize) {
    const batch = messages.slice(i, i + batchSize);
    const batchResults = await Promise.allSettled(batch.map(message => processMessage(message, deps, now)));

    batchResults.forEach((result, index) => {
      if (result.status === 'fulfilled') {
        records.push(result.value);
      } else {
        logger.error(`Batch error: ${toErrorMessage(result.reason)}`);
        records.push(failedRecord(batch[index], result.reason, null, now));
      }
    });
  }

  const failed = records.filter(r => r.status === 'error').length;
  logger.info(`All ${records.length} message(s) processed (${failed} failed)`);

  return records;
}

export default { fetchUrgentEmails, validateMaxCount };
