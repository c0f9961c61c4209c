/**
 * Upload Processor
 * Handles the file request: one .eml container in, summary and tone out
 */

import logger from '../utils/logger.js';
import { InputError } from '../utils/errors.js';
import { extractEmail } from '../services/text-extractor.js';
import SummaryService, { MAX_EMAIL_CHARS } from '../services/summary-service.js';
import { isEmailFilename } from '../persistence/file-storage.js';
import type { EmailSummaryResponse } from '../models/email-digest.js';

export interface UploadedEmailFile {
  filename?: string | null;
  content?: Buffer | null;
}

export interface UploadDependencies {
  summaryService: SummaryService;
}

/**
 * Reject anything that is not a non-empty .eml upload
 * @throws InputError
 */
export function validateUpload(file: UploadedEmailFile | null | undefined): { filename: string; content: Buffer } {
  if (!file || !file.filename) {
    throw new InputError('No file uploaded');
  }

  if (!isEmailFilename(file.filename)) {
    throw new InputError('Only .eml files are supported');
  }

  if (!file.content || file.content.length === 0) {
    throw new InputError(`Uploaded file ${file.filename} is empty`);
  }

  return { filename: file.filename, content: file.content };
}

/**
 * Summarize an uploaded email container
 * @throws InputError for a missing, empty or unparseable upload
 * @throws UpstreamCompletionError when the completion service fails
 */
export async function summarizeEmailFile(
  file: UploadedEmailFile | null | undefined,
  deps: UploadDependencies
): Promise<EmailSummaryResponse> {
  const upload = validateUpload(file);
  const startTime = Date.now();

  logger.info(`Summarizing upload ${upload.filename} (${Math.round(upload.content.length / 1024)} KB)`);

  const email = await extractEmail(upload.content);
  const rawBody = email.body.slice(0, MAX_EMAIL_CHARS);

  if (!rawBody) {
    logger.warn(`Upload ${upload.filename} has no readable text`);
  }

  const { summary, tone } = await deps.summaryService.summarize(rawBody);

  logger.info(`Upload ${upload.filename} summarized in ${Date.now() - startTime}ms`);

  return {
    subject: email.subject,
    sender: email.sender,
    date: email.date,
    summary,
    tone,
    rawBody,
    status: rawBody ? 'ok' : 'empty'
  };
}

export default { summarizeEmailFile, validateUpload };
