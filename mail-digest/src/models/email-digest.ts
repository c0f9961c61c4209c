/**
 * Email Digest Model
 * Result shapes returned to callers and stored for processed uploads
 */

import type { ErrorKind } from '../utils/errors.js';
import type { UrgencyLevel } from '../services/urgency-scorer.js';

/**
 * Result of the file request. `status` is 'empty' when the email had no
 * readable text; that is a valid outcome, not an error.
 */
export interface EmailSummaryResponse {
  subject: string;
  sender: string;
  date: string;
  summary: string;
  tone: string;
  rawBody: string;
  status: 'ok' | 'empty';
}

/**
 * One message of a batch-fetch request. Failures of this message only are
 * reported through `status`, `errorType` and `errorMessage`.
 */
export interface UrgentEmailRecord {
  id: string;
  subject: string;
  sender: string;
  date: string;
  snippet: string;
  daysLeft: number | null;
  urgencyLevel: UrgencyLevel;
  summary: string;
  tone: string;
  status: 'ok' | 'error';
  errorType?: ErrorKind;
  errorMessage?: string;
}

/**
 * Stored result of a processed upload
 */
export interface DigestRecord {
  email_id: string;
  source_file: string;
  subject: string;
  from: string;
  date: string;
  summary: string | null;
  tone: string | null;
  raw_body: string | null;
  status: 'ok' | 'empty' | 'error';
  error_type?: ErrorKind;
  error_message?: string;
  processed_at: string;
  processing_time_ms?: number;
}

/**
 * Create a digest record from a successful file request
 */
export function createDigestRecord(
  emailId: string,
  sourceFile: string,
  response: EmailSummaryResponse
): DigestRecord {
  return {
    email_id: emailId,
    source_file: sourceFile,
    subject: response.subject || '(no subject)',
    from: response.sender || 'unknown',
    date: response.date,

    summary: response.summary,
    tone: response.tone,
    raw_body: response.rawBody,

    status: response.status,
    processed_at: new Date().toISOString()
  };
}

/**
 * Create an error digest record (when the upload could not be summarized)
 */
export function createErrorDigestRecord(
  emailId: string,
  sourceFile: string,
  errorType: ErrorKind,
  errorMessage: string
): DigestRecord {
  return {
    email_id: emailId,
    source_file: sourceFile,
    subject: '(unknown)',
    from: 'unknown',
    date: '',

    summary: null,
    tone: null,
    raw_body: null,

    status: 'error',
    error_type: errorType,
    error_message: errorMessage,
    processed_at: new Date().toISOString()
  };
}

export default {
  createDigestRecord,
  createErrorDigestRecord
};
