/**
 * Text Extractor
 * Parses an email container and returns its headers and a plain-text body.
 * The text/plain part is preferred; the text/html part is only converted
 * when no plain-text part exists. Attachments are ignored.
 */

import { simpleParser, type ParsedMail } from 'mailparser';
import { convert, type HtmlToTextOptions } from 'html-to-text';
import logger from '../utils/logger.js';
import { InputError, toErrorMessage } from '../utils/errors.js';

export interface ExtractedEmail {
  subject: string;
  sender: string;
  /** Date header as written by the sender's client */
  date: string;
  body: string;
}

const HTML_TO_TEXT_OPTIONS: HtmlToTextOptions = {
  wordwrap: false,
  selectors: [
    { selector: 'a', options: { ignoreHref: true } },
    { selector: 'img', format: 'skip' },
    { selector: 'script', format: 'skip' },
    { selector: 'style', format: 'skip' },
    { selector: 'head', format: 'skip' }
  ]
};

/**
 * Convert HTML markup to readable plain text
 */
export function stripHtml(html: string): string {
  if (!html || !html.trim()) return '';

  return convert(html, HTML_TO_TEXT_OPTIONS)
    .replace(/\u00a0/g, ' ')
    .replace(/[ \t]+\n/g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

function headerValue(lines: ParsedMail['headerLines'], key: string): string {
  const header = lines.find(h => h.key === key);
  if (!header) return '';

  const separator = header.line.indexOf(':');
  return header.line
    .slice(separator + 1)
    .replace(/\r?\n[ \t]+/g, ' ')
    .trim();
}

/**
 * Extract subject, sender, date and body from a raw email container
 * @throws InputError when the content cannot be parsed as an email
 */
export async function extractEmail(raw: Buffer | string): Promise<ExtractedEmail> {
  let parsed: ParsedMail;
  try {
    parsed = await simpleParser(raw, { skipHtmlToText: true, skipTextToHtml: true, skipImageLinks: true });
  } catch (error) {
    logger.warn('Could not parse email container:', toErrorMessage(error));
    throw new InputError(`Unparseable email container: ${toErrorMessage(error)}`, { cause: error });
  }

  const plain = (parsed.text || '').replace(/\r\n?/g, '\n').trim();
  let body = plain;

  if (!body && typeof parsed.html === 'string') {
    logger.debug('No text/plain part, converting text/html part');
    body = stripHtml(parsed.html);
  }

  return {
    subject: parsed.subject || '',
    sender: parsed.from?.text || '',
    date: headerValue(parsed.headerLines, 'date'),
    body
  };
}

export default { extractEmail, stripHtml };
