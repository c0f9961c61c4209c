/**
 * Mail Digest - Entry Point
 * Summarizes emails with Mistral AI, labels their tone and scores deadline urgency
 */

import dotenv from 'dotenv';
import { pathToFileURL } from 'url';
import logger from './utils/logger.js';
import { loadAppConfig, loadAllLLMConfigs, type AppConfig } from './utils/config-loader.js';
import { toErrorMessage } from './utils/errors.js';
import MistralService from './services/mistral-service.js';
import LimitedCompletionProvider from './services/limited-provider.js';
import SummaryService from './services/summary-service.js';
import GmailMailSource, { createGmailApiFactory } from './services/gmail-mail-source.js';
import DirectoryMailSource from './services/directory-mail-source.js';
import FileStorage from './persistence/file-storage.js';
import EmailDigestProcessor from './processors/email-digest-processor.js';
import { summarizeEmailFile, type UploadedEmailFile } from './processors/upload-processor.js';
import { fetchUrgentEmails } from './processors/urgent-batch-processor.js';
import type { MailSource } from './services/mail-source.js';
import type { EmailSummaryResponse, UrgentEmailRecord } from './models/email-digest.js';

dotenv.config();

export interface MailDigestContext {
  config: AppConfig;
  summaryService: SummaryService;
  fileStorage: FileStorage;
  mailSource: MailSource;
}

interface ServiceInstance {
  stop: () => void;
}

export function createMailSource(config: AppConfig, fileStorage: FileStorage): MailSource {
  if (config.mailSource === 'directory') {
    return new DirectoryMailSource(fileStorage);
  }
  return new GmailMailSource(
    createGmailApiFactory(config.gmail.credentialsFile, config.gmail.tokenFile),
    config.gmail
  );
}

/**
 * Wire every component from one configuration value
 */
export function createContext(config: AppConfig): MailDigestContext {
  const provider = new LimitedCompletionProvider(new MistralService(config), config.summaryConcurrency);
  const fileStorage = new FileStorage(config);

  return {
    config,
    summaryService: new SummaryService(provider, config.llm),
    fileStorage,
    mailSource: createMailSource(config, fileStorage)
  };
}

let processor: EmailDigestProcessor | null = null;
let contextPromise: Promise<MailDigestContext> | null = null;

/**
 * Configuration is read once, on first use
 */
function getContext(): Promise<MailDigestContext> {
  if (!contextPromise) {
    contextPromise = loadAllLLMConfigs(process.env.LLM_CONFIG_DIR || undefined)
      .then(llm => createContext(loadAppConfig(process.env, llm)))
      .catch((error: unknown) => {
        contextPromise = null;
        throw error;
      });
  }
  return contextPromise;
}

function logConfiguration(context: MailDigestContext): void {
  const { config, fileStorage } = context;

  logger.info('Configuration:');
  logger.info(`   Mode: ${config.dryRun ? 'DRY_RUN (simulated completions)' : 'Mistral API'}`);
  logger.info(`   Summary model: ${config.llm.summary.model}`);
  logger.info(`   Tone model: ${config.llm.tone.model}`);
  logger.info(`   API Timeout: ${config.mistralTimeoutMs}ms`);
  logger.info(`   Max concurrent completions: ${config.summaryConcurrency}`);
  logger.info(`   Mail source: ${context.mailSource.name}`);
  logger.info(`   Storage: ${fileStorage.getBasePath()}`);
  logger.info(`   Uploads: ${fileStorage.getUploadPath()}`);
  logger.info(`   Digests: ${fileStorage.getResultPath()}`);
  logger.info(`   Poll Interval: ${config.pollIntervalSeconds}s`);
  logger.info('');
}

export async function startMailDigest(): Promise<ServiceInstance> {
  try {
    logger.info('Starting Mail Digest...');
    logger.info('   Email summaries, tone and deadline urgency with Mistral AI');
    logger.info('');

    const context = await getContext();
    logConfiguration(context);

    processor = new EmailDigestProcessor({
      fileStorage: context.fileStorage,
      summaryService: context.summaryService,
      pollIntervalSeconds: context.config.pollIntervalSeconds
    });
    await processor.start();

    logger.info('');
    logger.info('Mail Digest is ready!');
    logger.info('Waiting for .eml uploads...');
    logger.info('');

    return {
      stop: (): void => stopMailDigest()
    };
  } catch (error) {
    logger.error('Failed to start Mail Digest:', toErrorMessage(error));
    logger.debug('Error stack:', error instanceof Error ? error.stack : undefined);
    throw error;
  }
}

export function stopMailDigest(): void {
  if (processor) {
    processor.stop();
    processor = null;
  }
}

/**
 * Summarize one uploaded .eml file
 * This function is meant to be called by the orchestrator
 */
export async function processEmailFile(file: UploadedEmailFile): Promise<EmailSummaryResponse> {
  const { summaryService } = await getContext();
  return summarizeEmailFile(file, { summaryService });
}

/**
 * Fetch, score and summarize the most recent inbox messages
 * This function is meant to be called by the orchestrator
 */
export async function getUrgentEmails(maxCount: unknown = 10): Promise<UrgentEmailRecord[]> {
  const { config, mailSource, summaryService } = await getContext();
  return fetchUrgentEmails(maxCount, {
    mailSource,
    summaryService,
    concurrency: config.summaryConcurrency,
    messageTimeoutMs: config.messageTimeoutMs
  });
}

async function main(): Promise<void> {
  const [command, arg] = process.argv.slice(2);

  if (command === 'urgent') {
    try {
      const records = await getUrgentEmails(arg ?? 10);
      process.stdout.write(`${JSON.stringify({ items: records }, null, 2)}\n`);
    } catch (error) {
      logger.error('Urgent email batch failed:', toErrorMessage(error));
      process.exitCode = 1;
    }
    return;
  }

  try {
    await startMailDigest();
  } catch {
    logger.error('Application failed to start');
    process.exit(1);
  }

  process.on('SIGTERM', () => {
    logger.info('Received SIGTERM signal');
    stopMailDigest();
    process.exit(0);
  });

  process.on('SIGINT', () => {
    logger.info('Received SIGINT signal');
    stopMailDigest();
    process.exit(0);
  });
}

const isMainModule = process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href;
if (isMainModule) {
  void main();
}

export { summarizeEmailFile, fetchUrgentEmails };
export { findDeadline, computeDaysLeft } from './services/deadline-scanner.js';
export { urgencyForDaysLeft, scoreUrgency } from './services/urgency-scorer.js';
export { extractEmail } from './services/text-extractor.js';
export { InputError, UpstreamMailError, UpstreamCompletionError, MailDigestError, ConfigError } from './utils/errors.js';
export type { EmailSummaryResponse, UrgentEmailRecord } from './models/email-digest.js';
export type { CompletionProvider } from './services/completion-provider.js';
export type { MailSource, RawMessage } from './services/mail-source.js';

export default {
  startMailDigest,
  stopMailDigest,
  processEmailFile,
  getUrgentEmails
};
