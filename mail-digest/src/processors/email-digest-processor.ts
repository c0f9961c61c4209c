/**
 * Email Digest Processor
 * Polls the upload directory for .eml files, summarizes each one and stores
 * the digest as JSON in the result directory
 */

import { basename } from 'path';
import logger from '../utils/logger.js';
import { isMailDigestError, toErrorMessage } from '../utils/errors.js';
import FileStorage, { emailIdFromFilename } from '../persistence/file-storage.js';
import SummaryService from '../services/summary-service.js';
import { createDigestRecord, createErrorDigestRecord, type DigestRecord } from '../models/email-digest.js';
import { summarizeEmailFile } from './upload-processor.js';

export interface EmailDigestProcessorOptions {
  fileStorage: FileStorage;
  summaryService: SummaryService;
  pollIntervalSeconds: number;
}

class EmailDigestProcessor {
  private fileStorage: FileStorage;
  private summaryService: SummaryService;
  private pollInterval: number;
  private timer: NodeJS.Timeout | null;
  private isProcessing: boolean;
  private skippedCycles: number;

  constructor(options: EmailDigestProcessorOptions) {
    this.fileStorage = options.fileStorage;
    this.summaryService = options.summaryService;
    this.pollInterval = options.pollIntervalSeconds * 1000;
    this.timer = null;
    this.isProcessing = false;
    this.skippedCycles = 0;

    logger.info('Email Digest Processor initialized');
    logger.info(`   Polling interval: ${this.pollInterval / 1000}s`);
  }

  async start(): Promise<void> {
    logger.info('Starting Email Digest Processor...');

    await this.fileStorage.ensureDir(this.fileStorage.getUploadPath());
    await this.processCycle();

    this.timer = setInterval(() => {
      void this.processCycle();
    }, this.pollInterval);

    logger.info('Email Digest Processor started');
  }

  stop(): void {
    logger.info('Stopping Email Digest Processor...');

    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }

    logger.info('Email Digest Processor stopped');
  }

  /**
   * Process every pending upload; returns how many were handled
   */
  async processCycle(): Promise<number> {
    // Mutex: prevent concurrent cycles
    if (this.isProcessing) {
      this.skippedCycles++;
      if (this.skippedCycles % 5 === 0) {
        logger.warn(`Cycle skipped (${this.skippedCycles} total) - previous still running`);
      }
      return 0;
    }

    this.isProcessing = true;
    this.skippedCycles = 0;

    try {
      const pending = await this.fileStorage.listPendingUploads();

      if (pending.length === 0) {
        logger.debug('No new uploads to process');
        return 0;
      }

      logger.info(`Found ${pending.length} upload(s) to process`);

      for (const uploadPath of pending) {
        await this.processUpload(uploadPath);
      }

      return pending.length;
    } catch (error) {
      logger.error('Error in processing cycle:', toErrorMessage(error));
      return 0;
    } finally {
      this.isProcessing = false;
    }
  }

  async processUpload(uploadPath: string): Promise<DigestRecord> {
    const sourceFile = basename(uploadPath);
    const emailId = emailIdFromFilename(sourceFile);
    const startTime = Date.now();
    let record: DigestRecord;

    try {
      logger.info(`Processing upload: ${sourceFile}`);
      const content = await this.fileStorage.readEmailFile(uploadPath);
      const response = await summarizeEmailFile(
        { filename: sourceFile, content },
        { summaryService: this.summaryService }
      );
      record = createDigestRecord(emailId, sourceFile, response);
    } catch (error) {
      const errorType = isMailDigestError(error) ? error.kind : 'input';
      logger.error(`Failed to process upload ${sourceFile}:`, toErrorMessage(error));
      record = createErrorDigestRecord(emailId, sourceFile, errorType, toErrorMessage(error));
    }

    record.processing_time_ms = Date.now() - startTime;

    await this.fileStorage.saveDigest(record);
    await this.fileStorage.deleteEmailFile(uploadPath);

    logger.info(`Upload ${sourceFile} processed and saved`);
    logger.info(`   From: ${record.from}`);
    logger.info(`   Subject: ${record.subject}`);
    logger.info(`   Status: ${record.status}`);

    if (record.status === 'ok' && record.summary) {
      logger.info(`   Summary: ${record.summary.substring(0, 100)}...`);
    }

    return record;
  }
}

export default EmailDigestProcessor;
