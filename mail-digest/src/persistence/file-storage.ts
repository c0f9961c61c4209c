/**
 * File Storage Service
 * Manages the upload intake directory, the local inbox directory and the
 * JSON digest results
 */

import { readdir, readFile, writeFile, rename, mkdir, unlink, stat } from 'fs/promises';
import { join, basename } from 'path';
import { existsSync } from 'fs';
import logger from '../utils/logger.js';
import { toErrorMessage } from '../utils/errors.js';
import type { AppConfig } from '../utils/config-loader.js';
import type { DigestRecord } from '../models/email-digest.js';

export const EMAIL_EXTENSION = '.eml';

export type FileStorageConfig = Pick<AppConfig, 'storagePath' | 'uploadDir' | 'resultDir' | 'inboxDir'>;

export interface StoredEmailFile {
  path: string;
  name: string;
  modifiedAt: Date;
}

export function isEmailFilename(filename: string): boolean {
  return filename.toLowerCase().endsWith(EMAIL_EXTENSION);
}

export function emailIdFromFilename(filename: string): string {
  const name = basename(filename);
  return isEmailFilename(name) ? name.slice(0, -EMAIL_EXTENSION.length) : name;
}

class FileStorage {
  private basePath: string;
  private uploadDir: string;
  private resultDir: string;
  private inboxDir: string;

  constructor(config: FileStorageConfig) {
    this.basePath = config.storagePath;
    this.uploadDir = config.uploadDir;
    this.resultDir = config.resultDir;
    this.inboxDir = config.inboxDir;
  }

  getBasePath(): string {
    return this.basePath;
  }

  getUploadPath(): string {
    return join(this.basePath, this.uploadDir);
  }

  getResultPath(): string {
    return join(this.basePath, this.resultDir);
  }

  getInboxPath(): string {
    return join(this.basePath, this.inboxDir);
  }

  async ensureDir(path: string): Promise<void> {
    if (!existsSync(path)) {
      await mkdir(path, { recursive: true });
      logger.info(`Created directory: ${path}`);
    }
  }

  /**
   * List .eml files of a directory with their modification time.
   * A missing directory raises ENOENT to the caller.
   */
  async listEmailFiles(dirPath: string): Promise<StoredEmailFile[]> {
    const entries = await readdir(dirPath, { withFileTypes: true });
    const files: StoredEmailFile[] = [];

    for (const entry of entries) {
      if (!entry.isFile() || !isEmailFilename(entry.name)) continue;

      const path = join(dirPath, entry.name);
      const info = await stat(path);
      files.push({ path, name: entry.name, modifiedAt: info.mtime });
    }

    return files;
  }

  /**
   * Uploaded .eml files waiting for processing, in name order
   */
  async listPendingUploads(): Promise<string[]> {
    const uploadPath = this.getUploadPath();

    try {
      if (!existsSync(uploadPath)) {
        return [];
      }

      const files = await this.listEmailFiles(uploadPath);
      const pending = files.map(f => f.path).sort();

      logger.debug(`Found ${pending.length} pending upload(s)`);
      return pending;
    } catch (error) {
      logger.error('Error listing uploads:', toErrorMessage(error));
      return [];
    }
  }

  /**
   * Newest .eml files of the inbox directory, newest first
   */
  async listRecentInboxFiles(maxCount: number): Promise<StoredEmailFile[]> {
    const files = await this.listEmailFiles(this.getInboxPath());

    return files
      .sort((a, b) => b.modifiedAt.getTime() - a.modifiedAt.getTime() || a.name.localeCompare(b.name))
      .slice(0, maxCount);
  }

  async readEmailFile(filepath: string): Promise<Buffer> {
    try {
      const content = await readFile(filepath);
      logger.debug(`Read email file: ${basename(filepath)} (${content.length} bytes)`);
      return content;
    } catch (error) {
      logger.error(`Error reading email from ${filepath}:`, toErrorMessage(error));
      throw error;
    }
  }

  async saveDigest(data: DigestRecord): Promise<string> {
    const resultPath = this.getResultPath();
    await this.ensureDir(resultPath);

    const filename = `${data.email_id}.digest.json`;
    const filepath = join(resultPath, filename);
    const tempPath = `${filepath}.tmp`;

    try {
      await writeFile(tempPath, JSON.stringify(data, null, 2), 'utf-8');
      await rename(tempPath, filepath);

      logger.info(`Saved digest: ${filename}`);
      return filepath;
    } catch (error) {
      logger.error(`Error saving digest ${filename}:`, toErrorMessage(error));
      throw error;
    }
  }

  async deleteEmailFile(filepath: string): Promise<void> {
    try {
      await unlink(filepath);
      logger.info(`[CLEANUP] Deleted processed upload: ${basename(filepath)}`);
    } catch (error) {
      logger.error(`[CLEANUP] Failed to delete ${basename(filepath)}:`, toErrorMessage(error));
    }
  }
}

export default FileStorage;
