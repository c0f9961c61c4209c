/**
 * Directory Mail Source
 * Serves the newest .eml files of the local inbox directory
 */

import logger from '../utils/logger.js';
import { UpstreamMailError, toErrorMessage } from '../utils/errors.js';
import FileStorage, { emailIdFromFilename } from '../persistence/file-storage.js';
import type { MailSource, RawMessage } from './mail-source.js';

class DirectoryMailSource implements MailSource {
  readonly name = 'directory';
  private fileStorage: FileStorage;

  constructor(fileStorage: FileStorage) {
    this.fileStorage = fileStorage;
  }

  async fetchRecent(maxCount: number): Promise<RawMessage[]> {
    const inboxPath = this.fileStorage.getInboxPath();

    try {
      const files = await this.fileStorage.listRecentInboxFiles(maxCount);
      logger.info(`Found ${files.length} message(s) in ${inboxPath}`);

      const messages: RawMessage[] = [];
      for (const file of files) {
        const raw = await this.fileStorage.readEmailFile(file.path);
        messages.push({
          id: emailIdFromFilename(file.name),
          raw,
          // Filled from the extracted body
          snippet: ''
        });
      }

      return messages;
    } catch (error) {
      throw new UpstreamMailError(`Cannot read inbox directory ${inboxPath}: ${toErrorMessage(error)}`, { cause: error });
    }
  }
}

export default DirectoryMailSource;
