import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import FileStorage, { emailIdFromFilename, isEmailFilename } from '../file-storage.js';
import { createErrorDigestRecord } from '../../models/email-digest.js';

describe('FileStorage', () => {
  let storagePath: string;
  let storage: FileStorage;

  beforeEach(async () => {
    storagePath = await mkdtemp(join(tmpdir(), 'mail-digest-storage-'));
    storage = new FileStorage({ storagePath, uploadDir: '00_uploads', resultDir: '10_digests', inboxDir: '05_inbox' });
  });

  afterEach(async () => {
    await rm(storagePath, { recursive: true, force: true });
  });

  it('builds paths under the storage root', () => {
    expect(storage.getBasePath()).toBe(storagePath);
    expect(storage.getUploadPath()).toBe(join(storagePath, '00_uploads'));
    expect(storage.getResultPath()).toBe(join(storagePath, '10_digests'));
    expect(storage.getInboxPath()).toBe(join(storagePath, '05_inbox'));
  });

  it('lists pending uploads in name order, ignoring other files', async () => {
    await mkdir(storage.getUploadPath(), { recursive: true });
    await writeFile(join(storage.getUploadPath(), 'b.eml'), 'b');
    await writeFile(join(storage.getUploadPath(), 'a.eml'), 'a');
    await writeFile(join(storage.getUploadPath(), 'readme.md'), 'ignored');

    expect(await storage.listPendingUploads()).toEqual([
      join(storage.getUploadPath(), 'a.eml'),
      join(storage.getUploadPath(), 'b.eml')
    ]);
  });

  it('has no pending uploads before the directory exists', async () => {
    expect(await storage.listPendingUploads()).toEqual([]);
  });

  it('saves digests as JSON without leaving temp files', async () => {
    const record = createErrorDigestRecord('broken', 'broken.eml', 'input', 'Uploaded file broken.eml is empty');

    const path = await storage.saveDigest(record);

    expect(path).toBe(join(storage.getResultPath(), 'broken.digest.json'));
    expect(JSON.parse(await readFile(path, 'utf-8'))).toEqual(record);
    expect(await readdir(storage.getResultPath())).toEqual(['broken.digest.json']);
  });

  it('deletes processed uploads and tolerates missing ones', async () => {
    await mkdir(storage.getUploadPath(), { recursive: true });
    const path = join(storage.getUploadPath(), 'done.eml');
    await writeFile(path, 'x');

    await storage.deleteEmailFile(path);
    await expect(storage.deleteEmailFile(path)).resolves.toBeUndefined();
    expect(await storage.listPendingUploads()).toEqual([]);
  });
});

describe('email file names', () => {
  it('recognizes .eml files regardless of case', () => {
    expect(isEmailFilename('message.eml')).toBe(true);
    expect(isEmailFilename('MESSAGE.EML')).toBe(true);
    expect(isEmailFilename('message.eml.txt')).toBe(false);
  });

  it('derives the email id from the file name', () => {
    expect(emailIdFromFilename('/tmp/uploads/invoice-42.eml')).toBe('invoice-42');
    expect(emailIdFromFilename('notes.txt')).toBe('notes.txt');
  });
});
