/**
 * JsonRecordStore: every recorded message of one channel in a single JSON file.
 *
 * - The whole file is read, extended and rewritten on each append
 * - Writes go to a temporary sibling and are renamed into place
 * - A file that cannot be parsed is replaced by a fresh store holding only the new
 *   message; the old content is lost
 * - Any other read or write failure loses only the new message
 * - Single writer: callers serialize appends
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import type { Logger } from '../../infra/logger/logger.js';
import { errorMessage } from '../../infra/logger/logger.js';
import type { DuplicatePolicy } from '../../infra/config/config.js';
import {
  StoreDocumentSchema,
  emptyStore,
  encodeRecord,
  type AppendResult,
  type ChannelMetadata,
  type MessageRecord,
  type StoreDocument,
  type StoredMessage,
} from './types.js';

export interface RecordStore {
  initialize(): Promise<void>;
  append(record: MessageRecord): Promise<AppendResult>;
}

export interface JsonRecordStoreOptions {
  filePath: string;
  channel: ChannelMetadata;
  duplicates?: DuplicatePolicy;
}

export class StoreFormatError extends Error {
  constructor(filePath: string, detail: string) {
    super(`${filePath} is not a valid messages file: ${detail}`);
    this.name = 'StoreFormatError';
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export class JsonRecordStore implements RecordStore {
  private readonly filePath: string;
  private readonly channel: ChannelMetadata;
  private readonly duplicates: DuplicatePolicy;

  constructor(
    private logger: Logger,
    options: JsonRecordStoreOptions,
  ) {
    this.filePath = options.filePath;
    this.channel = { ...options.channel };
    this.duplicates = options.duplicates ?? 'allow';
  }

  get path(): string {
    return this.filePath;
  }

  /**
   * Create the file with an empty store unless it already exists.
   */
  async initialize(): Promise<void> {
    try {
      await fs.stat(this.filePath);
      this.logger.debug('record-store', `Using existing messages file ${this.filePath}`);
      return;
    } catch (err) {
      if (!isNotFound(err)) throw err;
    }

    await this.write(emptyStore(this.channel));
    this.logger.info('record-store', `Created new messages file: ${this.filePath}`);
  }

  /**
   * Append one record. Never throws; the result says what happened.
   */
  async append(record: MessageRecord): Promise<AppendResult> {
    const entry = encodeRecord(record);

    let doc: StoreDocument;
    try {
      doc = await this.load();
    } catch (err) {
      if (err instanceof StoreFormatError) return this.replaceCorrupt(entry, err.message);
      const detail = errorMessage(err);
      this.logger.error('record-store', `Could not read ${this.filePath}: ${detail}`);
      return { status: 'failed', error: detail };
    }

    if (
      this.duplicates === 'skip' &&
      doc.messages.some((m) => m.slack_timestamp === entry.slack_timestamp)
    ) {
      this.logger.warn(
        'record-store',
        `Skipping duplicate message ${entry.slack_timestamp} (already stored)`,
      );
      return { status: 'duplicate', sourceTimestamp: entry.slack_timestamp };
    }

    doc.messages.push(entry);
    try {
      await this.write(doc);
    } catch (err) {
      // the rename never happened, so the file on disk still holds the earlier messages
      const detail = errorMessage(err);
      this.logger.error('record-store', `Error saving message ${entry.slack_timestamp}: ${detail}`);
      return { status: 'failed', error: detail };
    }
    this.logger.info('record-store', `Message saved to ${this.filePath}`);
    return { status: 'appended', count: doc.messages.length };
  }

  /**
   * An unreadable store is replaced by one holding only the new message.
   */
  private async replaceCorrupt(entry: StoredMessage, reason: string): Promise<AppendResult> {
    this.logger.error('record-store', `Error reading messages file: ${reason}`);
    try {
      await this.write({ ...emptyStore(this.channel), messages: [entry] });
      this.logger.warn('record-store', `Created fresh ${this.filePath} with message`);
      return { status: 'recovered', count: 1, reason };
    } catch (err) {
      const detail = errorMessage(err);
      this.logger.error('record-store', `Could not save message at all: ${detail}`);
      return { status: 'failed', error: detail };
    }
  }

  /**
   * Read the current store. A missing or empty file reads as an empty store.
   */
  async read(): Promise<StoreDocument> {
    return this.load();
  }

  private async load(): Promise<StoreDocument> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (isNotFound(err)) return emptyStore(this.channel);
      throw err;
    }
    if (raw.length === 0) return emptyStore(this.channel);

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new StoreFormatError(this.filePath, errorMessage(err));
    }

    const parsed = StoreDocumentSchema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new StoreFormatError(
        this.filePath,
        `${issue.path.join('.') || '(root)'}: ${issue.message}`,
      );
    }
    return parsed.data;
  }

  private async write(doc: StoreDocument): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const tmp = `${this.filePath}.${process.pid}.tmp`;
    try {
      await fs.writeFile(tmp, JSON.stringify(doc, null, 2), 'utf-8');
      await fs.rename(tmp, this.filePath);
    } catch (err) {
      await fs.rm(tmp, { force: true });
      throw err;
    }
  }
}
