import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { JsonRecordStore } from '../../../../src/core/storage/RecordStore.js';
import type { MessageRecord } from '../../../../src/core/storage/types.js';
import type { Logger } from '../../../../src/infra/logger/logger.js';

const mockLogger: Logger = {
  info: () => {},
  debug: () => {},
  warn: () => {},
  error: () => {},
};

const channel = { channelName: 'general', channelId: 'C1' };

function record(ts: string, text = `message ${ts}`): MessageRecord {
  return {
    recordedAt: '2023-11-14 22:13:20',
    sourceTimestamp: ts,
    sender: { id: 'U1', name: 'bob', realName: 'Bob Smith', displayName: '', email: '' },
    text,
    channelName: 'general',
    channelId: 'C1',
    messageId: '',
    threadTimestamp: '',
    parentUserId: '',
    reactions: [],
    attachments: [],
    files: [],
  };
}

describe('JsonRecordStore', () => {
  let dir: string;
  let filePath: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'record-store-'));
    filePath = path.join(dir, 'slack_messages.json');
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('initialize creates an empty store with channel metadata', async () => {
    const store = new JsonRecordStore(mockLogger, { filePath, channel });
    await store.initialize();

    const raw = await fs.readFile(filePath, 'utf-8');
    expect(raw).toBe('{\n  "channel_name": "general",\n  "channel_id": "C1",\n  "messages": []\n}');
  });

  it('initialize creates missing parent directories', async () => {
    const nested = path.join(dir, 'data', 'out', 'messages.json');
    await new JsonRecordStore(mockLogger, { filePath: nested, channel }).initialize();

    const doc = JSON.parse(await fs.readFile(nested, 'utf-8'));
    expect(doc.messages).toEqual([]);
  });

  it('initialize twice leaves an existing store untouched', async () => {
    const store = new JsonRecordStore(mockLogger, { filePath, channel });
    await store.initialize();
    await store.append(record('1700000000.000001'));
    const before = await fs.readFile(filePath, 'utf-8');

    await store.initialize();
    await new JsonRecordStore(mockLogger, {
      filePath,
      channel: { channelName: 'other', channelId: 'C9' },
    }).initialize();

    expect(await fs.readFile(filePath, 'utf-8')).toBe(before);
  });

  it('writes the persisted message layout', async () => {
    const store = new JsonRecordStore(mockLogger, { filePath, channel });
    await store.append({
      ...record('1700000000.000001', 'hi'),
      messageId: 'abc-123',
      threadTimestamp: '1699999999.000100',
      parentUserId: 'U0',
      reactions: [{ name: 'tada', count: 1 }],
    });

    const doc = JSON.parse(await fs.readFile(filePath, 'utf-8'));
    expect(doc).toEqual({
      channel_name: 'general',
      channel_id: 'C1',
      messages: [
        {
          timestamp: '2023-11-14 22:13:20',
          slack_timestamp: '1700000000.000001',
          user: { id: 'U1', name: 'bob', real_name: 'Bob Smith', display_name: '', email: '' },
          message: 'hi',
          channel_name: 'general',
          channel_id: 'C1',
          message_id: 'abc-123',
          thread_ts: '1699999999.000100',
          parent_user_id: 'U0',
          reactions: [{ name: 'tada', count: 1 }],
          attachments: [],
          files: [],
        },
      ],
    });
  });

  it('keeps non-ASCII text verbatim', async () => {
    const store = new JsonRecordStore(mockLogger, { filePath, channel });
    await store.append(record('1700000000.000001', 'héllo 世界'));

    const raw = await fs.readFile(filePath, 'utf-8');
    expect(raw).toContain('"message": "héllo 世界"');
  });

  it('preserves append order', async () => {
    const store = new JsonRecordStore(mockLogger, { filePath, channel });
    await store.initialize();
    for (const ts of ['1700000001.000000', '1700000002.000000', '1700000003.000000']) {
      await store.append(record(ts));
    }

    const doc = await store.read();
    expect(doc.messages.map((m) => m.slack_timestamp)).toEqual([
      '1700000001.000000',
      '1700000002.000000',
      '1700000003.000000',
    ]);
  });

  it('reports the message count after each append', async () => {
    const store = new JsonRecordStore(mockLogger, { filePath, channel });

    await expect(store.append(record('1.0'))).resolves.toEqual({ status: 'appended', count: 1 });
    await expect(store.append(record('2.0'))).resolves.toEqual({ status: 'appended', count: 2 });
  });

  it('treats an empty file as an empty store', async () => {
    await fs.writeFile(filePath, '', 'utf-8');
    const store = new JsonRecordStore(mockLogger, { filePath, channel });

    await expect(store.append(record('1.0'))).resolves.toEqual({ status: 'appended', count: 1 });
    const doc = await store.read();
    expect(doc.channel_name).toBe('general');
    expect(doc.messages).toHaveLength(1);
  });

  it('keeps unknown keys of messages already on disk', async () => {
    const existing = {
      channel_name: 'general',
      channel_id: 'C1',
      messages: [{ slack_timestamp: '1.0', legacy_field: 42 }],
    };
    await fs.writeFile(filePath, JSON.stringify(existing, null, 2), 'utf-8');
    const store = new JsonRecordStore(mockLogger, { filePath, channel });

    await store.append(record('2.0'));

    const doc = await store.read();
    expect(doc.messages[0]).toEqual({ slack_timestamp: '1.0', legacy_field: 42 });
    expect(doc.messages[1].slack_timestamp).toBe('2.0');
  });

  // Data loss by design: earlier messages in an unreadable file are discarded.
  it('replaces a corrupt file with a store holding only the new message', async () => {
    await fs.writeFile(filePath, '{"channel_name": "general", "messages": [{"slack_ti', 'utf-8');
    const error = vi.fn();
    const store = new JsonRecordStore({ ...mockLogger, error }, { filePath, channel });

    const result = await store.append(record('1700000000.000001', 'M'));

    expect(result.status).toBe('recovered');
    const doc = await store.read();
    expect(doc.channel_name).toBe('general');
    expect(doc.channel_id).toBe('C1');
    expect(doc.messages).toHaveLength(1);
    expect(doc.messages[0].message).toBe('M');
    expect(error).toHaveBeenCalledTimes(1);
  });

  it('replaces valid JSON of the wrong shape and restores constructor metadata', async () => {
    await fs.writeFile(
      filePath,
      JSON.stringify({ channel_name: 'renamed', messages: 'nope' }),
      'utf-8',
    );
    const store = new JsonRecordStore(mockLogger, { filePath, channel });

    const result = await store.append(record('5.0'));

    expect(result.status).toBe('recovered');
    const doc = await store.read();
    expect(doc.channel_name).toBe('general');
    expect(doc.channel_id).toBe('C1');
    expect(doc.messages.map((m) => m.slack_timestamp)).toEqual(['5.0']);
  });

  it('keeps earlier messages when writing the new one fails', async () => {
    const store = new JsonRecordStore(mockLogger, { filePath, channel });
    await store.append(record('1.0'));
    await store.append(record('2.0'));
    const diskFull = Object.assign(new Error('ENOSPC: no space left on device'), {
      code: 'ENOSPC',
    });
    vi.spyOn(fs, 'writeFile').mockRejectedValueOnce(diskFull);

    const result = await store.append(record('3.0'));

    expect(result).toEqual({ status: 'failed', error: 'ENOSPC: no space left on device' });
    const doc = await store.read();
    expect(doc.messages.map((m) => m.slack_timestamp)).toEqual(['1.0', '2.0']);
    expect(await fs.readdir(dir)).toEqual(['slack_messages.json']);
  });

  it('keeps the file untouched when it cannot be read', async () => {
    const store = new JsonRecordStore(mockLogger, { filePath, channel });
    await store.append(record('1.0'));
    const before = await fs.readFile(filePath, 'utf-8');
    const denied = Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' });
    vi.spyOn(fs, 'readFile').mockRejectedValueOnce(denied);

    const result = await store.append(record('2.0'));

    expect(result).toEqual({ status: 'failed', error: 'EACCES: permission denied' });
    expect(await fs.readFile(filePath, 'utf-8')).toBe(before);
  });

  it('keeps duplicates by default', async () => {
    const store = new JsonRecordStore(mockLogger, { filePath, channel });
    await store.append(record('1.0'));
    await store.append(record('1.0'));

    expect((await store.read()).messages).toHaveLength(2);
  });

  it('skips a stored slack_timestamp when duplicates are skipped', async () => {
    const store = new JsonRecordStore(mockLogger, { filePath, channel, duplicates: 'skip' });
    await store.append(record('1.0'));

    await expect(store.append(record('1.0'))).resolves.toEqual({
      status: 'duplicate',
      sourceTimestamp: '1.0',
    });
    expect((await store.read()).messages).toHaveLength(1);
  });

  it('reports failure without throwing when nothing can be written', async () => {
    // the target path is a directory, so the read fails
    await fs.mkdir(filePath);
    const store = new JsonRecordStore(mockLogger, { filePath, channel });

    const result = await store.append(record('1.0'));

    expect(result.status).toBe('failed');
  });

  it('leaves no temporary files behind', async () => {
    const store = new JsonRecordStore(mockLogger, { filePath, channel });
    await store.initialize();
    await store.append(record('1.0'));

    expect(await fs.readdir(dir)).toEqual(['slack_messages.json']);
  });
});
