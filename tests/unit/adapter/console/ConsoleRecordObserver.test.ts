import { describe, it, expect } from 'vitest';
import {
  ConsoleRecordObserver,
  formatRecordSummary,
} from '../../../../src/adapter/console/ConsoleRecordObserver.js';
import type { MessageRecord } from '../../../../src/core/storage/types.js';

const record: MessageRecord = {
  recordedAt: '2023-11-14 22:13:20',
  sourceTimestamp: '1700000000.000001',
  sender: { id: 'U1', name: 'bob', realName: 'Bob Smith', displayName: '', email: '' },
  text: 'hi',
  channelName: 'general',
  channelId: 'C1',
  messageId: '',
  threadTimestamp: '',
  parentUserId: '',
  reactions: [],
  attachments: [],
  files: [],
};

describe('ConsoleRecordObserver', () => {
  it('summarizes a record', () => {
    expect(formatRecordSummary(record)).toEqual([
      '='.repeat(60),
      '2023-11-14 22:13:20',
      'Bob Smith (@bob)',
      'hi',
      '#general',
      '='.repeat(60),
    ]);
  });

  it('falls back to the handle and notes the thread', () => {
    const lines = formatRecordSummary({
      ...record,
      sender: { ...record.sender, realName: '' },
      threadTimestamp: '1699999999.000001',
    });

    expect(lines[2]).toBe('bob (@bob)');
    expect(lines[4]).toBe('#general (thread 1699999999.000001)');
  });

  it('writes a header and the summary lines', () => {
    const out: string[] = [];
    new ConsoleRecordObserver((line) => out.push(line), false).onRecord(record);

    expect(out[0]).toBe('');
    expect(out[1]).toBe('NEW MESSAGE');
    expect(out.slice(2)).toEqual(formatRecordSummary(record));
  });
});
