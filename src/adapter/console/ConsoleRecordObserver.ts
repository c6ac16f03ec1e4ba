import chalk from 'chalk';
import type { RecordObserver } from '../../core/ingestion/IngestionPipeline.js';
import type { MessageRecord } from '../../core/storage/types.js';

const RULE = '='.repeat(60);

/** Plain-text summary of one record, one line per entry. */
export function formatRecordSummary(record: MessageRecord): string[] {
  const who = record.sender.realName || record.sender.displayName || record.sender.name;
  return [
    RULE,
    `${record.recordedAt}`,
    `${who} (@${record.sender.name})`,
    record.text,
    `#${record.channelName}${record.threadTimestamp ? ` (thread ${record.threadTimestamp})` : ''}`,
    RULE,
  ];
}

/**
 * Echoes each stored message to stdout.
 */
export class ConsoleRecordObserver implements RecordObserver {
  constructor(
    private readonly write: (line: string) => void = (line) => console.log(line),
    private readonly color = true,
  ) {}

  onRecord(record: MessageRecord): void {
    this.write('');
    this.write(this.color ? chalk.bold.green('NEW MESSAGE') : 'NEW MESSAGE');
    for (const line of formatRecordSummary(record)) {
      this.write(line);
    }
  }
}
