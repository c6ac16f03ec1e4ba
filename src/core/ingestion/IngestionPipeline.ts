import type { AppConfig } from '../../infra/config/config.js';
import type { Logger } from '../../infra/logger/logger.js';
import { errorMessage } from '../../infra/logger/logger.js';
import { SlackEventSchema, type SlackEvent, type SocketModeEnvelope } from '../../adapter/slack/types.js';
import type { RecordStore } from '../storage/RecordStore.js';
import type { AppendResult, MessageRecord, Profile } from '../storage/types.js';
import { EventFilter } from './EventFilter.js';
import type { ProfileResolver } from './ProfileResolver.js';
import { SerialQueue } from './SerialQueue.js';
import { formatSlackTimestamp } from './formatTimestamp.js';

/** Sends the Socket Mode acknowledgement for one envelope. */
export type Acknowledge = (envelopeId: string) => void;

/** Receives every record that reached the store. */
export interface RecordObserver {
  onRecord(record: MessageRecord): void | Promise<void>;
}

export type IngestionOutcome =
  | { status: 'dropped'; reason: string }
  | { status: 'rejected'; reason: string }
  | { status: 'stored'; record: MessageRecord; result: AppendResult };

export interface IngestionPipelineDeps {
  config: Pick<AppConfig, 'channel' | 'ingestion'>;
  resolver: Pick<ProfileResolver, 'resolve'>;
  store: RecordStore;
  logger: Logger;
  observer?: RecordObserver;
  filter?: EventFilter;
}

/**
 * Envelope → ack → filter → profile lookup → record → store → observer.
 *
 * The ack goes out synchronously on arrival; everything after it runs on a
 * single-consumer queue so appends never overlap and keep arrival order.
 */
export class IngestionPipeline {
  private filter: EventFilter;
  private queue: SerialQueue;

  constructor(private readonly deps: IngestionPipelineDeps) {
    this.filter = deps.filter ?? new EventFilter();
    this.queue = new SerialQueue(deps.config.ingestion.queueCapacity);
  }

  onEvent(envelope: SocketModeEnvelope, ack: Acknowledge): Promise<IngestionOutcome> {
    const { logger } = this.deps;
    logger.debug('ingest', `Received envelope type: ${envelope.type}`);

    if (envelope.envelope_id) {
      try {
        ack(envelope.envelope_id);
      } catch (err) {
        logger.error('ingest', `Failed to ack ${envelope.envelope_id}: ${errorMessage(err)}`);
      }
    }

    const queued = this.queue.push(() => this.process(envelope));
    if (!queued) {
      logger.error(
        'ingest',
        `Queue full (${this.deps.config.ingestion.queueCapacity}), dropping envelope ${envelope.envelope_id ?? envelope.type}`,
      );
      return Promise.resolve<IngestionOutcome>({ status: 'rejected', reason: 'queue full' });
    }
    return queued;
  }

  /** Wait until every queued envelope has been handled. */
  drain(): Promise<void> {
    return this.queue.drain();
  }

  get pending(): number {
    return this.queue.size;
  }

  private async process(envelope: SocketModeEnvelope): Promise<IngestionOutcome> {
    const { logger, config } = this.deps;

    if (envelope.type !== 'events_api') {
      if (envelope.type === 'interactive') {
        logger.debug('ingest', 'Interactive event received');
      } else {
        logger.debug('ingest', `Other envelope type: ${envelope.type}`);
      }
      return { status: 'dropped', reason: `envelope type ${envelope.type}` };
    }

    const parsed = SlackEventSchema.safeParse(envelope.payload?.event);
    if (!parsed.success) {
      logger.warn('ingest', `Malformed events_api payload in ${envelope.envelope_id ?? '?'}`);
      return { status: 'dropped', reason: 'malformed event' };
    }
    const event = parsed.data;
    logger.debug(
      'ingest',
      `Event details: ${event.type} in channel ${event.channel ?? 'unknown'}`,
    );

    const decision = this.filter.evaluate(event, config.channel.id);
    if (!decision.accepted) {
      logger.debug('ingest', `Skipping event: ${decision.reason}`);
      return { status: 'dropped', reason: decision.reason };
    }
    // accepted events always carry a user
    const userId = event.user ?? '';
    const ts = event.ts;
    if (!ts) {
      logger.warn('ingest', `Message from ${userId} has no ts, skipping`);
      return { status: 'dropped', reason: 'no ts' };
    }

    logger.info('ingest', `Processing message from user ${userId}`);
    try {
      const sender = await this.deps.resolver.resolve(userId);
      const record = this.buildRecord(event, ts, sender);
      const result = await this.deps.store.append(record);

      if (result.status === 'appended' || result.status === 'recovered') {
        await this.notify(record);
      }
      return { status: 'stored', record, result };
    } catch (err) {
      const error = errorMessage(err);
      logger.error('ingest', `Failed to record message ${ts}: ${error}`);
      return { status: 'dropped', reason: error };
    }
  }

  private buildRecord(event: SlackEvent, ts: string, sender: Profile): MessageRecord {
    const { channel } = this.deps.config;
    return {
      recordedAt: formatSlackTimestamp(ts),
      sourceTimestamp: ts,
      sender,
      text: event.text ?? '',
      channelName: channel.name,
      channelId: channel.id,
      messageId: event.client_msg_id ?? '',
      threadTimestamp: event.thread_ts ?? '',
      parentUserId: event.parent_user_id ?? '',
      reactions: event.reactions ?? [],
      attachments: event.attachments ?? [],
      files: event.files ?? [],
    };
  }

  private async notify(record: MessageRecord): Promise<void> {
    if (!this.deps.observer) return;
    try {
      await this.deps.observer.onRecord(record);
    } catch (err) {
      this.deps.logger.warn('ingest', `Observer failed: ${errorMessage(err)}`);
    }
  }
}
