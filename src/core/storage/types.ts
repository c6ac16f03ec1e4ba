/**
 * Storage layer types for recorded channel messages.
 *
 * Domain types are camelCase; the `Stored*` types mirror the on-disk JSON
 * (snake_case) that existing consumers of the messages file read.
 */

import { z } from 'zod';

/** Sender identity snapshot taken when the message was ingested. */
export interface Profile {
  id: string;
  name: string;
  realName: string;
  displayName: string;
  email: string;
}

export interface MessageRecord {
  /** Local `YYYY-MM-DD HH:MM:SS` derived from sourceTimestamp */
  recordedAt: string;
  /** Slack `ts`, the ordering key */
  sourceTimestamp: string;
  sender: Profile;
  text: string;
  channelName: string;
  channelId: string;
  messageId: string;
  threadTimestamp: string;
  parentUserId: string;
  // pass-through, never interpreted
  reactions: unknown[];
  attachments: unknown[];
  files: unknown[];
}

export type StoredUser = {
  id: string;
  name: string;
  real_name: string;
  display_name: string;
  email: string;
};

export type StoredMessage = {
  timestamp: string;
  slack_timestamp: string;
  user: StoredUser;
  message: string;
  channel_name: string;
  channel_id: string;
  message_id: string;
  thread_ts: string;
  parent_user_id: string;
  reactions: unknown[];
  attachments: unknown[];
  files: unknown[];
};

/**
 * The whole messages file. Messages already on disk are kept as read, so the
 * element type stays open.
 */
export interface StoreDocument {
  channel_name: string;
  channel_id: string;
  messages: Array<Record<string, unknown>>;
}

export const StoreDocumentSchema = z
  .object({
    channel_name: z.string(),
    channel_id: z.string(),
    messages: z.array(z.record(z.unknown())),
  })
  .passthrough();

export interface ChannelMetadata {
  channelName: string;
  channelId: string;
}

export type AppendResult =
  | { status: 'appended'; count: number }
  | { status: 'recovered'; count: 1; reason: string }
  | { status: 'duplicate'; sourceTimestamp: string }
  | { status: 'failed'; error: string };

export function encodeRecord(record: MessageRecord): StoredMessage {
  return {
    timestamp: record.recordedAt,
    slack_timestamp: record.sourceTimestamp,
    user: {
      id: record.sender.id,
      name: record.sender.name,
      real_name: record.sender.realName,
      display_name: record.sender.displayName,
      email: record.sender.email,
    },
    message: record.text,
    channel_name: record.channelName,
    channel_id: record.channelId,
    message_id: record.messageId,
    thread_ts: record.threadTimestamp,
    parent_user_id: record.parentUserId,
    reactions: record.reactions,
    attachments: record.attachments,
    files: record.files,
  };
}

export function emptyStore(meta: ChannelMetadata): StoreDocument {
  return {
    channel_name: meta.channelName,
    channel_id: meta.channelId,
    messages: [],
  };
}
