import type { SlackEvent } from '../../adapter/slack/types.js';

export interface FilterDecision {
  accepted: boolean;
  reason: string;
}

/**
 * Accepts only new plain user messages in the tracked channel. Bot and channel
 * posts lack `user`; edits, deletes and joins carry a `subtype`.
 */
export class EventFilter {
  evaluate(event: SlackEvent, trackedChannelId: string): FilterDecision {
    if (event.type !== 'message') {
      return { accepted: false, reason: `type=${event.type}` };
    }
    if (event.channel !== trackedChannelId) {
      return { accepted: false, reason: `channel=${event.channel ?? 'none'}` };
    }
    if (event.user === undefined) {
      return { accepted: false, reason: 'no user' };
    }
    if (event.subtype !== undefined) {
      return { accepted: false, reason: `subtype=${event.subtype}` };
    }
    return { accepted: true, reason: `message from ${event.user}` };
  }

  accept(event: SlackEvent, trackedChannelId: string): boolean {
    return this.evaluate(event, trackedChannelId).accepted;
  }
}
