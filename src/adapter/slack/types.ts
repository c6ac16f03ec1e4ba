import { z } from 'zod';

/**
 * Socket Mode frames. Envelopes carry an `envelope_id` that must be acknowledged;
 * `hello` and `disconnect` are connection control frames without one.
 * https://api.slack.com/apis/connections/socket
 */
export const SocketModeEnvelopeSchema = z
  .object({
    type: z.string(),
    envelope_id: z.string().optional(),
    payload: z.record(z.unknown()).optional(),
    accepts_response_payload: z.boolean().optional(),
    retry_attempt: z.number().optional(),
    retry_reason: z.string().optional(),
    reason: z.string().optional(),
  })
  .passthrough();

export type SocketModeEnvelope = z.infer<typeof SocketModeEnvelopeSchema>;

/** Inner `payload.event` of an `events_api` envelope. Unknown keys pass through. */
export const SlackEventSchema = z
  .object({
    type: z.string(),
    channel: z.string().optional(),
    user: z.string().optional(),
    text: z.string().optional(),
    ts: z.string().optional(),
    subtype: z.string().optional(),
    client_msg_id: z.string().optional(),
    thread_ts: z.string().optional(),
    parent_user_id: z.string().optional(),
    reactions: z.array(z.unknown()).optional(),
    attachments: z.array(z.unknown()).optional(),
    files: z.array(z.unknown()).optional(),
  })
  .passthrough();

export type SlackEvent = z.infer<typeof SlackEventSchema>;

export const SlackUserSchema = z.object({
  id: z.string(),
  name: z.string(),
  real_name: z.string().optional(),
  profile: z
    .object({
      display_name: z.string().optional(),
      email: z.string().optional(),
    })
    .passthrough()
    .optional(),
});

export type SlackUser = z.infer<typeof SlackUserSchema>;

export const SlackChannelSchema = z.object({
  id: z.string(),
  name: z.string(),
});

export type SlackChannel = z.infer<typeof SlackChannelSchema>;

export const ApiEnvelopeSchema = z
  .object({
    ok: z.boolean(),
    error: z.string().optional(),
  })
  .passthrough();

export const UsersInfoResponseSchema = z.object({ ok: z.literal(true), user: SlackUserSchema });
export const ConversationsInfoResponseSchema = z.object({
  ok: z.literal(true),
  channel: SlackChannelSchema,
});
export const ConnectionsOpenResponseSchema = z.object({ ok: z.literal(true), url: z.string() });

/** Lookup of a user by id; implemented by SlackWebClient, faked in tests. */
export interface UserDirectory {
  usersInfo(userId: string): Promise<SlackUser>;
}
