import { WebSocket, type RawData } from 'ws';
import type { Logger } from '../../infra/logger/logger.js';
import { errorMessage } from '../../infra/logger/logger.js';
import type { Acknowledge } from '../../core/ingestion/IngestionPipeline.js';
import { SocketModeEnvelopeSchema, type SocketModeEnvelope } from './types.js';
import type { SlackWebClient } from './SlackWebClient.js';

export type EnvelopeHandler = (envelope: SocketModeEnvelope, ack: Acknowledge) => Promise<unknown>;

export interface SocketModeClientOptions {
  autoReconnect?: boolean;
  maxReconnectAttempts?: number;
  /** First retry delay; doubles per attempt, capped at 10s */
  reconnectBaseDelayMs?: number;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function frameText(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf-8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf-8');
  return Buffer.from(data).toString('utf-8');
}

/**
 * Slack Socket Mode connection.
 * Fetches a WebSocket URL with the app token, forwards every envelope to the
 * handler together with an ack callback, and follows `disconnect` requests.
 */
export class SocketModeClient {
  private socket: WebSocket | null = null;
  private stopping = false;
  private finished = false;
  private markStopped: () => void = () => {};
  private readonly stopped: Promise<void>;
  private readonly autoReconnect: boolean;
  private readonly maxReconnectAttempts: number;
  private readonly reconnectBaseDelayMs: number;

  constructor(
    private web: Pick<SlackWebClient, 'openConnection'>,
    private logger: Logger,
    private handler: EnvelopeHandler,
    options: SocketModeClientOptions = {},
  ) {
    this.autoReconnect = options.autoReconnect ?? true;
    this.maxReconnectAttempts = options.maxReconnectAttempts ?? 5;
    this.reconnectBaseDelayMs = options.reconnectBaseDelayMs ?? 1000;
    this.stopped = new Promise((resolve) => {
      this.markStopped = resolve;
    });
  }

  /** Open the first connection; rejects if it cannot be established. */
  async start(): Promise<void> {
    await this.connect();
    this.logger.info('socket-mode', 'Connected to Slack');
  }

  /** Resolves once the client has stopped for good. */
  whenStopped(): Promise<void> {
    return this.stopped;
  }

  get connected(): boolean {
    return this.socket?.readyState === WebSocket.OPEN;
  }

  async stop(): Promise<void> {
    this.stopping = true;
    const ws = this.socket;
    this.socket = null;
    if (ws && ws.readyState !== WebSocket.CLOSED) {
      await new Promise<void>((resolve) => {
        ws.once('close', () => resolve());
        ws.close();
      });
    }
    this.finish();
  }

  private finish(): void {
    if (this.finished) return;
    this.finished = true;
    this.logger.info('socket-mode', 'Listener stopped');
    this.markStopped();
  }

  private async connect(): Promise<void> {
    const url = await this.web.openConnection();
    this.logger.debug('socket-mode', 'Opening WebSocket');

    await new Promise<void>((resolve, reject) => {
      const ws = new WebSocket(url);
      const onOpenError = (err: Error) => reject(err);
      ws.once('error', onOpenError);
      ws.once('open', () => {
        ws.off('error', onOpenError);
        this.socket = ws;
        this.attach(ws);
        resolve();
      });
    });
  }

  private attach(ws: WebSocket): void {
    ws.on('message', (data: RawData) => {
      this.handleFrame(frameText(data), ws);
    });

    ws.on('close', (code: number) => {
      if (this.socket !== ws) return; // replaced or stopped on purpose
      this.socket = null;
      this.logger.warn('socket-mode', `Connection closed (code ${code})`);
      this.reconnect('connection closed').catch((err) => {
        this.logger.error('socket-mode', `Reconnect failed: ${errorMessage(err)}`);
      });
    });

    ws.on('error', (err: Error) => {
      this.logger.error('socket-mode', `WebSocket error: ${err.message}`);
    });
  }

  private handleFrame(text: string, ws: WebSocket): void {
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (err) {
      this.logger.error('socket-mode', `Failed to parse frame: ${errorMessage(err)}`);
      return;
    }

    const parsed = SocketModeEnvelopeSchema.safeParse(json);
    if (!parsed.success) {
      this.logger.warn('socket-mode', 'Ignoring frame without a type');
      return;
    }
    const envelope = parsed.data;

    switch (envelope.type) {
      case 'hello':
        this.logger.debug('socket-mode', 'Received hello');
        return;
      case 'disconnect':
        this.logger.warn(
          'socket-mode',
          `Slack requested disconnect (${envelope.reason ?? 'no reason'})`,
        );
        if (this.socket === ws) this.socket = null;
        ws.close();
        this.reconnect(envelope.reason ?? 'disconnect').catch((err) => {
          this.logger.error('socket-mode', `Reconnect failed: ${errorMessage(err)}`);
        });
        return;
      default:
        this.handler(envelope, (envelopeId) => this.ack(ws, envelopeId)).catch((err) => {
          this.logger.error('socket-mode', `Envelope handler failed: ${errorMessage(err)}`);
        });
    }
  }

  private ack(ws: WebSocket, envelopeId: string): void {
    ws.send(JSON.stringify({ envelope_id: envelopeId }));
  }

  private async reconnect(reason: string): Promise<void> {
    if (this.stopping) return;
    if (!this.autoReconnect) {
      this.logger.warn('socket-mode', `Not reconnecting after ${reason}`);
      this.finish();
      return;
    }

    for (let attempt = 1; attempt <= this.maxReconnectAttempts; attempt++) {
      try {
        await this.connect();
        if (this.stopping) {
          await this.stop();
          return;
        }
        this.logger.info('socket-mode', `Reconnected after ${reason}`);
        return;
      } catch (err) {
        const delay = Math.min(this.reconnectBaseDelayMs * 2 ** (attempt - 1), 10000);
        this.logger.error(
          'socket-mode',
          `Reconnect attempt ${attempt}/${this.maxReconnectAttempts} failed: ${errorMessage(err)}`,
        );
        if (attempt < this.maxReconnectAttempts) await sleep(delay);
      }
      if (this.stopping) return;
    }

    this.logger.error('socket-mode', 'Giving up on reconnecting');
    this.finish();
  }
}
