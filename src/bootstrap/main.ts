import {
  ConfigError,
  loadConfig,
  type AppConfig,
  type LoadConfigOptions,
} from '../infra/config/config.js';
import { createLogger, errorMessage, type Logger } from '../infra/logger/logger.js';
import { SlackWebClient, SlackApiError } from '../adapter/slack/SlackWebClient.js';
import {
  SocketModeClient,
  type EnvelopeHandler,
  type SocketModeClientOptions,
} from '../adapter/slack/SocketModeClient.js';
import { ConsoleRecordObserver } from '../adapter/console/ConsoleRecordObserver.js';
import { JsonRecordStore } from '../core/storage/RecordStore.js';
import { ProfileResolver } from '../core/ingestion/ProfileResolver.js';
import { IngestionPipeline, type RecordObserver } from '../core/ingestion/IngestionPipeline.js';

export interface RunningRecorder {
  /** Close the socket, then let queued messages finish. */
  stop(): Promise<void>;
  /** Resolves when the listener has stopped for any reason. */
  stopped: Promise<void>;
}

/** The part of SocketModeClient the bootstrap drives. */
export interface ListenerSocket {
  start(): Promise<void>;
  stop(): Promise<void>;
  whenStopped(): Promise<void>;
}

export type SocketFactory = (
  web: SlackWebClient,
  logger: Logger,
  handler: EnvelopeHandler,
  options: SocketModeClientOptions,
) => ListenerSocket;

export interface StartOptions {
  config?: LoadConfigOptions;
  fetchImpl?: typeof fetch;
  createSocket?: SocketFactory;
  observer?: RecordObserver;
}

const bootLogger = createLogger({ logging: { level: 'info', color: true } });

const defaultSocketFactory: SocketFactory = (web, logger, handler, options) =>
  new SocketModeClient(web, logger, handler, options);

function readConfig(options: LoadConfigOptions | undefined): AppConfig | null {
  try {
    return loadConfig(options);
  } catch (err) {
    if (err instanceof ConfigError && err.missing.length > 0) {
      bootLogger.error('bootstrap', 'Missing required environment variables:');
      for (const name of err.missing) {
        bootLogger.error('bootstrap', `  - ${name}`);
      }
      bootLogger.error('bootstrap', 'Create a .env file (see .env.example) with the values above.');
      return null;
    }
    bootLogger.error('bootstrap', errorMessage(err));
    return null;
  }
}

/**
 * Wire up and start the recorder. Returns null (after logging why) when the
 * configuration is incomplete or the bot cannot read the channel.
 */
export async function start(options: StartOptions = {}): Promise<RunningRecorder | null> {
  const cfg = readConfig(options.config);
  if (!cfg) return null;

  const logger = createLogger(cfg);
  logger.info('bootstrap', `Starting ${cfg.app.name} in ${cfg.app.env} for #${cfg.channel.name}`);

  const web = new SlackWebClient(logger, {
    botToken: cfg.slack.botToken,
    appToken: cfg.slack.appToken,
    baseUrl: cfg.slack.apiBaseUrl,
    fetchImpl: options.fetchImpl,
  });

  try {
    const channel = await web.conversationsInfo(cfg.channel.id);
    logger.info('bootstrap', `Bot can access channel: #${channel.name}`);
  } catch (err) {
    const reason = err instanceof SlackApiError ? err.code : errorMessage(err);
    logger.error('bootstrap', `Bot cannot access channel ${cfg.channel.id}: ${reason}`);
    logger.error('bootstrap', 'Make sure the bot is added to the channel.');
    return null;
  }

  const store = new JsonRecordStore(logger, {
    filePath: cfg.storage.file,
    channel: { channelName: cfg.channel.name, channelId: cfg.channel.id },
    duplicates: cfg.storage.duplicates,
  });
  await store.initialize();

  const pipeline = new IngestionPipeline({
    config: cfg,
    resolver: new ProfileResolver(web, logger),
    store,
    logger,
    observer: options.observer ?? new ConsoleRecordObserver(undefined, cfg.logging.color),
  });

  const createSocket = options.createSocket ?? defaultSocketFactory;
  const socket = createSocket(
    web,
    logger,
    (envelope, ack) => pipeline.onEvent(envelope, ack),
    { autoReconnect: cfg.slack.autoReconnect },
  );

  await socket.start();
  logger.info('bootstrap', `Waiting for messages in #${cfg.channel.name} (Ctrl+C to stop)`);

  let stopping: Promise<void> | null = null;
  const stop = (): Promise<void> => {
    stopping ??= (async () => {
      logger.info('bootstrap', 'Stopping listener...');
      await socket.stop();
      if (pipeline.pending > 0) {
        logger.info('bootstrap', `Waiting for ${pipeline.pending} queued message(s)`);
      }
      await pipeline.drain();
    })();
    return stopping;
  };

  const onSignal = (signal: NodeJS.Signals) => {
    logger.info('bootstrap', `Received ${signal}`);
    stop().catch((err) => {
      logger.error('bootstrap', `Shutdown failed: ${errorMessage(err)}`);
    });
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  const stopped = socket
    .whenStopped()
    .then(() => pipeline.drain())
    .finally(() => {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
    });

  return { stop, stopped };
}

/**
 * Run until the listener stops. Resolves with the process exit code.
 */
export async function run(options: StartOptions = {}): Promise<number> {
  let recorder: RunningRecorder | null;
  try {
    recorder = await start(options);
  } catch (err) {
    bootLogger.error('bootstrap', `Startup failed: ${errorMessage(err)}`);
    return 1;
  }
  if (!recorder) return 1;

  await recorder.stopped;
  return 0;
}
