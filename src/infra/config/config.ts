import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse } from 'yaml';
import { z } from 'zod';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type DuplicatePolicy = 'allow' | 'skip';

export type AppConfig = {
  readonly app: {
    readonly name: string;
    readonly env: 'dev' | 'prod' | 'test';
  };
  readonly logging: {
    readonly level: LogLevel;
    readonly color: boolean;
  };
  readonly slack: {
    readonly botToken: string;
    readonly appToken: string;
    readonly apiBaseUrl: string;
    readonly autoReconnect: boolean;
  };
  readonly channel: {
    readonly id: string;
    readonly name: string;
  };
  readonly storage: {
    readonly file: string;
    readonly duplicates: DuplicatePolicy;
  };
  readonly ingestion: {
    readonly queueCapacity: number;
  };
};

/** Names of the settings that must come from the environment. */
export const REQUIRED_ENV = ['SLACK_BOT_TOKEN', 'SLACK_APP_TOKEN', 'CHANNEL_ID', 'CHANNEL_NAME'] as const;
export type RequiredEnvName = (typeof REQUIRED_ENV)[number];

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly missing: readonly string[] = [],
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

const levelSchema = z.enum(['debug', 'info', 'warn', 'error']);

// Everything optional: the YAML file only overrides defaults
const FileConfigSchema = z
  .object({
    app: z
      .object({
        name: z.string().optional(),
        env: z.enum(['dev', 'prod', 'test']).optional(),
      })
      .optional(),
    logging: z
      .object({
        level: levelSchema.optional(),
        color: z.boolean().optional(),
      })
      .optional(),
    storage: z
      .object({
        file: z.string().min(1).optional(),
        duplicates: z.enum(['allow', 'skip']).optional(),
      })
      .optional(),
    ingestion: z
      .object({
        queueCapacity: z.number().int().positive().optional(),
      })
      .optional(),
    slack: z
      .object({
        apiBaseUrl: z.string().url().optional(),
        autoReconnect: z.boolean().optional(),
      })
      .optional(),
  })
  .nullish();

type FileConfig = z.infer<typeof FileConfigSchema>;

export interface LoadConfigOptions {
  /** Defaults to `config/default.yaml` under the working directory. */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

function readFileConfig(filePath: string): FileConfig {
  if (!existsSync(filePath)) return undefined;
  const raw = readFileSync(filePath, 'utf-8');
  const parsed = FileConfigSchema.safeParse(parse(raw));
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config file ${filePath}: ${issues}`);
  }
  return parsed.data;
}

function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const value of Object.values(obj)) {
    if (value && typeof value === 'object') deepFreeze(value);
  }
  return Object.freeze(obj);
}

/**
 * Build the process configuration from the YAML defaults file and the environment.
 * Throws a ConfigError naming every missing required variable at once.
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const env = options.env ?? process.env;
  const filePath = options.configPath ?? resolve(process.cwd(), 'config', 'default.yaml');
  const cfg = readFileConfig(filePath);

  const missing = REQUIRED_ENV.filter((name) => !env[name]);
  if (missing.length > 0) {
    throw new ConfigError(
      `Missing required environment variables: ${missing.join(', ')}`,
      missing,
    );
  }

  const envLevel = levelSchema.safeParse(env.LOG_LEVEL);
  const envName = z.enum(['dev', 'prod', 'test']).safeParse(env.NODE_ENV);

  const config: AppConfig = {
    app: {
      name: cfg?.app?.name ?? 'slack-channel-recorder',
      env: envName.success ? envName.data : cfg?.app?.env ?? 'prod',
    },
    logging: {
      level: envLevel.success ? envLevel.data : cfg?.logging?.level ?? 'info',
      color: cfg?.logging?.color ?? true,
    },
    slack: {
      botToken: env.SLACK_BOT_TOKEN ?? '',
      appToken: env.SLACK_APP_TOKEN ?? '',
      apiBaseUrl: cfg?.slack?.apiBaseUrl ?? 'https://slack.com/api',
      autoReconnect: cfg?.slack?.autoReconnect ?? true,
    },
    channel: {
      id: env.CHANNEL_ID ?? '',
      name: env.CHANNEL_NAME ?? '',
    },
    storage: {
      file: env.MESSAGES_FILE || cfg?.storage?.file || 'slack_messages.json',
      duplicates: cfg?.storage?.duplicates ?? 'allow',
    },
    ingestion: {
      queueCapacity: cfg?.ingestion?.queueCapacity ?? 1000,
    },
  };

  return deepFreeze(config);
}
