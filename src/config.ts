import * as dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from './core/errors.js';

// Load environment variables from .env file
dotenv.config();

export interface Config {
  provider: {
    apiBase: string;
    apiKey: string;
  };
  chat: {
    model: string;
    systemMessage: string;
    maxTokens: number;
    reserveTokens: number;
    temperature?: number;
    topP?: number;
    presencePenalty?: number;
    frequencyPenalty?: number;
  };
  storage: {
    dbPath: string;
  };
  tokenizer: {
    cacheSize: number;
  };
  ui: {
    waitingIntervalMs: number;
  };
  debug: boolean;
}

/**
 * Accepted ranges of the sampling parameters
 */
export const SamplingSchema = z.object({
  temperature: z.number().min(0).max(2).optional(),
  topP: z.number().min(0).max(1).optional(),
  presencePenalty: z.number().min(-2).max(2).optional(),
  frequencyPenalty: z.number().min(-2).max(2).optional(),
});

// Zod validation schema
const ConfigSchema = z.object({
  provider: z.object({
    apiBase: z.string().url('Invalid API base URL'),
    apiKey: z.string(),
  }),
  chat: z
    .object({
      model: z.string().min(1, 'Model must not be empty'),
      systemMessage: z.string(),
      maxTokens: z.number().int().positive(),
      reserveTokens: z.number().int().min(0),
      ...SamplingSchema.shape,
    })
    .refine((chat) => chat.reserveTokens < chat.maxTokens, {
      message: 'Reserve tokens must be smaller than max tokens',
      path: ['reserveTokens'],
    }),
  storage: z.object({
    dbPath: z.string().min(1, 'Database path must not be empty'),
  }),
  tokenizer: z.object({
    cacheSize: z.number().int().min(1),
  }),
  ui: z.object({
    waitingIntervalMs: z.number().int().min(50).max(60000),
  }),
  debug: z.boolean(),
});

/**
 * Parse command line arguments
 * Usage: node dist/src/index.js --model gpt-4o-mini --max-tokens 8000 --debug
 */
export function parseArgs(argv: string[]): Record<string, string | boolean> {
  const args: Record<string, string | boolean> = {};

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];

    if (arg.startsWith('--')) {
      const key = arg.slice(2);

      // Check if next arg is a value or another flag
      if (i + 1 < argv.length && !argv[i + 1].startsWith('--')) {
        args[key] = argv[++i];
      } else {
        args[key] = true;
      }
    }
  }

  return args;
}

/**
 * Get configuration from CLI arguments, then environment variables, then
 * defaults. Throws ConfigurationError listing every invalid field.
 */
export function getConfig(
  argv: string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env
): Config {
  const cliArgs = parseArgs(argv);

  const getString = (cliKey: string, envKey: string, defaultValue: string): string => {
    const cliValue = cliArgs[cliKey];
    if (typeof cliValue === 'string') return cliValue;
    return env[envKey] ?? defaultValue;
  };

  const getBoolean = (cliKey: string, envKey: string, defaultValue: boolean): boolean => {
    if (cliArgs[cliKey] !== undefined) return cliArgs[cliKey] === true || cliArgs[cliKey] === 'true';
    const envValue = env[envKey];
    return envValue === 'true' ? true : envValue === 'false' ? false : defaultValue;
  };

  const getOptionalNumber = (cliKey: string, envKey: string): number | undefined => {
    const cliValue = cliArgs[cliKey];
    const value = typeof cliValue === 'string' ? cliValue : env[envKey];
    return value === undefined || value === '' ? undefined : Number(value);
  };

  const getNumber = (cliKey: string, envKey: string, defaultValue: number): number =>
    getOptionalNumber(cliKey, envKey) ?? defaultValue;

  const maxTokens = getNumber('max-tokens', 'MAX_TOKENS', 4097);

  const rawConfig = {
    provider: {
      apiBase: getString('api-base', 'OPENAI_API_BASE', 'https://api.openai.com/v1'),
      apiKey: getString('api-key', 'OPENAI_API_KEY', ''),
    },
    chat: {
      model: getString('model', 'DEFAULT_MODEL', 'gpt-3.5-turbo'),
      systemMessage: getString('system-message', 'SYSTEM_MESSAGE', "You're a helpful assistant."),
      maxTokens,
      reserveTokens: getNumber('reserve-tokens', 'RESERVE_TOKENS', Math.floor(maxTokens / 10)),
      temperature: getOptionalNumber('temperature', 'TEMPERATURE'),
      topP: getOptionalNumber('top-p', 'TOP_P'),
      presencePenalty: getOptionalNumber('presence-penalty', 'PRESENCE_PENALTY'),
      frequencyPenalty: getOptionalNumber('frequency-penalty', 'FREQUENCY_PENALTY'),
    },
    storage: {
      dbPath: getString('db-path', 'CHAT_DB_PATH', 'chat_history.sqlite'),
    },
    tokenizer: {
      cacheSize: getNumber('token-cache-size', 'TOKEN_CACHE_SIZE', 10000),
    },
    ui: {
      waitingIntervalMs: getNumber('waiting-interval', 'WAITING_INTERVAL_MS', 500),
    },
    debug: getBoolean('debug', 'DEBUG', false),
  };

  const result = ConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    throw new ConfigurationError(
      result.error.errors.map((err) => `${err.path.join('.') || 'root'}: ${err.message}`)
    );
  }
  return result.data;
}

/**
 * Print configuration summary
 */
export function printConfigInfo(config: Config): void {
  const sampling = [
    ['temperature', config.chat.temperature],
    ['top_p', config.chat.topP],
    ['presence_penalty', config.chat.presencePenalty],
    ['frequency_penalty', config.chat.frequencyPenalty],
  ]
    .filter(([, value]) => value !== undefined)
    .map(([name, value]) => `${name}=${value}`);

  console.error(`\n🔗 Provider: ${config.provider.apiBase}${config.provider.apiKey ? '' : ' (no API key)'}`);
  console.error(`🤖 Model: ${config.chat.model} ${config.debug ? '(Debug Mode)' : ''}`);
  console.error(`📏 Tokens: ${config.chat.maxTokens} max, ${config.chat.reserveTokens} reserved`);
  if (sampling.length > 0) {
    console.error(`🎛️  Sampling: ${sampling.join(', ')}`);
  }
  console.error(`💾 History: ${config.storage.dbPath}`);
  console.error('─'.repeat(68));
}
