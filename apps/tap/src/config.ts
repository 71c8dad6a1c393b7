import { z } from 'zod';
import {
  ConfigError,
  DEFAULT_MAX_RETRIES,
  DEFAULT_NAMESPACE,
  DEFAULT_NOMAD_ADDR,
  DEFAULT_PAGE_SIZE,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_RETRY_BASE_DELAY_MS,
  DEFAULT_RETRY_MAX_DELAY_MS,
  DEFAULT_START_INDEX,
  isJsonObject,
  MAX_PAGE_SIZE,
  readEnv,
  type Logger,
} from '@tap-nomad/shared';
import type { FetchLike, NomadClientConfig } from '@tap-nomad/nomad';

export const tapConfigSchema = z.object({
  address: z.string().url().optional(),
  token: z.string().min(1).optional(),
  namespace: z.string().min(1).optional(),
  region: z.string().min(1).optional(),
  page_size: z.number().int().min(1).max(MAX_PAGE_SIZE).default(DEFAULT_PAGE_SIZE),
  start_index: z.number().int().min(0).default(DEFAULT_START_INDEX),
  max_retries: z.number().int().min(0).max(20).default(DEFAULT_MAX_RETRIES),
  retry_base_delay_ms: z.number().int().min(0).default(DEFAULT_RETRY_BASE_DELAY_MS),
  retry_max_delay_ms: z.number().int().min(0).default(DEFAULT_RETRY_MAX_DELAY_MS),
  request_timeout_ms: z.number().int().positive().default(DEFAULT_REQUEST_TIMEOUT_MS),
  streams: z.array(z.string().min(1)).min(1).optional(),
});

export type TapConfigInput = z.input<typeof tapConfigSchema>;

export interface TapConfig {
  address: string;
  token?: string;
  namespace: string;
  region?: string;
  pageSize: number;
  startIndex: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  requestTimeoutMs: number;
  /** Streams to sync when no catalog is given; all streams when absent */
  streams?: string[];
}

function checkAddress(address: string): string {
  try {
    new URL(address);
  } catch {
    throw new ConfigError(`Invalid Nomad address: ${address}`, { address });
  }
  return address;
}

/**
 * Validates a config document and fills gaps from NOMAD_ADDR, NOMAD_TOKEN,
 * NOMAD_NAMESPACE and NOMAD_REGION. Values in the document win.
 *
 * @throws ConfigError
 */
export function loadConfig(input: unknown = {}): TapConfig {
  if (!isJsonObject(input)) {
    throw new ConfigError('Config must be a JSON object');
  }

  const result = tapConfigSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.errors[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new ConfigError(`Config is invalid${where}: ${issue?.message ?? 'invalid'}`);
  }
  const parsed = result.data;

  const config: TapConfig = {
    address: checkAddress(parsed.address ?? readEnv('NOMAD_ADDR') ?? DEFAULT_NOMAD_ADDR),
    namespace: parsed.namespace ?? readEnv('NOMAD_NAMESPACE') ?? DEFAULT_NAMESPACE,
    pageSize: parsed.page_size,
    startIndex: parsed.start_index,
    maxRetries: parsed.max_retries,
    retryBaseDelayMs: parsed.retry_base_delay_ms,
    retryMaxDelayMs: parsed.retry_max_delay_ms,
    requestTimeoutMs: parsed.request_timeout_ms,
  };

  const token = parsed.token ?? readEnv('NOMAD_TOKEN');
  if (token !== undefined) config.token = token;
  const region = parsed.region ?? readEnv('NOMAD_REGION');
  if (region !== undefined) config.region = region;
  if (parsed.streams !== undefined) config.streams = parsed.streams;

  return config;
}

/** Parses the raw text of a config file */
export function parseConfigText(text: string): TapConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Config is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  return loadConfig(parsed);
}

export function toClientConfig(config: TapConfig, logger: Logger, fetch?: FetchLike): NomadClientConfig {
  const clientConfig: NomadClientConfig = {
    baseUrl: config.address,
    namespace: config.namespace,
    pageSize: config.pageSize,
    requestTimeoutMs: config.requestTimeoutMs,
    retry: {
      maxRetries: config.maxRetries,
      baseDelayMs: config.retryBaseDelayMs,
      maxDelayMs: config.retryMaxDelayMs,
    },
    logger,
  };
  if (config.token !== undefined) clientConfig.token = config.token;
  if (config.region !== undefined) clientConfig.region = config.region;
  if (fetch !== undefined) clientConfig.fetch = fetch;
  return clientConfig;
}
