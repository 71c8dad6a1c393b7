import {
  ConfigError,
  createLogger,
  emptyState,
  errorMessage,
  parseReplicationStateText,
  TAP_NAME,
  type Logger,
  type ReplicationState,
} from '@tap-nomad/shared';
import {
  discoverCatalog,
  parseCatalogText,
  renderCatalog,
  selectAll,
  selectByName,
  type Catalog,
  type SchemaRegistry,
} from '@tap-nomad/stream-registry';
import { createNomadSchemaRegistry, MODIFY_INDEX, NomadSource, type FetchLike } from '@tap-nomad/nomad';
import {
  formatRunSummary,
  JsonLinesSink,
  Tap,
  type ReplicationValue,
  type WritableLike,
} from '@tap-nomad/sync-engine';
import { parseArgs, USAGE, UsageError, type CliArgs } from './args.js';
import { loadConfig, parseConfigText, tapConfigSchema, toClientConfig, type TapConfig } from './config.js';

export interface CliIO {
  /** Message stream */
  stdout: WritableLike;
  /** Usage, summaries and fatal errors */
  stderr: WritableLike;
  readFile(path: string): Promise<string>;
  signal?: AbortSignal;
  logger?: Logger;
  fetch?: FetchLike;
  now?: () => Date;
}

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;

async function readInput(io: CliIO, path: string, kind: string): Promise<string> {
  try {
    return await io.readFile(path);
  } catch (error) {
    throw new ConfigError(`Cannot read ${kind} file ${path}: ${errorMessage(error)}`, { path });
  }
}

function aboutDocument(registry: SchemaRegistry): Record<string, unknown> {
  return {
    name: TAP_NAME,
    description: 'Nomad cluster state as a SCHEMA/RECORD/STATE message stream',
    capabilities: ['discover', 'catalog', 'state'],
    streams: registry.getStreamNames(),
    settings: Object.keys(tapConfigSchema.shape),
  };
}

function defaultCatalog(registry: SchemaRegistry, config: TapConfig): Catalog {
  const catalog = discoverCatalog(registry);
  return config.streams ? selectByName(catalog, config.streams) : selectAll(catalog);
}

function startValues(registry: SchemaRegistry, config: TapConfig): Record<string, ReplicationValue> {
  const values: Record<string, ReplicationValue> = {};
  for (const definition of registry.getAll()) {
    if (definition.replicationKey === MODIFY_INDEX) {
      values[definition.name] = config.startIndex;
    }
  }
  return values;
}

async function runSync(args: CliArgs, config: TapConfig, io: CliIO, logger: Logger): Promise<number> {
  const registry = createNomadSchemaRegistry();

  const catalog = args.catalogPath
    ? parseCatalogText(await readInput(io, args.catalogPath, 'catalog'))
    : defaultCatalog(registry, config);
  const state: ReplicationState = args.statePath
    ? parseReplicationStateText(await readInput(io, args.statePath, 'state'))
    : emptyState();

  const tap = new Tap({
    registry,
    source: new NomadSource(toClientConfig(config, logger, io.fetch)),
    sink: new JsonLinesSink(io.stdout),
    logger,
    now: io.now,
    startValues: startValues(registry, config),
  });

  const summary = await tap.sync(catalog, state, { signal: io.signal });
  io.stderr.write(`${formatRunSummary(summary)}\n`);
  return EXIT_OK;
}

/**
 * Runs one tap invocation and returns the process exit status: 0 when the run
 * finished or was cancelled (failed streams are reported, not fatal), 1 on
 * usage errors and fatal errors.
 */
export async function runCli(argv: readonly string[], io: CliIO): Promise<number> {
  let args: CliArgs;
  try {
    args = parseArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      io.stderr.write(`${error.message}\n${USAGE}`);
      return EXIT_FATAL;
    }
    throw error;
  }

  if (args.command === 'help') {
    io.stderr.write(USAGE);
    return EXIT_OK;
  }

  const logger = io.logger ?? createLogger({ service: TAP_NAME });

  try {
    if (args.command === 'about') {
      io.stdout.write(`${JSON.stringify(aboutDocument(createNomadSchemaRegistry()), null, 2)}\n`);
      return EXIT_OK;
    }

    const config = args.configPath ? parseConfigText(await readInput(io, args.configPath, 'config')) : loadConfig({});

    if (args.command === 'discover') {
      const registry = createNomadSchemaRegistry();
      io.stdout.write(`${JSON.stringify(renderCatalog(discoverCatalog(registry), registry), null, 2)}\n`);
      return EXIT_OK;
    }

    return await runSync(args, config, io, logger);
  } catch (error) {
    logger.fatal('Run aborted', error);
    io.stderr.write(`FATAL: ${errorMessage(error)}\n`);
    return EXIT_FATAL;
  }
}
