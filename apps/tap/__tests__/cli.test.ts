import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createMockLogger, type MockLogger } from '@tap-nomad/shared/testing';
import { FakeNomadApi, createMockJobs, createMockNode } from '@tap-nomad/nomad/testing';
import { runCli, type CliIO } from '../src/cli.js';

const NOW = '2024-06-01T00:00:00.000Z';

const CONFIG = JSON.stringify({
  address: 'http://nomad.test:4646',
  page_size: 2,
  max_retries: 0,
  streams: ['jobs'],
});

interface Harness {
  io: CliIO;
  stdout: string[];
  stderr: string[];
  logger: MockLogger;
}

function parseMessages(stdout: string[]): Array<Record<string, unknown>> {
  return stdout
    .join('')
    .split('\n')
    .filter((line) => line !== '')
    .map((line): Record<string, unknown> => JSON.parse(line));
}

describe('runCli', () => {
  let api: FakeNomadApi;
  let files: Record<string, string>;

  beforeEach(() => {
    vi.stubEnv('NOMAD_ADDR', '');
    vi.stubEnv('NOMAD_TOKEN', '');
    api = new FakeNomadApi({
      '/v1/jobs': createMockJobs(3),
      '/v1/nodes': [createMockNode()],
    });
    files = { 'config.json': CONFIG };
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  function harness(overrides: Partial<CliIO> = {}): Harness {
    const stdout: string[] = [];
    const stderr: string[] = [];
    const logger = createMockLogger();
    const io: CliIO = {
      stdout: { write: (chunk: string) => stdout.push(chunk) },
      stderr: { write: (chunk: string) => stderr.push(chunk) },
      readFile: async (path) => {
        const content = files[path];
        if (content === undefined) {
          throw new Error(`ENOENT: no such file or directory, open '${path}'`);
        }
        return content;
      },
      logger,
      fetch: api.fetch,
      now: () => new Date(NOW),
      ...overrides,
    };
    return { io, stdout, stderr, logger };
  }

  describe('modes', () => {
    it('should print capabilities for --about', async () => {
      const { io, stdout } = harness();

      const code = await runCli(['--about'], io);

      expect(code).toBe(0);
      expect(JSON.parse(stdout.join(''))).toMatchObject({
        name: 'tap-nomad',
        capabilities: ['discover', 'catalog', 'state'],
        streams: ['jobs', 'allocations', 'nodes', 'deployments', 'evaluations', 'namespaces'],
      });
    });

    it('should print the catalog for --discover without calling the API', async () => {
      const { io, stdout } = harness();

      const code = await runCli(['--config', 'config.json', '--discover'], io);

      expect(code).toBe(0);
      const catalog: { streams: Array<{ tap_stream_id: string }> } = JSON.parse(stdout.join(''));
      expect(catalog.streams.map((entry) => entry.tap_stream_id)).toEqual([
        'jobs',
        'allocations',
        'nodes',
        'deployments',
        'evaluations',
        'namespaces',
      ]);
      expect(api.requests).toEqual([]);
    });

    it('should print usage for --help', async () => {
      const { io, stderr } = harness();

      expect(await runCli(['--help'], io)).toBe(0);
      expect(stderr.join('')).toContain('Usage:');
    });

    it('should exit 1 on invalid usage', async () => {
      const { io, stderr } = harness();

      expect(await runCli(['--bogus'], io)).toBe(1);
      expect(stderr[0]?.startsWith('Unknown argument: --bogus\n')).toBe(true);
    });
  });

  describe('sync', () => {
    it('should stream messages for the configured streams', async () => {
      const { io, stdout, stderr } = harness();

      const code = await runCli(['--config', 'config.json'], io);

      expect(code).toBe(0);
      const messages = parseMessages(stdout);
      expect(messages.map((message) => message.type)).toEqual([
        'SCHEMA',
        'RECORD',
        'RECORD',
        'STATE',
        'RECORD',
        'STATE',
        'STATE',
      ]);
      expect(messages[messages.length - 1]).toEqual({
        type: 'STATE',
        value: { bookmarks: { jobs: { modify_index: 102, last_completed_at: NOW } } },
      });
      expect(stderr.join('')).toMatch(/^Sync DONE \(run [\w-]+\): 1 succeeded, 0 failed, 0 skipped\n/);
    });

    it('should resume from a state file', async () => {
      files['state.json'] = JSON.stringify({ bookmarks: { jobs: { modify_index: 101 } } });
      const { io, stdout } = harness();

      await runCli(['--config', 'config.json', '--state', 'state.json'], io);

      const records = parseMessages(stdout).filter((message) => message.type === 'RECORD');
      expect(records.map((message) => message.record)).toEqual([expect.objectContaining({ id: 'job-003' })]);
    });

    it('should sync the streams a catalog file selects', async () => {
      files['catalog.json'] = JSON.stringify({ streams: [{ stream: 'nodes', selected: true }] });
      const { io, stdout } = harness();

      await runCli(['--config', 'config.json', '--catalog', 'catalog.json'], io);

      const schemas = parseMessages(stdout).filter((message) => message.type === 'SCHEMA');
      expect(schemas.map((message) => message.stream)).toEqual(['nodes']);
    });

    it('should exit 0 and warn when some streams fail', async () => {
      files['config.json'] = JSON.stringify({ address: 'http://nomad.test:4646', max_retries: 0 });
      const { io, stderr } = harness();

      const code = await runCli(['--config', 'config.json'], io);

      expect(code).toBe(0);
      const report = stderr.join('');
      expect(report).toContain('2 succeeded, 4 failed, 0 skipped');
      expect(report).toContain('WARNING: 4 stream(s) failed');
      expect(report).toContain(
        '  allocations: SourceRequestError: Nomad request failed with HTTP 404 on /v1/allocations: 404 page not found',
      );
    });

    it('should exit 0 when cancelled', async () => {
      const controller = new AbortController();
      controller.abort();
      const { io, stderr, stdout } = harness({ signal: controller.signal });

      const code = await runCli(['--config', 'config.json'], io);

      expect(code).toBe(0);
      expect(stderr.join('')).toMatch(/^Sync CANCELLED/);
      expect(parseMessages(stdout)).toEqual([{ type: 'STATE', value: { bookmarks: {} } }]);
    });
  });

  describe('fatal errors', () => {
    it('should exit 1 on a corrupt state file before any output', async () => {
      files['state.json'] = '{"bookmarks": ';
      const { io, stdout, stderr, logger } = harness();

      const code = await runCli(['--config', 'config.json', '--state', 'state.json'], io);

      expect(code).toBe(1);
      expect(stdout).toEqual([]);
      expect(stderr.join('')).toMatch(/^FATAL: State document is not valid JSON: /);
      expect(logger.hasLog('fatal', 'Run aborted')).toBe(true);
      expect(api.requests).toEqual([]);
    });

    it('should exit 1 when the config file is missing', async () => {
      const { io, stderr } = harness();

      const code = await runCli(['--config', 'missing.json'], io);

      expect(code).toBe(1);
      expect(stderr).toEqual([
        "FATAL: Cannot read config file missing.json: ENOENT: no such file or directory, open 'missing.json'\n",
      ]);
    });

    it('should exit 1 on an invalid config', async () => {
      files['config.json'] = JSON.stringify({ page_size: 0 });
      const { io, stderr } = harness();

      expect(await runCli(['--config', 'config.json'], io)).toBe(1);
      expect(stderr).toEqual(['FATAL: Config is invalid at page_size: Number must be greater than or equal to 1\n']);
    });

    it('should exit 1 on an empty catalog', async () => {
      files['catalog.json'] = '{"streams": []}';
      const { io, stderr } = harness();

      expect(await runCli(['--config', 'config.json', '--catalog', 'catalog.json'], io)).toBe(1);
      expect(stderr).toEqual(['FATAL: Catalog is empty\n']);
    });
  });
});
