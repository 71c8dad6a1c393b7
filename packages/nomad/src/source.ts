import type { StreamDefinition } from '@tap-nomad/shared';
import type { RecordSource, SourcePage } from '@tap-nomad/stream-registry';
import { NomadClient, type NomadClientConfig } from './client.js';
import { normalizeNomadPayload } from './mapper.js';

/**
 * RecordSource implementation for the Nomad HTTP API.
 *
 * Wraps NomadClient to conform to the engine's source contract: stream
 * definitions name the endpoint and fixed params, the client handles paging
 * and retries, and payloads are normalized to snake_case.
 */
export class NomadSource implements RecordSource {
  readonly sourceId = 'nomad';

  private readonly client: NomadClient;

  constructor(clientOrConfig: NomadClient | NomadClientConfig) {
    this.client = clientOrConfig instanceof NomadClient ? clientOrConfig : new NomadClient(clientOrConfig);
  }

  async *pages(definition: StreamDefinition, startToken?: string): AsyncGenerator<SourcePage> {
    for await (const page of this.client.paginate(definition.path, definition.params ?? {}, startToken)) {
      const sourcePage: SourcePage = { items: page.items };
      if (page.nextToken !== undefined) sourcePage.nextToken = page.nextToken;
      if (page.index !== undefined) sourcePage.index = page.index;
      yield sourcePage;
    }
  }

  normalize(item: unknown): unknown {
    return normalizeNomadPayload(item);
  }
}
