export { NomadClient, type NomadClientConfig, type NomadPage, type QueryParams, type FetchLike } from './client.js';
export { NomadSource } from './source.js';
export { normalizeNomadPayload, toSnakeCase, nanosToIso } from './mapper.js';
export {
  createNomadSchemaRegistry,
  NOMAD_STREAMS,
  MODIFY_INDEX,
  JOBS_STREAM,
  ALLOCATIONS_STREAM,
  NODES_STREAM,
  DEPLOYMENTS_STREAM,
  EVALUATIONS_STREAM,
  NAMESPACES_STREAM,
} from './streams.js';
export type * from './types.js';
