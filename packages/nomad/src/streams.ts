import type { StreamDefinition } from '@tap-nomad/shared';
import { SchemaRegistry } from '@tap-nomad/stream-registry';

/**
 * Every object Nomad stores carries the Raft index of its last write. Indexes
 * only grow, so ModifyIndex is the replication key for incremental streams.
 */
export const MODIFY_INDEX = 'modify_index';

export const JOBS_STREAM: StreamDefinition = {
  name: 'jobs',
  path: '/v1/jobs',
  params: { meta: 'true' },
  primaryKeys: ['id', 'namespace'],
  replicationMethod: 'INCREMENTAL',
  replicationKey: MODIFY_INDEX,
  schema: {
    id: 'string',
    namespace: 'string',
    name: 'string',
    parent_id: 'string',
    type: 'string',
    priority: 'integer',
    datacenters: 'array',
    periodic: 'boolean',
    parameterized_job: 'boolean',
    stop: 'boolean',
    status: 'string',
    status_description: 'string',
    job_summary: 'object',
    meta: 'object',
    submit_time: 'datetime',
    create_index: 'integer',
    modify_index: 'integer',
    job_modify_index: 'integer',
  },
};

export const ALLOCATIONS_STREAM: StreamDefinition = {
  name: 'allocations',
  path: '/v1/allocations',
  // Task state histories are large and change on every event
  params: { task_states: 'false' },
  primaryKeys: ['id'],
  replicationMethod: 'INCREMENTAL',
  replicationKey: MODIFY_INDEX,
  schema: {
    id: 'string',
    namespace: 'string',
    name: 'string',
    eval_id: 'string',
    node_id: 'string',
    node_name: 'string',
    job_id: 'string',
    job_type: 'string',
    job_version: 'integer',
    task_group: 'string',
    desired_status: 'string',
    desired_description: 'string',
    client_status: 'string',
    client_description: 'string',
    deployment_status: 'object',
    followup_eval_id: 'string',
    create_time: 'datetime',
    modify_time: 'datetime',
    create_index: 'integer',
    modify_index: 'integer',
  },
};

export const NODES_STREAM: StreamDefinition = {
  name: 'nodes',
  path: '/v1/nodes',
  primaryKeys: ['id'],
  replicationMethod: 'FULL_TABLE',
  schema: {
    id: 'string',
    name: 'string',
    address: 'string',
    datacenter: 'string',
    node_class: 'string',
    node_pool: 'string',
    version: 'string',
    drain: 'boolean',
    scheduling_eligibility: 'string',
    status: 'string',
    status_description: 'string',
    drivers: 'object',
    create_index: 'integer',
    modify_index: 'integer',
  },
};

export const DEPLOYMENTS_STREAM: StreamDefinition = {
  name: 'deployments',
  path: '/v1/deployments',
  primaryKeys: ['id'],
  replicationMethod: 'INCREMENTAL',
  replicationKey: MODIFY_INDEX,
  schema: {
    id: 'string',
    namespace: 'string',
    job_id: 'string',
    job_version: 'integer',
    job_create_index: 'integer',
    job_modify_index: 'integer',
    is_multiregion: 'boolean',
    task_groups: 'object',
    status: 'string',
    status_description: 'string',
    create_index: 'integer',
    modify_index: 'integer',
  },
};

export const EVALUATIONS_STREAM: StreamDefinition = {
  name: 'evaluations',
  path: '/v1/evaluations',
  primaryKeys: ['id'],
  replicationMethod: 'INCREMENTAL',
  replicationKey: MODIFY_INDEX,
  schema: {
    id: 'string',
    namespace: 'string',
    priority: 'integer',
    type: 'string',
    triggered_by: 'string',
    job_id: 'string',
    job_modify_index: 'integer',
    node_id: 'string',
    deployment_id: 'string',
    status: 'string',
    status_description: 'string',
    next_eval: 'string',
    previous_eval: 'string',
    blocked_eval: 'string',
    create_time: 'datetime',
    modify_time: 'datetime',
    create_index: 'integer',
    modify_index: 'integer',
  },
};

export const NAMESPACES_STREAM: StreamDefinition = {
  name: 'namespaces',
  path: '/v1/namespaces',
  primaryKeys: ['name'],
  replicationMethod: 'FULL_TABLE',
  schema: {
    name: 'string',
    description: 'string',
    quota: 'string',
    meta: 'object',
    create_index: 'integer',
    modify_index: 'integer',
  },
};

/** Discovery order; streams run in this order */
export const NOMAD_STREAMS: readonly StreamDefinition[] = [
  JOBS_STREAM,
  ALLOCATIONS_STREAM,
  NODES_STREAM,
  DEPLOYMENTS_STREAM,
  EVALUATIONS_STREAM,
  NAMESPACES_STREAM,
];

/**
 * Creates the frozen registry of every Nomad stream.
 */
export function createNomadSchemaRegistry(): SchemaRegistry {
  const registry = new SchemaRegistry();
  for (const definition of NOMAD_STREAMS) {
    registry.register(definition);
  }
  return registry.freeze();
}
