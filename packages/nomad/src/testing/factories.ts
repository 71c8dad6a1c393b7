/**
 * Fixture factories for Nomad list stubs. Indexes and timestamps are
 * deterministic so tests can assert exact values.
 */

import type {
  NomadAllocListStub,
  NomadDeployment,
  NomadEvaluation,
  NomadJobListStub,
  NomadNamespace,
  NomadNodeListStub,
} from '../types.js';

/** 2024-01-01T00:00:00.000Z in nanoseconds */
export const BASE_TIME_NANOS = 1_704_067_200_000 * 1_000_000;

export function createMockJob(overrides: Partial<NomadJobListStub> = {}): NomadJobListStub {
  return {
    ID: 'web',
    ParentID: '',
    Name: 'web',
    Namespace: 'default',
    Datacenters: ['dc1'],
    Type: 'service',
    Priority: 50,
    Periodic: false,
    ParameterizedJob: false,
    Stop: false,
    Status: 'running',
    StatusDescription: '',
    JobSummary: null,
    CreateIndex: 10,
    ModifyIndex: 10,
    JobModifyIndex: 10,
    SubmitTime: BASE_TIME_NANOS,
    Meta: null,
    ...overrides,
  };
}

/** `count` jobs with IDs job-001.. and ModifyIndex firstIndex, firstIndex+1, .. */
export function createMockJobs(count: number, firstIndex = 100): NomadJobListStub[] {
  return Array.from({ length: count }, (_, i) => {
    const id = `job-${String(i + 1).padStart(3, '0')}`;
    return createMockJob({ ID: id, Name: id, CreateIndex: firstIndex + i, ModifyIndex: firstIndex + i, JobModifyIndex: firstIndex + i });
  });
}

export function createMockAllocation(overrides: Partial<NomadAllocListStub> = {}): NomadAllocListStub {
  return {
    ID: 'alloc-0001',
    EvalID: 'eval-0001',
    Name: 'web.web[0]',
    Namespace: 'default',
    NodeID: 'node-0001',
    NodeName: 'client-1',
    JobID: 'web',
    JobType: 'service',
    JobVersion: 0,
    TaskGroup: 'web',
    DesiredStatus: 'run',
    DesiredDescription: '',
    ClientStatus: 'running',
    ClientDescription: 'Tasks are running',
    DeploymentStatus: null,
    FollowupEvalID: '',
    CreateIndex: 20,
    ModifyIndex: 20,
    CreateTime: BASE_TIME_NANOS,
    ModifyTime: BASE_TIME_NANOS,
    ...overrides,
  };
}

export function createMockNode(overrides: Partial<NomadNodeListStub> = {}): NomadNodeListStub {
  return {
    ID: 'node-0001',
    Name: 'client-1',
    Address: '10.0.0.1',
    Datacenter: 'dc1',
    NodeClass: '',
    NodePool: 'default',
    Version: '1.7.3',
    Drain: false,
    SchedulingEligibility: 'eligible',
    Status: 'ready',
    StatusDescription: '',
    Drivers: { docker: { Detected: true, Healthy: true } },
    CreateIndex: 5,
    ModifyIndex: 5,
    ...overrides,
  };
}

export function createMockDeployment(overrides: Partial<NomadDeployment> = {}): NomadDeployment {
  return {
    ID: 'deploy-0001',
    Namespace: 'default',
    JobID: 'web',
    JobVersion: 0,
    JobModifyIndex: 10,
    JobCreateIndex: 10,
    IsMultiregion: false,
    TaskGroups: {},
    Status: 'successful',
    StatusDescription: 'Deployment completed successfully',
    CreateIndex: 30,
    ModifyIndex: 30,
    ...overrides,
  };
}

export function createMockEvaluation(overrides: Partial<NomadEvaluation> = {}): NomadEvaluation {
  return {
    ID: 'eval-0001',
    Namespace: 'default',
    Priority: 50,
    Type: 'service',
    TriggeredBy: 'job-register',
    JobID: 'web',
    JobModifyIndex: 10,
    NodeID: '',
    DeploymentID: '',
    Status: 'complete',
    StatusDescription: '',
    NextEval: '',
    PreviousEval: '',
    BlockedEval: '',
    CreateIndex: 11,
    ModifyIndex: 12,
    CreateTime: BASE_TIME_NANOS,
    ModifyTime: BASE_TIME_NANOS,
    ...overrides,
  };
}

export function createMockNamespace(overrides: Partial<NomadNamespace> = {}): NomadNamespace {
  return {
    Name: 'default',
    Description: 'Default shared namespace',
    Quota: '',
    Meta: null,
    CreateIndex: 1,
    ModifyIndex: 1,
    ...overrides,
  };
}
