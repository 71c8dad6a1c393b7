/**
 * List-stub shapes returned by the Nomad HTTP API. Only the fields the tap
 * extracts are declared; the API returns more and they are dropped.
 */

export interface NomadJobSummary {
  JobID: string;
  Namespace: string;
  Summary: Record<string, Record<string, number>>;
  CreateIndex: number;
  ModifyIndex: number;
}

export interface NomadJobListStub {
  ID: string;
  ParentID: string;
  Name: string;
  Namespace: string;
  Datacenters: string[];
  Type: 'service' | 'batch' | 'system' | 'sysbatch';
  Priority: number;
  Periodic: boolean;
  ParameterizedJob: boolean;
  Stop: boolean;
  Status: 'pending' | 'running' | 'dead';
  StatusDescription: string;
  JobSummary: NomadJobSummary | null;
  CreateIndex: number;
  ModifyIndex: number;
  JobModifyIndex: number;
  /** Unix epoch in nanoseconds */
  SubmitTime: number;
  Meta: Record<string, string> | null;
}

export interface NomadAllocDeploymentStatus {
  Healthy: boolean | null;
  Timestamp: string;
  Canary: boolean;
  ModifyIndex: number;
}

export interface NomadAllocListStub {
  ID: string;
  EvalID: string;
  Name: string;
  Namespace: string;
  NodeID: string;
  NodeName: string;
  JobID: string;
  JobType: string;
  JobVersion: number;
  TaskGroup: string;
  DesiredStatus: 'run' | 'stop' | 'evict';
  DesiredDescription: string;
  ClientStatus: 'pending' | 'running' | 'complete' | 'failed' | 'lost' | 'unknown';
  ClientDescription: string;
  DeploymentStatus: NomadAllocDeploymentStatus | null;
  FollowupEvalID: string;
  CreateIndex: number;
  ModifyIndex: number;
  /** Unix epoch in nanoseconds */
  CreateTime: number;
  /** Unix epoch in nanoseconds */
  ModifyTime: number;
}

export interface NomadNodeListStub {
  ID: string;
  Name: string;
  Address: string;
  Datacenter: string;
  NodeClass: string;
  NodePool: string;
  Version: string;
  Drain: boolean;
  SchedulingEligibility: 'eligible' | 'ineligible';
  Status: 'initializing' | 'ready' | 'down' | 'disconnected';
  StatusDescription: string;
  Drivers: Record<string, { Detected: boolean; Healthy: boolean }>;
  CreateIndex: number;
  ModifyIndex: number;
}

export interface NomadDeployment {
  ID: string;
  Namespace: string;
  JobID: string;
  JobVersion: number;
  JobModifyIndex: number;
  JobCreateIndex: number;
  IsMultiregion: boolean;
  TaskGroups: Record<string, unknown>;
  Status: 'running' | 'paused' | 'failed' | 'successful' | 'cancelled' | 'pending' | 'blocked' | 'unblocking';
  StatusDescription: string;
  CreateIndex: number;
  ModifyIndex: number;
}

export interface NomadEvaluation {
  ID: string;
  Namespace: string;
  Priority: number;
  Type: string;
  TriggeredBy: string;
  JobID: string;
  JobModifyIndex: number;
  NodeID: string;
  DeploymentID: string;
  Status: 'blocked' | 'pending' | 'complete' | 'failed' | 'canceled';
  StatusDescription: string;
  NextEval: string;
  PreviousEval: string;
  BlockedEval: string;
  CreateIndex: number;
  ModifyIndex: number;
  /** Unix epoch in nanoseconds */
  CreateTime: number;
  /** Unix epoch in nanoseconds */
  ModifyTime: number;
}

export interface NomadNamespace {
  Name: string;
  Description: string;
  Quota: string;
  Meta: Record<string, string> | null;
  CreateIndex: number;
  ModifyIndex: number;
}
