/**
 * ECS control-plane types
 */

import type { AwsCredentialIdentity } from "@smithy/types";

/**
 * Control-plane client configuration
 */
export interface EcsControlPlaneConfig {
  /** AWS region every call is issued against */
  region: string;
  /** Static credentials; the SDK default provider chain is used when absent */
  credentials?: AwsCredentialIdentity;
}

/**
 * Capacity of a service as reported back by UpdateService. `runningCount`
 * and `status` are absent when the response carries no service.
 */
export interface ServiceCapacity {
  serviceName: string;
  desiredCount: number;
  runningCount?: number;
  status?: string;
}

/**
 * The four control-plane calls the commands are built from.
 * Implemented by `EcsControlPlane`; tests provide in-memory fakes.
 */
export interface ControlPlane {
  /** Full service ARNs in the cluster */
  listServiceNames(cluster: string): Promise<string[]>;
  /** Full ARNs of the running tasks for one service */
  listTaskNames(cluster: string, service: string): Promise<string[]>;
  /** Task definition ARN per service name */
  listTaskDefinitionRefs(cluster: string, services: string[]): Promise<Map<string, string>>;
  setDesiredCount(cluster: string, service: string, count: number): Promise<ServiceCapacity>;
}
