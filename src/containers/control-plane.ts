/**
 * ECS Control Plane
 *
 * Thin adapter over the ECS API used by the ecs-mgr commands:
 * - ListServices / ListTasks for name listings
 * - DescribeServices for task definition references
 * - UpdateService for desired count changes
 *
 * Results are returned as the API reports them. Rejections are wrapped in
 * TransportError and never retried here.
 */

import {
  ECSClient,
  ListServicesCommand,
  ListTasksCommand,
  DescribeServicesCommand,
  UpdateServiceCommand,
} from '@aws-sdk/client-ecs';

import { TransportError } from '../errors.js';
import { shortName } from './arn.js';
import type { ControlPlane, EcsControlPlaneConfig, ServiceCapacity } from './types.js';

export class EcsControlPlane implements ControlPlane {
  private ecsClient: ECSClient;
  readonly region: string;

  constructor(config: EcsControlPlaneConfig) {
    this.region = config.region;
    this.ecsClient = new ECSClient({
      region: config.region,
      credentials: config.credentials,
    });
  }

  async listServiceNames(cluster: string): Promise<string[]> {
    const command = new ListServicesCommand({ cluster });
    const response = await this.call('ListServices', () => this.ecsClient.send(command));
    return response.serviceArns ?? [];
  }

  async listTaskNames(cluster: string, service: string): Promise<string[]> {
    const command = new ListTasksCommand({ cluster, serviceName: service });
    const response = await this.call('ListTasks', () => this.ecsClient.send(command));
    return response.taskArns ?? [];
  }

  /**
   * Services reported under `failures` (e.g. MISSING) or without a task
   * definition are left out of the map.
   */
  async listTaskDefinitionRefs(cluster: string, services: string[]): Promise<Map<string, string>> {
    const refs = new Map<string, string>();
    if (services.length === 0) {
      return refs;
    }

    const command = new DescribeServicesCommand({ cluster, services });
    const response = await this.call('DescribeServices', () => this.ecsClient.send(command));

    for (const service of response.services ?? []) {
      const name = service.serviceName ?? (service.serviceArn ? shortName(service.serviceArn) : undefined);
      if (name && service.taskDefinition) {
        refs.set(name, service.taskDefinition);
      }
    }
    return refs;
  }

  async setDesiredCount(cluster: string, service: string, count: number): Promise<ServiceCapacity> {
    if (!Number.isInteger(count) || count < 0) {
      throw new RangeError(`desired count must be a non-negative integer, got ${count}`);
    }

    const command = new UpdateServiceCommand({ cluster, service, desiredCount: count });
    const response = await this.call('UpdateService', () => this.ecsClient.send(command));
    const updated = response.service;

    return {
      serviceName: updated?.serviceName ?? service,
      desiredCount: updated?.desiredCount ?? count,
      runningCount: updated?.runningCount,
      status: updated?.status,
    };
  }

  private async call<T>(operation: string, send: () => Promise<T>): Promise<T> {
    try {
      return await send();
    } catch (error) {
      throw new TransportError(operation, error);
    }
  }
}

/**
 * Create an ECS control plane client
 */
export function createEcsControlPlane(config: EcsControlPlaneConfig): EcsControlPlane {
  return new EcsControlPlane(config);
}
