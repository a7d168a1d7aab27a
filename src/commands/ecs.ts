/**
 * ECS subcommands
 *
 * Fixed table of the eight operations `-e|--execute` accepts. Each entry
 * declares whether it needs `-s|--service` and composes one or more
 * control-plane calls into line-oriented output.
 */

import type { EcsMgrConfig } from "../config/config.js";
import { shortName, sortedShortNames } from "../containers/arn.js";
import type { ControlPlane, ServiceCapacity } from "../containers/types.js";
import { EXIT_FAILURE, EXIT_INVALID_OPERATION, EXIT_OK, TransportError, UsageError, formatErrorMessage } from "../errors.js";
import type { RuntimeEnv } from "../runtime.js";
import type { Theme } from "../terminal/theme.js";

// =============================================================================
// Types
// =============================================================================

export const OPERATION_NAMES = [
  "list_services",
  "list_tasks",
  "list_task_arns",
  "list_all_task_arns",
  "start",
  "stop",
  "start_all",
  "stop_all",
] as const;

export type OperationName = (typeof OPERATION_NAMES)[number];

export type OperationContext = {
  config: EcsMgrConfig;
  controlPlane: ControlPlane;
  runtime: RuntimeEnv;
  theme: Theme;
};

export type Operation = {
  name: OperationName;
  description: string;
  requiresService: boolean;
  /** Resolves to the process exit code. */
  run: (ctx: OperationContext) => Promise<number>;
};

/**
 * Outcome of an operation applied to every service in a cluster
 */
export type BulkResult = {
  succeeded: string[];
  failed: Array<{ name: string; error: unknown }>;
};

// =============================================================================
// Helpers
// =============================================================================

function debug(ctx: OperationContext, message: string): void {
  if (ctx.config.debug) {
    ctx.runtime.log(message);
  }
}

function printLines(ctx: OperationContext, lines: string[]): void {
  for (const line of lines) {
    ctx.runtime.log(line);
  }
}

function requireService(config: EcsMgrConfig): string {
  if (!config.service) {
    throw missingServiceError();
  }
  return config.service;
}

function missingServiceError(): UsageError {
  return new UsageError("no service specified as arg. need one of -s|--service <service>", {
    exitCode: EXIT_INVALID_OPERATION,
  });
}

export function describeFailure(error: unknown): string {
  return error instanceof TransportError ? error.describe() : formatErrorMessage(error);
}

export function formatCapacity(capacity: ServiceCapacity): string {
  const fields = [capacity.serviceName, `desiredCount=${capacity.desiredCount}`];
  if (capacity.runningCount !== undefined) fields.push(`runningCount=${capacity.runningCount}`);
  if (capacity.status !== undefined) fields.push(`status=${capacity.status}`);
  return fields.join(" ");
}

/**
 * Run `fn` for each service in order, one call at a time. A failing service
 * is reported and skipped.
 */
export async function forEachService(
  ctx: OperationContext,
  services: string[],
  fn: (service: string) => Promise<void>,
): Promise<BulkResult> {
  const result: BulkResult = { succeeded: [], failed: [] };
  for (const service of services) {
    try {
      await fn(service);
      result.succeeded.push(service);
    } catch (error) {
      result.failed.push({ name: service, error });
      ctx.runtime.error(ctx.theme.error(`[ERROR] ${service}: ${describeFailure(error)}`));
    }
  }
  return result;
}

function bulkExitCode(result: BulkResult): number {
  return result.failed.length > 0 ? EXIT_FAILURE : EXIT_OK;
}

async function listShortServiceNames(ctx: OperationContext): Promise<string[]> {
  return sortedShortNames(await ctx.controlPlane.listServiceNames(ctx.config.cluster));
}

async function scaleAll(ctx: OperationContext, count: number): Promise<number> {
  const services = await listShortServiceNames(ctx);
  const result = await forEachService(ctx, services, async (service) => {
    await ctx.controlPlane.setDesiredCount(ctx.config.cluster, service, count);
  });
  return bulkExitCode(result);
}

async function scaleOne(ctx: OperationContext, count: number): Promise<number> {
  const service = requireService(ctx.config);
  const capacity = await ctx.controlPlane.setDesiredCount(ctx.config.cluster, service, count);
  ctx.runtime.log(formatCapacity(capacity));
  return EXIT_OK;
}

// =============================================================================
// Operations
// =============================================================================

export const OPERATIONS: Record<OperationName, Operation> = {
  list_services: {
    name: "list_services",
    description: "list all services in a cluster",
    requiresService: false,
    run: async (ctx) => {
      debug(ctx, `[DEBUG] listing services for cluster: ${ctx.config.cluster}`);
      printLines(ctx, await listShortServiceNames(ctx));
      return EXIT_OK;
    },
  },

  list_tasks: {
    name: "list_tasks",
    description: "list all tasks for a service in a cluster",
    requiresService: true,
    run: async (ctx) => {
      const service = requireService(ctx.config);
      debug(ctx, `[INFO] tasks for service: ${service} in cluster: ${ctx.config.cluster}`);
      const tasks = await ctx.controlPlane.listTaskNames(ctx.config.cluster, service);
      printLines(ctx, sortedShortNames(tasks));
      return EXIT_OK;
    },
  },

  list_task_arns: {
    name: "list_task_arns",
    description: "list the task definitions for a service in a cluster",
    requiresService: true,
    run: async (ctx) => {
      const service = requireService(ctx.config);
      debug(ctx, `[INFO] task arns for service: ${service} in cluster: ${ctx.config.cluster}`);
      const refs = await ctx.controlPlane.listTaskDefinitionRefs(ctx.config.cluster, [service]);
      printLines(ctx, sortedShortNames([...refs.values()]));
      return EXIT_OK;
    },
  },

  // Requires -s like the other service-scoped commands even though it walks
  // the whole cluster.
  list_all_task_arns: {
    name: "list_all_task_arns",
    description: "list all task definitions for all services in a cluster",
    requiresService: true,
    run: async (ctx) => {
      requireService(ctx.config);
      debug(ctx, `[INFO] all task arns for cluster: ${ctx.config.cluster}`);
      const services = await listShortServiceNames(ctx);
      const result = await forEachService(ctx, services, async (service) => {
        const refs = await ctx.controlPlane.listTaskDefinitionRefs(ctx.config.cluster, [service]);
        printLines(ctx, [...refs.values()].map(shortName));
      });
      return bulkExitCode(result);
    },
  },

  start: {
    name: "start",
    description: "start a service in a cluster",
    requiresService: true,
    run: async (ctx) => {
      debug(ctx, `[INFO] starting service: ${requireService(ctx.config)} in cluster: ${ctx.config.cluster}`);
      return scaleOne(ctx, 1);
    },
  },

  stop: {
    name: "stop",
    description: "stop a service in a cluster",
    requiresService: true,
    run: async (ctx) => {
      debug(ctx, `[INFO] stopping service: ${requireService(ctx.config)} in cluster: ${ctx.config.cluster}`);
      return scaleOne(ctx, 0);
    },
  },

  start_all: {
    name: "start_all",
    description: "start all services in a cluster",
    requiresService: false,
    run: async (ctx) => {
      debug(ctx, `[INFO] starting all services in cluster: ${ctx.config.cluster}`);
      return scaleAll(ctx, 1);
    },
  },

  stop_all: {
    name: "stop_all",
    description: "stop all services in a cluster",
    requiresService: false,
    run: async (ctx) => {
      debug(ctx, `[INFO] stopping all services in cluster: ${ctx.config.cluster}`);
      return scaleAll(ctx, 0);
    },
  },
};

export function isOperationName(value: string): value is OperationName {
  return OPERATION_NAMES.some((name) => name === value);
}

/**
 * Look up the operation named by the config and check its service
 * requirement. Both failures exit with 99.
 */
export function resolveOperation(config: EcsMgrConfig): Operation {
  if (!isOperationName(config.operation)) {
    throw new UsageError("invalid subcommand specified", { exitCode: EXIT_INVALID_OPERATION });
  }
  const operation = OPERATIONS[config.operation];
  if (operation.requiresService && !config.service) {
    throw missingServiceError();
  }
  return operation;
}
