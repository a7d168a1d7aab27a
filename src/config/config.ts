/**
 * Resolved CLI configuration: TypeBox schema, region defaults, and the
 * validation that turns parsed flags into an immutable config value.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { UsageError } from "../errors.js";

export const SUPPORTED_REGIONS = ["us-east-1", "sa-east-1", "us-west-2"] as const;

export type SupportedRegion = (typeof SUPPORTED_REGIONS)[number];

export const DEFAULT_REGION: SupportedRegion = "us-east-1";

export const configSchema = Type.Object({
  region: Type.Union([Type.Literal("us-east-1"), Type.Literal("sa-east-1"), Type.Literal("us-west-2")]),
  cluster: Type.String({ minLength: 1, description: "ECS cluster name or ARN" }),
  service: Type.Optional(Type.String({ minLength: 1, description: "ECS service name" })),
  debug: Type.Boolean(),
  operation: Type.String({ minLength: 1, description: "Subcommand to execute" }),
});

export type EcsMgrConfig = Readonly<Static<typeof configSchema>>;

/** Flag values as they come out of the argument parser. */
export type RawOptions = {
  region?: string;
  cluster?: string;
  service?: string;
  debug?: boolean;
  execute?: string;
};

export function isSupportedRegion(value: string | undefined): value is SupportedRegion {
  return SUPPORTED_REGIONS.some((region) => region === value);
}

/**
 * Anything outside the supported list (including no value) falls back to the
 * default region.
 */
export function resolveRegion(value: string | undefined): SupportedRegion {
  return isSupportedRegion(value) ? value : DEFAULT_REGION;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === "" ? undefined : value;
}

export function resolveConfig(raw: RawOptions): EcsMgrConfig {
  const cluster = nonEmpty(raw.cluster);
  const operation = nonEmpty(raw.execute);

  const missing: string[] = [];
  if (!cluster) missing.push("-c|--cluster");
  if (!operation) missing.push("-e|--execute");
  if (!cluster || !operation) {
    throw new UsageError(`missing required argument(s): ${missing.join(", ")}`);
  }

  const service = nonEmpty(raw.service);
  const candidate: Static<typeof configSchema> = {
    region: resolveRegion(raw.region),
    cluster,
    debug: raw.debug ?? false,
    operation,
    ...(service ? { service } : {}),
  };

  if (!Value.Check(configSchema, candidate)) {
    const first = Value.Errors(configSchema, candidate).First();
    throw new UsageError(`invalid configuration: ${first ? `${first.path} ${first.message}` : "unknown"}`);
  }

  return Object.freeze(candidate);
}

/** Lines echoed in debug mode before an operation runs. */
export function describeConfig(config: EcsMgrConfig): string[] {
  return [
    "[DEBUG] Arguments:",
    `region  : ${config.region}`,
    `cluster : ${config.cluster}`,
    `service : ${config.service ?? ""}`,
    `execute : ${config.operation}`,
  ];
}
