/**
 * ecs-mgr command line: flag parsing, validation, and dispatch.
 *
 * `runCli` never exits the process; it resolves to the exit code and the
 * bin entry assigns it to `process.exitCode`.
 */

import { Command, CommanderError } from "commander";

import { describeConfig, resolveConfig, SUPPORTED_REGIONS, type EcsMgrConfig, type RawOptions } from "../config/config.js";
import type { ControlPlane } from "../containers/types.js";
import { OPERATION_NAMES, OPERATIONS, resolveOperation } from "../commands/ecs.js";
import {
  EXIT_FAILURE,
  EXIT_OK,
  EXIT_USAGE,
  MissingDependencyError,
  TransportError,
  UsageError,
  formatErrorMessage,
} from "../errors.js";
import { defaultRuntime, type RuntimeEnv } from "../runtime.js";
import { themeFor, type Theme } from "../terminal/theme.js";
import { checkDependencies } from "./preflight.js";

export const PROGRAM_NAME = "ecs-mgr";

export type CliDeps = {
  runtime?: RuntimeEnv;
  /** Builds the control plane once the config has been validated. */
  createControlPlane?: (config: EcsMgrConfig) => Promise<ControlPlane>;
  checkDependencies?: () => Promise<void>;
};

const USAGE =
  "-r|--region <region> -c|--cluster <cluster> [-s|--service <service>] [-d|--debug] -e|--execute <subcommand> [-h|--help]";

function formatSubcommandHelp(): string {
  const width = Math.max(...OPERATION_NAMES.map((name) => name.length)) + 2;
  const lines = OPERATION_NAMES.map((name) => `  ${name.padEnd(width)}${OPERATIONS[name].description}`);
  return `\nSubcommands:\n${lines.join("\n")}\n`;
}

function stripTrailingNewline(text: string): string {
  return text.endsWith("\n") ? text.slice(0, -1) : text;
}

export function buildProgram(runtime: RuntimeEnv): Command {
  return new Command()
    .name(PROGRAM_NAME)
    .description("Inspect and control ECS services in a cluster")
    .usage(USAGE)
    .option("-r, --region <region>", `one of: [${SUPPORTED_REGIONS.join(" | ")}] (default: us-east-1)`)
    .option("-c, --cluster <cluster>", "ECS cluster name")
    .option("-s, --service <service>", "ECS service name")
    .option("-d, --debug", "enable debug mode")
    .option("-e, --execute <subcommand>", "subcommand to run")
    .helpOption("-h, --help", "show this help")
    .addHelpText("after", formatSubcommandHelp())
    .allowExcessArguments(false)
    .showSuggestionAfterError(false)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => runtime.log(stripTrailingNewline(text)),
      writeErr: (text) => runtime.error(stripTrailingNewline(text)),
      // Parse errors are reported by runCli along with the usage text.
      outputError: () => undefined,
    });
}

function printUsage(program: Command): void {
  program.outputHelp({ error: true });
}

const VALUE_FLAGS = new Set(["-r", "--region", "-c", "--cluster", "-s", "--service", "-e", "--execute"]);
const HELP_FLAGS = new Set(["-h", "--help"]);

/**
 * Scan argv left to right for a help flag. The token after a value flag is
 * that flag's value, so `-c -h` names a cluster rather than asking for help.
 * Runs before commander so that help wins over any later parse error.
 */
export function isHelpRequested(argv: readonly string[]): boolean {
  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];
    if (token === "--") return false;
    if (HELP_FLAGS.has(token)) return true;
    if (VALUE_FLAGS.has(token)) i++;
  }
  return false;
}

/**
 * Map any failure to its diagnostic and exit code.
 */
function reportError(error: unknown, program: Command, runtime: RuntimeEnv, colors: Theme): number {
  if (error instanceof CommanderError) {
    if (error.code === "commander.helpDisplayed" || error.code === "commander.help") {
      return EXIT_OK;
    }
    runtime.error(colors.error(error.message));
    printUsage(program);
    return EXIT_USAGE;
  }

  if (error instanceof UsageError) {
    runtime.error(colors.error(`[ERROR] ${error.message}`));
    printUsage(program);
    return error.exitCode;
  }

  if (error instanceof MissingDependencyError) {
    runtime.error(colors.error(`[ERROR] ${error.message}`));
    return error.exitCode;
  }

  if (error instanceof TransportError) {
    runtime.error(colors.error(`[ERROR] ${error.describe()}`));
    return error.exitCode;
  }

  runtime.error(colors.error(`[ERROR] ${formatErrorMessage(error)}`));
  return EXIT_FAILURE;
}

async function createDefaultControlPlane(config: EcsMgrConfig): Promise<ControlPlane> {
  const { createEcsControlPlane } = await import("../containers/control-plane.js");
  return createEcsControlPlane({ region: config.region });
}

/**
 * Parse `argv` (without the node and script entries) and run the selected
 * operation.
 */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const runtime = deps.runtime ?? defaultRuntime;
  const colors = themeFor(runtime.colors);
  const program = buildProgram(runtime);

  try {
    await (deps.checkDependencies ?? checkDependencies)();

    if (argv.length === 0) {
      printUsage(program);
      return EXIT_USAGE;
    }

    if (isHelpRequested(argv)) {
      program.outputHelp();
      return EXIT_OK;
    }

    program.parse(argv, { from: "user" });
    const config = resolveConfig(program.opts<RawOptions>());

    if (config.debug) {
      for (const line of describeConfig(config)) {
        runtime.log(line);
      }
    }

    const operation = resolveOperation(config);
    const controlPlane = await (deps.createControlPlane ?? createDefaultControlPlane)(config);
    return await operation.run({ config, controlPlane, runtime, theme: colors });
  } catch (error) {
    return reportError(error, program, runtime, colors);
  }
}
