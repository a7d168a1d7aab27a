import { MissingDependencyError } from "../errors.js";

/** Modules the commands cannot run without. Checked before argument parsing. */
export const REQUIRED_MODULES = ["@aws-sdk/client-ecs"] as const;

export type ModuleLoader = (specifier: string) => Promise<unknown>;

const importModule: ModuleLoader = (specifier) => import(specifier);

export async function checkDependencies(load: ModuleLoader = importModule): Promise<void> {
  for (const specifier of REQUIRED_MODULES) {
    try {
      await load(specifier);
    } catch (error) {
      throw new MissingDependencyError(specifier, error);
    }
  }
}
