import type { CheckFn } from "../types";

/** Runtime dependencies the service cannot start without. */
export const REQUIRED_PACKAGES: readonly string[] = [
  "hono",
  "@hono/node-server",
  "valibot",
  "cockatiel",
  "yargs",
  "@aws-sdk/client-sts",
];

export type ModuleLoader = (specifier: string) => Promise<unknown>;

const importModule: ModuleLoader = (specifier) => import(specifier);

export interface RequiredPackagesCheckOptions {
  packages?: readonly string[];
  load?: ModuleLoader;
}

/**
 * Tries to load every package and lists all of the missing ones, not just the
 * first.
 */
export const createRequiredPackagesCheck = (
  options: RequiredPackagesCheckOptions = {},
): CheckFn => {
  const { packages = REQUIRED_PACKAGES, load = importModule } = options;

  return async () => {
    const settled = await Promise.allSettled(packages.map((name) => load(name)));
    const missing = packages.filter((_, index) => settled[index]?.status === "rejected");

    if (missing.length === 0) {
      return { success: true, message: "All required packages available" };
    }
    return { success: false, message: `Missing packages: ${missing.join(", ")}` };
  };
};
