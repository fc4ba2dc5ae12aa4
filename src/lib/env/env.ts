import * as v from "valibot";

import { type Env, envSchema } from "./schema";

/** One `  - PATH: message` line per issue. */
export const formatEnvIssues = (issues: readonly v.BaseIssue<unknown>[]): string[] =>
  issues.map((issue) => `  - ${v.getDotPath(issue) ?? "(root)"}: ${issue.message}`);

/**
 * Validates the environment against {@link envSchema}. Invalid configuration
 * is fatal: the issues are printed and the process exits with 1.
 */
export const parseEnv = (source: NodeJS.ProcessEnv = process.env): Env => {
  const result = v.safeParse(envSchema, source);
  if (result.success) {
    return result.output;
  }

  console.error("Environment variable validation failed:");
  for (const line of formatEnvIssues(result.issues)) {
    console.error(line);
  }
  process.exit(1);
};

// Parsed on first use so tests can set process.env beforehand
let cachedEnv: Env | undefined;

export const getEnv = (): Env => {
  if (!cachedEnv) {
    cachedEnv = parseEnv();
  }
  return cachedEnv;
};

export type { Env } from "./schema";
