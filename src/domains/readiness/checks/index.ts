import type { CheckDefinition } from "../types";

import { type CallerIdentityProbe, createAwsCredentialsCheck } from "./aws-credentials";
import { type ModuleLoader, createRequiredPackagesCheck } from "./required-packages";
import { createNodeVersionCheck } from "./node-version";

export interface StandardChecksOptions {
  identityProbe: CallerIdentityProbe;
  nodeVersion?: string;
  loadModule?: ModuleLoader;
}

/**
 * The deployment prerequisites, in reporting order.
 */
export const createStandardChecks = (options: StandardChecksOptions): CheckDefinition[] => [
  {
    name: "node_version",
    label: "Node.js Version",
    run: createNodeVersionCheck({ version: options.nodeVersion }),
  },
  {
    name: "required_packages",
    label: "Required Packages",
    run: createRequiredPackagesCheck({ load: options.loadModule }),
  },
  {
    name: "aws_credentials",
    label: "AWS Credentials",
    run: createAwsCredentialsCheck(options.identityProbe),
  },
];

export * from "./aws-credentials";
export * from "./node-version";
export * from "./required-packages";
