import { errorMessage } from "@/lib/errors";

import type { CheckFn } from "../types";

export interface CallerIdentity {
  account?: string;
  arn?: string;
}

export type CallerIdentityProbe = () => Promise<CallerIdentity>;

export type StsModule = typeof import("@aws-sdk/client-sts");

const importSts = (): Promise<StsModule> => import("@aws-sdk/client-sts");

/**
 * Resolves the caller identity through STS using the default credential chain.
 * The SDK is loaded on first call, so a missing package fails this check
 * instead of the whole run.
 */
export const createStsCallerIdentityProbe = (
  region?: string,
  loadSdk: () => Promise<StsModule> = importSts,
): CallerIdentityProbe => {
  return async () => {
    const { STSClient, GetCallerIdentityCommand } = await loadSdk();
    const client = new STSClient(region ? { region } : {});
    try {
      const response = await client.send(new GetCallerIdentityCommand({}));
      return { account: response.Account, arn: response.Arn };
    } finally {
      client.destroy();
    }
  };
};

/**
 * Any probe failure (network, auth, missing region) is reported as a failed
 * check with the error text kept.
 */
export const createAwsCredentialsCheck = (probe: CallerIdentityProbe): CheckFn => {
  return async () => {
    try {
      const identity = await probe();
      if (!identity.account) {
        return { success: false, message: "AWS credentials not configured" };
      }
      return { success: true, message: `AWS Account: ${identity.account}` };
    } catch (error) {
      return { success: false, message: `AWS credentials error: ${errorMessage(error)}` };
    }
  };
};
