import type { CheckFn } from "../types";

export const MINIMUM_NODE_MAJOR = 20;

export interface NodeVersionCheckOptions {
  minimumMajor?: number;
  /** Version string without the leading "v", defaults to the running process */
  version?: string;
}

export const createNodeVersionCheck = (options: NodeVersionCheckOptions = {}): CheckFn => {
  const { minimumMajor = MINIMUM_NODE_MAJOR, version = process.versions.node } = options;

  return () => {
    const match = /^(\d+)\.\d+\.\d+/.exec(version);
    if (!match) {
      throw new Error(`Unrecognized Node.js version: ${version}`);
    }

    const success = Number(match[1]) >= minimumMajor;
    const message = `Node.js ${version}`;
    return {
      success,
      message: success ? message : `${message} (requires Node.js ${minimumMajor}+)`,
    };
  };
};
