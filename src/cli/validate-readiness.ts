import { hideBin } from "yargs/helpers";

import { config } from "@/lib/config";
import { createLogFileStream, createLogger } from "@/lib/logger";

import { parseReadinessArgs, runReadinessCli } from "./readiness";

const main = async (): Promise<number> => {
  const options = parseReadinessArgs(hideBin(process.argv));
  const stream = createLogFileStream("readiness");
  const logger = createLogger({ level: options.verbose ? "debug" : "warn", stream });

  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort());

  try {
    return await runReadinessCli(options, {
      logger,
      signal: controller.signal,
      awsRegion: config.aws.region,
    });
  } finally {
    await new Promise<void>((resolve) => {
      stream.end(() => resolve());
    });
  }
};

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    console.error("Unhandled error:", error);
    process.exit(1);
  });
