import { runCli } from "./cli/main";
import { toErrorDetails } from "./shared/logger/errorDetails";
import { logger } from "./shared/logger/logger";

const entryLogger = logger.child({ entrypoint: "cli" });

runCli(process.argv).catch((error: unknown) => {
  entryLogger.fatal(
    { argv: process.argv.slice(2), error: toErrorDetails(error) },
    "concall-archiver stopped on an unhandled error",
  );
  process.exitCode = 1;
});
