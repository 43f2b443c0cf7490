import { buildProgram } from "./cli";
import { loadConfig } from "./config";
import { describeError } from "./errors";
import { logger } from "./logger";

async function main(): Promise<void> {
  const config = loadConfig();
  await buildProgram(config).parseAsync(process.argv);
}

main().catch((error) => {
  logger.error(`Command failed: ${describeError(error)}`);
  process.exitCode = 1;
});
