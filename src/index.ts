import "dotenv/config";
import { createCliProgram } from "./cli";
import { CancellationError } from "./summarizer";
import { logger } from "./utils/logger";

async function main(): Promise<void> {
  try {
    await createCliProgram().parseAsync(process.argv);
  } catch (error) {
    if (error instanceof CancellationError) {
      logger.warn("Summarization cancelled.");
      process.exitCode = 130;
      return;
    }
    logger.error(`❌ ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
  }
}

void main();
