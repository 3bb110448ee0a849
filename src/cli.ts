#!/usr/bin/env node
import { parseArgs, printHelp } from "./args";
import { logger } from "./logger";
import { packageVersion } from "./package-info";
import { isMainModule } from "./runtime";
import { runCliFlow } from "./scraper";

export async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  try {
    const { options, showHelp, showVersion } = parseArgs(argv);

    if (showVersion) {
      console.log(packageVersion);
      return;
    }
    if (showHelp) {
      printHelp();
      return;
    }

    logger.configure({
      verbose: options.verbose,
      showProgress: options.progress,
    });

    const compiled = await runCliFlow(options);
    if (compiled?.ok) {
      logger.info(`Done! Documentation has been saved to ${compiled.outputPath}`);
    }
  } catch (error) {
    printHelp();
    logger.error(String(error));
    process.exitCode = 1;
  }
}

if (isMainModule(import.meta.url)) {
  void main();
}
