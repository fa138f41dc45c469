// Speech Feedback Service - Local file analysis
// Runs the pipeline once on a video already on disk and prints the result.
//
//   npm run build && npm run analyze -- path/to/speech.mp4

import "dotenv/config";
import { loadConfig } from "./config.js";
import { isPipelineError } from "./errors.js";
import { createLogger, describeError, setLogLevel } from "./logger.js";
import { createServices } from "./services.js";

const logger = createLogger("AnalyzeFile");

async function main(argv: string[]): Promise<number> {
  const videoPath = argv[0];
  if (!videoPath) {
    logger.error("Usage: analyze-file <video-path>");
    return 2;
  }

  const config = loadConfig();
  setLogLevel(config.logLevel);
  const services = createServices(config, logger);

  try {
    const result = await services.pipeline.analyzeLocalFile(videoPath);
    process.stdout.write(`${JSON.stringify(result, null, 2)}\n`);
    return 0;
  } catch (err) {
    if (isPipelineError(err)) {
      logger.error(`${err.name}: ${err.message}`);
    } else {
      logger.error(`Analysis failed: ${describeError(err)}`);
    }
    return 1;
  } finally {
    services.close();
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    logger.error(describeError(err));
    process.exitCode = 1;
  },
);
