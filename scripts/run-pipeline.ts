import { createConfig, parseEnv } from '../src/infra/config/index.js';
import { createLogger } from '../src/infra/logger/index.js';
import { runPipeline } from '../src/modules/pipeline/index.js';

const main = async (): Promise<void> => {
  const config = createConfig(parseEnv(process.env));
  const logger = createLogger(config.logger);

  const result = await runPipeline(config, logger);

  if (result.isErr()) {
    const { stage, file, line, field, message } = result.error;
    logger.error({ stage, file, line, field }, message);
    process.exitCode = 1;
    return;
  }

  const { parse, decode, aggregate } = result.value;
  logger.info(
    {
      cards: parse.files.length,
      records: parse.recordCount,
      skipped: parse.skippedCount,
      unresolvedCodes: decode.unresolved.length,
      reports: aggregate.reports,
    },
    'Pipeline finished'
  );
};

await main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
