/**
 * Expedientes CLI
 *
 * Processes an image, PDF or directory and logs a batch summary.
 */

import {
  config,
  createPipelineContext,
  describeError,
  logger,
  processPath,
  runWithContextAsync,
  summarizeResults,
} from '@expedientes/shared';
import { createRuntime } from '@expedientes/runtime';
import { ulid } from 'ulid';
import { EXIT_CODES, exitCodeFor, parseCliArgs, USAGE } from './lib/args';

async function main(argv: string[]): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (!parsed.ok) {
    console.error(`${parsed.error.message}\n\n${USAGE}`);
    return EXIT_CODES.FAILURE;
  }
  if (parsed.value.help) {
    console.log(USAGE);
    return EXIT_CODES.OK;
  }

  const options = parsed.value.options;
  const runtime = createRuntime();
  const context = createPipelineContext(runtime.deps, {
    concurrency: options.concurrency ?? config.batchConcurrency,
  });

  try {
    return await runWithContextAsync({ correlationId: ulid() }, async () => {
      const started = Date.now();
      const results = await processPath(
        options.input,
        context,
        options.processing,
        options.output ?? config.defaultOutputDir
      );
      const summary = summarizeResults(results, context.settings.qualityThresholds);

      logger.info('Batch summary', { ...summary, duration_ms: Date.now() - started });
      return exitCodeFor(results, options.failOnErrors);
    });
  } catch (error) {
    logger.error('Processing aborted', error);
    console.error(describeError(error));
    return EXIT_CODES.FAILURE;
  } finally {
    await runtime.close();
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    logger.error('Unexpected failure', error);
    process.exitCode = EXIT_CODES.FAILURE;
  }
);
