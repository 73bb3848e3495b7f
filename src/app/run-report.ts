/**
 * Report driver: configuration, logging, one-time dataset load, report output.
 * Returns the process exit code instead of exiting.
 */

import { createConfig, parseEnv, type AppConfig } from '../infra/config/index.js';
import { createChildLogger, createLogger } from '../infra/logger/index.js';
import { buildReport, createLegoSetRepo, renderReport } from '../modules/lego-sets/index.js';
import { formatLoadError } from '../modules/static-records/index.js';

export interface ReportOutput {
  write(chunk: string): boolean;
}

export interface RunReportDeps {
  env: NodeJS.ProcessEnv;
  stdout: ReportOutput;
  /** Receives configuration errors, which occur before a logger exists. */
  stderr: ReportOutput;
  cwd?: string;
}

export const runReport = (deps: RunReportDeps): number => {
  let config: AppConfig;
  try {
    config = createConfig(parseEnv(deps.env, deps.cwd));
  } catch (error: unknown) {
    deps.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
    return 1;
  }

  const logger = createLogger(config.logger);

  const repoResult = createLegoSetRepo({
    dataDir: config.data.dir,
    logger: createChildLogger(logger, { module: 'static-records' }),
  });
  if (repoResult.isErr()) {
    logger.error(
      { errorType: repoResult.error.type, path: repoResult.error.path },
      formatLoadError(repoResult.error).join('\n')
    );
    return 1;
  }

  const sets = repoResult.value.getAll();
  logger.info({ setCount: sets.length }, 'Dataset loaded');

  deps.stdout.write(renderReport(buildReport(sets)));
  return 0;
};
