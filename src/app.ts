import { describeConfig, loadConfig } from './config/config.js';
import { createBootstrapLogger, createLogger, type Logger } from './lib/logger.js';
import type { RunError } from './lib/errors.js';
import { ErrorKind, ExitCode } from './types/index.js';
import { S3ObjectStore, createS3Client, type ObjectStore } from './services/ObjectStoreGateway.js';
import { HubModelFetcher, type ModelFetcher } from './services/ModelFetcher.js';
import { WorkflowController, type Workspace } from './services/WorkflowController.js';

const BANNER = '='.repeat(60);

export interface AppOverrides {
  logger?: Logger;
  store?: ObjectStore;
  fetcher?: ModelFetcher;
  workspace?: Workspace;
}

export function failureCategory(error: RunError): string {
  switch (error.kind) {
    case ErrorKind.CONFIG:
      return 'Configuration error';
    case ErrorKind.VALIDATION:
      return 'Input validation error';
    case ErrorKind.STORE:
      return 'S3 operation error';
    case ErrorKind.FETCH:
      return 'Hub download error';
    case ErrorKind.FILESYSTEM:
      return 'Filesystem error';
    case ErrorKind.UNEXPECTED:
      return 'An unexpected error occurred';
  }
}

function banner(logger: Logger, level: 'info' | 'error', message: string): void {
  logger[level](BANNER);
  logger[level](message);
  logger[level](BANNER);
}

function reportFailure(logger: Logger, error: RunError): void {
  banner(logger, 'error', `FAILED: ${failureCategory(error)}`);
  if (error.kind === ErrorKind.UNEXPECTED) {
    logger.error({ error }, `Unexpected Error (${error.typeName}): ${error.message}`);
    logger.warn('This is an unexpected error type. Please report this issue.');
  } else {
    logger.error({ kind: error.kind, error }, error.message);
  }
}

/**
 * Load configuration from `env`, run the workflow once and return the
 * process exit code. Nothing here calls `process.exit`.
 */
export async function runApp(
  env: Readonly<Record<string, string | undefined>> = process.env,
  overrides: AppOverrides = {}
): Promise<ExitCode> {
  const bootstrapLogger = overrides.logger ?? createBootstrapLogger();
  banner(bootstrapLogger, 'info', 'Model Cache Loader - Starting');

  const loaded = loadConfig(env);
  if (!loaded.ok) {
    reportFailure(bootstrapLogger, loaded.error);
    return ExitCode.FAILURE;
  }
  const config = loaded.value;

  const logger = overrides.logger ?? createLogger(config.logging);
  logger.info({ config: describeConfig(config) }, 'Configuration loaded');

  const store = overrides.store ?? new S3ObjectStore(createS3Client(config.s3), logger);
  const fetcher = overrides.fetcher ?? HubModelFetcher.fromConfig(config.hub, logger);

  const controller = new WorkflowController(config, {
    store,
    fetcher,
    logger,
    workspace: overrides.workspace,
  });
  const outcome = await controller.run();

  if (outcome.error) {
    reportFailure(logger, outcome.error);
  } else if (outcome.skippedDownload) {
    banner(logger, 'info', 'SUCCESS: Model is ready in S3');
  } else {
    banner(logger, 'info', 'SUCCESS: Model downloaded and uploaded to S3');
  }

  return outcome.exitCode;
}
