import { resolve } from 'path';
import type { RunConfig } from '../types/index.js';
import { ExitCode, FetchFailureReason, SCRATCH_DIR_PREFIX, WorkflowState, modelKeyPrefix } from '../types/index.js';
import { FetchError, toUnexpectedError, type FilesystemError, type RunError } from '../lib/errors.js';
import { createScratchDirectory, removeDirectory } from '../lib/fs.js';
import { err, type Result } from '../lib/result.js';
import type { Logger } from '../lib/logger.js';
import type { UploadSummary } from '../models/UploadTask.js';
import { validateInputs } from './InputValidator.js';
import type { ObjectStore } from './ObjectStoreGateway.js';
import type { ModelFetcher } from './ModelFetcher.js';
import { UploadOrchestrator } from './UploadOrchestrator.js';

/**
 * Local directory lifecycle. Swappable so callers can observe or fail cleanup.
 */
export interface Workspace {
  create(parent: string, prefix: string): Promise<Result<string, FilesystemError>>;
  remove(path: string, logger: Logger): Promise<boolean>;
}

export const localWorkspace: Workspace = {
  create: createScratchDirectory,
  remove: removeDirectory,
};

export interface WorkflowDependencies {
  store: ObjectStore;
  fetcher: ModelFetcher;
  logger: Logger;
  workspace?: Workspace;
}

export interface RunOutcome {
  status: WorkflowState.SUCCEEDED | WorkflowState.FAILED;
  exitCode: ExitCode;
  /** True when the model was already in the bucket */
  skippedDownload: boolean;
  upload: UploadSummary | null;
  error: RunError | null;
  /** Every state visited, in order */
  history: WorkflowState[];
}

export class WorkflowController {
  private readonly store: ObjectStore;
  private readonly fetcher: ModelFetcher;
  private readonly workspace: Workspace;
  private readonly logger: Logger;
  private readonly orchestrator: UploadOrchestrator;
  private history: WorkflowState[] = [];

  constructor(
    private readonly config: RunConfig,
    deps: WorkflowDependencies
  ) {
    this.store = deps.store;
    this.fetcher = deps.fetcher;
    this.workspace = deps.workspace ?? localWorkspace;
    this.logger = deps.logger.child({ component: 'workflow', modelId: config.hub.modelId });
    this.orchestrator = new UploadOrchestrator(deps.store, deps.logger, {
      showProgress: config.upload.showProgress,
    });
  }

  get state(): WorkflowState {
    return this.history[this.history.length - 1] ?? WorkflowState.INIT;
  }

  async run(): Promise<RunOutcome> {
    this.history = [WorkflowState.INIT];

    try {
      return await this.execute();
    } catch (error) {
      return this.fail(toUnexpectedError(error));
    }
  }

  private async execute(): Promise<RunOutcome> {
    const { s3, hub, upload } = this.config;

    this.transition(WorkflowState.VALIDATING);
    const validated = validateInputs(hub.modelId, s3.bucket, upload.objectPrefix);
    if (!validated.ok) {
      return this.fail(validated.error);
    }
    this.logger.info('Input validation passed successfully');

    const keyPrefix = modelKeyPrefix(upload.objectPrefix, hub.modelId);

    this.transition(WorkflowState.CHECKING_EXISTENCE);
    const exists = await this.store.exists(s3.bucket, keyPrefix);
    if (!exists.ok) {
      return this.fail(exists.error);
    }

    if (exists.value) {
      this.transition(WorkflowState.SKIPPING_DOWNLOAD);
      this.logger.info({ bucket: s3.bucket, keyPrefix }, 'Model found in S3, skipping download');
      return this.succeed(null, true);
    }

    this.logger.info('Model not found in S3, starting download from the hub');
    this.transition(WorkflowState.FETCHING);

    const scratch = await this.workspace.create(this.config.localWorkDir, SCRATCH_DIR_PREFIX);
    if (!scratch.ok) {
      return this.fail(scratch.error);
    }
    const localDir = scratch.value;
    this.logger.info({ localDir }, `Created secure download directory: ${localDir}`);

    let published: Result<UploadSummary, RunError>;
    try {
      published = await this.fetchAndPublish(localDir, keyPrefix);
    } catch (error) {
      published = err(toUnexpectedError(error));
    } finally {
      await this.cleanup(localDir);
    }

    return published.ok ? this.succeed(published.value, false) : this.fail(published.error);
  }

  private async fetchAndPublish(localDir: string, keyPrefix: string): Promise<Result<UploadSummary, RunError>> {
    const { s3, hub, upload } = this.config;

    const fetched = await this.fetcher.fetch(hub.modelId, localDir, hub.token);
    if (!fetched.ok) {
      return fetched;
    }

    if (resolve(fetched.value.path) !== resolve(localDir)) {
      return err(
        new FetchError(
          FetchFailureReason.INTEGRITY,
          `Fetched snapshot root ${fetched.value.path} does not match requested destination ${localDir}`
        )
      );
    }

    this.transition(WorkflowState.UPLOADING);
    return this.orchestrator.uploadTree(localDir, s3.bucket, keyPrefix, upload.concurrency);
  }

  private async cleanup(localDir: string): Promise<void> {
    this.transition(WorkflowState.CLEANING_UP);
    try {
      await this.workspace.remove(localDir, this.logger);
    } catch (error) {
      this.logger.warn({ localDir, error }, 'Cleanup failed (non-fatal)');
    }
  }

  private transition(next: WorkflowState): void {
    const previous = this.state;
    this.history.push(next);
    this.logger.debug({ from: previous, to: next }, 'Workflow state changed');
  }

  private succeed(upload: UploadSummary | null, skippedDownload: boolean): RunOutcome {
    this.transition(WorkflowState.SUCCEEDED);
    return {
      status: WorkflowState.SUCCEEDED,
      exitCode: ExitCode.SUCCESS,
      skippedDownload,
      upload,
      error: null,
      history: [...this.history],
    };
  }

  /** Last working phase, looking past the cleanup step */
  private get activePhase(): WorkflowState {
    return [...this.history].reverse().find(state => state !== WorkflowState.CLEANING_UP) ?? WorkflowState.INIT;
  }

  private fail(error: RunError): RunOutcome {
    const phase = this.activePhase;
    this.logger.error({ phase, kind: error.kind, error }, `Phase ${phase} failed: ${error.message}`);
    this.transition(WorkflowState.FAILED);
    return {
      status: WorkflowState.FAILED,
      exitCode: ExitCode.FAILURE,
      skippedDownload: false,
      upload: null,
      error,
      history: [...this.history],
    };
  }
}
