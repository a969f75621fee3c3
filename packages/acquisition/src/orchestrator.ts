/**
 * Download Orchestrator
 *
 * Runs a batch of links through the downloader one at a time. Each item is
 * supervised by a fixed-interval tick loop that honours stop/skip requests,
 * enforces the per-link time limit and streams output into progress
 * snapshots. Image-count and size limits are checked once the tool exits.
 *
 * Pause only takes effect between items; a running download is never
 * suspended.
 */

import {
  isValidTransition,
  ToolInvocationError,
  type AppConfig,
  type DownloadLimits,
  type LimitKind,
  type Link,
  type LinkStore,
  type OrchestratorSettings,
  type ToolConfig,
} from '@linkgarden/core';
import {
  createLogger,
  errorMessage,
  isDefined,
  resolveFrom,
  sleep,
  type OutputLine,
  type StreamingProcess,
} from '@linkgarden/utils';
import { buildToolInvocation, formatInvocation } from './commandBuilder.js';
import { DecisionGateway, type LimitResolver } from './decisionGateway.js';
import { spawnLauncher, type ProcessLauncher } from './launcher.js';
import {
  ConsecutiveDedupe,
  countImageEvents,
  deriveErrorMessage,
  isImageEvent,
  measureOutputSizeMb,
} from './outputParser.js';
import {
  createSnapshot,
  ObserverRegistry,
  type CompletionObserver,
  type ProgressObserver,
  type ProgressSnapshot,
  type Unsubscribe,
} from './progress.js';
import { RunControl } from './runControl.js';

const log = createLogger({ module: 'orchestrator' });

export interface OrchestratorOptions {
  /** Working directory of the tool and base for relative paths */
  baseDir: string;
  launcher?: ProcessLauncher;
  gateway?: DecisionGateway;
}

/**
 * How a single item ended
 */
export type ItemOutcome =
  | { status: 'downloaded' }
  | { status: 'skipped' }
  | { status: 'error'; message: string }
  | { status: 'to_skip_limit'; kind: LimitKind; detail: string };

export class DownloadOrchestrator {
  private readonly observers = new ObserverRegistry();
  private readonly gateway: DecisionGateway;
  private readonly launcher: ProcessLauncher;
  private readonly limits: DownloadLimits;
  private readonly tool: ToolConfig;
  private readonly settings: OrchestratorSettings;
  private readonly baseDir: string;

  private control = new RunControl();
  private snapshot: ProgressSnapshot = createSnapshot();
  private worker: Promise<void> | null = null;

  constructor(
    private readonly links: LinkStore,
    config: AppConfig,
    options: OrchestratorOptions
  ) {
    this.limits = { ...config.downloadLimits };
    this.tool = { ...config.tool, defaultArgs: [...config.tool.defaultArgs] };
    this.settings = { ...config.orchestrator };
    this.baseDir = options.baseDir;
    this.launcher = options.launcher ?? spawnLauncher;
    this.gateway = options.gateway ?? new DecisionGateway();
  }

  // ===========================================================================
  // Run lifecycle
  // ===========================================================================

  /**
   * Start a run over the given link ids, or over every link waiting to be
   * downloaded. Returns false when a run is already active or nothing is
   * eligible.
   */
  start(linkIds?: readonly string[]): boolean {
    if (this.isActive()) {
      log.warn('Download already running');
      return false;
    }

    const batch = this.resolveBatch(linkIds);
    if (batch.length === 0) {
      log.info('No links to download');
      return false;
    }

    this.control = new RunControl();
    this.snapshot = createSnapshot(batch.length, 'running');
    this.worker = this.run(batch);

    log.info({ count: batch.length }, 'Started downloading links');
    return true;
  }

  isActive(): boolean {
    return this.worker !== null;
  }

  /**
   * Resolves once the current run, if any, has finished
   */
  async whenIdle(): Promise<void> {
    await this.worker;
  }

  pause(): void {
    if (!this.isActive() || this.control.paused) return;
    this.control.requestPause();
    log.info('Downloads paused');
  }

  resume(): void {
    if (!this.control.paused) return;
    this.control.requestResume();
    log.info('Downloads resumed');
  }

  stop(): void {
    if (!this.isActive() || this.control.stopped) return;
    this.control.requestStop();
    log.info('Downloads stopped');
  }

  /**
   * Abandon the item in flight. Ignored between items.
   */
  skipCurrent(): void {
    if (this.snapshot.currentLink === null || this.control.skipping) return;
    this.control.requestSkip();
    log.info({ url: this.snapshot.currentLink.url }, 'Skipping current download');
  }

  // ===========================================================================
  // Observers
  // ===========================================================================

  onProgress(observer: ProgressObserver): Unsubscribe {
    return this.observers.onProgress(observer);
  }

  onCompletion(observer: CompletionObserver): Unsubscribe {
    return this.observers.onCompletion(observer);
  }

  setResolver(resolver: LimitResolver | null): void {
    this.gateway.setResolver(resolver);
  }

  getProgress(): ProgressSnapshot {
    return { ...this.snapshot };
  }

  // ===========================================================================
  // Worker
  // ===========================================================================

  private resolveBatch(linkIds?: readonly string[]): Link[] {
    if (!linkIds) {
      return this.links.listByStatus(['to_download']);
    }

    const seen = new Set<string>();
    return linkIds
      .filter((id) => {
        if (seen.has(id)) return false;
        seen.add(id);
        return true;
      })
      .map((id) => this.links.getById(id))
      .filter(isDefined)
      .filter((link) => !link.deleted && isValidTransition(link.status, 'downloading'));
  }

  private async run(batch: Link[]): Promise<void> {
    const control = this.control;

    try {
      for (const [index, link] of batch.entries()) {
        if (control.stopped) break;

        await this.waitWhilePaused(control);
        if (control.stopped) break;

        try {
          await this.processItem(link, control);
        } catch (error) {
          log.error({ err: error, url: link.url }, 'Error downloading link');
          this.recordFailure(link, errorMessage(error));
        }

        this.snapshot.currentProgress = (index + 1) / batch.length;
        this.publish();
      }

      if (control.stopped) {
        this.snapshot.status = 'stopped';
        this.snapshot.currentOperation = 'Stopped';
        this.publish();
      }
    } catch (error) {
      log.error({ err: error }, 'Error in download worker');
    } finally {
      this.snapshot.status = 'idle';
      this.snapshot.currentLink = null;
      this.snapshot.currentOperation = 'Idle';
      this.worker = null;
      this.publish();
      log.info(
        { completed: this.snapshot.completedLinks, failed: this.snapshot.failedLinks },
        'Download run finished'
      );
    }
  }

  private async waitWhilePaused(control: RunControl): Promise<void> {
    if (!control.paused) return;

    this.snapshot.status = 'paused';
    this.snapshot.currentOperation = 'Paused';
    this.publish();

    while (control.paused) {
      await sleep(this.settings.pausePollMs);
    }

    if (!control.stopped) {
      this.snapshot.status = 'running';
      this.publish();
    }
  }

  private async processItem(link: Link, control: RunControl): Promise<void> {
    link.errorMessage = '';
    link.limitExceeded = null;
    this.links.updateStatus(link.id, 'downloading');

    this.snapshot.currentLink = link;
    this.snapshot.currentOperation = `Downloading ${link.url}`;
    this.snapshot.imagesDownloaded = 0;
    this.snapshot.lastOutputLine = '';
    this.publish();

    const outcome = await this.download(link, control);
    this.finishItem(link, outcome);
    control.clearSkip();
  }

  private async download(link: Link, control: RunControl): Promise<ItemOutcome> {
    const invocation = buildToolInvocation(this.tool, link.url, { baseDir: this.baseDir });

    log.info({ url: link.url }, 'Starting download');
    log.debug({ command: formatInvocation(invocation) }, 'Tool command');

    let proc: StreamingProcess;
    try {
      proc = this.launcher(invocation, { cwd: this.baseDir });
    } catch (error) {
      const failure = new ToolInvocationError(invocation.command, errorMessage(error), error);
      log.error({ err: failure, url: link.url }, 'Could not start download');
      return { status: 'error', message: failure.message };
    }

    const output: OutputLine[] = [];
    const dedupe = new ConsecutiveDedupe();
    let tally = 0;

    const consume = (): void => {
      for (const line of proc.takeLines()) {
        output.push(line);
        if (!dedupe.accept(line.text)) continue;
        if (isImageEvent(line.text)) tally++;
        this.snapshot.imagesDownloaded = tally;
        this.snapshot.lastOutputLine = line.text;
        this.publish();
      }
    };

    const maxElapsedMs = this.limits.maxTimePerLinkSeconds * 1000;
    let startedAt = Date.now();

    while (!proc.hasExited()) {
      if (control.cancelled) {
        proc.terminate();
        log.info({ url: link.url }, 'Download terminated');
        return { status: 'skipped' };
      }

      if (Date.now() - startedAt > maxElapsedMs) {
        log.warn({ url: link.url, limitSeconds: this.limits.maxTimePerLinkSeconds }, 'Download timeout');
        if (await this.gateway.decide(link, 'timeout')) {
          startedAt = Date.now();
        } else {
          proc.terminate();
          return {
            status: 'to_skip_limit',
            kind: 'timeout',
            detail: `exceeded ${this.limits.maxTimePerLinkSeconds}s`,
          };
        }
      }

      consume();
      await sleep(this.settings.tickIntervalMs);
    }

    const exit = await proc.exited;
    if (exit.error) {
      const failure = new ToolInvocationError(invocation.command, exit.error.message, exit.error);
      log.error({ err: failure, url: link.url }, 'Could not start download');
      return { status: 'error', message: failure.message };
    }

    await proc.drained;
    consume();

    const texts = output.map((line) => line.text);
    const imagesCount = Math.max(tally, countImageEvents(texts));
    const fileSizeMb = measureOutputSizeMb(
      output.filter((line) => line.stream === 'stdout').map((line) => line.text),
      this.baseDir
    );

    link.imagesCount = imagesCount;
    link.fileSizeMb = fileSizeMb;
    this.snapshot.imagesDownloaded = imagesCount;

    if (imagesCount > this.limits.maxImagesPerLink) {
      log.warn({ url: link.url, imagesCount, limit: this.limits.maxImagesPerLink }, 'Image count limit exceeded');
      if (!(await this.gateway.decide(link, 'image_count'))) {
        return {
          status: 'to_skip_limit',
          kind: 'image_count',
          detail: `${imagesCount} images > ${this.limits.maxImagesPerLink}`,
        };
      }
    }

    if (fileSizeMb > this.limits.maxFileSizeMb) {
      log.warn({ url: link.url, fileSizeMb, limit: this.limits.maxFileSizeMb }, 'File size limit exceeded');
      if (!(await this.gateway.decide(link, 'file_size'))) {
        return {
          status: 'to_skip_limit',
          kind: 'file_size',
          detail: `${fileSizeMb}MB > ${this.limits.maxFileSizeMb}MB`,
        };
      }
    }

    if (exit.exitCode === 0) {
      log.info({ url: link.url, imagesCount, fileSizeMb }, 'Successfully downloaded');
      return { status: 'downloaded' };
    }

    const message = deriveErrorMessage(output, invocation.command, exit.exitCode);
    log.error({ url: link.url, exitCode: exit.exitCode, message }, 'Download tool failed');
    return { status: 'error', message };
  }

  private finishItem(link: Link, outcome: ItemOutcome): void {
    switch (outcome.status) {
      case 'downloaded':
        link.downloadPath = this.tool.outputDir ? resolveFrom(this.baseDir, this.tool.outputDir) : this.baseDir;
        break;
      case 'error':
        link.errorMessage = outcome.message;
        break;
      case 'to_skip_limit':
        link.errorMessage = `error(${outcome.kind}): ${outcome.detail}`;
        link.limitExceeded = outcome.kind;
        break;
      case 'skipped':
        break;
    }

    this.links.updateStatus(link.id, outcome.status);

    const success = outcome.status === 'downloaded';
    if (success) {
      this.snapshot.completedLinks++;
    } else {
      this.snapshot.failedLinks++;
    }
    this.observers.notifyCompletion(link.id, success);
  }

  /**
   * Record an item that failed outside the normal outcome path
   */
  private recordFailure(link: Link, message: string): void {
    try {
      if (link.status === 'downloading') {
        link.errorMessage = message;
        this.links.updateStatus(link.id, 'error');
      }
    } catch (error) {
      log.error({ err: error, url: link.url }, 'Could not record download failure');
    }
    this.snapshot.failedLinks++;
    this.observers.notifyCompletion(link.id, false);
    this.control.clearSkip();
  }

  private publish(): void {
    this.observers.notifyProgress(this.snapshot);
  }
}
