import { randomUUID } from 'crypto';
import path from 'path';
import { ProgressChannel, DEFAULT_PROGRESS_CAPACITY } from './progress-channel.js';
import { InputValidationError } from '../errors/index.js';
import type {
  DownloadFormat,
  DownloadState,
  DownloadStatus,
  FileTransferPort,
  StartDownloadOptions,
  TransferRequest,
} from '../types/index.js';

export interface DownloadOrchestratorOptions {
  /** Directory used when a download is started without an output path */
  downloadDir?: string;
  progressCapacity?: number;
  idGenerator?: () => string;
}

const TERMINAL_STATES: ReadonlySet<DownloadState> = new Set(['completed', 'failed', 'cancelled']);

const FILE_EXTENSIONS: Record<DownloadFormat, string> = {
  original: '',
  fit: '.fit',
  gpx: '.gpx',
};

/**
 * Runs activity file downloads in the background and tracks their status.
 *
 * State per download moves Pending → InProgress → Completed | Failed | Cancelled.
 * Cancellation is cooperative: `cancel` aborts the task's signal and marks it
 * cancelled right away, but a transfer that finishes before it checks the signal
 * still records its own outcome over the cancelled state.
 */
export class DownloadOrchestrator {
  private statuses = new Map<string, DownloadStatus>();
  private controllers = new Map<string, AbortController>();
  private running = new Map<string, Promise<void>>();
  private readonly progressCapacity: number;
  private readonly idGenerator: () => string;

  constructor(
    private transferPort: FileTransferPort,
    private options: DownloadOrchestratorOptions = {}
  ) {
    this.progressCapacity = options.progressCapacity ?? DEFAULT_PROGRESS_CAPACITY;
    this.idGenerator = options.idGenerator ?? randomUUID;
  }

  /**
   * Register a download and start it in the background.
   * Returns the download ID immediately; the task is already visible as pending.
   *
   * @throws InputValidationError when the activity ID can't name a file inside the download directory
   */
  start(activityId: string, options: StartDownloadOptions = {}): string {
    const id = this.idGenerator();
    const format = options.format ?? 'original';
    const outputPath = options.outputPath ?? this.defaultOutputPath(activityId, format);

    this.statuses.set(id, {
      id,
      activity_id: activityId,
      format,
      state: 'pending',
      bytes_downloaded: 0,
      total_bytes: null,
      path: null,
      error: null,
    });

    const controller = new AbortController();
    this.controllers.set(id, controller);

    const task = this.run(id, { activityId, format, outputPath }, controller.signal)
      .catch((error) => {
        console.error(`[Downloads] Unexpected error in download ${id}:`, error);
      })
      .finally(() => {
        this.running.delete(id);
        this.controllers.delete(id);
      });
    this.running.set(id, task);

    console.log(`[Downloads] Started download ${id} for activity ${activityId} (${format})`);
    return id;
  }

  getStatus(id: string): DownloadStatus | undefined {
    const status = this.statuses.get(id);
    return status ? { ...status } : undefined;
  }

  list(): DownloadStatus[] {
    return Array.from(this.statuses.values(), (status) => ({ ...status }));
  }

  /**
   * Request cancellation of a download.
   * Returns false only for an unknown ID. A download that has already reached a
   * final state keeps it.
   */
  cancel(id: string): boolean {
    const status = this.statuses.get(id);
    if (!status) {
      return false;
    }

    this.controllers.get(id)?.abort();
    if (!TERMINAL_STATES.has(status.state)) {
      this.update(id, (current) => ({ ...current, state: 'cancelled' }));
      console.log(`[Downloads] Cancellation requested for download ${id}`);
    }
    return true;
  }

  /**
   * Resolves once the download's background work has finished.
   */
  settled(id: string): Promise<void> {
    return this.running.get(id) ?? Promise.resolve();
  }

  /**
   * Cancel every download still running and wait for all of them to wind down.
   */
  async shutdown(): Promise<void> {
    const ids = Array.from(this.running.keys());
    for (const id of ids) {
      this.cancel(id);
    }
    await Promise.all(Array.from(this.running.values()));
    if (ids.length > 0) {
      console.log(`[Downloads] Shut down ${ids.length} in-flight download(s)`);
    }
  }

  private async run(id: string, request: TransferRequest, signal: AbortSignal): Promise<void> {
    // Let start() return before any transfer work happens
    await Promise.resolve();

    if (signal.aborted) {
      console.log(`[Downloads] Download ${id} was cancelled before it began`);
      return;
    }

    this.update(id, (status) =>
      status.state === 'pending' ? { ...status, state: 'in_progress' } : status
    );

    const channel = new ProgressChannel(this.progressCapacity);
    const listener = this.listen(id, channel);

    let outcome: { ok: true; path: string } | { ok: false; message: string };
    try {
      const outputPath = await this.transferPort.transfer(request, channel, signal);
      outcome = { ok: true, path: outputPath };
    } catch (error) {
      outcome = { ok: false, message: error instanceof Error ? error.message : String(error) };
    } finally {
      channel.close();
      await listener;
    }

    if (channel.droppedCount > 0) {
      console.log(`[Downloads] Dropped ${channel.droppedCount} progress update(s) for download ${id}`);
    }

    if (outcome.ok) {
      const { path: outputPath } = outcome;
      this.update(id, (status) => ({ ...status, state: 'completed', path: outputPath, error: null }));
      console.log(`[Downloads] Download ${id} completed`);
    } else {
      const { message } = outcome;
      this.update(id, (status) => ({ ...status, state: 'failed', error: message }));
      console.error(`[Downloads] Download ${id} failed: ${message}`);
    }
  }

  private async listen(id: string, channel: ProgressChannel): Promise<void> {
    for await (const update of channel) {
      this.update(id, (status) => ({
        ...status,
        bytes_downloaded: update.bytesDownloaded,
        total_bytes: update.totalBytes,
      }));
    }
  }

  private update(id: string, apply: (status: DownloadStatus) => DownloadStatus): void {
    const status = this.statuses.get(id);
    if (status) {
      this.statuses.set(id, apply(status));
    }
  }

  private defaultOutputPath(activityId: string, format: DownloadFormat): string | undefined {
    if (!this.options.downloadDir) {
      return undefined;
    }
    const directory = path.resolve(this.options.downloadDir);
    const target = path.resolve(directory, `${activityId}${FILE_EXTENSIONS[format]}`);
    // The file must sit directly in the download directory
    if (path.dirname(target) !== directory) {
      throw new InputValidationError(
        `Activity ID '${activityId}' can't be used as a file name in the download directory.`,
        { operation: 'start download', resource: `activity ${activityId}` }
      );
    }
    return target;
  }
}
