import { DownloadOrchestrator } from '../downloads/orchestrator.js';
import { DownloadNotFoundError } from '../errors/index.js';
import type { DownloadStatus } from '../types/index.js';
import type { DownloadIdInput, StartDownloadInput } from './types.js';

export interface StartDownloadResponse {
  download_id: string;
  status: DownloadStatus;
}

export interface CancelDownloadResponse {
  download_id: string;
  cancelled: boolean;
  status: DownloadStatus;
}

export class DownloadTools {
  constructor(private orchestrator: DownloadOrchestrator) {}

  /**
   * Start a background download and return its ID with the initial status
   */
  async startDownload(params: StartDownloadInput): Promise<StartDownloadResponse> {
    const id = this.orchestrator.start(params.activity_id, {
      outputPath: params.output_path,
      format: params.format,
    });
    return { download_id: id, status: this.requireStatus(id, 'start download') };
  }

  async getDownloadStatus(params: DownloadIdInput): Promise<DownloadStatus> {
    return this.requireStatus(params.download_id, 'get download status');
  }

  /**
   * Request cancellation. A download that already finished keeps its final state.
   */
  async cancelDownload(params: DownloadIdInput): Promise<CancelDownloadResponse> {
    const { download_id: id } = params;
    if (!this.orchestrator.cancel(id)) {
      throw new DownloadNotFoundError(id, 'cancel download');
    }
    const status = this.requireStatus(id, 'cancel download');
    return { download_id: id, cancelled: status.state === 'cancelled', status };
  }

  async listDownloads(): Promise<{ downloads: DownloadStatus[] }> {
    return { downloads: this.orchestrator.list() };
  }

  private requireStatus(id: string, operation: string): DownloadStatus {
    const status = this.orchestrator.getStatus(id);
    if (!status) {
      throw new DownloadNotFoundError(id, operation);
    }
    return status;
  }
}
