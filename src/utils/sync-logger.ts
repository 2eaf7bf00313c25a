import { Logger } from './logger.js';

export interface BatchSummary {
  totalProcessed: number;
  created: number;
  updated: number;
  skipped: number;
  pages: number;
}

/**
 * Times a full sync pass and logs its per-page progress and final summary.
 */
export class SyncLogger {
  private logger: Logger;
  private startTime = 0;

  constructor(serviceName: string) {
    this.logger = new Logger(serviceName);
  }

  startBatch(): void {
    this.startTime = Date.now();
  }

  logPage(entity: string, page: number, received: number): void {
    this.logger.debug({ event: 'page_received', entity, page, received });
  }

  logBatchSummary(entity: string, summary: BatchSummary): void {
    const duration = Date.now() - this.startTime;

    this.logger.info({
      event: 'sync_completed',
      entity,
      processed: summary.totalProcessed,
      created: summary.created,
      updated: summary.updated,
      skipped: summary.skipped,
      pages: summary.pages,
      duration,
    });
  }

  logBatchFailure(entity: string, page: number, error: unknown): void {
    this.logger.error({
      event: 'sync_failed',
      entity,
      page,
      elapsedMs: Date.now() - this.startTime,
      error,
    });
  }

  getLogger(): Logger {
    return this.logger;
  }
}
