/**
 * @fileoverview Log-based tracing for detection sessions and batches. Each
 * tracer tags its entries with a short trace id so one video's checkpoints
 * can be followed through interleaved logs.
 */

import type { Logger as WinstonLogger } from 'winston';

function generateTraceId(): string {
  return Math.random().toString(36).substring(2, 15);
}

/**
 * Tracer for a single video's detection session.
 */
export class DetectionTracer {
  readonly traceId: string;
  private readonly startTime: number;
  private lastCheckpointTime: number;

  constructor(
    private readonly videoId: string,
    private readonly logger: WinstonLogger
  ) {
    this.traceId = generateTraceId();
    this.startTime = Date.now();
    this.lastCheckpointTime = this.startTime;

    this.logger.debug('TRACE [DETECTION] Starting', {
      traceId: this.traceId,
      videoId,
    });
  }

  /**
   * Records that a state-machine checkpoint was reached and how long the
   * previous stage took.
   */
  checkpoint(name: string, load: number): void {
    const now = Date.now();
    this.logger.debug(`TRACE [DETECTION] ${name}`, {
      traceId: this.traceId,
      videoId: this.videoId,
      load,
      stageMs: now - this.lastCheckpointTime,
    });
    this.lastCheckpointTime = now;
  }

  recordError(error: Error, phase: string): void {
    this.logger.debug('TRACE [DETECTION] ERROR', {
      traceId: this.traceId,
      videoId: this.videoId,
      phase,
      error: error.message,
    });
  }

  finish(verdict: boolean | null): number {
    const durationMs = Date.now() - this.startTime;
    this.logger.debug('TRACE [DETECTION] COMPLETED', {
      traceId: this.traceId,
      videoId: this.videoId,
      verdict,
      durationMs,
    });
    return durationMs;
  }
}

/**
 * Tracer for a batch run. Reports progress and an estimated time remaining.
 */
export class BatchProgressTracer {
  readonly traceId: string;
  private readonly startTime: number;

  constructor(
    private readonly total: number,
    private readonly logger: WinstonLogger
  ) {
    this.traceId = generateTraceId();
    this.startTime = Date.now();
    this.logger.info(`Starting batch of ${total} video(s)`, {
      traceId: this.traceId,
    });
  }

  recordProgress(completed: number, videoId: string, verdict: boolean | null): void {
    const elapsedMs = Date.now() - this.startTime;
    const remaining = this.total - completed;
    const etaSeconds =
      completed > 0 ? Math.round(((elapsedMs / completed) * remaining) / 1000) : 0;

    this.logger.info(
      `[${completed}/${this.total}] ${videoId}: ${verdict === null ? 'Unknown' : verdict ? 'Has Ads' : 'No Ads'}`,
      { traceId: this.traceId, etaSeconds }
    );
  }

  finish(): number {
    const durationMs = Date.now() - this.startTime;
    this.logger.info(
      `Batch completed: ${this.total} video(s) in ${(durationMs / 1000).toFixed(1)}s`,
      { traceId: this.traceId }
    );
    return durationMs;
  }
}
