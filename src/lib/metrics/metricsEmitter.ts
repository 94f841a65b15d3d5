/**
 * Metrics Emitter
 *
 * Fire-and-forget lifecycle events from agent loops to any number of sinks.
 * `emit()` only appends to a bounded buffer and schedules delivery; it never
 * awaits a sink. When the buffer is full the OLDEST undelivered event is
 * dropped and counted in `dropped`.
 *
 * Many loops may share one emitter.
 */

import { v7 as uuidv7 } from 'uuid';
import type { ApiShape, TokenUsage } from '../providers/providerContract.js';
import type { ErrorKind } from '../providers/errors.js';
import type { Logger } from '../core/logger.js';
import { silentLogger } from '../core/logger.js';

// ============================================================================
// Event Types
// ============================================================================

export type MetricsPayload =
  | { type: 'turn_started'; target: string }
  | { type: 'attempt_started'; step: number; attempt: number; profile: string; api: ApiShape; model: string }
  | { type: 'attempt_succeeded'; step: number; attempt: number; profile: string; api: ApiShape; latencyMs: number; usage: TokenUsage }
  | { type: 'attempt_failed'; step: number; attempt: number; profile: string; api: ApiShape; kind: ErrorKind; message: string; latencyMs: number }
  | { type: 'retry_scheduled'; step: number; attempt: number; delayMs: number; kind: ErrorKind }
  | { type: 'shape_fallback'; step: number; profile: string; from: ApiShape; to: ApiShape }
  | { type: 'tool_executed'; step: number; toolName: string; toolCallId: string; ok: boolean; durationMs: number }
  | {
      type: 'turn_finished';
      status: 'completed' | 'aborted' | 'failed';
      steps: number;
      attempts: number;
      retries: number;
      fallbacks: number;
      durationMs: number;
      usage: TokenUsage;
      errorKind?: ErrorKind;
    };

export type MetricsEventType = MetricsPayload['type'];

/**
 * Every event carries a consistent envelope.
 */
export type MetricsEvent = MetricsPayload & {
  /** uuidv7, time-ordered */
  id: string;
  /** ISO-8601 timestamp */
  timestamp: string;
  turnId: string;
};

export type MetricsSink = (event: MetricsEvent) => void | Promise<void>;

/**
 * What the agent loop depends on.
 */
export interface MetricsRecorder {
  emit(turnId: string, payload: MetricsPayload): void;
}

export interface MetricsEmitterOptions {
  /** Most undelivered events kept before the oldest is dropped */
  capacity?: number;
  logger?: Logger;
}

// ============================================================================
// MetricsEmitter Class
// ============================================================================

export class MetricsEmitter implements MetricsRecorder {
  private readonly sinks = new Set<MetricsSink>();
  private buffer: MetricsEvent[] = [];
  private readonly capacity: number;
  private readonly logger: Logger;
  private scheduled = false;
  private draining: Promise<void> = Promise.resolve();
  private droppedCount = 0;

  constructor(options: MetricsEmitterOptions = {}) {
    this.capacity = Math.max(1, options.capacity ?? 1024);
    this.logger = options.logger ?? silentLogger();
  }

  /**
   * Queue an event for delivery. Returns immediately.
   */
  emit(turnId: string, payload: MetricsPayload): void {
    const event: MetricsEvent = {
      ...payload,
      id: uuidv7(),
      timestamp: new Date().toISOString(),
      turnId,
    };

    if (this.buffer.length >= this.capacity) {
      this.buffer.shift();
      this.droppedCount += 1;
    }
    this.buffer.push(event);
    this.schedule();
  }

  /**
   * Subscribe a sink. Returns an unsubscribe function.
   */
  subscribe(sink: MetricsSink): () => void {
    this.sinks.add(sink);
    return () => {
      this.sinks.delete(sink);
    };
  }

  /** Events dropped because the buffer was full */
  get dropped(): number {
    return this.droppedCount;
  }

  /** Events waiting for delivery */
  get pending(): number {
    return this.buffer.length;
  }

  /**
   * Resolves once everything emitted so far has been handed to the sinks.
   */
  async flush(): Promise<void> {
    while (this.buffer.length > 0 || this.scheduled) {
      this.schedule();
      await this.draining;
    }
    await this.draining;
  }

  private schedule(): void {
    if (this.scheduled) return;
    this.scheduled = true;
    this.draining = this.draining.then(
      () =>
        new Promise<void>((resolve) => {
          setImmediate(() => {
            this.drain()
              .catch((error: unknown) => {
                this.logger.error({ err: error }, 'metrics drain failed');
              })
              .finally(resolve);
          });
        })
    );
  }

  private async drain(): Promise<void> {
    this.scheduled = false;
    const batch = this.buffer;
    this.buffer = [];

    for (const event of batch) {
      for (const sink of this.sinks) {
        try {
          await sink(event);
        } catch (error) {
          this.logger.warn({ err: error, eventType: event.type }, 'metrics sink failed');
        }
      }
    }
  }
}

/**
 * Sink that writes every event to a pino logger at debug level.
 */
export function logMetricsSink(logger: Logger): MetricsSink {
  return (event) => {
    logger.debug({ metrics: event }, `metrics ${event.type}`);
  };
}

/**
 * Recorder that discards everything.
 */
export const noopMetrics: MetricsRecorder = {
  emit: () => undefined,
};
