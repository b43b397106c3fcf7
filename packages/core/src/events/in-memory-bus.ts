import { EventEnvelopeSchema } from '@kitchenflow/shared';
import type { EventEnvelope } from '@kitchenflow/shared';
import { logger, serializeError } from '../observability/logger';
import type { EventBus, EventHandler } from './bus';

interface NamedHandler {
  handler: EventHandler;
  consumerName: string;
}

export interface DeadLetter {
  event: EventEnvelope;
  consumerName: string;
  error: Error;
  failedAt: string;
}

export interface InMemoryEventBusOptions {
  maxRetries?: number;
  handlerTimeoutMs?: number;
  /** Base delay for the quadratic retry backoff (attempt² × base). */
  retryBaseDelayMs?: number;
}

const MAX_CONCURRENT_HANDLERS = 10;

/**
 * Process-local event bus. Handlers are retried with backoff and, once
 * retries are exhausted, parked on a dead-letter list. A failing handler
 * never makes `publish` reject.
 */
export class InMemoryEventBus implements EventBus {
  private handlers = new Map<string, NamedHandler[]>();
  private patternHandlers = new Map<string, NamedHandler[]>();
  private processed = new Set<string>();
  private deadLetterQueue: DeadLetter[] = [];
  private running = false;
  private readonly maxRetries: number;
  private readonly handlerTimeoutMs: number;
  private readonly retryBaseDelayMs: number;

  constructor(options: InMemoryEventBusOptions = {}) {
    this.maxRetries = options.maxRetries ?? 3;
    this.handlerTimeoutMs = options.handlerTimeoutMs ?? 30_000;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? 100;
  }

  subscribe(eventType: string, handler: EventHandler, consumerName?: string): void {
    const existing = this.handlers.get(eventType) ?? [];
    const name = consumerName ?? `${eventType}:handler_${existing.length}`;
    existing.push({ handler, consumerName: name });
    this.handlers.set(eventType, existing);
  }

  subscribePattern(pattern: string, handler: EventHandler, consumerName?: string): void {
    const existing = this.patternHandlers.get(pattern) ?? [];
    const name = consumerName ?? `${pattern}:handler_${existing.length}`;
    existing.push({ handler, consumerName: name });
    this.patternHandlers.set(pattern, existing);
  }

  async publish(event: EventEnvelope): Promise<void> {
    EventEnvelopeSchema.parse(event);

    const handlers = this.getMatchingHandlers(event.eventType);

    for (let i = 0; i < handlers.length; i += MAX_CONCURRENT_HANDLERS) {
      const batch = handlers.slice(i, i + MAX_CONCURRENT_HANDLERS);
      await Promise.allSettled(
        batch.map(({ handler, consumerName }) => this.dispatchWithRetry(event, handler, consumerName)),
      );
    }
  }

  async start(): Promise<void> {
    this.running = true;
  }

  async stop(): Promise<void> {
    this.running = false;
  }

  isRunning(): boolean {
    return this.running;
  }

  getDeadLetterQueue(): DeadLetter[] {
    return [...this.deadLetterQueue];
  }

  clearDeadLetterQueue(): void {
    this.deadLetterQueue = [];
  }

  private getMatchingHandlers(eventType: string): NamedHandler[] {
    const result: NamedHandler[] = [...(this.handlers.get(eventType) ?? [])];

    for (const [pattern, handlers] of this.patternHandlers) {
      if (this.matchPattern(pattern, eventType)) {
        result.push(...handlers);
      }
    }

    return result;
  }

  private matchPattern(pattern: string, eventType: string): boolean {
    if (pattern === '*') return true;
    if (pattern.endsWith('.*')) {
      const prefix = pattern.slice(0, -2);
      return eventType.startsWith(prefix + '.');
    }
    return pattern === eventType;
  }

  private async dispatchWithRetry(
    event: EventEnvelope,
    handler: EventHandler,
    consumerName: string,
  ): Promise<void> {
    const processedKey = `${event.eventId}:${consumerName}`;
    if (this.processed.has(processedKey)) return;

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      try {
        await this.runWithTimeout(handler, event);
        this.processed.add(processedKey);
        return;
      } catch (error) {
        logger.warn(`Event handler failed (attempt ${attempt}/${this.maxRetries})`, {
          eventType: event.eventType,
          eventId: event.eventId,
          hubId: event.hubId,
          consumerName,
          error: serializeError(error),
        });

        if (attempt < this.maxRetries) {
          const delay = attempt * attempt * this.retryBaseDelayMs;
          await new Promise((resolve) => setTimeout(resolve, delay));
        } else {
          this.deadLetterQueue.push({
            event,
            consumerName,
            error: error instanceof Error ? error : new Error(String(error)),
            failedAt: new Date().toISOString(),
          });
          logger.error('Event moved to dead letter queue', {
            eventType: event.eventType,
            eventId: event.eventId,
            hubId: event.hubId,
            consumerName,
          });
        }
      }
    }
  }

  private async runWithTimeout(handler: EventHandler, event: EventEnvelope): Promise<void> {
    let timeoutId: ReturnType<typeof setTimeout> | undefined;
    try {
      await Promise.race([
        handler(event),
        new Promise<never>((_, reject) => {
          timeoutId = setTimeout(
            () => reject(new Error(`Handler timeout after ${this.handlerTimeoutMs}ms`)),
            this.handlerTimeoutMs,
          );
        }),
      ]);
    } finally {
      if (timeoutId) clearTimeout(timeoutId);
    }
  }
}
