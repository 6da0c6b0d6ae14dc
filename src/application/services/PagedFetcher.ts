import { setTimeout as delay } from 'node:timers/promises';
import { FetchCancelledError, FetchExhaustedError } from '../../domain/errors/LedgerReportError.js';
import { DEFAULT_RETRY_POLICY, decideRetry, isTransient, RetryPolicyOptions } from '../../domain/services/RetryPolicy.js';
import { EntitySourcePort } from '../ports/EntitySourcePort.js';

export const PAGE_SIZE = 100;

export interface RetryEvent {
  entity: string;
  startPosition: number;
  attempt: number;
  delayMs: number;
  error: Error;
}

export interface FetchAllOptions {
  filter?: string;
  signal?: AbortSignal;
  onRetry?: (event: RetryEvent) => void;
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface PagedFetcherConfig {
  pageSize?: number;
  retryPolicy?: RetryPolicyOptions;
  sleep?: Sleep;
  random?: () => number;
}

const defaultSleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

export class PagedFetcher {
  private readonly pageSize: number;
  private readonly retryPolicy: RetryPolicyOptions;
  private readonly sleep: Sleep;
  private readonly random: () => number;

  constructor(config: PagedFetcherConfig = {}) {
    this.pageSize = config.pageSize ?? PAGE_SIZE;
    this.retryPolicy = config.retryPolicy ?? DEFAULT_RETRY_POLICY;
    this.sleep = config.sleep ?? defaultSleep;
    this.random = config.random ?? Math.random;
  }

  /**
   * Reads every page of `source` in server order. A short or empty page ends the
   * fetch. On cancellation the pages read so far are dropped.
   */
  async fetchAll(source: EntitySourcePort, options: FetchAllOptions = {}): Promise<unknown[]> {
    const records: unknown[] = [];
    let startPosition = 1;

    for (;;) {
      this.throwIfCancelled(options.signal, source.entity);

      const page = await this.fetchPage(source, startPosition, options);
      records.push(...page);

      if (page.length < this.pageSize) {
        break;
      }

      startPosition += this.pageSize;
    }

    console.log(`📥 Fetched ${records.length} ${source.entity} record(s)`);
    return records;
  }

  private async fetchPage(source: EntitySourcePort, startPosition: number, options: FetchAllOptions): Promise<unknown[]> {
    for (let attempt = 0; ; attempt += 1) {
      try {
        return await source.list({ filter: options.filter, startPosition, pageSize: this.pageSize });
      } catch (error) {
        const decision = decideRetry(error, attempt, this.random, this.retryPolicy);

        if (decision.action === 'abort') {
          if (isTransient(error)) {
            throw new FetchExhaustedError(error, attempt + 1);
          }

          throw error;
        }

        console.warn(
          `🔁 ${source.entity} page at ${startPosition} failed (attempt ${attempt + 1}): ${error instanceof Error ? error.message : String(error)}. Retrying in ${Math.round(decision.delayMs)}ms`,
        );
        options.onRetry?.({
          entity: source.entity,
          startPosition,
          attempt,
          delayMs: decision.delayMs,
          error: error instanceof Error ? error : new Error(String(error)),
        });

        await this.backoff(decision.delayMs, options.signal, source.entity);
      }
    }
  }

  private async backoff(ms: number, signal: AbortSignal | undefined, entity: string): Promise<void> {
    this.throwIfCancelled(signal, entity);

    try {
      await this.sleep(ms, signal);
    } catch (error) {
      if (signal?.aborted) {
        throw new FetchCancelledError(`${entity} fetch cancelled during backoff`);
      }

      throw error;
    }

    this.throwIfCancelled(signal, entity);
  }

  private throwIfCancelled(signal: AbortSignal | undefined, entity: string): void {
    if (signal?.aborted) {
      throw new FetchCancelledError(`${entity} fetch cancelled`);
    }
  }
}
