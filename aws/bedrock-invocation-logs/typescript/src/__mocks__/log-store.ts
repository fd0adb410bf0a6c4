/**
 * In-memory log store for testing.
 *
 * Pages and errors are scripted up front and handed out one per request, in order.
 */

import type { LogPage, LogPageRequest, LogStore } from '../store/store.js';
import type { RawLogLine } from '../types/events.js';

/**
 * An error shaped like the ones the AWS SDK throws.
 */
export class FakeServiceError extends Error {
  readonly $metadata: { httpStatusCode?: number; requestId?: string };
  readonly $fault: 'client' | 'server';

  constructor(name: string, message: string, options: { httpStatusCode?: number; fault?: 'client' | 'server' } = {}) {
    super(message);
    this.name = name;
    this.$metadata = { httpStatusCode: options.httpStatusCode, requestId: 'req-test' };
    this.$fault = options.fault ?? 'client';
  }
}

export function throttlingError(): FakeServiceError {
  return new FakeServiceError('ThrottlingException', 'Rate exceeded', { httpStatusCode: 400 });
}

/**
 * @example
 * ```typescript
 * const store = new InMemoryLogStore()
 *   .enqueuePage([lineA, lineB], 'token-1')
 *   .enqueueError(throttlingError())
 *   .enqueuePage([lineC]);
 * ```
 */
export class InMemoryLogStore implements LogStore {
  private readonly script: Array<LogPage | Error> = [];
  private readonly requests: LogPageRequest[] = [];
  private latestStream?: string;
  private latestStreamCalls = 0;

  /**
   * Splits lines into pages of `pageSize`, linked by tokens `token-1`, `token-2`, ...
   */
  static paginate(lines: readonly RawLogLine[], pageSize: number): InMemoryLogStore {
    const store = new InMemoryLogStore();
    if (lines.length === 0) {
      return store.enqueuePage([]);
    }
    for (let start = 0, page = 1; start < lines.length; start += pageSize, page++) {
      const end = start + pageSize;
      store.enqueuePage(lines.slice(start, end), end < lines.length ? `token-${page}` : undefined);
    }
    return store;
  }

  enqueuePage(lines: readonly RawLogLine[], nextToken?: string): this {
    this.script.push({ lines, nextToken });
    return this;
  }

  enqueueError(error: Error, times = 1): this {
    for (let i = 0; i < times; i++) {
      this.script.push(error);
    }
    return this;
  }

  withLatestStream(name: string | undefined): this {
    this.latestStream = name;
    return this;
  }

  getRequests(): LogPageRequest[] {
    return [...this.requests];
  }

  get latestStreamRequestCount(): number {
    return this.latestStreamCalls;
  }

  async filterPage(request: LogPageRequest): Promise<LogPage> {
    this.requests.push(request);

    const next = this.script.shift();
    if (!next) {
      throw new Error('No page configured in InMemoryLogStore');
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }

  async latestStreamName(): Promise<string | undefined> {
    this.latestStreamCalls++;
    return this.latestStream;
  }
}
