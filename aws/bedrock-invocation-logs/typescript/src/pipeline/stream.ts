/**
 * Single-use stream of invocation records.
 *
 * @module pipeline/stream
 */

import { StreamConsumedError } from '../error/categories.js';
import { NoopLogger, type Logger } from '../observability/logging.js';
import type { InvocationRecord, PipelineWarning, WarningKind } from '../types/record.js';

/**
 * Produces the records of one run, reporting warnings as they are raised.
 */
export type RecordSource = (onWarning: (warning: PipelineWarning) => void) => AsyncIterable<InvocationRecord>;

export interface PipelineSummary {
  /** Records yielded so far */
  readonly emitted: number;
  /** Lines and chunks dropped without producing a record */
  readonly skipped: number;
  readonly warningsByKind: Readonly<Partial<Record<WarningKind, number>>>;
}

const SKIPPING_KINDS: ReadonlySet<WarningKind> = new Set([
  'MALFORMED_RECORD',
  'UNSUPPORTED_INVOCATION_KIND',
  'INCONSISTENT_STREAM',
]);

/**
 * The result of `fetchAndNormalize`: invocation records in timestamp order, plus the
 * warnings raised while producing them.
 *
 * It can be iterated once. Work starts on the first pull and stops when the consumer
 * stops pulling.
 *
 * @example
 * ```typescript
 * const stream = fetchAndNormalize({ lookbackHours: 1 });
 * for await (const record of stream) {
 *   console.log(record.modelId, record.metadata.usage?.totalTokens);
 * }
 * console.log(stream.summary());
 * ```
 */
export class InvocationStream implements AsyncIterable<InvocationRecord> {
  private readonly source: RecordSource;
  private readonly logger: Logger;
  private readonly recorded: PipelineWarning[] = [];
  private consumed = false;
  private emitted = 0;

  constructor(source: RecordSource, logger: Logger = new NoopLogger()) {
    this.source = source;
    this.logger = logger;
  }

  /**
   * @throws StreamConsumedError when the stream has already been iterated
   */
  [Symbol.asyncIterator](): AsyncIterator<InvocationRecord> {
    if (this.consumed) {
      throw new StreamConsumedError();
    }
    this.consumed = true;
    return this.run();
  }

  /**
   * Warnings raised so far, in the order they were raised.
   */
  get warnings(): readonly PipelineWarning[] {
    return [...this.recorded];
  }

  summary(): PipelineSummary {
    const warningsByKind: Partial<Record<WarningKind, number>> = {};
    let skipped = 0;

    for (const warning of this.recorded) {
      warningsByKind[warning.kind] = (warningsByKind[warning.kind] ?? 0) + 1;
      if (SKIPPING_KINDS.has(warning.kind)) {
        skipped++;
      }
    }

    return { emitted: this.emitted, skipped, warningsByKind };
  }

  /**
   * Drains the stream.
   */
  async collect(): Promise<{ records: InvocationRecord[]; warnings: readonly PipelineWarning[] }> {
    const records: InvocationRecord[] = [];
    for await (const record of this) {
      records.push(record);
    }
    return { records, warnings: this.warnings };
  }

  private async *run(): AsyncGenerator<InvocationRecord, void, undefined> {
    for await (const record of this.source((warning) => this.recorded.push(warning))) {
      this.emitted++;
      yield record;
    }

    const { emitted, skipped } = this.summary();
    this.logger.info('Invocation log normalization complete', {
      emitted,
      skipped,
      warnings: this.recorded.length,
    });
  }
}
