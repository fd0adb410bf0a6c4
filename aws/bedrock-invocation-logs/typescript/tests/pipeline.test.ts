/**
 * Normalization pipeline tests
 */

import { describe, it, expect, vi } from 'vitest';
import {
  BASE_TIME,
  MODEL_ID,
  chunkLine,
  converseLine,
  converseLog,
  messageStartFrame,
  messageStopFrame,
  metadataFrame,
  rawLine,
  textDeltaFrame,
} from '../src/__fixtures__/index.js';
import { InMemoryLogStore, throttlingError } from '../src/__mocks__/index.js';
import {
  ConfigurationError,
  DEFAULT_FILTER_PATTERN,
  DEFAULT_LOG_GROUP_NAME,
  FetchFailedError,
  LogStoreError,
  NoopLogger,
  ReorderBuffer,
  StreamConsumedError,
  fetchAndNormalize,
  outputTexts,
} from '../src/index.js';
import type { LogStore, PipelineConfigInput } from '../src/index.js';

const WINDOW: PipelineConfigInput = {
  startTime: BASE_TIME - 3_600_000,
  endTime: BASE_TIME + 3_600_000,
};

function run(store: LogStore, config: PipelineConfigInput = WINDOW) {
  return fetchAndNormalize(config, {
    store,
    logger: new NoopLogger(),
    clock: () => BASE_TIME + 3_600_000,
    sleep: vi.fn(async () => {}),
    random: () => 0,
  });
}

describe('fetchAndNormalize', () => {
  it('should emit shuffled single invocations in timestamp order when fully buffering', async () => {
    const t1 = BASE_TIME + 1_000;
    const t2 = BASE_TIME + 2_000;
    const t3 = BASE_TIME + 3_000;
    const store = InMemoryLogStore.paginate(
      [
        converseLine({ requestId: 'req-3', at: t3 }),
        converseLine({ requestId: 'req-1', at: t1 }),
        converseLine({ requestId: 'req-2', at: t2 }),
      ],
      2
    );

    const { records, warnings } = await run(store, { ...WINDOW, bufferUntilExhausted: true }).collect();

    expect(records.map((record) => record.invocationId)).toEqual(['req-1', 'req-2', 'req-3']);
    expect(records.map((record) => record.timestamp)).toEqual([t1, t2, t3]);
    expect(records.every((record) => record.metadata.rawShape === 'single')).toBe(true);
    expect(warnings).toEqual([]);
  });

  it('should reassemble a closed stream into one record', async () => {
    const store = InMemoryLogStore.paginate(
      [
        chunkLine({ requestId: 'abc', at: BASE_TIME, sequence: 0, frames: [messageStartFrame(), textDeltaFrame('A')] }),
        chunkLine({ requestId: 'abc', at: BASE_TIME + 10, sequence: 1, frames: [textDeltaFrame('B')] }),
        chunkLine({ requestId: 'abc', at: BASE_TIME + 20, sequence: 2, frames: [textDeltaFrame('C')] }),
        chunkLine({
          requestId: 'abc',
          at: BASE_TIME + 30,
          sequence: 3,
          frames: [messageStopFrame('end_turn'), metadataFrame()],
        }),
      ],
      3
    );

    const { records } = await run(store).collect();

    expect(records).toHaveLength(1);
    const [record] = records;
    expect(record.invocationId).toBe('abc');
    expect(outputTexts(record.output)).toEqual([{ role: 'assistant', text: 'ABC' }]);
    expect(record.metadata.stopReason).toBe('end_turn');
    expect(record.metadata.incomplete).toBe(false);
    expect(record.metadata.rawShape).toBe('chunk');
  });

  it('should emit an unterminated stream as incomplete when the fetch ends', async () => {
    const store = new InMemoryLogStore().enqueuePage([
      chunkLine({ requestId: 'xyz', at: BASE_TIME, sequence: 0, frames: [textDeltaFrame('Hello ')] }),
      chunkLine({ requestId: 'xyz', at: BASE_TIME + 10, sequence: 1, frames: [textDeltaFrame('world')] }),
    ]);

    const { records } = await run(store).collect();

    expect(records).toHaveLength(1);
    expect(records[0].metadata.incomplete).toBe(true);
    expect(outputTexts(records[0].output)).toEqual([{ role: 'assistant', text: 'Hello world' }]);
  });

  it('should fail with FetchFailedError when every attempt is throttled', async () => {
    const store = new InMemoryLogStore().enqueueError(throttlingError(), 5);

    const error = await run(store)
      .collect()
      .then(
        () => undefined,
        (reason: unknown) => reason
      );

    expect(error).toBeInstanceOf(FetchFailedError);
    if (!(error instanceof FetchFailedError)) return;
    expect(error.attempts).toBe(5);
    expect(error.cause).toBeInstanceOf(LogStoreError);
    expect(error.message).toBe('FilterLogEvents failed (gave up after 5 attempts): Rate exceeded');
    expect(store.getRequests()).toHaveLength(5);
  });

  it('should not carry state from a failed call into the next one', async () => {
    const failing = new InMemoryLogStore()
      .enqueuePage([chunkLine({ requestId: 'abc', at: BASE_TIME, sequence: 0, frames: [textDeltaFrame('lost')] })], 'token-1')
      .enqueueError(throttlingError(), 5);
    await expect(run(failing).collect()).rejects.toBeInstanceOf(FetchFailedError);

    const healthy = new InMemoryLogStore().enqueuePage([converseLine({ requestId: 'req-1', at: BASE_TIME })]);
    const { records, warnings } = await run(healthy).collect();

    expect(records.map((record) => record.invocationId)).toEqual(['req-1']);
    expect(warnings).toEqual([]);
  });

  it('should record each unusable line exactly once and skip it', async () => {
    const store = new InMemoryLogStore().enqueuePage([
      converseLine({ requestId: 'req-1', at: BASE_TIME }),
      { message: 'not json', timestamp: BASE_TIME + 1, eventId: 'evt-bad' },
      rawLine({ ...converseLog({ requestId: 'req-im', at: BASE_TIME + 2 }), operation: 'InvokeModel' }, BASE_TIME + 2, {
        eventId: 'evt-im',
      }),
      converseLine({ requestId: 'req-2', at: BASE_TIME + 3 }),
    ]);
    const stream = run(store);

    const { records, warnings } = await stream.collect();

    expect(records.map((record) => record.invocationId)).toEqual(['req-1', 'req-2']);
    expect(warnings.map((warning) => [warning.kind, warning.eventId])).toEqual([
      ['MALFORMED_RECORD', 'evt-bad'],
      ['UNSUPPORTED_INVOCATION_KIND', 'evt-im'],
    ]);
    expect(warnings[1].invocationId).toBe('req-im');
    expect(stream.summary()).toEqual({
      emitted: 2,
      skipped: 2,
      warningsByKind: { MALFORMED_RECORD: 1, UNSUPPORTED_INVOCATION_KIND: 1 },
    });
  });

  it('should order streams and single invocations together', async () => {
    const store = new InMemoryLogStore().enqueuePage([
      converseLine({ requestId: 'late', at: BASE_TIME + 2_000 }),
      chunkLine({ requestId: 'abc', at: BASE_TIME, sequence: 0, frames: [textDeltaFrame('streamed')] }),
      converseLine({ requestId: 'middle', at: BASE_TIME + 1_000 }),
      chunkLine({
        requestId: 'abc',
        at: BASE_TIME + 3_000,
        sequence: 1,
        frames: [messageStopFrame(), metadataFrame()],
      }),
    ]);

    const { records } = await run(store, { ...WINDOW, bufferUntilExhausted: true }).collect();

    expect(records.map((record) => record.invocationId)).toEqual(['abc', 'middle', 'late']);
  });

  it('should warn about a chunk naming another model and leave the stream intact', async () => {
    const store = new InMemoryLogStore().enqueuePage([
      chunkLine({ requestId: 'abc', at: BASE_TIME, sequence: 0, frames: [textDeltaFrame('kept')] }),
      chunkLine({
        requestId: 'abc',
        at: BASE_TIME + 1,
        sequence: 1,
        modelId: 'amazon.nova-lite-v1:0',
        frames: [textDeltaFrame('dropped')],
        eventId: 'evt-other',
      }),
    ]);

    const { records, warnings } = await run(store).collect();

    expect(outputTexts(records[0].output)).toEqual([{ role: 'assistant', text: 'kept' }]);
    expect(warnings).toEqual([
      {
        kind: 'INCONSISTENT_STREAM',
        reason: `Chunk names model amazon.nova-lite-v1:0 but stream abc uses ${MODEL_ID}`,
        eventId: 'evt-other',
        invocationId: 'abc',
      },
    ]);
  });

  it('should warn about a chunk that arrives after its stream was reassembled', async () => {
    const store = new InMemoryLogStore().enqueuePage([
      chunkLine({ requestId: 'abc', at: BASE_TIME, sequence: 0, frames: [messageStopFrame(), metadataFrame()] }),
      chunkLine({ requestId: 'abc', at: BASE_TIME + 1, sequence: 1, frames: [textDeltaFrame('late')], eventId: 'evt-late' }),
    ]);

    const { records, warnings } = await run(store).collect();

    expect(records).toHaveLength(1);
    expect(warnings).toEqual([
      {
        kind: 'INCONSISTENT_STREAM',
        reason: 'Chunk arrived after stream abc was reassembled',
        eventId: 'evt-late',
        invocationId: 'abc',
      },
    ]);
  });

  it('should use the configured region for logs that omit theirs', async () => {
    const log = { ...converseLog({ requestId: 'req-1', at: BASE_TIME }), region: undefined };
    const store = new InMemoryLogStore().enqueuePage([rawLine(log, BASE_TIME)]);

    const { records } = await run(store, { ...WINDOW, region: 'eu-west-1' }).collect();

    expect(records[0].region).toBe('eu-west-1');
  });

  it('should send the resolved query to the store', async () => {
    const store = new InMemoryLogStore().enqueuePage([]);

    await run(store).collect();

    expect(store.getRequests()).toEqual([
      {
        logGroupName: DEFAULT_LOG_GROUP_NAME,
        region: 'us-east-1',
        startTime: BASE_TIME - 3_600_000,
        endTime: BASE_TIME + 3_600_000,
        filterPattern: DEFAULT_FILTER_PATTERN,
        logStreamNames: undefined,
        nextToken: undefined,
        limit: undefined,
      },
    ]);
  });

  it('should read only the latest stream when asked to', async () => {
    const store = new InMemoryLogStore().withLatestStream('stream-b').enqueuePage([]);

    await run(store, { ...WINDOW, streamSelection: 'latest' }).collect();

    expect(store.getRequests()[0].logStreamNames).toEqual(['stream-b']);
  });

  it('should reject an invalid configuration before fetching', () => {
    const store = new InMemoryLogStore();

    expect(() => run(store, { ...WINDOW, region: 'nowhere' })).toThrow(ConfigurationError);
    expect(store.getRequests()).toHaveLength(0);
  });

  describe('stream behaviour', () => {
    it('should not touch the store until iterated', () => {
      const store = new InMemoryLogStore().enqueuePage([]);

      run(store);

      expect(store.getRequests()).toHaveLength(0);
    });

    it('should be iterable only once', async () => {
      const stream = run(new InMemoryLogStore().enqueuePage([]));
      await stream.collect();

      expect(() => stream[Symbol.asyncIterator]()).toThrow(StreamConsumedError);
    });

    it('should stop requesting pages when the consumer stops', async () => {
      const store = InMemoryLogStore.paginate(
        [1, 2, 3, 4, 5, 6].map((n) => converseLine({ requestId: `req-${n}`, at: BASE_TIME + n })),
        2
      );
      const seen: string[] = [];

      for await (const record of run(store)) {
        seen.push(record.invocationId);
        break;
      }

      expect(seen).toEqual(['req-1']);
      expect(store.getRequests()).toHaveLength(1);
    });

    it('should read the whole window before the first record when fully buffering', async () => {
      const store = InMemoryLogStore.paginate(
        [1, 2, 3, 4, 5, 6].map((n) => converseLine({ requestId: `req-${n}`, at: BASE_TIME + n })),
        2
      );
      const seen: string[] = [];

      for await (const record of run(store, { ...WINDOW, bufferUntilExhausted: true })) {
        seen.push(record.invocationId);
        break;
      }

      expect(seen).toEqual(['req-1']);
      expect(store.getRequests()).toHaveLength(3);
    });

    it('should still emit late records and warn about them', async () => {
      const store = new InMemoryLogStore().enqueuePage([
        converseLine({ requestId: 'req-2', at: BASE_TIME + 2_000 }),
        converseLine({ requestId: 'req-1', at: BASE_TIME + 1_000 }),
      ]);
      const stream = run(store);

      const { records, warnings } = await stream.collect();

      expect(records.map((record) => record.invocationId)).toEqual(['req-2', 'req-1']);
      expect(warnings).toEqual([
        {
          kind: 'OUT_OF_ORDER',
          reason: `Record at ${new Date(BASE_TIME + 1_000).toISOString()} released after ${new Date(
            BASE_TIME + 2_000
          ).toISOString()}`,
          invocationId: 'req-1',
        },
      ]);
      expect(stream.summary().skipped).toBe(0);
    });

    it('should hold records behind an open stream', async () => {
      const store = new InMemoryLogStore().enqueuePage([
        chunkLine({ requestId: 'abc', at: BASE_TIME, sequence: 0, frames: [textDeltaFrame('first')] }),
        converseLine({ requestId: 'req-1', at: BASE_TIME + 1_000 }),
        chunkLine({ requestId: 'abc', at: BASE_TIME + 2_000, sequence: 1, frames: [messageStopFrame(), metadataFrame()] }),
      ]);

      const { records, warnings } = await run(store).collect();

      expect(records.map((record) => record.invocationId)).toEqual(['abc', 'req-1']);
      expect(warnings).toEqual([]);
    });
  });
});

describe('ReorderBuffer', () => {
  it('should release items up to a threshold in timestamp order', () => {
    const buffer = new ReorderBuffer<{ timestamp: number; id: string }>();
    buffer.push({ timestamp: 30, id: 'c' });
    buffer.push({ timestamp: 10, id: 'a' });
    buffer.push({ timestamp: 20, id: 'b1' });
    buffer.push({ timestamp: 20, id: 'b2' });

    expect(buffer.drainUpTo(20).map((item) => item.id)).toEqual(['a', 'b1', 'b2']);
    expect(buffer.size).toBe(1);
    expect(buffer.drainAll().map((item) => item.id)).toEqual(['c']);
  });
});
