/**
 * Connector tests
 *
 * One uniform chunk contract over the four ways a model can produce output:
 * plain return, generator, async return and async generator.
 */

import { describe, it, expect } from 'vitest';
import type { JobInput, OutputChunk } from '@lightinfer/core';
import {
  StreamModelConnector,
  UnaryModelConnector,
  createConnector,
  detectModelKind,
  modelName,
  type ModelContext,
} from '../connectors/index.js';
import { collect, createTestJob, payloads, sleep } from './setup.js';

function run(connector: ReturnType<typeof createConnector>, signal = new AbortController().signal) {
  const job = createTestJob({ args: ['Hello'], kwargs: { steps: 3 } });
  return collect(connector.invoke(job, signal));
}

describe('detectModelKind', () => {
  it('should classify generator functions as streaming', () => {
    expect(detectModelKind({ *infer() { yield 1; } })).toBe('stream');
    expect(detectModelKind({ async *infer() { yield 1; } })).toBe('stream');
  });

  it('should classify plain and async functions as unary', () => {
    expect(detectModelKind({ infer: () => 1 })).toBe('unary');
    expect(detectModelKind({ infer: async () => 1 })).toBe('unary');
  });

  it('should honour an explicit kind', () => {
    expect(detectModelKind({ kind: 'stream', infer: () => ['a', 'b'] })).toBe('stream');
  });
});

describe('modelName', () => {
  class MockLLM {
    *infer() {
      yield 'x';
    }
  }

  it('should prefer the declared name, then the class name, then the position', () => {
    expect(modelName({ name: 'llm-a', infer: () => 1 }, 0)).toBe('llm-a');
    expect(modelName(new MockLLM(), 1)).toBe('MockLLM');
    expect(modelName({ infer: () => 1 }, 2)).toBe('worker-2');
  });
});

describe('createConnector', () => {
  it('should pick the connector class when the worker is registered', () => {
    expect(createConnector({ *infer() { yield 1; } }, 0)).toBeInstanceOf(StreamModelConnector);
    expect(createConnector({ infer: async () => 1 }, 0)).toBeInstanceOf(UnaryModelConnector);
  });

  it('should pass ready-made connectors through', () => {
    const connector = createConnector({ infer: () => 1 }, 0);
    expect(createConnector(connector, 3)).toBe(connector);
  });

  it('should carry the model tags', () => {
    expect(createConnector({ tags: ['tts'], infer: () => 1 }, 0).tags).toEqual(['tts']);
  });
});

describe('producer shapes', () => {
  it('should yield one terminal chunk for a plain function', async () => {
    const connector = createConnector({ infer: ({ args }: JobInput) => `echo ${String(args[0])}` }, 0);
    const chunks = await run(connector);

    expect(chunks).toHaveLength(1);
    expect(chunks[0]).toMatchObject({ seq: 0, payload: 'echo Hello', terminal: true });
    expect(chunks[0].error).toBeUndefined();
  });

  it('should yield one terminal chunk for an async function', async () => {
    const connector = createConnector(
      {
        async infer({ args }: JobInput) {
          await sleep(5);
          return `Async result for ${String(args[0])}`;
        },
      },
      0
    );
    const chunks = await run(connector);

    expect(chunks).toHaveLength(1);
    expect(chunks[0]).toMatchObject({ payload: 'Async result for Hello', terminal: true });
  });

  it('should yield one chunk per generator value and a final terminal chunk', async () => {
    const connector = createConnector(
      {
        *infer({ args, kwargs }: JobInput) {
          yield `Response to '${String(args[0])}': `;
          for (let i = 0; i < Number(kwargs.steps); i++) {
            yield `token_${i} `;
          }
        },
      },
      0
    );
    const chunks = await run(connector);

    expect(payloads(chunks)).toEqual(["Response to 'Hello': ", 'token_0 ', 'token_1 ', 'token_2 ']);
    expect(chunks.map(c => c.terminal)).toEqual([false, false, false, false, true]);
    expect(chunks.map(c => c.seq)).toEqual([0, 1, 2, 3, 4]);
    expect(chunks[4].payload).toBeUndefined();
  });

  it('should stream an async generator in production order', async () => {
    const connector = createConnector(
      {
        async *infer() {
          for (const size of [3, 1, 2]) {
            await sleep(size);
            yield new Uint8Array(size).fill(size);
          }
        },
      },
      0
    );
    const chunks = await run(connector);

    expect(payloads(chunks)).toEqual([
      new Uint8Array([3, 3, 3]),
      new Uint8Array([1]),
      new Uint8Array([2, 2]),
    ]);
    expect(chunks.at(-1)?.terminal).toBe(true);
  });

  it('should treat an empty generator as a lone terminal chunk', async () => {
    const connector = createConnector({ *infer() { return; } }, 0);
    const chunks = await run(connector);

    expect(chunks).toEqual([{ job_id: chunks[0].job_id, seq: 0, terminal: true }]);
  });

  it('should stream an iterable returned by an explicitly streaming function', async () => {
    const connector = createConnector({ kind: 'stream', infer: async () => ['a', 'b'] }, 0);
    const chunks = await run(connector);

    expect(payloads(chunks)).toEqual(['a', 'b']);
  });

  it('should fail a streaming function that returns no iterable', async () => {
    const connector = createConnector({ kind: 'stream', infer: () => 42 }, 0);
    const chunks = await run(connector);

    expect(chunks).toHaveLength(1);
    expect(chunks[0].error?.code).toBe('ADAPTER_ERROR');
  });
});

describe('producer failures', () => {
  it('should deliver the values produced so far, then one error chunk', async () => {
    let requested = 0;
    const connector = createConnector(
      {
        *infer() {
          for (let i = 0; i < 5; i++) {
            requested++;
            if (i === 2) throw new Error('model exploded');
            yield `token_${i}`;
          }
        },
      },
      0
    );
    const chunks = await run(connector);

    expect(chunks).toHaveLength(3);
    expect(payloads(chunks)).toEqual(['token_0', 'token_1']);
    expect(chunks[2]).toMatchObject({
      seq: 2,
      terminal: true,
      error: { code: 'ADAPTER_ERROR', message: 'model exploded' },
    });
    expect(requested).toBe(3);
    expect(connector.getStats()).toEqual({ jobs_processed: 0, jobs_failed: 1 });
  });

  it('should turn a rejected single-shot producer into an error chunk', async () => {
    const connector = createConnector({ infer: () => Promise.reject(new Error('no GPU')) }, 0);
    const chunks = await run(connector);

    expect(chunks).toEqual([
      { job_id: chunks[0].job_id, seq: 0, terminal: true, error: { code: 'ADAPTER_ERROR', message: 'no GPU' } },
    ]);
  });
});

describe('cancellation', () => {
  it('should stop pulling from a generator once the signal fires', async () => {
    const controller = new AbortController();
    let produced = 0;
    let closed = false;
    const connector = createConnector(
      {
        *infer() {
          try {
            for (let i = 0; i < 10; i++) {
              produced++;
              yield i;
            }
          } finally {
            closed = true;
          }
        },
      },
      0
    );

    const job = createTestJob();
    const seen: OutputChunk[] = [];
    for await (const chunk of connector.invoke(job, controller.signal)) {
      seen.push(chunk);
      if (chunk.seq === 1) controller.abort();
    }

    expect(payloads(seen)).toEqual([0, 1]);
    expect(seen.at(-1)?.error?.code).toBe('CANCELLED');
    expect(produced).toBe(2);
    expect(closed).toBe(true);
  });

  it('should hand the signal to models that can cancel natively', async () => {
    const controller = new AbortController();
    let observed: AbortSignal | undefined;
    const connector = createConnector(
      {
        infer(_input: JobInput, context: ModelContext) {
          observed = context.signal;
          return 'done';
        },
      },
      0
    );

    await collect(connector.invoke(createTestJob(), controller.signal));
    expect(observed).toBe(controller.signal);
  });

  it('should discard the result of a single-shot producer that finished after cancellation', async () => {
    const controller = new AbortController();
    const connector = createConnector(
      {
        async infer() {
          await sleep(10);
          return 'too late';
        },
      },
      0
    );

    const pending = collect(connector.invoke(createTestJob(), controller.signal));
    controller.abort();
    const chunks = await pending;

    expect(chunks).toHaveLength(1);
    expect(chunks[0].payload).toBeUndefined();
    expect(chunks[0].error?.code).toBe('CANCELLED');
  });
});
