// Model connectors - adapt the four producer shapes a model can have
//   plain function / async function      -> UnaryModelConnector
//   generator / async generator function -> StreamModelConnector
// The shape is fixed when the worker is registered, not per call.

import { JobCancelledError, toPayload, type Job, type ModelKind } from '@lightinfer/core';
import { BaseConnector, type InferenceModel, type ModelContext, type ProducedChunk } from './base-connector.js';

export function detectModelKind(model: InferenceModel): ModelKind {
  if (model.kind) {
    return model.kind;
  }
  const functionType = model.infer.constructor.name;
  return functionType === 'GeneratorFunction' || functionType === 'AsyncGeneratorFunction' ? 'stream' : 'unary';
}

export function modelName(model: InferenceModel, index: number): string {
  if (model.name) {
    return model.name;
  }
  const className = model.constructor.name;
  return className && className !== 'Object' ? className : `worker-${index}`;
}

function isAsyncIterable(value: unknown): value is AsyncIterable<unknown> {
  return typeof value === 'object' && value !== null && Symbol.asyncIterator in value;
}

function isIterable(value: unknown): value is Iterable<unknown> {
  return typeof value === 'object' && value !== null && Symbol.iterator in value;
}

async function* fromIterable(items: Iterable<unknown>): AsyncGenerator<unknown, void, undefined> {
  yield* items;
}

abstract class ModelConnector extends BaseConnector {
  constructor(
    protected readonly model: InferenceModel,
    connectorId: string
  ) {
    super(connectorId, model.tags ?? []);
  }
}

export class UnaryModelConnector extends ModelConnector {
  readonly kind = 'unary';

  protected async *produce(job: Job, context: ModelContext): AsyncGenerator<ProducedChunk, void, undefined> {
    const value: unknown = await this.model.infer(job.input, context);

    // No cancel hook on a single-shot producer: it ran to completion, drop the result
    if (context.signal.aborted) {
      throw new JobCancelledError(job.id);
    }

    yield { payload: toPayload(value), terminal: true };
  }
}

export class StreamModelConnector extends ModelConnector {
  readonly kind = 'stream';

  protected async *produce(job: Job, context: ModelContext): AsyncGenerator<ProducedChunk, void, undefined> {
    const result: unknown = this.model.infer(job.input, context);
    const source: unknown = isAsyncIterable(result) ? result : await result;

    if (typeof source === 'string' || source instanceof Uint8Array) {
      yield { payload: toPayload(source), terminal: false };
    } else if (isAsyncIterable(source) || isIterable(source)) {
      // One value in flight: the next is pulled only after this chunk was taken downstream
      const iterator: AsyncIterator<unknown> = isAsyncIterable(source)
        ? source[Symbol.asyncIterator]()
        : fromIterable(source);
      try {
        for (;;) {
          if (context.signal.aborted) {
            throw new JobCancelledError(job.id);
          }
          const next = await iterator.next();
          if (next.done) {
            break;
          }
          yield { payload: toPayload(next.value), terminal: false };
        }
      } finally {
        await iterator.return?.();
      }
    } else {
      throw new TypeError(`Streaming model ${this.connector_id} did not return an iterable`);
    }

    yield { terminal: true };
  }
}

/** Wrap a model (or pass through a ready-made connector) for the worker at `index`. */
export function createConnector(entry: InferenceModel | BaseConnector, index: number): BaseConnector {
  if (entry instanceof BaseConnector) {
    return entry;
  }

  const connectorId = modelName(entry, index);
  return detectModelKind(entry) === 'stream'
    ? new StreamModelConnector(entry, connectorId)
    : new UnaryModelConnector(entry, connectorId);
}
