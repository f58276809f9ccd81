// Mock models for the example server and the gateway tests
// Each one stands in for a real model with its own tag and output type.

import { setTimeout as delay } from 'node:timers/promises';
import { logger, type JobInput } from '@lightinfer/core';
import type { InferenceModel, ModelContext } from '@lightinfer/worker';

export interface MockModelOptions {
  /** Pause between produced values, in milliseconds */
  delayMs?: number;
}

function stringArg(input: JobInput, position: number, name: string): string {
  const value = input.args[position] ?? input.kwargs[name];
  return typeof value === 'string' ? value : String(value ?? '');
}

function intKwarg(input: JobInput, name: string, defaultValue: number): number {
  const value = input.kwargs[name];
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 ? value : defaultValue;
}

/** Streams a prompt echo followed by `steps` tokens. */
export class MockLLM implements InferenceModel {
  readonly tags = ['llm'];
  private readonly delayMs: number;

  constructor(options: MockModelOptions = {}) {
    this.delayMs = options.delayMs ?? 500;
  }

  async *infer(input: JobInput, context: ModelContext): AsyncGenerator<string> {
    const prompt = stringArg(input, 0, 'prompt');
    const steps = intKwarg(input, 'steps', 5);
    logger.info(`LLM received prompt: ${prompt}`, { job_id: context.job_id });

    yield `Response to '${prompt}': `;
    for (let i = 0; i < steps; i++) {
      await delay(this.delayMs, undefined, { signal: context.signal });
      yield `token_${i} `;
    }
  }
}

/** Streams 20 groups of 50 silent audio bytes, one group per `delayMs`. */
export class MockTTS implements InferenceModel {
  readonly tags = ['tts'];
  private readonly delayMs: number;

  constructor(options: MockModelOptions = {}) {
    this.delayMs = options.delayMs ?? 100;
  }

  async *infer(input: JobInput, context: ModelContext): AsyncGenerator<Uint8Array> {
    logger.info(`TTS received text: ${stringArg(input, 0, 'text')}`, { job_id: context.job_id });
    for (let i = 0; i < 20; i++) {
      await delay(this.delayMs, undefined, { signal: context.signal });
      yield new Uint8Array(50);
    }
  }
}

export class AsyncMockModel implements InferenceModel {
  readonly tags = ['async'];
  private readonly delayMs: number;

  constructor(options: MockModelOptions = {}) {
    this.delayMs = options.delayMs ?? 1000;
  }

  async infer(input: JobInput, context: ModelContext): Promise<string> {
    await delay(this.delayMs, undefined, { signal: context.signal });
    return `Async result for ${stringArg(input, 0, 'query')}`;
  }
}

/**
 * Behaves like the LLM or the TTS model depending on the `mode` kwarg:
 * `text` streams tokens, `audio` streams 10 groups of 100 bytes, any other mode
 * produces nothing.
 */
export class UniversalMockModel implements InferenceModel {
  readonly tags = ['universal'];
  private readonly delayMs: number;

  constructor(options: MockModelOptions = {}) {
    this.delayMs = options.delayMs ?? 200;
  }

  async *infer(input: JobInput, context: ModelContext): AsyncGenerator<string | Uint8Array> {
    const text = stringArg(input, 0, 'input_text');
    const mode = input.kwargs.mode ?? 'text';

    if (mode === 'text') {
      yield `Response to '${text}': `;
      for (let i = 0; i < 5; i++) {
        await delay(this.delayMs, undefined, { signal: context.signal });
        yield `token_${i} `;
      }
      return;
    }

    if (mode === 'audio') {
      for (let i = 0; i < 10; i++) {
        await delay(this.delayMs, undefined, { signal: context.signal });
        yield new Uint8Array(100);
      }
    }
  }
}
