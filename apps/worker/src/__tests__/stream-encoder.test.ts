/**
 * Stream encoder tests
 *
 * Framing per response mode, binary re-segmentation and the encoder state machine.
 */

import { describe, it, expect } from 'vitest';
import { EncodingError } from '@lightinfer/core';
import {
  EncoderState,
  StreamEncoder,
  formatSseDone,
  formatSseError,
  formatSseEvent,
  mergePayloads,
  type EncodedFrame,
} from '../stream-encoder.js';
import { chunk, collect, fromArray } from './setup.js';

function byteFrames(frames: EncodedFrame[]): Uint8Array[] {
  const bytes: Uint8Array[] = [];
  for (const frame of frames) {
    if (frame.type === 'bytes') bytes.push(frame.bytes);
  }
  return bytes;
}

function byteGroups(sizes: number[]) {
  let value = 0;
  return sizes.map(size => Uint8Array.from({ length: size }, () => value++ % 256));
}

describe('SSE formatting', () => {
  it('should write one data line per text line', () => {
    expect(formatSseEvent('token_0 ')).toBe('data: token_0 \n\n');
    expect(formatSseEvent('a\nb')).toBe('data: a\ndata: b\n\n');
  });

  it('should render named error and done events', () => {
    expect(formatSseError({ code: 'ADAPTER_ERROR', message: 'boom' })).toBe(
      'event: error\ndata: {"error":{"code":"ADAPTER_ERROR","message":"boom"}}\n\n'
    );
    expect(formatSseDone()).toBe('event: done\ndata: [DONE]\n\n');
  });
});

describe('mergePayloads', () => {
  it('should return null for no payload and a single payload unchanged', () => {
    expect(mergePayloads([])).toBeNull();
    expect(mergePayloads([{ a: 1 }])).toEqual({ a: 1 });
  });

  it('should concatenate text and bytes', () => {
    expect(mergePayloads(['a', 'b', 'c'])).toBe('abc');
    expect(mergePayloads([new Uint8Array([1]), new Uint8Array([2, 3])])).toEqual(Buffer.from([1, 2, 3]));
  });

  it('should fall back to an array for mixed payloads', () => {
    expect(mergePayloads(['a', 1, new Uint8Array([0, 0, 0])])).toEqual(['a', 1, 'AAAA']);
  });
});

describe('StreamEncoder', () => {
  describe('unary', () => {
    it('should emit the single terminal payload as the body', async () => {
      const encoder = new StreamEncoder('unary', 4096);
      const frames = await collect(
        encoder.encode(fromArray([chunk('j', 0, { payload: 'Async result for X', terminal: true })]))
      );

      expect(frames).toEqual([{ type: 'body', body: 'Async result for X' }, { type: 'end' }]);
      expect(encoder.state).toBe(EncoderState.COMPLETE);
    });

    it('should join a streamed text response into one body', async () => {
      const encoder = new StreamEncoder('unary', 4096);
      const frames = await collect(
        encoder.encode(
          fromArray([
            chunk('j', 0, { payload: 'Hello ' }),
            chunk('j', 1, { payload: 'world' }),
            chunk('j', 2, { terminal: true }),
          ])
        )
      );

      expect(frames).toEqual([{ type: 'body', body: 'Hello world' }, { type: 'end' }]);
    });
  });

  describe('sse-stream', () => {
    it('should emit one event per chunk as it arrives', () => {
      const encoder = new StreamEncoder('sse-stream', 4096);

      expect(encoder.state).toBe(EncoderState.WAITING);
      expect(encoder.accept(chunk('j', 0, { payload: 'token_0 ' }))).toEqual([
        { type: 'event', data: 'data: token_0 \n\n' },
      ]);
      expect(encoder.state).toBe(EncoderState.STREAMING);
      expect(encoder.accept(chunk('j', 1, { payload: { step: 1 } }))).toEqual([
        { type: 'event', data: 'data: {"step":1}\n\n' },
      ]);
      expect(encoder.accept(chunk('j', 2, { terminal: true }))).toEqual([{ type: 'end' }]);
      expect(encoder.state).toBe(EncoderState.COMPLETE);
    });

    it('should emit a payload carried by the terminal chunk before ending', () => {
      const encoder = new StreamEncoder('sse-stream', 4096);
      expect(encoder.accept(chunk('j', 0, { payload: 'only', terminal: true }))).toEqual([
        { type: 'event', data: 'data: only\n\n' },
        { type: 'end' },
      ]);
    });
  });

  describe('binary-stream', () => {
    it('should re-slice arbitrary byte groups into fixed-size frames', async () => {
      const groups = byteGroups([3, 10, 1, 7, 0, 15]);
      const source = [
        ...groups.map((payload, seq) => chunk('j', seq, { payload })),
        chunk('j', groups.length, { terminal: true }),
      ];

      const frames = await collect(new StreamEncoder('binary-stream', 8).encode(fromArray(source)));
      const bytes = byteFrames(frames);

      expect(bytes.map(frame => frame.length)).toEqual([8, 8, 8, 8, 4]);
      expect(Buffer.concat(bytes)).toEqual(Buffer.concat(groups));
      expect(frames.at(-1)).toEqual({ type: 'end' });
    });

    it('should produce only full frames when the total is a multiple of the chunk size', async () => {
      const groups = byteGroups([50, 50, 50, 50]);
      const source = [
        ...groups.map((payload, seq) => chunk('j', seq, { payload })),
        chunk('j', groups.length, { terminal: true }),
      ];

      const bytes = byteFrames(await collect(new StreamEncoder('binary-stream', 100).encode(fromArray(source))));

      expect(bytes.map(frame => frame.length)).toEqual([100, 100]);
      expect(Buffer.concat(bytes)).toEqual(Buffer.concat(groups));
    });

    it('should hold bytes back until a frame is full', () => {
      const encoder = new StreamEncoder('binary-stream', 4);

      expect(encoder.accept(chunk('j', 0, { payload: new Uint8Array([1, 2]) }))).toEqual([]);
      expect(encoder.accept(chunk('j', 1, { payload: new Uint8Array([3, 4, 5]) }))).toEqual([
        { type: 'bytes', bytes: Buffer.from([1, 2, 3, 4]) },
      ]);
      expect(encoder.accept(chunk('j', 2, { terminal: true }))).toEqual([
        { type: 'bytes', bytes: Buffer.from([5]) },
        { type: 'end' },
      ]);
    });

    it('should encode text payloads as UTF-8', () => {
      const encoder = new StreamEncoder('binary-stream', 2);
      expect(encoder.accept(chunk('j', 0, { payload: 'abc', terminal: true }))).toEqual([
        { type: 'bytes', bytes: Buffer.from('ab') },
        { type: 'bytes', bytes: Buffer.from('c') },
        { type: 'end' },
      ]);
    });

    it('should reject a chunk size that is not a positive integer', () => {
      expect(() => new StreamEncoder('binary-stream', 0)).toThrow(EncodingError);
      expect(() => new StreamEncoder('binary-stream', -256)).toThrow(EncodingError);
    });
  });

  describe('state machine', () => {
    it('should fail on an error chunk and drop buffered bytes', () => {
      const encoder = new StreamEncoder('binary-stream', 8);
      encoder.accept(chunk('j', 0, { payload: new Uint8Array([1, 2, 3]) }));

      expect(
        encoder.accept(chunk('j', 1, { terminal: true, error: { code: 'ADAPTER_ERROR', message: 'boom' } }))
      ).toEqual([{ type: 'error', error: { code: 'ADAPTER_ERROR', message: 'boom' } }]);
      expect(encoder.state).toBe(EncoderState.FAILED);
    });

    it('should go straight from waiting to complete on an empty stream', () => {
      const encoder = new StreamEncoder('sse-stream', 8);
      expect(encoder.accept(chunk('j', 0, { terminal: true }))).toEqual([{ type: 'end' }]);
      expect(encoder.state).toBe(EncoderState.COMPLETE);
    });

    it('should reject chunks after the stream finished', () => {
      const encoder = new StreamEncoder('sse-stream', 8);
      encoder.accept(chunk('j', 0, { terminal: true }));

      expect(() => encoder.accept(chunk('j', 1, { payload: 'late' }))).toThrow(EncodingError);
      expect(encoder.state).toBe(EncoderState.COMPLETE);
    });

    it('should fail when the source ends without a terminal chunk', async () => {
      const encoder = new StreamEncoder('sse-stream', 8);
      const frames = await collect(encoder.encode(fromArray([chunk('j', 0, { payload: 'a' })])));

      expect(frames).toEqual([
        { type: 'event', data: 'data: a\n\n' },
        { type: 'error', error: { code: 'WORKER_FAULT', message: 'Output ended without a terminal chunk' } },
      ]);
      expect(encoder.state).toBe(EncoderState.FAILED);
    });

    it('should fail when the source itself throws', async () => {
      async function* broken() {
        yield chunk('j', 0, { payload: 'a' });
        throw new Error('channel broke');
      }

      const encoder = new StreamEncoder('sse-stream', 8);
      const frames = await collect(encoder.encode(broken()));

      expect(frames.at(-1)).toEqual({ type: 'error', error: { code: 'WORKER_FAULT', message: 'channel broke' } });
      expect(encoder.state).toBe(EncoderState.FAILED);
    });
  });
});
