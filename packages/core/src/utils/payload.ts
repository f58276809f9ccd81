// Payload normalisation - turns whatever a model produced into bytes, text or JSON

import type { JsonValue, Payload } from '../types/job.js';

export function isBytes(value: unknown): value is Uint8Array {
  return value instanceof Uint8Array;
}

export function toPayload(value: unknown): Payload {
  if (value instanceof Uint8Array) {
    return value;
  }
  if (value instanceof ArrayBuffer) {
    return new Uint8Array(value);
  }
  return toJsonValue(value);
}

export function toJsonValue(value: unknown): JsonValue {
  if (value === null || value === undefined) {
    return null;
  }
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return value;
    case 'number':
      return Number.isFinite(value) ? value : null;
    case 'bigint':
      return value.toString();
    case 'object':
      break;
    default:
      return String(value);
  }

  if (Array.isArray(value)) {
    return value.map(item => toJsonValue(item));
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (value instanceof Uint8Array) {
    return Buffer.from(value).toString('base64');
  }

  const result: { [key: string]: JsonValue } = {};
  for (const [key, entry] of Object.entries(value)) {
    if (entry !== undefined) {
      result[key] = toJsonValue(entry);
    }
  }
  return result;
}

/** Text used wherever a payload has to travel as a string. Bytes are base64 encoded. */
export function payloadToText(payload: Payload): string {
  if (typeof payload === 'string') {
    return payload;
  }
  if (isBytes(payload)) {
    return Buffer.from(payload).toString('base64');
  }
  return JSON.stringify(payload);
}

/** Bytes used wherever a payload has to travel as binary. Text is UTF-8 encoded. */
export function payloadToBytes(payload: Payload): Uint8Array {
  if (isBytes(payload)) {
    return payload;
  }
  if (typeof payload === 'string') {
    return Buffer.from(payload, 'utf8');
  }
  return Buffer.from(JSON.stringify(payload), 'utf8');
}
