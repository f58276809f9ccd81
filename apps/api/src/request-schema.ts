// Inbound request validation for POST /api/v1/infer

import { z } from 'zod';
import { InvalidRequestError, type InferenceRequest } from '@lightinfer/core';

// null is accepted wherever a field may be absent
export const InferenceRequestSchema = z
  .object({
    args: z.array(z.unknown()).nullish(),
    kwargs: z.record(z.string(), z.unknown()).nullish(),
    stream: z.boolean().nullish(),
    media_type: z.string().min(1).nullish(),
    chunk_size: z.number().nullish(),
    target: z.union([z.number(), z.string()]).nullish(),
  });

export function parseInferenceRequest(body: unknown): InferenceRequest {
  const result = InferenceRequestSchema.safeParse(body ?? {});
  if (!result.success) {
    const details = result.error.issues
      .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new InvalidRequestError(`Invalid inference request: ${details}`);
  }

  const { args, kwargs, stream, media_type, chunk_size, target } = result.data;
  return {
    ...(args != null ? { args } : {}),
    ...(kwargs != null ? { kwargs } : {}),
    ...(stream != null ? { stream } : {}),
    ...(media_type != null ? { media_type } : {}),
    ...(chunk_size != null ? { chunk_size } : {}),
    ...(target != null ? { target } : {}),
  };
}
