// corrector/api/body - Request body reading with a size limit

import type { Readable } from 'stream';

export const MAX_JSON_BODY_SIZE = 1 * 1024 * 1024; // 1 MiB

export class JsonBodyError extends Error {
  status: number;

  constructor(message: string, status = 400) {
    super(message);
    this.name = 'JsonBodyError';
    this.status = status;
  }
}

/**
 * Collect a request body as UTF-8 text. Rejects with 413 as soon as the
 * declared or received size passes `limit`.
 */
export function readRequestBody(
  req: Readable,
  contentLength: string | undefined,
  limit = MAX_JSON_BODY_SIZE
): Promise<string> {
  return new Promise((resolve, reject) => {
    if (contentLength) {
      const declared = Number(contentLength);
      if (Number.isFinite(declared) && declared > limit) {
        reject(new JsonBodyError('Payload too large', 413));
        return;
      }
    }

    const chunks: Buffer[] = [];
    let received = 0;
    let aborted = false;

    req.on('data', (chunk: Buffer | string) => {
      if (aborted) return;
      const buffer = typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : chunk;
      received += buffer.length;
      if (received > limit) {
        aborted = true;
        req.destroy();
        reject(new JsonBodyError('Payload too large', 413));
        return;
      }
      chunks.push(buffer);
    });

    req.on('end', () => {
      resolve(Buffer.concat(chunks).toString('utf-8'));
    });

    req.on('error', (err) => {
      reject(err instanceof JsonBodyError ? err : new JsonBodyError(String(err), 400));
    });
  });
}

export function parseJsonBody(text: string): unknown {
  if (text.trim() === '') {
    throw new JsonBodyError('Empty body');
  }
  try {
    return JSON.parse(text);
  } catch {
    throw new JsonBodyError('Invalid JSON');
  }
}

/** A non-empty string field of a JSON object body. */
export function requireString(body: unknown, field: string, allowEmpty = false): string {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw new JsonBodyError('Expected a JSON object');
  }
  const value: unknown = Reflect.get(body, field);
  if (typeof value !== 'string' || (!allowEmpty && value.trim() === '')) {
    throw new JsonBodyError(`Missing required field: ${field}`);
  }
  return value;
}
