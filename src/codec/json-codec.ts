/**
 * JSON payload codec
 *
 * The queue carries opaque bytes; these helpers cover the common case of
 * JSON-serializable payloads and results.
 */

import { MalformedRecordError } from '../errors/queue-error';

export function encodeJson(value: unknown): Buffer {
  const text = JSON.stringify(value);
  if (text === undefined) {
    throw new TypeError(`Value of type ${typeof value} has no JSON representation`);
  }
  return Buffer.from(text, 'utf8');
}

/**
 * Parse a JSON payload. The caller narrows the result.
 * @param source - key or job id reported on failure
 */
export function decodeJson(data: Buffer, source: string = 'payload'): unknown {
  const text = data.toString('utf8');
  try {
    return JSON.parse(text);
  } catch {
    throw new MalformedRecordError(source, text, 'JSON document');
  }
}
