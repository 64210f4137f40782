/**
 * Resumable Upload Header Helpers
 */

import type { Result, UploadMetadata } from '../../types/index.js';
import { failure, success } from '../../types/index.js';

export const TUS_VERSION = '1.0.0';
export const OFFSET_CONTENT_TYPE = 'application/offset+octet-stream';

const UNSIGNED_INTEGER = /^\d+$/;
const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Parse a non-negative integer header such as `Upload-Length`
 */
export function parseByteHeader(
  name: string,
  value: string | undefined
): Result<number> {
  if (value === undefined || !UNSIGNED_INTEGER.test(value.trim())) {
    return failure('VALIDATION_ERROR', `${name} must be a non-negative integer`);
  }
  const parsed = Number(value.trim());
  if (!Number.isSafeInteger(parsed)) {
    return failure('VALIDATION_ERROR', `${name} is too large`);
  }
  return success(parsed);
}

/**
 * Parse `Upload-Metadata`: comma-separated `key base64value` pairs.
 * A key without a value maps to the empty string.
 */
export function parseMetadata(
  header: string | undefined
): Result<UploadMetadata> {
  const metadata: UploadMetadata = {};
  if (header === undefined || header.trim() === '') {
    return success(metadata);
  }

  for (const pair of header.split(',')) {
    const parts = pair.trim().split(' ');
    const [key, encoded = '', ...extra] = parts;
    if (key === undefined || key === '' || extra.length > 0) {
      return failure('VALIDATION_ERROR', 'Upload-Metadata is malformed', {
        pair: pair.trim(),
      });
    }
    if (!BASE64.test(encoded)) {
      return failure(
        'VALIDATION_ERROR',
        `Upload-Metadata value for ${key} is not base64`
      );
    }
    metadata[key] = Buffer.from(encoded, 'base64').toString('utf8');
  }

  return success(metadata);
}

/**
 * Serialize metadata back into `Upload-Metadata` form
 */
export function serializeMetadata(metadata: UploadMetadata): string {
  return Object.entries(metadata)
    .map(([key, value]) =>
      value === ''
        ? key
        : `${key} ${Buffer.from(value, 'utf8').toString('base64')}`
    )
    .join(',');
}

/**
 * Origin for `Location`, honouring proxy headers when asked to
 */
export function resolveOrigin(
  requestUrl: string,
  headers: { get(name: string): string | null },
  behindProxy: boolean
): string {
  const url = new URL(requestUrl);
  let protocol = url.protocol.replace(/:$/, '');
  let host = url.host;

  if (behindProxy) {
    const forwarded = headers.get('forwarded');
    if (forwarded !== null) {
      const first = forwarded.split(',')[0] ?? '';
      for (const directive of first.split(';')) {
        const [name = '', rawValue = ''] = directive.trim().split('=');
        const value = rawValue.replace(/^"|"$/g, '');
        if (value === '') {
          continue;
        }
        if (name.toLowerCase() === 'host') {
          host = value;
        } else if (name.toLowerCase() === 'proto') {
          protocol = value.toLowerCase();
        }
      }
    } else {
      const forwardedHost = headers.get('x-forwarded-host');
      const forwardedProto = headers.get('x-forwarded-proto');
      if (forwardedHost !== null && forwardedHost.trim() !== '') {
        host = forwardedHost.split(',')[0]?.trim() ?? host;
      }
      if (forwardedProto !== null && forwardedProto.trim() !== '') {
        protocol =
          forwardedProto.split(',')[0]?.trim().toLowerCase() ?? protocol;
      }
    }
  }

  if (protocol !== 'http' && protocol !== 'https') {
    protocol = 'http';
  }
  return `${protocol}://${host}`;
}

/**
 * Async iterator over a request body
 */
export async function* bodyChunks(
  body: ReadableStream<Uint8Array> | null
): AsyncGenerator<Uint8Array> {
  if (body === null) {
    return;
  }
  const reader = body.getReader();
  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) {
        return;
      }
      yield value;
    }
  } finally {
    reader.releaseLock();
  }
}

/**
 * Safe `Content-Disposition` for a stored filename
 */
export function contentDisposition(filename: string): string {
  const fallback = filename.replace(/[^\x20-\x7e]|["\\]/g, '_');
  const encoded = encodeURIComponent(filename);
  return `attachment; filename="${fallback}"; filename*=UTF-8''${encoded}`;
}
