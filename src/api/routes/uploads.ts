/**
 * Upload Routes
 *
 * Minimal resumable-upload surface backed by the store composer:
 * creation, offset lookup, chunk append, download and termination.
 * Checksums, deferred lengths and concatenation are not offered.
 */

import type { Context, Next } from 'hono';
import { Hono } from 'hono';
import { stream } from 'hono/streaming';

import { logEvent } from '../../lib/logger.js';
import type { StoreComposer } from '../../services/store-composer.js';
import { errorResponse } from '../utils/response.js';
import {
  OFFSET_CONTENT_TYPE,
  TUS_VERSION,
  bodyChunks,
  contentDisposition,
  parseByteHeader,
  parseMetadata,
  resolveOrigin,
  serializeMetadata,
} from '../utils/upload-headers.js';

interface UploadRoutesDeps {
  composer: StoreComposer;
  /** Mount path with leading and trailing slash, e.g. `/files/` */
  basePath: string;
  /** 0 = unlimited */
  maxSize: number;
  behindProxy: boolean;
}

const MIME_TYPE = /^[\w.+-]+\/[\w.+-]+$/;

/**
 * `/files/` and `/files`, so clients may post to either
 */
function collectionPathsFor(basePath: string): string[] {
  const trimmed = basePath.replace(/\/+$/, '');
  return trimmed === '' ? [basePath] : [basePath, trimmed];
}

function mediaType(header: string | undefined): string {
  return (header ?? '').split(';')[0]?.trim().toLowerCase() ?? '';
}

async function tusHeaders(c: Context, next: Next): Promise<void> {
  await next();
  c.header('Tus-Resumable', TUS_VERSION);
}

/**
 * Create upload routes
 */
export function createUploadRoutes(deps: UploadRoutesDeps): Hono {
  const { composer, basePath, maxSize, behindProxy } = deps;
  const app = new Hono();

  const collectionPaths = collectionPathsFor(basePath);
  const itemPath = `${basePath}:id`;

  for (const routePath of [...collectionPaths, itemPath]) {
    app.use(routePath, tusHeaders);
  }

  // ─────────────────────────────────────────────────────────────
  // DISCOVERY
  // ─────────────────────────────────────────────────────────────

  /**
   * OPTIONS /files/
   * Advertise protocol version and supported extensions
   */
  app.on('OPTIONS', [...collectionPaths, itemPath], (c) => {
    const extensions = ['creation'];
    if (composer.has('terminater')) {
      extensions.push('termination');
    }

    c.header('Tus-Version', TUS_VERSION);
    c.header('Tus-Extension', extensions.join(','));
    if (maxSize > 0) {
      c.header('Tus-Max-Size', String(maxSize));
    }
    return c.body(null, 204);
  });

  // ─────────────────────────────────────────────────────────────
  // CREATE
  // ─────────────────────────────────────────────────────────────

  /**
   * POST /files/
   * Declare a new upload of `Upload-Length` bytes
   */
  app.on('POST', collectionPaths, async (c) => {
    const length = parseByteHeader(
      'Upload-Length',
      c.req.header('upload-length')
    );
    if (!length.success) {
      return errorResponse(c, length.error);
    }
    if (maxSize > 0 && length.data > maxSize) {
      return errorResponse(c, {
        code: 'SIZE_EXCEEDED',
        message: `Upload-Length exceeds the maximum of ${maxSize} bytes`,
        details: { maxSize },
      });
    }

    const metadata = parseMetadata(c.req.header('upload-metadata'));
    if (!metadata.success) {
      return errorResponse(c, metadata.error);
    }

    const result = await composer.require('core').create({
      size: length.data,
      metadata: metadata.data,
    });
    if (!result.success) {
      return errorResponse(c, result.error);
    }

    const info = result.data;
    const origin = resolveOrigin(c.req.url, c.req.raw.headers, behindProxy);
    const location = `${origin}${basePath}${info.id}`;

    logEvent('UploadCreated', { id: info.id, size: info.size, url: location });

    c.header('Location', location);
    return c.body(null, 201);
  });

  // ─────────────────────────────────────────────────────────────
  // OFFSET LOOKUP AND DOWNLOAD
  // ─────────────────────────────────────────────────────────────

  /**
   * HEAD /files/:id  - report committed offset
   * GET  /files/:id  - stream committed bytes
   *
   * Hono serves HEAD through the GET handler.
   */
  app.get(itemPath, async (c) => {
    const id = c.req.param('id') ?? '';
    const store = composer.require('core');

    if (c.req.method === 'HEAD') {
      const result = await store.getInfo(id);
      if (!result.success) {
        return errorResponse(c, result.error);
      }

      const info = result.data;
      c.header('Cache-Control', 'no-store');
      c.header('Upload-Offset', String(info.offset));
      c.header('Upload-Length', String(info.size));
      if (Object.keys(info.metadata).length > 0) {
        c.header('Upload-Metadata', serializeMetadata(info.metadata));
      }
      return c.body(null, 200);
    }

    const result = await store.read(id);
    if (!result.success) {
      return errorResponse(c, result.error);
    }

    const { info, stream: content } = result.data;
    const filetype = info.metadata.filetype ?? '';
    c.header(
      'Content-Type',
      MIME_TYPE.test(filetype) ? filetype : 'application/octet-stream'
    );
    c.header('Content-Length', String(info.offset));
    c.header(
      'Content-Disposition',
      contentDisposition(info.metadata.filename ?? id)
    );

    return stream(c, async (output) => {
      output.onAbort(() => {
        content.destroy();
      });
      for await (const chunk of content) {
        await output.write(chunk);
      }
    });
  });

  // ─────────────────────────────────────────────────────────────
  // APPEND
  // ─────────────────────────────────────────────────────────────

  /**
   * PATCH /files/:id
   * Append the body at `Upload-Offset`
   */
  app.patch(itemPath, async (c) => {
    const id = c.req.param('id') ?? '';

    if (mediaType(c.req.header('content-type')) !== OFFSET_CONTENT_TYPE) {
      return errorResponse(c, {
        code: 'UNSUPPORTED_MEDIA_TYPE',
        message: `Content-Type must be ${OFFSET_CONTENT_TYPE}`,
      });
    }

    const offset = parseByteHeader(
      'Upload-Offset',
      c.req.header('upload-offset')
    );
    if (!offset.success) {
      return errorResponse(c, offset.error);
    }

    const result = await composer
      .require('core')
      .writeChunk(id, offset.data, bodyChunks(c.req.raw.body));
    if (!result.success) {
      return errorResponse(c, result.error);
    }

    logEvent('ChunkWriteComplete', {
      id,
      from: offset.data,
      offset: result.data,
    });

    c.header('Upload-Offset', String(result.data));
    return c.body(null, 204);
  });

  // ─────────────────────────────────────────────────────────────
  // TERMINATE
  // ─────────────────────────────────────────────────────────────

  /**
   * DELETE /files/:id
   * Only available when a terminater is registered
   */
  app.delete(itemPath, async (c) => {
    const id = c.req.param('id') ?? '';

    const terminater = composer.get('terminater');
    if (terminater === undefined) {
      return errorResponse(c, {
        code: 'METHOD_NOT_ALLOWED',
        message: 'Upload termination is not supported',
      });
    }

    const result = await terminater.terminate(id);
    if (!result.success) {
      return errorResponse(c, result.error);
    }

    logEvent('UploadTerminated', { id });
    return c.body(null, 204);
  });

  return app;
}
