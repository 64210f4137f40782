/**
 * Listing Route Tests
 */

import { describe, expect, it, vi } from 'vitest';
import { Hono } from 'hono';

import { createListingRoutes, renderListing } from '@/api/routes/listing.js';
import type { UploadInfo } from '@/types/index.js';
import { failure, success } from '@/types/index.js';

function makeInfo(id: string, filename?: string): UploadInfo {
  return {
    id,
    size: 4,
    offset: 4,
    metadata: filename === undefined ? {} : { filename },
    createdAt: '2026-01-01T00:00:00.000Z',
  };
}

function mountListing(list: ReturnType<typeof vi.fn>): Hono {
  const app = new Hono();
  app.route(
    '/',
    createListingRoutes({ listingService: { list }, basePath: '/files/' })
  );
  return app;
}

describe('renderListing', () => {
  it('should link every upload under the base path', async () => {
    const page = await renderListing(
      [makeInfo('a1', 'alpha.txt'), makeInfo('b2')],
      '/files/'
    );
    const markup = page.toString();

    expect(markup).toContain(
      '<li><a href="/files/a1">alpha.txt</a></li>'
    );
    expect(markup).toContain('<li><a href="/files/b2">b2</a></li>');
    expect(markup.startsWith('<!DOCTYPE html>')).toBe(true);
    expect(markup).toContain('<title>File Listing</title>');
  });

  it('should escape filenames', async () => {
    const page = await renderListing(
      [makeInfo('x', '<script>"&')],
      '/files/'
    );

    expect(page.toString()).toContain(
      '<li><a href="/files/x">&lt;script&gt;&quot;&amp;</a></li>'
    );
  });
});

describe('GET /', () => {
  it('should serve the listing as HTML', async () => {
    const list = vi
      .fn()
      .mockResolvedValue(success([makeInfo('a1', 'alpha.txt')]));
    const app = mountListing(list);

    const res = await app.request('/');
    const text = await res.text();

    expect(res.status).toBe(200);
    expect(res.headers.get('Content-Type')).toBe('text/html; charset=UTF-8');
    expect(text).toContain('<li><a href="/files/a1">alpha.txt</a></li>');
  });

  it('should render an empty list', async () => {
    const app = mountListing(vi.fn().mockResolvedValue(success([])));

    const res = await app.request('/');
    const text = await res.text();

    expect(res.status).toBe(200);
    expect(text).not.toContain('<li>');
  });

  it('should fail with 500 when any upload cannot be resolved', async () => {
    const list = vi
      .fn()
      .mockResolvedValue(
        failure('NOT_FOUND', 'Unable to resolve upload x: Upload not found', {
          id: 'x',
        })
      );
    const app = mountListing(list);

    const res = await app.request('/');
    const body = await res.json();

    expect(res.status).toBe(500);
    expect(body.error.code).toBe('NOT_FOUND');
    expect(body.error.message).toBe(
      'Unable to resolve upload x: Upload not found'
    );
  });
});
