/**
 * Listing Route
 * HTML index of uploads, rebuilt from disk on every request
 */

import { Hono } from 'hono';
import { html, raw } from 'hono/html';

import type { ListingService } from '../../services/listing.service.js';
import type { UploadInfo } from '../../types/index.js';
import { errorResponse } from '../utils/response.js';

interface ListingRoutesDeps {
  listingService: Pick<ListingService, 'list'>;
  /** Upload endpoint mount, used to build download links */
  basePath: string;
}

const STYLE = `
* {
  font-family: monospace;
  font-size: 18px;
  box-sizing: border-box;
}

a {
  text-decoration: none;
}

a:hover {
  text-decoration: underline;
}

a:visited {
  color: blue;
}

ul {
  list-style-type: none;
  margin: 0;
  padding: 0;
}

li {
  margin: 5px 10px;
  padding: 0;
}
`;

/**
 * Render the listing page. Every interpolated value is escaped.
 */
export function renderListing(uploads: UploadInfo[], basePath: string) {
  const items = uploads.map(
    (info) =>
      html`<li><a href="${basePath}${info.id}">${info.metadata.filename ?? info.id}</a></li>`
  );

  return html`<!DOCTYPE html>
<html>
  <head>
    <title>File Listing</title>
    <style>${raw(STYLE)}</style>
  </head>
  <body>
    <ul>
      ${items}
    </ul>
  </body>
</html>`;
}

/**
 * Create listing routes
 */
export function createListingRoutes(deps: ListingRoutesDeps): Hono {
  const { listingService, basePath } = deps;
  const app = new Hono();

  /**
   * GET /
   * Any upload that fails to resolve fails the whole page
   */
  app.get('/', async (c) => {
    const result = await listingService.list();
    if (!result.success) {
      return errorResponse(c, result.error, 500);
    }
    return c.html(renderListing(result.data, basePath));
  });

  return app;
}
