/**
 * Health Route Tests
 */

import { describe, expect, it, vi } from 'vitest';

import { createHealthRoutes } from '@/api/routes/health.js';
import { createStoreComposer } from '@/services/store-composer.js';
import type { DataStore } from '@/types/index.js';

function createMockCore(): DataStore {
  return {
    create: vi.fn(),
    writeChunk: vi.fn(),
    getInfo: vi.fn(),
    read: vi.fn(),
  };
}

describe('GET /health', () => {
  it('should report capabilities without a quota', async () => {
    const composer = createStoreComposer();
    composer.register('core', createMockCore());
    const app = createHealthRoutes({ composer });

    const res = await app.request('/health');
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body).toMatchObject({
      status: 'ok',
      capabilities: 'Core: ✓ Terminater: ✗ Quota: ✗',
      quota: null,
    });
    expect(typeof body.timestamp).toBe('string');
  });

  it('should include quota usage when a quota is registered', async () => {
    const composer = createStoreComposer();
    composer.register('core', createMockCore());
    composer.register('quota', {
      usage: () => ({ usedBytes: 700, ceiling: 1000, remaining: 300 }),
    });
    const app = createHealthRoutes({ composer });

    const res = await app.request('/health');
    const body = await res.json();

    expect(body.capabilities).toBe('Core: ✓ Terminater: ✗ Quota: ✓');
    expect(body.quota).toEqual({
      usedBytes: 700,
      ceiling: 1000,
      remaining: 300,
    });
  });
});
