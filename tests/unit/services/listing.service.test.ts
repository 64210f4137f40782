/**
 * Listing Service Tests
 */

import { writeFile } from 'fs/promises';
import path from 'path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import {
  compareByFilename,
  createListingService,
  idFromSidecarName,
} from '@/services/listing.service.js';
import type { UploadInfo } from '@/types/index.js';
import { failure, success } from '@/types/index.js';

import { createTempDir, removeTempDir } from '../../helpers/test-utils.js';

function makeInfo(id: string, filename?: string): UploadInfo {
  return {
    id,
    size: 10,
    offset: 0,
    metadata: filename === undefined ? {} : { filename },
    createdAt: '2026-01-01T00:00:00.000Z',
  };
}

describe('idFromSidecarName', () => {
  it('should strip the sidecar suffix', () => {
    expect(idFromSidecarName('abc123.info')).toBe('abc123');
  });

  it('should ignore data files and temp files', () => {
    expect(idFromSidecarName('abc123')).toBeNull();
    expect(idFromSidecarName('abc123.info.tmp')).toBeNull();
  });

  it('should ignore a bare suffix', () => {
    expect(idFromSidecarName('.info')).toBeNull();
  });
});

describe('compareByFilename', () => {
  it('should order by filename', () => {
    const sorted = [
      makeInfo('1', 'b.txt'),
      makeInfo('2', 'a.txt'),
      makeInfo('3', 'c.txt'),
    ].sort(compareByFilename);

    expect(sorted.map((info) => info.id)).toEqual(['2', '1', '3']);
  });

  it('should compare by byte value, so uppercase sorts first', () => {
    const sorted = [makeInfo('lower', 'apple'), makeInfo('upper', 'Zebra')].sort(
      compareByFilename
    );

    expect(sorted.map((info) => info.id)).toEqual(['upper', 'lower']);
  });

  it('should order astral characters by their UTF-8 bytes', () => {
    const sorted = [
      makeInfo('emoji', '\u{1F600}.txt'),
      makeInfo('halfwidth', '\uFF61.txt'),
    ].sort(compareByFilename);

    expect(sorted.map((info) => info.id)).toEqual(['halfwidth', 'emoji']);
  });

  it('should put uploads without a filename first', () => {
    expect(compareByFilename(makeInfo('a'), makeInfo('b', 'x'))).toBe(-1);
    expect(compareByFilename(makeInfo('a'), makeInfo('b'))).toBe(0);
  });
});

describe('ListingService', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  async function touch(...names: string[]): Promise<void> {
    for (const name of names) {
      await writeFile(path.join(dir, name), '');
    }
  }

  describe('collect', () => {
    it('should resolve every sidecar and skip other entries', async () => {
      await touch('one', 'one.info', 'two.info', 'three', 'notes.txt');
      const getInfo = vi.fn(async (id: string) =>
        success(makeInfo(id, `${id}.bin`))
      );
      const service = createListingService({ dir, store: { getInfo } });

      const result = await service.collect();

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.map((info) => info.id).sort()).toEqual([
          'one',
          'two',
        ]);
      }
      expect(getInfo).toHaveBeenCalledTimes(2);
    });

    it('should return an empty list for an empty directory', async () => {
      const service = createListingService({
        dir,
        store: { getInfo: vi.fn() },
      });

      expect(await service.collect()).toEqual({ success: true, data: [] });
    });

    it('should fail as a whole when one upload cannot be resolved', async () => {
      await touch('good.info', 'bad.info');
      const getInfo = vi.fn(async (id: string) =>
        id === 'bad'
          ? failure('CORRUPT', 'Upload info is not valid JSON', { id })
          : success(makeInfo(id))
      );
      const service = createListingService({ dir, store: { getInfo } });

      const result = await service.collect();

      expect(result).toEqual({
        success: false,
        error: {
          code: 'CORRUPT',
          message: 'Unable to resolve upload bad: Upload info is not valid JSON',
          details: { id: 'bad' },
        },
      });
    });

    it('should fail when the directory cannot be read', async () => {
      const service = createListingService({
        dir: path.join(dir, 'missing'),
        store: { getInfo: vi.fn() },
      });

      const result = await service.collect();

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('IO_FAILURE');
        expect(result.error.details).toEqual({
          dir: path.join(dir, 'missing'),
        });
      }
    });
  });

  describe('list', () => {
    it('should sort by filename', async () => {
      await touch('x.info', 'y.info', 'z.info');
      const names: Record<string, string> = {
        x: 'cherry.txt',
        y: 'apple.txt',
        z: 'banana.txt',
      };
      const getInfo = vi.fn(async (id: string) =>
        success(makeInfo(id, names[id]))
      );
      const service = createListingService({ dir, store: { getInfo } });

      const result = await service.list();

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.map((info) => info.metadata.filename)).toEqual([
          'apple.txt',
          'banana.txt',
          'cherry.txt',
        ]);
      }
    });
  });
});
