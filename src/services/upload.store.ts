/**
 * Filesystem Upload Store
 *
 * Persists each upload as two files in one directory:
 * - `<id>`       raw bytes, committed up to `offset`
 * - `<id>.info`  JSON sidecar (id, size, offset, metadata, createdAt)
 *
 * Sidecar updates go through a temp file, fsync and rename, so a crash
 * leaves the record at its last acknowledged offset. A chunk write only
 * advances the sidecar after every byte of the chunk is on disk; a failed
 * or interrupted write truncates the data back to the committed offset.
 */

import { readFile, open, rename, rm, stat } from 'fs/promises';
import type { FileHandle } from 'fs/promises';
import path from 'path';
import { Readable } from 'stream';

import { nanoid } from 'nanoid';

import type {
  CreateUploadParams,
  DataStore,
  Result,
  Terminater,
  UploadContent,
  UploadInfo,
} from '../types/index.js';
import {
  INFO_SUFFIX,
  UPLOAD_ERROR,
  UPLOAD_ID_PATTERN,
  failure,
  success,
  uploadInfoSchema,
} from '../types/index.js';

import type { StoreComposer } from './store-composer.js';

/**
 * File store: data store and terminater over one directory
 */
export interface FileUploadStore extends DataStore, Terminater {
  readonly dir: string;
  useIn(composer: StoreComposer): void;
}

// ─────────────────────────────────────────────────────────────
// HELPER FUNCTIONS
// ─────────────────────────────────────────────────────────────

/**
 * Extract the errno code from a thrown filesystem error
 */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function ioFailure(action: string, id: string, error: unknown) {
  return failure(
    UPLOAD_ERROR.IO_FAILURE,
    `Unable to ${action}: ${errorMessage(error)}`,
    { id, errno: errorCode(error) ?? 'UNKNOWN' }
  );
}

function notFound(id: string) {
  return failure(UPLOAD_ERROR.NOT_FOUND, 'Upload not found', { id });
}

/**
 * Write a file atomically: temp file, fsync, rename
 */
async function writeFileAtomic(
  target: string,
  contents: string
): Promise<void> {
  const temp = `${target}.tmp`;
  const handle = await open(temp, 'w');
  try {
    await handle.writeFile(contents, 'utf8');
    await handle.sync();
  } finally {
    await handle.close();
  }
  await rename(temp, target);
}

/**
 * Write one chunk fully at the given position
 */
async function writeAt(
  handle: FileHandle,
  chunk: Uint8Array,
  position: number
): Promise<void> {
  let written = 0;
  while (written < chunk.byteLength) {
    const { bytesWritten } = await handle.write(
      chunk,
      written,
      chunk.byteLength - written,
      position + written
    );
    written += bytesWritten;
  }
}

// ─────────────────────────────────────────────────────────────
// STORE IMPLEMENTATION
// ─────────────────────────────────────────────────────────────

/**
 * Create a filesystem-backed upload store rooted at `dir`.
 * The directory must already exist.
 */
export function createFileUploadStore(deps: { dir: string }): FileUploadStore {
  const { dir } = deps;

  // Ids with a write or termination in flight
  const busy = new Set<string>();

  const dataPath = (id: string): string => path.join(dir, id);
  const infoPath = (id: string): string =>
    path.join(dir, `${id}${INFO_SUFFIX}`);

  async function readInfo(id: string): Promise<Result<UploadInfo>> {
    if (!UPLOAD_ID_PATTERN.test(id)) {
      return notFound(id);
    }

    let raw: string;
    try {
      raw = await readFile(infoPath(id), 'utf8');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return notFound(id);
      }
      return ioFailure('read upload info', id, error);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      return failure(UPLOAD_ERROR.CORRUPT, 'Upload info is not valid JSON', {
        id,
        reason: errorMessage(error),
      });
    }

    const result = uploadInfoSchema.safeParse(parsed);
    if (!result.success) {
      return failure(UPLOAD_ERROR.CORRUPT, 'Upload info is malformed', {
        id,
        issues: result.error.issues.map((issue) => issue.message),
      });
    }
    if (result.data.id !== id) {
      return failure(UPLOAD_ERROR.CORRUPT, 'Upload info belongs to another id', {
        id,
        recordedId: result.data.id,
      });
    }

    return success(result.data);
  }

  async function writeInfo(info: UploadInfo): Promise<void> {
    await writeFileAtomic(infoPath(info.id), JSON.stringify(info));
  }

  /**
   * Drop any uncommitted bytes past the acknowledged offset
   */
  async function rollback(
    handle: FileHandle,
    offset: number
  ): Promise<string | undefined> {
    try {
      await handle.truncate(offset);
      return undefined;
    } catch (error) {
      return errorMessage(error);
    }
  }

  async function appendChunks(
    info: UploadInfo,
    chunks: AsyncIterable<Uint8Array>
  ): Promise<Result<number>> {
    const { id } = info;

    let handle: FileHandle;
    try {
      handle = await open(dataPath(id), 'r+');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return failure(UPLOAD_ERROR.CORRUPT, 'Upload data file is missing', {
          id,
        });
      }
      return ioFailure('open upload data', id, error);
    }

    let position = info.offset;
    try {
      try {
        for await (const chunk of chunks) {
          if (position + chunk.byteLength > info.size) {
            const rollbackError = await rollback(handle, info.offset);
            return failure(
              UPLOAD_ERROR.SIZE_EXCEEDED,
              'Chunk would exceed the declared upload size',
              {
                id,
                size: info.size,
                offset: info.offset,
                ...(rollbackError === undefined ? {} : { rollbackError }),
              }
            );
          }
          await writeAt(handle, chunk, position);
          position += chunk.byteLength;
        }
        await handle.sync();
      } catch (error) {
        const rollbackError = await rollback(handle, info.offset);
        return failure(
          UPLOAD_ERROR.IO_FAILURE,
          `Chunk write interrupted: ${errorMessage(error)}`,
          {
            id,
            offset: info.offset,
            ...(rollbackError === undefined ? {} : { rollbackError }),
          }
        );
      }
    } finally {
      await handle.close();
    }

    try {
      await writeInfo({ ...info, offset: position });
    } catch (error) {
      return ioFailure('commit upload offset', id, error);
    }

    return success(position);
  }

  const store: FileUploadStore = {
    dir,

    /**
     * Create an empty upload with a fresh id
     */
    async create(params: CreateUploadParams): Promise<Result<UploadInfo>> {
      if (!Number.isSafeInteger(params.size) || params.size < 0) {
        return failure(
          'VALIDATION_ERROR',
          'Upload size must be a non-negative integer'
        );
      }

      const info: UploadInfo = {
        id: nanoid(),
        size: params.size,
        offset: 0,
        metadata: { ...params.metadata },
        createdAt: new Date().toISOString(),
      };

      try {
        const handle = await open(dataPath(info.id), 'wx');
        await handle.close();
      } catch (error) {
        return ioFailure('create upload data', info.id, error);
      }

      try {
        await writeInfo(info);
      } catch (error) {
        await rm(dataPath(info.id), { force: true });
        return ioFailure('write upload info', info.id, error);
      }

      return success(info);
    },

    /**
     * Append a chunk at exactly the committed offset
     */
    async writeChunk(
      id: string,
      offset: number,
      chunks: AsyncIterable<Uint8Array>
    ): Promise<Result<number>> {
      if (busy.has(id)) {
        return failure(
          UPLOAD_ERROR.UPLOAD_LOCKED,
          'Another request is writing to this upload',
          { id }
        );
      }

      busy.add(id);
      try {
        const infoResult = await readInfo(id);
        if (!infoResult.success) {
          return infoResult;
        }

        const info = infoResult.data;
        if (offset !== info.offset) {
          return failure(
            UPLOAD_ERROR.OFFSET_MISMATCH,
            `Upload is at offset ${info.offset}, not ${offset}`,
            { id, expected: info.offset, received: offset }
          );
        }

        return await appendChunks(info, chunks);
      } finally {
        busy.delete(id);
      }
    },

    async getInfo(id: string): Promise<Result<UploadInfo>> {
      return readInfo(id);
    },

    /**
     * Stream the committed bytes of an upload
     */
    async read(id: string): Promise<Result<UploadContent>> {
      const infoResult = await readInfo(id);
      if (!infoResult.success) {
        return infoResult;
      }

      const info = infoResult.data;
      if (info.offset === 0) {
        return success({ info, stream: Readable.from([]) });
      }

      let handle: FileHandle;
      try {
        handle = await open(dataPath(id), 'r');
      } catch (error) {
        if (errorCode(error) === 'ENOENT') {
          return failure(UPLOAD_ERROR.CORRUPT, 'Upload data file is missing', {
            id,
          });
        }
        return ioFailure('open upload data', id, error);
      }

      return success({
        info,
        stream: handle.createReadStream({ start: 0, end: info.offset - 1 }),
      });
    },

    /**
     * Remove both the data and the sidecar
     */
    async terminate(id: string): Promise<Result<void>> {
      if (!UPLOAD_ID_PATTERN.test(id)) {
        return notFound(id);
      }
      if (busy.has(id)) {
        return failure(
          UPLOAD_ERROR.UPLOAD_LOCKED,
          'Another request is writing to this upload',
          { id }
        );
      }

      busy.add(id);
      try {
        try {
          await stat(infoPath(id));
        } catch (error) {
          if (errorCode(error) === 'ENOENT') {
            return notFound(id);
          }
          return ioFailure('stat upload info', id, error);
        }

        try {
          await rm(infoPath(id));
          await rm(dataPath(id), { force: true });
        } catch (error) {
          return ioFailure('remove upload', id, error);
        }

        return success(undefined);
      } finally {
        busy.delete(id);
      }
    },

    useIn(composer: StoreComposer): void {
      composer.register('core', store);
      composer.register('terminater', store);
    },
  };

  return store;
}
