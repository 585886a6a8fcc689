import { promises as fs } from 'node:fs';
import path from 'node:path';

import type { Logger } from 'pino';

import { ExportError, type FrameBuffer } from '../../../domain/sprite-export/index.js';
import { createChildLogger } from '../../../shared/logger/pino.js';
import { decodePng, encodePng } from '../encoding/image-encoder.js';

/** Frames are scratch data; favour speed over size. */
const SCRATCH_DEFLATE_LEVEL = 1;
const STAGING_DIR = 'staged';
const OUT_OF_SPACE_CODES = new Set(['ENOSPC', 'EDQUOT']);

export interface TempFrameStoreOptions {
  readonly rootDir: string;
  readonly jobId: string;
  readonly maxBytes: number;
}

export interface FrameSink {
  write(index: number, frame: FrameBuffer): Promise<void>;
}

function isOutOfSpace(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string' &&
    OUT_OF_SPACE_CODES.has(error.code)
  );
}

/**
 * Private scratch area for one job, namespaced by job id. Holds captured
 * frames keyed by index and staged output files, up to a byte budget.
 */
export class TempFrameStore implements FrameSink {
  private readonly logger: Logger;

  private readonly frames = new Map<number, string>();

  private bytesUsed = 0;

  private disposed = false;

  private constructor(
    public readonly directory: string,
    private readonly maxBytes: number,
    jobId: string,
  ) {
    this.logger = createChildLogger({ module: 'TempFrameStore', jobId });
  }

  public static async create(options: TempFrameStoreOptions): Promise<TempFrameStore> {
    await fs.mkdir(options.rootDir, { recursive: true });
    const directory = await fs.mkdtemp(path.join(options.rootDir, `spritebake-${options.jobId}-`));
    return new TempFrameStore(directory, options.maxBytes, options.jobId);
  }

  public get usedBytes(): number {
    return this.bytesUsed;
  }

  public get frameCount(): number {
    return this.frames.size;
  }

  public get isDisposed(): boolean {
    return this.disposed;
  }

  public async write(index: number, frame: FrameBuffer): Promise<void> {
    const filePath = path.join(this.directory, `frame-${index.toString().padStart(6, '0')}.png`);
    await this.persist(filePath, encodePng(frame, SCRATCH_DEFLATE_LEVEL));
    this.frames.set(index, filePath);
  }

  public async read(index: number): Promise<FrameBuffer> {
    const filePath = this.frames.get(index);
    if (!filePath) {
      throw new Error(`Frame ${index} was never captured`);
    }
    return decodePng(await fs.readFile(filePath));
  }

  /**
   * Writes an encoded output into the staging area and returns its path.
   */
  public async stage(fileName: string, bytes: Buffer): Promise<string> {
    const stagingDir = path.join(this.directory, STAGING_DIR);
    await fs.mkdir(stagingDir, { recursive: true });
    const filePath = path.join(stagingDir, fileName);
    await this.persist(filePath, bytes);
    return filePath;
  }

  /**
   * Removes the whole scratch area. Never throws.
   */
  public async dispose(): Promise<void> {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    this.frames.clear();

    try {
      await fs.rm(this.directory, { recursive: true, force: true });
    } catch (error) {
      this.logger.warn({ error, directory: this.directory }, 'Failed to remove temporary frame storage');
    }
  }

  private async persist(filePath: string, bytes: Buffer): Promise<void> {
    if (this.disposed) {
      throw new Error('Temporary frame storage has already been released');
    }
    if (this.bytesUsed + bytes.byteLength > this.maxBytes) {
      throw new ExportError({ kind: 'StorageExhausted', limitBytes: this.maxBytes });
    }

    try {
      await fs.writeFile(filePath, bytes);
    } catch (error) {
      if (isOutOfSpace(error)) {
        throw new ExportError({ kind: 'StorageExhausted', limitBytes: this.maxBytes }, error);
      }
      throw error;
    }

    this.bytesUsed += bytes.byteLength;
  }
}
