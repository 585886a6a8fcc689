import { promises as fs } from 'node:fs';
import path from 'node:path';
import { performance } from 'node:perf_hooks';

import type { Logger } from 'pino';

import {
  assertFramingOptions,
  BoundingBoxSampler,
  ExportError,
  frameFileName,
  gridCanvasSize,
  isExportError,
  orientFrame,
  planCamera,
  planSampleFrames,
  sheetFileName,
  SheetCanvas,
  solveGridLayout,
  type AnimationSystem,
  type CameraPlan,
  type ExportJob,
  type ExportOutcome,
  type ExportRunOptions,
  type GridLayout,
  type SceneRenderer,
  type SpriteExportService,
} from '../../domain/sprite-export/index.js';
import { loadConfig, type SpritebakeConfig } from '../../shared/config/env.js';
import { createChildLogger } from '../../shared/logger/pino.js';

import { FrameCaptureDriver } from './capture/frame-capture-driver.js';
import { CleanupCoordinator } from './cleanup/cleanup-coordinator.js';
import { SceneLease } from './cleanup/scene-lease.js';
import { RasterImageEncoder, WEBP_MAX_DIMENSION, type ImageEncoder } from './encoding/image-encoder.js';
import { TempFrameStore } from './storage/temp-frame-store.js';

export interface SpriteSheetExportServiceOptions {
  readonly animation: AnimationSystem;
  readonly renderer: SceneRenderer;
  readonly encoder?: ImageEncoder;
  readonly config?: Partial<SpritebakeConfig>;
}

interface EncodedOutputs {
  readonly staged: string[];
  readonly composeMs: number;
  readonly encodeMs: number;
}

/**
 * The output size is fixed once the layout is known, so a sheet WebP cannot
 * describe is rejected before any frame is rendered.
 */
function assertEncodable(job: ExportJob, layout: GridLayout | null): void {
  if (job.format !== 'webp') {
    return;
  }
  const { width, height } = layout ? gridCanvasSize(layout, job.frameSize) : job.frameSize;
  if (width > WEBP_MAX_DIMENSION || height > WEBP_MAX_DIMENSION) {
    throw new ExportError({ kind: 'EncodeFailed', format: 'webp' });
  }
}

/**
 * Runs one export job end to end against a single scene:
 * sample → plan → capture → lay out → compose/encode → publish, with all
 * scratch storage removed and the scene restored on every exit path.
 */
export class SpriteSheetExportService implements SpriteExportService {
  private readonly logger: Logger = createChildLogger({ module: 'SpriteSheetExportService' });

  private readonly animation: AnimationSystem;

  private readonly renderer: SceneRenderer;

  private readonly encoder: ImageEncoder;

  private readonly config: SpritebakeConfig;

  public constructor(options: SpriteSheetExportServiceOptions) {
    this.animation = options.animation;
    this.renderer = options.renderer;
    this.config = { ...loadConfig(), ...options.config };
    this.encoder = options.encoder ?? new RasterImageEncoder({ webpQuality: this.config.webpQuality });
  }

  public async export(job: ExportJob, options: ExportRunOptions = {}): Promise<ExportOutcome> {
    const lease = SceneLease.acquire(this.animation, job.id);

    try {
      // Validation happens before the scene or the filesystem is touched.
      assertFramingOptions({
        angle: job.angle,
        padding: job.padding,
        mirror: job.mirror,
        frameSize: job.frameSize,
        projection: job.projection,
      });
      const layout = job.mode === 'sheet' ? solveGridLayout(job.frameCount, job.grid) : null;
      assertEncodable(job, layout);

      return await this.run(job, layout, options);
    } catch (error) {
      if (isExportError(error)) {
        this.logger.error({ jobId: job.id, failure: error.failure }, 'Sprite export failed');
      } else {
        this.logger.error({ jobId: job.id, error }, 'Sprite export failed unexpectedly');
      }
      throw error;
    } finally {
      lease.release();
    }
  }

  private async run(
    job: ExportJob,
    layout: GridLayout | null,
    options: ExportRunOptions,
  ): Promise<ExportOutcome> {
    const startedAt = performance.now();
    const coordinator = new CleanupCoordinator(job.id);

    this.logger.info(
      { jobId: job.id, frameCount: job.frameCount, mode: job.mode, format: job.format },
      'Starting sprite export',
    );

    return coordinator.run(async (scope) => {
      const originalTime = await this.animation.getTime();
      const originalCamera = await this.renderer.getCamera();
      scope.defer('restore-scene', async () => {
        await this.animation.setTime(originalTime);
        if (originalCamera) {
          await this.renderer.setCamera(originalCamera);
        }
      });

      if (options.signal?.aborted) {
        throw new ExportError({ kind: 'Cancelled' }, options.signal.reason);
      }

      const samplingStarted = performance.now();
      const sampleFrames = planSampleFrames(job.frameRange, job.samplingStride);
      options.onProgress?.({ phase: 'sampling', current: 0, total: sampleFrames.length });
      const samples = await new BoundingBoxSampler(this.animation).sample(sampleFrames);
      const plan = planCamera(samples, {
        angle: job.angle,
        padding: job.padding,
        mirror: job.mirror,
        frameSize: job.frameSize,
        projection: job.projection,
      });
      const samplingMs = performance.now() - samplingStarted;
      options.onProgress?.({ phase: 'sampling', current: sampleFrames.length, total: sampleFrames.length });

      const store = await TempFrameStore.create({
        rootDir: this.config.tempDir,
        jobId: job.id,
        maxBytes: this.config.maxTempBytes,
      });
      scope.defer('temp-frames', () => store.dispose());

      const captureStarted = performance.now();
      const driver = new FrameCaptureDriver({
        jobId: job.id,
        animation: this.animation,
        renderer: this.renderer,
        sink: store,
        signal: options.signal,
        onStateChange: (state) => {
          if (state.phase === 'capturing') {
            options.onProgress?.({
              phase: 'capturing',
              current: state.frameIndex + 1,
              total: job.frameCount,
            });
          }
        },
      });
      await driver.run(plan, job.captureFrames);
      const captureMs = performance.now() - captureStarted;

      const encoded = layout
        ? await this.encodeSheet(job, plan, layout, store, options)
        : await this.encodeFrames(job, plan, store, options);

      const files = await this.publish(job, encoded.staged);
      const outputSizeBytes = await this.totalSize(files);

      this.logger.info(
        { jobId: job.id, files: files.length, outputSizeBytes, layout },
        'Sprite export completed',
      );

      return {
        jobId: job.id,
        files,
        frameCount: job.frameCount,
        layout,
        plan,
        metrics: {
          samplingMs,
          captureMs,
          composeMs: encoded.composeMs,
          encodeMs: encoded.encodeMs,
          totalMs: performance.now() - startedAt,
          outputSizeBytes,
        },
      } satisfies ExportOutcome;
    });
  }

  private async encodeSheet(
    job: ExportJob,
    plan: CameraPlan,
    layout: GridLayout,
    store: TempFrameStore,
    options: ExportRunOptions,
  ): Promise<EncodedOutputs> {
    const composeStarted = performance.now();
    const canvas = new SheetCanvas(layout, {
      frameSize: job.frameSize,
      frameCount: job.frameCount,
      mirror: plan.mirror,
    });

    for (let index = 0; index < job.frameCount; index += 1) {
      canvas.place(index, await store.read(index));
      options.onProgress?.({ phase: 'composing', current: index + 1, total: job.frameCount });
    }
    const sheet = canvas.finish();
    const composeMs = performance.now() - composeStarted;

    const encodeStarted = performance.now();
    options.onProgress?.({ phase: 'encoding', current: 0, total: 1 });
    const bytes = await this.encoder.encode(sheet, job.format);
    const staged = await store.stage(sheetFileName(job.name, job.format), bytes);
    options.onProgress?.({ phase: 'encoding', current: 1, total: 1 });

    return { staged: [staged], composeMs, encodeMs: performance.now() - encodeStarted };
  }

  private async encodeFrames(
    job: ExportJob,
    plan: CameraPlan,
    store: TempFrameStore,
    options: ExportRunOptions,
  ): Promise<EncodedOutputs> {
    const encodeStarted = performance.now();
    const staged: string[] = [];

    for (let index = 0; index < job.frameCount; index += 1) {
      const frame = orientFrame(await store.read(index), plan.mirror);
      const bytes = await this.encoder.encode(frame, job.format);
      staged.push(await store.stage(frameFileName(job.name, index, job.frameCount, job.format), bytes));
      options.onProgress?.({ phase: 'encoding', current: index + 1, total: job.frameCount });
    }

    return { staged, composeMs: 0, encodeMs: performance.now() - encodeStarted };
  }

  /**
   * Copies staged outputs into the output directory. Either every file
   * lands or none is left behind.
   */
  private async publish(job: ExportJob, staged: readonly string[]): Promise<string[]> {
    const outputDir = path.resolve(job.outputDir);
    await fs.mkdir(outputDir, { recursive: true });

    const published: string[] = [];
    try {
      for (const stagedPath of staged) {
        const target = path.join(outputDir, path.basename(stagedPath));
        await fs.copyFile(stagedPath, target);
        published.push(target);
      }
    } catch (error) {
      await Promise.all(
        published.map(async (file) => {
          try {
            await fs.rm(file, { force: true });
          } catch (removeError) {
            this.logger.warn({ jobId: job.id, file, error: removeError }, 'Failed to remove partial output');
          }
        }),
      );
      throw error;
    }

    return published;
  }

  private async totalSize(files: readonly string[]): Promise<number> {
    const sizes = await Promise.all(files.map(async (file) => (await fs.stat(file)).size));
    return sizes.reduce((total, size) => total + size, 0);
  }
}
