import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import {
  ExportJob,
  type CameraSetup,
  type ExportJobProps,
  type ExportProgress,
} from '../../../../src/domain/sprite-export/index.js';
import {
  decodePng,
  SceneLease,
  SpriteSheetExportService,
} from '../../../../src/infrastructure/sprite-export/index.js';

import { decodeWebp } from '../../../support/decode-webp.js';
import { FakeScene, pixelAt } from '../../../support/fake-scene.js';

const originalCamera: CameraSetup = {
  transform: {
    position: { x: 0, y: -10, z: 1 },
    target: { x: 0, y: 0, z: 1 },
    up: { x: 0, y: 0, z: 1 },
    quaternion: [0, 0, 0, 1],
  },
  projection: { kind: 'perspective', fovDegrees: 50, aspect: 1, near: 0.1, far: 100 },
};

describe('SpriteSheetExportService', () => {
  let workDir: string;
  let tempDir: string;
  let outputDir: string;

  const jobProps = (overrides: Partial<ExportJobProps> = {}): ExportJobProps => ({
    id: 'job-1',
    name: 'walk',
    outputDir,
    frameSize: { width: 64, height: 64 },
    frameRange: { start: 1, end: 10 },
    angle: { kind: 'front' },
    projection: { kind: 'orthographic' },
    padding: 0.1,
    mirror: false,
    format: 'png',
    mode: 'sheet',
    samplingStride: 1,
    createdAt: new Date('2024-01-01T00:00:00Z'),
    ...overrides,
  });

  const serviceFor = (scene: FakeScene, maxTempBytes = 50_000_000): SpriteSheetExportService =>
    new SpriteSheetExportService({
      animation: scene,
      renderer: scene,
      config: { tempDir, maxTempBytes },
    });

  beforeEach(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'spritebake-service-test-'));
    tempDir = path.join(workDir, 'tmp');
    outputDir = path.join(workDir, 'out');
    await fs.mkdir(tempDir);
    await fs.mkdir(outputDir);
  });

  afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true });
  });

  it('writes a packed sheet and restores the scene', async () => {
    const scene = new FakeScene({ initialTime: 99, camera: originalCamera });
    const progress: ExportProgress[] = [];

    const outcome = await serviceFor(scene).export(ExportJob.create(jobProps()), {
      onProgress: (update) => progress.push(update),
    });

    expect(outcome.files).toEqual([path.join(outputDir, 'walk_sheet.png')]);
    expect(outcome.layout).toEqual({ rows: 3, columns: 4 });
    expect(outcome.frameCount).toBe(10);

    const sheet = decodePng(await fs.readFile(path.join(outputDir, 'walk_sheet.png')));
    expect(sheet.width).toBe(256);
    expect(sheet.height).toBe(192);
    // Tenth frame sits in row 2, column 1; red carries the animation frame.
    expect(pixelAt(sheet, 64, 128)).toEqual([10, 9, 0, 255]);
    expect(pixelAt(sheet, 128, 128)).toEqual([0, 0, 0, 0]);

    expect(scene.renderCount).toBe(10);
    expect(scene.cameraHistory).toHaveLength(2);
    expect(scene.camera).toEqual(originalCamera);
    expect(scene.time).toBe(99);
    expect(progress).toContainEqual({ phase: 'capturing', current: 10, total: 10 });
    expect(outcome.metrics.outputSizeBytes).toBeGreaterThan(0);
    await expect(fs.readdir(tempDir)).resolves.toEqual([]);
  });

  it('writes one zero-padded file per frame in frames mode', async () => {
    const scene = new FakeScene();

    const outcome = await serviceFor(scene).export(
      ExportJob.create(jobProps({ mode: 'frames', frameRange: { start: 0, end: 2 } })),
    );

    expect(outcome.layout).toBeNull();
    expect(outcome.files).toEqual([
      path.join(outputDir, 'walk_0000.png'),
      path.join(outputDir, 'walk_0001.png'),
      path.join(outputDir, 'walk_0002.png'),
    ]);
    const last = decodePng(await fs.readFile(path.join(outputDir, 'walk_0002.png')));
    expect(pixelAt(last, 0, 0)).toEqual([2, 2, 0, 255]);
  });

  it('fails with NoAnimationData without rendering anything', async () => {
    const scene = new FakeScene({ bounds: () => null, initialTime: 4 });

    await expect(serviceFor(scene).export(ExportJob.create(jobProps()))).rejects.toMatchObject({
      failure: { kind: 'NoAnimationData' },
    });
    expect(scene.renderCount).toBe(0);
    expect(scene.cameraHistory).toEqual([]);
    expect(scene.time).toBe(4);
    await expect(fs.readdir(outputDir)).resolves.toEqual([]);
  });

  it('leaves no temporary or output files when a frame fails to render', async () => {
    const scene = new FakeScene({ failOnRenderCall: 4, initialTime: 1, camera: originalCamera });

    await expect(
      serviceFor(scene).export(ExportJob.create(jobProps({ frameRange: { start: 1, end: 20 } }))),
    ).rejects.toMatchObject({ failure: { kind: 'RenderFailed', frameIndex: 4 } });

    expect(scene.renderCount).toBe(5);
    expect(scene.camera).toEqual(originalCamera);
    expect(scene.time).toBe(1);
    await expect(fs.readdir(tempDir)).resolves.toEqual([]);
    await expect(fs.readdir(outputDir)).resolves.toEqual([]);
  });

  it('rejects invalid padding before touching the scene', async () => {
    const scene = new FakeScene();

    await expect(
      serviceFor(scene).export(ExportJob.create(jobProps({ padding: 2 }))),
    ).rejects.toMatchObject({ failure: { kind: 'InvalidPadding', padding: 2 } });
    expect(scene.timeHistory).toEqual([]);
  });

  it('rejects a manual grid that is too small before capturing', async () => {
    const scene = new FakeScene();

    await expect(
      serviceFor(scene).export(
        ExportJob.create(jobProps({ frameRange: { start: 1, end: 5 }, grid: { rows: 2, columns: 2 } })),
      ),
    ).rejects.toMatchObject({ failure: { kind: 'GridTooSmall', rows: 2, columns: 2, frameCount: 5 } });
    expect(scene.renderCount).toBe(0);
  });

  it('refuses a second job on a scene that is already leased', async () => {
    const scene = new FakeScene();
    const lease = SceneLease.acquire(scene, 'other-job');

    try {
      await expect(serviceFor(scene).export(ExportJob.create(jobProps()))).rejects.toMatchObject({
        failure: { kind: 'JobAlreadyRunning' },
      });
      expect(scene.timeHistory).toEqual([]);
    } finally {
      lease.release();
    }
  });

  it('stops with Cancelled when the signal is already aborted', async () => {
    const scene = new FakeScene({ initialTime: 3 });
    const controller = new AbortController();
    controller.abort();

    await expect(
      serviceFor(scene).export(ExportJob.create(jobProps()), { signal: controller.signal }),
    ).rejects.toMatchObject({ failure: { kind: 'Cancelled' } });
    expect(scene.renderCount).toBe(0);
    expect(scene.time).toBe(3);
  });

  it('mirrors every frame when requested', async () => {
    const scene = new FakeScene();
    const outcome = await serviceFor(scene).export(
      ExportJob.create(jobProps({ frameRange: { start: 1, end: 1 }, mirror: true })),
    );

    expect(outcome.plan.mirror).toBe(true);
    const sheet = decodePng(await fs.readFile(path.join(outputDir, 'walk_sheet.png')));
    expect(sheet.width).toBe(64);
    expect(pixelAt(sheet, 0, 0)).toEqual([1, 0, 0, 255]);
  });

  it('cleans up and restores the scene when cancelled between frames', async () => {
    const scene = new FakeScene({ initialTime: 6, camera: originalCamera });
    const controller = new AbortController();

    await expect(
      serviceFor(scene).export(ExportJob.create(jobProps()), {
        signal: controller.signal,
        onProgress: (update) => {
          if (update.phase === 'capturing' && update.current === 3) {
            controller.abort();
          }
        },
      }),
    ).rejects.toMatchObject({ failure: { kind: 'Cancelled' } });

    expect(scene.renderCount).toBe(3);
    expect(scene.time).toBe(6);
    expect(scene.camera).toEqual(originalCamera);
    await expect(fs.readdir(tempDir)).resolves.toEqual([]);
    await expect(fs.readdir(outputDir)).resolves.toEqual([]);
  });

  it('fails with StorageExhausted and leaves nothing behind when frames outgrow the budget', async () => {
    const scene = new FakeScene({ initialTime: 2, camera: originalCamera });

    await expect(serviceFor(scene, 1).export(ExportJob.create(jobProps()))).rejects.toMatchObject({
      failure: { kind: 'StorageExhausted', limitBytes: 1 },
    });

    expect(scene.renderCount).toBe(1);
    expect(scene.time).toBe(2);
    expect(scene.camera).toEqual(originalCamera);
    await expect(fs.readdir(tempDir)).resolves.toEqual([]);
    await expect(fs.readdir(outputDir)).resolves.toEqual([]);
  });

  it('writes WebP frames whose colour and alpha match the capture', async () => {
    const scene = new FakeScene({ alpha: 128 });

    const outcome = await serviceFor(scene).export(
      ExportJob.create(jobProps({ mode: 'frames', format: 'webp', frameRange: { start: 0, end: 1 } })),
    );

    expect(outcome.files).toEqual([
      path.join(outputDir, 'walk_0000.webp'),
      path.join(outputDir, 'walk_0001.webp'),
    ]);
    const frame = await decodeWebp(await fs.readFile(path.join(outputDir, 'walk_0001.webp')));
    expect(frame.width).toBe(64);
    expect(pixelAt(frame, 10, 10)).toEqual([1, 1, 0, 128]);
  });

  it('rejects a WebP sheet wider than the format allows before rendering', async () => {
    const scene = new FakeScene();

    await expect(
      serviceFor(scene).export(
        ExportJob.create(
          jobProps({
            format: 'webp',
            frameSize: { width: 2048, height: 64 },
            frameRange: { start: 1, end: 9 },
            grid: { rows: 1, columns: 9 },
          }),
        ),
      ),
    ).rejects.toMatchObject({ failure: { kind: 'EncodeFailed', format: 'webp' } });
    expect(scene.renderCount).toBe(0);
    expect(scene.timeHistory).toEqual([]);
  });
});
