import { describe, expect, it, vi } from 'vitest';

import {
  ExportError,
  planCamera,
  type ExportJob,
  type ExportOutcome,
  type ExportRunOptions,
  type SpriteExportService,
} from '../../../../src/domain/sprite-export/index.js';
import {
  ExportSpritesCommand,
  ExportSpritesHandler,
  type ExportSpritesPayload,
} from '../../../../src/application/sprite-export/index.js';

import { unitBox } from '../../../support/fake-scene.js';

const plan = planCamera([{ frame: 1, bounds: unitBox }], {
  angle: { kind: 'side' },
  padding: 0.2,
  mirror: false,
  frameSize: { width: 128, height: 128 },
  projection: { kind: 'orthographic' },
});

const sampleOutcome: ExportOutcome = {
  jobId: 'job-id',
  files: ['/tmp/out/hero_sheet.png'],
  frameCount: 24,
  layout: { rows: 5, columns: 5 },
  plan,
  metrics: {
    samplingMs: 5,
    captureMs: 100,
    composeMs: 20,
    encodeMs: 30,
    totalMs: 155,
    outputSizeBytes: 2_048,
  },
};

const payload: ExportSpritesPayload = {
  id: 'job-id',
  name: 'hero:walk',
  outputDir: '/tmp/out',
  frameSize: { width: 128, height: 128 },
  frameRange: { start: 1, end: 24 },
};

function exporterReturning(
  result: () => Promise<ExportOutcome>,
): SpriteExportService & { readonly calls: [ExportJob, ExportRunOptions | undefined][] } {
  const calls: [ExportJob, ExportRunOptions | undefined][] = [];
  return {
    calls,
    export: vi.fn(async (job: ExportJob, options?: ExportRunOptions) => {
      calls.push([job, options]);
      return result();
    }),
  };
}

describe('ExportSpritesHandler', () => {
  it('builds a job with defaults and delegates to the export service', async () => {
    const exporter = exporterReturning(async () => sampleOutcome);
    const handler = new ExportSpritesHandler(exporter);

    const result = await handler.execute(new ExportSpritesCommand(payload));

    expect(result).toEqual({ status: 'succeeded', outcome: sampleOutcome });
    expect(exporter.export).toHaveBeenCalledTimes(1);
    const job = exporter.calls.at(0)?.[0];
    expect(job?.name).toBe('hero_walk');
    expect(job?.angle).toEqual({ kind: 'side' });
    expect(job?.padding).toBe(0.2);
    expect(job?.format).toBe('png');
    expect(job?.mode).toBe('sheet');
    expect(job?.projection).toEqual({ kind: 'orthographic' });
    expect(job?.frameCount).toBe(24);
  });

  it('forwards the cancellation signal and progress callback', async () => {
    const exporter = exporterReturning(async () => sampleOutcome);
    const onProgress = vi.fn();
    const controller = new AbortController();
    const handler = new ExportSpritesHandler(exporter, { onProgress });

    await handler.execute(new ExportSpritesCommand(payload, { signal: controller.signal }));

    const options = exporter.calls.at(0)?.[1];
    expect(options?.signal).toBe(controller.signal);
    expect(options?.onProgress).toBe(onProgress);
  });

  it('returns a failed result carrying the export failure', async () => {
    const exporter = exporterReturning(async () => {
      throw new ExportError({ kind: 'RenderFailed', frameIndex: 5 });
    });
    const handler = new ExportSpritesHandler(exporter);

    const result = await handler.execute(new ExportSpritesCommand(payload));

    expect(result).toEqual({
      status: 'failed',
      failure: { kind: 'RenderFailed', frameIndex: 5 },
      code: 'sprite-export.render-failed',
      message: 'Renderer failed on frame 5',
    });
  });

  it('wraps unexpected errors in a failed result', async () => {
    const exporter = exporterReturning(async () => {
      throw new Error('disk unplugged');
    });
    const handler = new ExportSpritesHandler(exporter);

    const result = await handler.execute(new ExportSpritesCommand(payload));

    expect(result).toEqual({
      status: 'failed',
      failure: null,
      code: 'sprite-export.failure',
      message: 'disk unplugged',
    });
  });

  it('throws validation error when payload is invalid', async () => {
    const exporter = exporterReturning(async () => sampleOutcome);
    const handler = new ExportSpritesHandler(exporter);

    await expect(
      handler.execute(
        new ExportSpritesCommand({ ...payload, frameSize: { width: 32, height: 128 } }),
      ),
    ).rejects.toMatchObject({ code: 'sprite-export.invalid-payload' });
    await expect(
      handler.execute(new ExportSpritesCommand({ ...payload, frameRange: { start: 10, end: 2 } })),
    ).rejects.toMatchObject({ code: 'sprite-export.invalid-payload' });
    expect(exporter.export).not.toHaveBeenCalled();
  });
});
