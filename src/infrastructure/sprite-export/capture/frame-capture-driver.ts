import type { Logger } from 'pino';

import {
  ExportError,
  hasRgbaLayout,
  matchesSize,
  type AnimationSystem,
  type CameraPlan,
  type FrameBuffer,
  type SceneRenderer,
} from '../../../domain/sprite-export/index.js';
import { SpritebakeError } from '../../../shared/errors/base.error.js';
import { createChildLogger } from '../../../shared/logger/pino.js';
import type { FrameSink } from '../storage/temp-frame-store.js';

export type CaptureState =
  | { readonly phase: 'idle' }
  | { readonly phase: 'priming' }
  | { readonly phase: 'capturing'; readonly frameIndex: number }
  | { readonly phase: 'drained'; readonly frameCount: number }
  | { readonly phase: 'cancelled'; readonly frameIndex: number }
  | { readonly phase: 'failed'; readonly frameIndex: number | null };

export interface FrameCaptureDriverOptions {
  readonly jobId: string;
  readonly animation: AnimationSystem;
  readonly renderer: SceneRenderer;
  readonly sink: FrameSink;
  readonly signal?: AbortSignal;
  readonly onStateChange?: (state: CaptureState) => void;
}

export interface CaptureSummary {
  readonly frameCount: number;
  /** Animation frame behind each buffer index. */
  readonly animationFrames: readonly number[];
}

/**
 * Sequential capture: Idle → Priming → Capturing(i) → Drained, with
 * Cancelled and Failed as the other terminal states. The camera is applied
 * once during Priming and never touched again while frames are captured.
 */
export class FrameCaptureDriver {
  private readonly logger: Logger;

  private current: CaptureState = { phase: 'idle' };

  public constructor(private readonly options: FrameCaptureDriverOptions) {
    this.logger = createChildLogger({ module: 'FrameCaptureDriver', jobId: options.jobId });
  }

  public get state(): CaptureState {
    return this.current;
  }

  public async run(plan: CameraPlan, animationFrames: readonly number[]): Promise<CaptureSummary> {
    if (this.current.phase !== 'idle') {
      throw new SpritebakeError({
        code: 'sprite-export.driver-reused',
        message: 'A capture driver runs exactly one job',
        metadata: { state: this.current.phase },
      });
    }

    const { animation, renderer, sink } = this.options;

    this.throwIfCancelled(0);
    this.transition({ phase: 'priming' });
    try {
      await renderer.setCamera({ transform: plan.transform, projection: plan.projection });
    } catch (error) {
      this.transition({ phase: 'failed', frameIndex: null });
      throw error;
    }

    for (const [frameIndex, animationFrame] of animationFrames.entries()) {
      this.throwIfCancelled(frameIndex);
      this.transition({ phase: 'capturing', frameIndex });

      try {
        await animation.setTime(animationFrame);
        const frame = await this.renderFrame(frameIndex, plan);
        await sink.write(frameIndex, frame);
      } catch (error) {
        this.transition({ phase: 'failed', frameIndex });
        throw error;
      }
    }

    this.transition({ phase: 'drained', frameCount: animationFrames.length });
    return { frameCount: animationFrames.length, animationFrames: [...animationFrames] };
  }

  private async renderFrame(frameIndex: number, plan: CameraPlan): Promise<FrameBuffer> {
    let frame: FrameBuffer;
    try {
      frame = await this.options.renderer.render({ ...plan.frameSize });
    } catch (error) {
      throw new ExportError({ kind: 'RenderFailed', frameIndex }, error);
    }

    if (!hasRgbaLayout(frame) || !matchesSize(frame, plan.frameSize)) {
      this.logger.error(
        { frameIndex, width: frame.width, height: frame.height, bytes: frame.data.length },
        'Renderer returned a buffer that does not match the job frame size',
      );
      throw new ExportError({ kind: 'RenderFailed', frameIndex });
    }

    return frame;
  }

  private throwIfCancelled(frameIndex: number): void {
    if (this.options.signal?.aborted) {
      this.transition({ phase: 'cancelled', frameIndex });
      throw new ExportError({ kind: 'Cancelled' }, this.options.signal.reason);
    }
  }

  private transition(next: CaptureState): void {
    this.current = next;
    this.logger.debug({ state: next }, 'Capture state changed');
    this.options.onStateChange?.(next);
  }
}
