import { ValidationError } from '../../../shared/errors/validation.error.js';
import { planCaptureFrames } from '../services/frame-schedule.js';
import {
  MAX_FRAME_DIMENSION,
  MIN_FRAME_DIMENSION,
  type CameraAngle,
  type FrameRange,
  type FrameSize,
  type OutputFormat,
  type OutputMode,
  type ProjectionOptions,
  type SamplingStride,
} from '../value-objects/export-options.js';
import type { GridLayout } from '../value-objects/grid-layout.js';

export interface ExportJobProps {
  readonly id: string;
  /** Base name of the produced files, already sanitised. */
  readonly name: string;
  readonly outputDir: string;
  readonly frameSize: FrameSize;
  readonly frameRange: FrameRange;
  readonly frameLimit?: number;
  readonly angle: CameraAngle;
  readonly projection: ProjectionOptions;
  readonly padding: number;
  readonly mirror: boolean;
  readonly format: OutputFormat;
  readonly mode: OutputMode;
  readonly grid?: GridLayout;
  readonly samplingStride: SamplingStride;
  readonly createdAt: Date;
}

export class ExportJob {
  public readonly id: string;

  public readonly name: string;

  public readonly outputDir: string;

  public readonly frameSize: FrameSize;

  public readonly frameRange: FrameRange;

  public readonly frameLimit?: number;

  public readonly angle: CameraAngle;

  public readonly projection: ProjectionOptions;

  public readonly padding: number;

  public readonly mirror: boolean;

  public readonly format: OutputFormat;

  public readonly mode: OutputMode;

  public readonly grid?: GridLayout;

  public readonly samplingStride: SamplingStride;

  public readonly createdAt: Date;

  /** Animation frame captured into each buffer index. */
  public readonly captureFrames: readonly number[];

  private constructor(props: ExportJobProps) {
    this.id = props.id;
    this.name = props.name;
    this.outputDir = props.outputDir;
    this.frameSize = { ...props.frameSize };
    this.frameRange = { ...props.frameRange };
    this.frameLimit = props.frameLimit;
    this.angle = props.angle;
    this.projection = props.projection;
    this.padding = props.padding;
    this.mirror = props.mirror;
    this.format = props.format;
    this.mode = props.mode;
    this.grid = props.grid ? { ...props.grid } : undefined;
    this.samplingStride = props.samplingStride;
    this.createdAt = props.createdAt;
    this.captureFrames = Object.freeze(planCaptureFrames(props.frameRange, props.frameLimit));
    Object.freeze(this);
  }

  public static create(props: ExportJobProps): ExportJob {
    const issues: string[] = [];

    if (props.id.length === 0) {
      issues.push('Job id must not be empty');
    }

    for (const dimension of [props.frameSize.width, props.frameSize.height]) {
      if (
        !Number.isInteger(dimension) ||
        dimension < MIN_FRAME_DIMENSION ||
        dimension > MAX_FRAME_DIMENSION
      ) {
        issues.push(
          `Frame dimensions must be integers between ${MIN_FRAME_DIMENSION} and ${MAX_FRAME_DIMENSION}`,
        );
        break;
      }
    }

    const { start, end } = props.frameRange;
    if (!Number.isInteger(start) || !Number.isInteger(end) || end < start) {
      issues.push('Frame range must be integer and satisfy start <= end');
    }

    if (props.frameLimit !== undefined && (!Number.isInteger(props.frameLimit) || props.frameLimit < 1)) {
      issues.push('Frame limit must be a positive integer');
    }

    if (props.samplingStride !== 'auto' && (!Number.isInteger(props.samplingStride) || props.samplingStride < 1)) {
      issues.push('Sampling stride must be a positive integer or "auto"');
    }

    if (issues.length > 0) {
      throw new ValidationError('sprite-export.invalid-job', { jobId: props.id, issues });
    }

    return new ExportJob(props);
  }

  public get frameCount(): number {
    return this.captureFrames.length;
  }
}
