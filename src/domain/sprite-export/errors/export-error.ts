import { SpritebakeError } from '../../../shared/errors/base.error.js';
import type { OutputFormat } from '../value-objects/export-options.js';

/**
 * Tagged failures an export job can terminate with.
 */
export type ExportFailure =
  | { readonly kind: 'NoAnimationData' }
  | { readonly kind: 'DegenerateBounds' }
  | { readonly kind: 'InvalidCameraAngle' }
  | { readonly kind: 'InvalidPadding'; readonly padding: number }
  | { readonly kind: 'RenderFailed'; readonly frameIndex: number }
  | { readonly kind: 'StorageExhausted'; readonly limitBytes: number }
  | {
      readonly kind: 'GridTooSmall';
      readonly rows: number;
      readonly columns: number;
      readonly frameCount: number;
    }
  | { readonly kind: 'EncodeFailed'; readonly format: OutputFormat }
  | { readonly kind: 'JobAlreadyRunning' }
  | { readonly kind: 'Cancelled' };

export type ExportFailureKind = ExportFailure['kind'];

const FAILURE_CODES: Record<ExportFailureKind, string> = {
  NoAnimationData: 'sprite-export.no-animation-data',
  DegenerateBounds: 'sprite-export.degenerate-bounds',
  InvalidCameraAngle: 'sprite-export.invalid-camera-angle',
  InvalidPadding: 'sprite-export.invalid-padding',
  RenderFailed: 'sprite-export.render-failed',
  StorageExhausted: 'sprite-export.storage-exhausted',
  GridTooSmall: 'sprite-export.grid-too-small',
  EncodeFailed: 'sprite-export.encode-failed',
  JobAlreadyRunning: 'sprite-export.job-already-running',
  Cancelled: 'sprite-export.cancelled',
};

function describeFailure(failure: ExportFailure): string {
  switch (failure.kind) {
    case 'NoAnimationData':
      return 'The subject has no animated geometry in the export range';
    case 'DegenerateBounds':
      return 'The framing bounds have zero volume';
    case 'InvalidCameraAngle':
      return 'Custom camera direction must be a finite, non-zero vector';
    case 'InvalidPadding':
      return `Padding ${failure.padding} is outside [0, 1]`;
    case 'RenderFailed':
      return `Renderer failed on frame ${failure.frameIndex}`;
    case 'StorageExhausted':
      return `Temporary frame storage exhausted (limit ${failure.limitBytes} bytes)`;
    case 'GridTooSmall':
      return `Grid ${failure.rows}x${failure.columns} cannot hold ${failure.frameCount} frames`;
    case 'EncodeFailed':
      return `Unable to encode image as ${failure.format}`;
    case 'JobAlreadyRunning':
      return 'Another export job already owns this scene';
    case 'Cancelled':
      return 'Export job was cancelled';
    default: {
      const exhaustive: never = failure;
      return `Unknown export failure ${JSON.stringify(exhaustive)}`;
    }
  }
}

export class ExportError extends SpritebakeError {
  public readonly failure: ExportFailure;

  public constructor(failure: ExportFailure, cause?: unknown) {
    super({
      code: FAILURE_CODES[failure.kind],
      message: describeFailure(failure),
      metadata: { ...failure },
      cause,
      exposeMessage: true,
    });
    this.failure = failure;
  }

  public get kind(): ExportFailureKind {
    return this.failure.kind;
  }
}

export function isExportError(error: unknown): error is ExportError {
  return error instanceof ExportError;
}
