import type { Logger } from 'pino';

import {
  ExportJob,
  isExportError,
  sanitizeOutputName,
  type ExportFailure,
  type ExportOutcome,
  type ExportProgress,
  type SpriteExportService,
} from '../../../domain/sprite-export/index.js';
import { SpritebakeError } from '../../../shared/errors/base.error.js';
import { ValidationError } from '../../../shared/errors/validation.error.js';
import { createChildLogger } from '../../../shared/logger/pino.js';
import type { ExportSpritesCommand } from '../commands/export-sprites.command.js';
import {
  exportSpritesCommandSchema,
  type ExportSpritesPayload,
  type ValidatedExportSpritesPayload,
} from '../dto/export-sprites.dto.js';

export type ExportResult =
  | { readonly status: 'succeeded'; readonly outcome: ExportOutcome }
  | {
      readonly status: 'failed';
      /** `null` when the failure is outside the export taxonomy. */
      readonly failure: ExportFailure | null;
      readonly code: string;
      readonly message: string;
    };

export interface ExportSpritesHandlerOptions {
  readonly onProgress?: (progress: ExportProgress) => void;
}

export class ExportSpritesHandler {
  private readonly logger: Logger = createChildLogger({ module: 'ExportSpritesHandler' });

  public constructor(
    private readonly exporter: SpriteExportService,
    private readonly options: ExportSpritesHandlerOptions = {},
  ) {}

  /**
   * Resolves to exactly one terminal result. Only a malformed payload
   * throws, since no job exists for it yet.
   */
  public async execute(command: ExportSpritesCommand): Promise<ExportResult> {
    const payload = this.validate(command.payload);
    const job = this.toJob(payload);

    this.logger.info({ jobId: job.id, frameCount: job.frameCount }, 'Export requested');

    try {
      const outcome = await this.exporter.export(job, {
        signal: command.signal,
        onProgress: this.options.onProgress,
      });

      this.logger.info(
        {
          jobId: job.id,
          durationMs: outcome.metrics.totalMs,
          outputSizeBytes: outcome.metrics.outputSizeBytes,
        },
        'Export completed',
      );

      return { status: 'succeeded', outcome };
    } catch (error) {
      if (isExportError(error)) {
        this.logger.warn({ jobId: job.id, failure: error.failure }, 'Export failed');
        return { status: 'failed', failure: error.failure, code: error.code, message: error.message };
      }

      const wrapped = SpritebakeError.from(error, 'sprite-export.failure');
      this.logger.error({ jobId: job.id, error: wrapped }, 'Export failed unexpectedly');
      return { status: 'failed', failure: null, code: wrapped.code, message: wrapped.message };
    }
  }

  private validate(payload: ExportSpritesPayload): ValidatedExportSpritesPayload {
    const parsed = exportSpritesCommandSchema.safeParse(payload);

    if (!parsed.success) {
      this.logger.warn({ issues: parsed.error.issues }, 'Invalid export payload received');
      throw new ValidationError('sprite-export.invalid-payload', {
        issues: parsed.error.issues,
      });
    }

    return parsed.data;
  }

  private toJob(payload: ValidatedExportSpritesPayload): ExportJob {
    return ExportJob.create({
      id: payload.id,
      name: sanitizeOutputName(payload.name),
      outputDir: payload.outputDir,
      frameSize: payload.frameSize,
      frameRange: payload.frameRange,
      frameLimit: payload.frameLimit,
      angle: payload.angle,
      projection: payload.projection,
      padding: payload.padding,
      mirror: payload.mirror,
      format: payload.format,
      mode: payload.mode,
      grid: payload.grid,
      samplingStride: payload.samplingStride,
      createdAt: new Date(),
    });
  }
}
