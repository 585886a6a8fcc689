import type { ExportJob } from '../entities/export-job.js';
import type { CameraPlan } from '../value-objects/camera-plan.js';
import type { GridLayout } from '../value-objects/grid-layout.js';

export type ExportPhase = 'sampling' | 'capturing' | 'composing' | 'encoding';

export interface ExportProgress {
  readonly phase: ExportPhase;
  readonly current: number;
  readonly total: number;
}

export interface ExportRunOptions {
  readonly signal?: AbortSignal;
  readonly onProgress?: (progress: ExportProgress) => void;
}

export interface ExportMetrics {
  readonly samplingMs: number;
  readonly captureMs: number;
  readonly composeMs: number;
  readonly encodeMs: number;
  readonly totalMs: number;
  readonly outputSizeBytes: number;
}

export interface ExportOutcome {
  readonly jobId: string;
  /** Absolute paths of the files written, in frame order for frame mode. */
  readonly files: readonly string[];
  readonly frameCount: number;
  /** Present in sheet mode. */
  readonly layout: GridLayout | null;
  readonly plan: CameraPlan;
  readonly metrics: ExportMetrics;
}

export interface SpriteExportService {
  export(job: ExportJob, options?: ExportRunOptions): Promise<ExportOutcome>;
}
