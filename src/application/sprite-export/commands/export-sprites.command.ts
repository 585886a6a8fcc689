import type { ExportSpritesPayload } from '../dto/export-sprites.dto.js';

export interface ExportSpritesCommandOptions {
  readonly signal?: AbortSignal;
}

export class ExportSpritesCommand {
  public readonly payload: ExportSpritesPayload;

  public readonly signal?: AbortSignal;

  public constructor(payload: ExportSpritesPayload, options: ExportSpritesCommandOptions = {}) {
    this.payload = payload;
    this.signal = options.signal;
  }
}
