import { SpritebakeError } from './base.error.js';

/**
 * Input that can never produce an export: a malformed payload, an invalid
 * job, or a caller misusing a component. Raised before the scene is touched.
 */
export class ValidationError extends SpritebakeError {
  public constructor(code: string, metadata: Record<string, unknown>) {
    super({
      code,
      message: `Invalid sprite export input (${code})`,
      metadata,
      exposeMessage: true,
    });
  }
}
