export interface SpritebakeErrorOptions {
  readonly code: string;
  readonly message: string;
  readonly metadata?: Record<string, unknown>;
  readonly cause?: unknown;
  readonly exposeMessage?: boolean;
}

export class SpritebakeError extends Error {
  public readonly code: string;

  public readonly metadata: Record<string, unknown>;

  /**
   * Whether the message is safe to show to the end user as-is.
   */
  public readonly exposeMessage: boolean;

  public constructor(options: SpritebakeErrorOptions) {
    super(options.message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = options.code;
    this.metadata = options.metadata ?? {};
    this.exposeMessage = options.exposeMessage ?? false;
  }

  /**
   * Wraps anything thrown by a collaborator. Errors that already belong to
   * this package pass through untouched.
   */
  public static from(error: unknown, code: string): SpritebakeError {
    if (error instanceof SpritebakeError) {
      return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return new SpritebakeError({ code, message, cause: error });
  }

  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      metadata: this.metadata,
    };
  }
}
