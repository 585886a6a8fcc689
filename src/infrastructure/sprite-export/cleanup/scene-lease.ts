import { ExportError } from '../../../domain/sprite-export/index.js';

const leasedScenes = new WeakMap<object, string>();

/**
 * Exclusive ownership of a scene (its camera and animation time) for the
 * duration of one job.
 */
export class SceneLease {
  private released = false;

  private constructor(
    private readonly scene: object,
    public readonly jobId: string,
  ) {}

  public static acquire(scene: object, jobId: string): SceneLease {
    if (leasedScenes.has(scene)) {
      throw new ExportError({ kind: 'JobAlreadyRunning' });
    }
    leasedScenes.set(scene, jobId);
    return new SceneLease(scene, jobId);
  }

  public static holder(scene: object): string | undefined {
    return leasedScenes.get(scene);
  }

  public release(): void {
    if (this.released) {
      return;
    }
    this.released = true;
    if (leasedScenes.get(this.scene) === this.jobId) {
      leasedScenes.delete(this.scene);
    }
  }
}
