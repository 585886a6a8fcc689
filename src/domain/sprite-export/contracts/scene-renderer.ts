import type { CameraSetup } from '../value-objects/camera-plan.js';
import type { FrameSize } from '../value-objects/export-options.js';
import type { FrameBuffer } from '../value-objects/frame-buffer.js';
import type { Awaitable } from './animation-system.js';

export type RenderRequest = FrameSize;

export interface SceneRenderer {
  /** Camera currently in use by the scene, if any, so it can be restored. */
  getCamera(): Awaitable<CameraSetup | null>;
  setCamera(setup: CameraSetup): Awaitable<void>;
  /**
   * Rasterises the current scene state through the current camera.
   * Rejects (or throws) when the renderer cannot produce the frame.
   */
  render(request: RenderRequest): Awaitable<FrameBuffer>;
}
