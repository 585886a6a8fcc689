import { randomUUID } from 'node:crypto';

import * as THREE from 'three';

import { ExportSpritesCommand, ExportSpritesHandler } from '../../src/application/sprite-export/index.js';
import {
  createFrameBuffer,
  type CameraSetup,
  type FrameBuffer,
  type RenderRequest,
  type SceneRenderer,
} from '../../src/domain/sprite-export/index.js';
import {
  computeWorldBounds,
  SpriteSheetExportService,
  ThreeAnimationSystem,
} from '../../src/infrastructure/sprite-export/index.js';

const FRAME_RATE = 24;
const SILHOUETTE: readonly [number, number, number, number] = [56, 189, 248, 255];

/**
 * Draws the screen-space rectangle covered by the subject's bounds. Good
 * enough to check framing without a GPU.
 */
class SilhouetteRenderer implements SceneRenderer {
  private camera: THREE.Camera | null = null;

  private setup: CameraSetup | null = null;

  public constructor(private readonly root: THREE.Object3D) {}

  public getCamera(): CameraSetup | null {
    return this.setup;
  }

  public setCamera(setup: CameraSetup): void {
    this.setup = setup;
    this.camera = toThreeCamera(setup);
  }

  public render(request: RenderRequest): FrameBuffer {
    const frame = createFrameBuffer(request);
    const box = computeWorldBounds(this.root);
    if (!this.camera || box.isEmpty()) {
      return frame;
    }

    const screen = new THREE.Box2();
    const corner = new THREE.Vector3();
    for (const x of [box.min.x, box.max.x]) {
      for (const y of [box.min.y, box.max.y]) {
        for (const z of [box.min.z, box.max.z]) {
          corner.set(x, y, z).project(this.camera);
          screen.expandByPoint(
            new THREE.Vector2(((corner.x + 1) / 2) * request.width, ((1 - corner.y) / 2) * request.height),
          );
        }
      }
    }

    const left = Math.max(0, Math.floor(screen.min.x));
    const right = Math.min(request.width, Math.ceil(screen.max.x));
    const top = Math.max(0, Math.floor(screen.min.y));
    const bottom = Math.min(request.height, Math.ceil(screen.max.y));
    for (let y = top; y < bottom; y += 1) {
      for (let x = left; x < right; x += 1) {
        frame.data.set(SILHOUETTE, (y * request.width + x) * 4);
      }
    }

    return frame;
  }
}

function toThreeCamera(setup: CameraSetup): THREE.Camera {
  const { projection, transform } = setup;
  let camera: THREE.OrthographicCamera | THREE.PerspectiveCamera;

  if (projection.kind === 'orthographic') {
    camera = new THREE.OrthographicCamera(
      projection.left,
      projection.right,
      projection.top,
      projection.bottom,
      projection.near,
      projection.far,
    );
  } else {
    camera = new THREE.PerspectiveCamera(projection.fovDegrees, projection.aspect, projection.near, projection.far);
  }

  camera.position.set(transform.position.x, transform.position.y, transform.position.z);
  camera.quaternion.set(...transform.quaternion);
  camera.updateProjectionMatrix();
  camera.updateMatrixWorld(true);
  return camera;
}

function buildBouncingSubject(): { root: THREE.Object3D; mixer: THREE.AnimationMixer } {
  const root = new THREE.Group();
  const body = new THREE.Mesh(new THREE.BoxGeometry(1, 1, 2), new THREE.MeshBasicMaterial());
  root.add(body);

  const bounce = new THREE.VectorKeyframeTrack('.position', [0, 0.5, 1], [0, 0, 1, 0, 0, 3, 0, 0, 1]);
  const mixer = new THREE.AnimationMixer(body);
  mixer.clipAction(new THREE.AnimationClip('bounce', 1, [bounce])).play();
  return { root, mixer };
}

async function main() {
  const { root, mixer } = buildBouncingSubject();
  const animation = new ThreeAnimationSystem({ root, mixer, frameRate: FRAME_RATE });
  const exporter = new SpriteSheetExportService({
    animation,
    renderer: new SilhouetteRenderer(root),
  });
  const handler = new ExportSpritesHandler(exporter, {
    onProgress: (progress) => console.log(`[${progress.phase}] ${progress.current}/${progress.total}`),
  });

  const result = await handler.execute(
    new ExportSpritesCommand({
      id: randomUUID(),
      name: 'bounce',
      outputDir: 'sprite-output',
      frameSize: { width: 128, height: 128 },
      frameRange: { start: 0, end: FRAME_RATE - 1 },
      angle: { kind: 'isometric' },
      padding: 0.1,
      format: 'png',
      mode: 'sheet',
    }),
  );

  if (result.status === 'failed') {
    throw new Error(`${result.code}: ${result.message}`);
  }

  console.log('Sprite sheet written', result.outcome.files, result.outcome.metrics);
}

main().catch((error) => {
  console.error('Failed to export sample sprite sheet', error);
  process.exitCode = 1;
});
