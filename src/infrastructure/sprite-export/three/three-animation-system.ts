import * as THREE from 'three';

import type { Aabb, AnimationSystem } from '../../../domain/sprite-export/index.js';

export interface ThreeAnimationSystemOptions {
  readonly root: THREE.Object3D;
  /** Mixer driving the subject; `null` for a static subject. */
  readonly mixer: THREE.AnimationMixer | null;
  readonly frameRate: number;
  readonly initialFrame?: number;
}

/**
 * Adapts a three.js object graph and its animation mixer to the animation
 * system contract. Frames map to mixer time through `frameRate`.
 */
export class ThreeAnimationSystem implements AnimationSystem {
  private readonly root: THREE.Object3D;

  private readonly mixer: THREE.AnimationMixer | null;

  private readonly frameRate: number;

  private currentFrame: number;

  public constructor(options: ThreeAnimationSystemOptions) {
    if (!Number.isFinite(options.frameRate) || options.frameRate <= 0) {
      throw new RangeError('Frame rate must be positive');
    }
    this.root = options.root;
    this.mixer = options.mixer;
    this.frameRate = options.frameRate;
    this.currentFrame = options.initialFrame ?? 0;
    this.evaluate(this.currentFrame);
  }

  public getTime(): number {
    return this.currentFrame;
  }

  public setTime(frame: number): void {
    this.currentFrame = frame;
    this.evaluate(frame);
  }

  public getWorldBounds(frame: number): Aabb | null {
    if (frame !== this.currentFrame) {
      this.setTime(frame);
    }

    const box = computeWorldBounds(this.root);
    if (box.isEmpty()) {
      return null;
    }

    return {
      min: { x: box.min.x, y: box.min.y, z: box.min.z },
      max: { x: box.max.x, y: box.max.y, z: box.max.z },
    };
  }

  private evaluate(frame: number): void {
    this.mixer?.setTime(frame / this.frameRate);
    this.root.updateMatrixWorld(true);
  }
}

/**
 * Bounds of every visible mesh under `root`. Skinned meshes contribute their
 * deformed vertices so the current pose is measured, not the bind pose.
 */
export function computeWorldBounds(root: THREE.Object3D): THREE.Box3 {
  const box = new THREE.Box3();
  const meshBox = new THREE.Box3();
  const vertex = new THREE.Vector3();

  root.updateWorldMatrix(true, true);

  root.traverseVisible((node) => {
    if (node instanceof THREE.SkinnedMesh) {
      const positions = node.geometry.getAttribute('position');
      if (!positions) {
        return;
      }
      node.skeleton.update();
      meshBox.makeEmpty();
      for (let index = 0; index < positions.count; index += 1) {
        vertex.fromBufferAttribute(positions, index);
        node.applyBoneTransform(index, vertex);
        vertex.applyMatrix4(node.matrixWorld);
        meshBox.expandByPoint(vertex);
      }
      box.union(meshBox);
      return;
    }

    if (node instanceof THREE.Mesh) {
      const geometry: THREE.BufferGeometry = node.geometry;
      geometry.computeBoundingBox();
      if (geometry.boundingBox) {
        meshBox.copy(geometry.boundingBox).applyMatrix4(node.matrixWorld);
        box.union(meshBox);
      }
    }
  });

  return box;
}
