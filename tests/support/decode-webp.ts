import sharp from 'sharp';

import type { FrameBuffer } from '../../src/domain/sprite-export/index.js';

export async function decodeWebp(bytes: Buffer): Promise<FrameBuffer> {
  const { data, info } = await sharp(bytes).ensureAlpha().raw().toBuffer({ resolveWithObject: true });
  return { width: info.width, height: info.height, data };
}
