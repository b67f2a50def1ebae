import sharp from 'sharp';
import type { ProcessedLogo } from '../types/article';

export const LOGO_MAX_WIDTH = 300;

export async function processLogo(image: Buffer | ArrayBuffer): Promise<ProcessedLogo> {
  const buffer = image instanceof ArrayBuffer ? Buffer.from(image) : image;

  const { data, info } = await sharp(buffer)
    .flatten({ background: '#ffffff' })
    .resize({ width: LOGO_MAX_WIDTH, withoutEnlargement: true })
    .png()
    .toBuffer({ resolveWithObject: true });

  return { data, width: info.width, height: info.height };
}
