import { existsSync, mkdirSync, writeFileSync } from 'fs';
import { dirname, resolve } from 'path';
import sharp from 'sharp';

export interface SavedScreenshot {
  saved: true;
  path: string;
  bytes: number;
}

export interface InlineScreenshot {
  saved: false;
  mimeType: 'image/png';
  width: number;
  height: number;
  resized: boolean;
  data: string;
}

/**
 * Writes the PNG to `outputPath` (relative paths resolve against the
 * working directory), creating parent directories as needed.
 */
export function saveScreenshot(png: Buffer, outputPath: string): SavedScreenshot {
  const path = resolve(outputPath);
  const dir = dirname(path);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
  writeFileSync(path, png);
  return { saved: true, path, bytes: png.length };
}

/**
 * Base64 PNG for returning to the client, downscaled to fit within
 * `maxDimension` on both sides.
 */
export async function inlineScreenshot(png: Buffer, maxDimension: number): Promise<InlineScreenshot> {
  const { width, height } = await sharp(png).metadata();

  let finalBuffer: Buffer = png;
  let resized = false;

  if (width && height && (width > maxDimension || height > maxDimension)) {
    finalBuffer = await sharp(png)
      .resize(maxDimension, maxDimension, {
        fit: 'inside',
        withoutEnlargement: true,
      })
      .png()
      .toBuffer();
    resized = true;
  }

  const final = resized ? await sharp(finalBuffer).metadata() : { width, height };
  return {
    saved: false,
    mimeType: 'image/png',
    width: final.width ?? 0,
    height: final.height ?? 0,
    resized,
    data: finalBuffer.toString('base64'),
  };
}

export function isInlineScreenshot(value: unknown): value is InlineScreenshot {
  return (
    typeof value === 'object' &&
    value !== null &&
    'saved' in value &&
    value.saved === false &&
    'mimeType' in value &&
    value.mimeType === 'image/png' &&
    'data' in value &&
    typeof value.data === 'string'
  );
}
