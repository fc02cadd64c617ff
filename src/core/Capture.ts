import fs from 'fs';
import screenshot from 'screenshot-desktop';
import { PNG } from 'pngjs';
import { createLogger, errorMessage } from './Logger';
import type { Bounds } from './Geometry';

const Logger = createLogger('Capture');

/**
 * Упрощённый аналог ImageData для Node.js (RGBA 8 бит на канал).
 */
export type ImageDataLike = { data: Uint8ClampedArray; width: number; height: number };

/** Источник кадров для тика. null: кадра нет, тик пропускается. */
export interface FrameSource {
  capture(): Promise<ImageDataLike | null>;
}

/** Декодирует PNG в RGBA без копирования буфера. */
export function decodePng(buf: Buffer): ImageDataLike {
  const png = PNG.sync.read(buf);
  const data = new Uint8ClampedArray(png.data.buffer, png.data.byteOffset, png.data.byteLength);
  return { data, width: png.width, height: png.height };
}

/**
 * Кадрирование по ROI. При width/height == 0 возвращается исходный кадр.
 */
export function cropImageData(img: ImageDataLike, roi?: Bounds): ImageDataLike {
  if (!roi || roi.width === 0 || roi.height === 0) return img;

  const clampedX = Math.max(0, Math.min(roi.x, img.width - 1));
  const clampedY = Math.max(0, Math.min(roi.y, img.height - 1));
  const clampedW = Math.max(1, Math.min(roi.width, img.width - clampedX));
  const clampedH = Math.max(1, Math.min(roi.height, img.height - clampedY));

  const out = new Uint8ClampedArray(clampedW * clampedH * 4);
  const srcStride = img.width * 4;
  const dstStride = clampedW * 4;
  // Построчно копируем полосы RGBA из исходного буфера в ROI-буфер
  for (let row = 0; row < clampedH; row++) {
    const srcStart = (clampedY + row) * srcStride + clampedX * 4;
    out.set(img.data.subarray(srcStart, srcStart + dstStride), row * dstStride);
  }
  return { data: out, width: clampedW, height: clampedH };
}

/** Делает скриншот экрана и декодирует его в RGBA. */
export async function captureImageData(roi?: Bounds): Promise<ImageDataLike> {
  const buf = await screenshot({ format: 'png' });
  return cropImageData(decodePng(buf), roi);
}

/** Читает PNG-файл (сохранённый кадр) для офлайн-прогона распознавания. */
export function loadPngFrame(file: string): ImageDataLike {
  return decodePng(fs.readFileSync(file));
}

function withTimeout<T>(p: Promise<T>, ms: number, label: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new Error(`${label}: timeout ${ms}ms`)), ms);
    p.then(
      (v) => { clearTimeout(timer); resolve(v); },
      (e: unknown) => { clearTimeout(timer); reject(e); },
    );
  });
}

/**
 * Захват экрана с таймаутом. Ошибка или таймаут не пробрасываются: тик просто пропускается.
 */
export class ScreenFrameSource implements FrameSource {
  constructor(private readonly opts: { timeoutMs: number; roi?: Bounds }) {}

  async capture(): Promise<ImageDataLike | null> {
    try {
      return await withTimeout(captureImageData(this.opts.roi), this.opts.timeoutMs, 'screenshot');
    } catch (e) {
      Logger.warn(`кадр не получен: ${errorMessage(e)}`);
      return null;
    }
  }
}
