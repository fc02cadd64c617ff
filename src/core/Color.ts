/** RGB-тройка 0..255. */
export type Rgb = [number, number, number];

/** Цвет с допуском по каждому каналу. */
export interface ColorSpec {
  color: Rgb;
  tolerance: number;
}

/** Полупрозрачные пиксели (тени, сглаживание текста) не совпадают ни с чем. */
export const MIN_ALPHA = 250;

export function withinTol(rgb: Rgb, tgt: Rgb, tol: number): boolean {
  return (
    Math.abs(rgb[0] - tgt[0]) <= tol &&
    Math.abs(rgb[1] - tgt[1]) <= tol &&
    Math.abs(rgb[2] - tgt[2]) <= tol
  );
}

/**
 * Сравнивает RGBA-пиксель по смещению idx с любым из цветов.
 * @param data RGBA-буфер кадра
 * @param idx Индекс красного канала пикселя
 */
export function pixelMatches(data: Uint8ClampedArray, idx: number, colors: readonly Rgb[], tol: number): boolean {
  if (data[idx + 3] < MIN_ALPHA) return false;
  const r = data[idx], g = data[idx + 1], b = data[idx + 2];
  for (const c of colors) {
    if (Math.abs(r - c[0]) <= tol && Math.abs(g - c[1]) <= tol && Math.abs(b - c[2]) <= tol) return true;
  }
  return false;
}

export function isRgb(value: unknown): value is Rgb {
  return (
    Array.isArray(value) &&
    value.length === 3 &&
    value.every((v) => typeof v === 'number' && Number.isInteger(v) && v >= 0 && v <= 255)
  );
}
