/**
 * Color-space math on plain channel tuples in [0, 1].
 *
 * HSV works directly on gamma-encoded sRGB. LAB goes through linear sRGB
 * and CIE XYZ with a D65 white point.
 */

export type Rgb = readonly [r: number, g: number, b: number];
export type Hsv = readonly [h: number, s: number, v: number];
export type Lab = readonly [l: number, a: number, b: number];

const clamp01 = (value: number): number => (value < 0 ? 0 : value > 1 ? 1 : value);

// =============================================================================
// sRGB TRANSFER
// =============================================================================

export const srgbToLinear = (value: number): number => {
  if (value <= 0.04045) {
    return value / 12.92;
  }
  return Math.pow((value + 0.055) / 1.055, 2.4);
};

export const linearToSrgb = (value: number): number => {
  const clamped = clamp01(value);
  if (clamped <= 0.0031308) {
    return clamped * 12.92;
  }
  return 1.055 * Math.pow(clamped, 1 / 2.4) - 0.055;
};

// =============================================================================
// HSV
// =============================================================================

/**
 * Hue as a fraction of a turn in [0, 1).
 */
export function rgbToHsv([r, g, b]: Rgb): Hsv {
  const max = Math.max(r, g, b);
  const min = Math.min(r, g, b);
  const delta = max - min;

  let hue = 0;
  if (delta > 0) {
    if (max === r) {
      hue = (g - b) / delta;
    } else if (max === g) {
      hue = 2 + (b - r) / delta;
    } else {
      hue = 4 + (r - g) / delta;
    }
    hue /= 6;
    if (hue < 0) hue += 1;
  }

  return [hue, max === 0 ? 0 : delta / max, max];
}

export function hsvToRgb([h, s, v]: Hsv): Rgb {
  const turns = ((h % 1) + 1) % 1;
  const sector = turns * 6;
  const i = Math.floor(sector);
  const f = sector - i;
  const p = v * (1 - s);
  const q = v * (1 - s * f);
  const t = v * (1 - s * (1 - f));

  switch (i % 6) {
    case 0:
      return [v, t, p];
    case 1:
      return [q, v, p];
    case 2:
      return [p, v, t];
    case 3:
      return [p, q, v];
    case 4:
      return [t, p, v];
    default:
      return [v, p, q];
  }
}

// =============================================================================
// CIE L*a*b*
// =============================================================================

const WHITE_X = 0.95047;
const WHITE_Y = 1.0;
const WHITE_Z = 1.08883;
const EPSILON = (6 / 29) ** 3;
const KAPPA = 3 * (6 / 29) ** 2;

const labF = (t: number): number => (t > EPSILON ? Math.cbrt(t) : t / KAPPA + 4 / 29);
const labFInverse = (t: number): number => (t > 6 / 29 ? t ** 3 : KAPPA * (t - 4 / 29));

/**
 * L in [0, 100]; a and b roughly in [-128, 128].
 */
export function rgbToLab([r, g, b]: Rgb): Lab {
  const lr = srgbToLinear(r);
  const lg = srgbToLinear(g);
  const lb = srgbToLinear(b);

  const x = 0.4124564 * lr + 0.3575761 * lg + 0.1804375 * lb;
  const y = 0.2126729 * lr + 0.7151522 * lg + 0.072175 * lb;
  const z = 0.0193339 * lr + 0.119192 * lg + 0.9503041 * lb;

  const fx = labF(x / WHITE_X);
  const fy = labF(y / WHITE_Y);
  const fz = labF(z / WHITE_Z);

  return [116 * fy - 16, 500 * (fx - fy), 200 * (fy - fz)];
}

/**
 * Out-of-gamut results are clamped to [0, 1].
 */
export function labToRgb([l, a, b]: Lab): Rgb {
  const fy = (l + 16) / 116;
  const fx = fy + a / 500;
  const fz = fy - b / 200;

  const x = WHITE_X * labFInverse(fx);
  const y = WHITE_Y * labFInverse(fy);
  const z = WHITE_Z * labFInverse(fz);

  const lr = 3.2404542 * x - 1.5371385 * y - 0.4985314 * z;
  const lg = -0.969266 * x + 1.8760108 * y + 0.041556 * z;
  const lb = 0.0556434 * x - 0.2040259 * y + 1.0572252 * z;

  return [linearToSrgb(lr), linearToSrgb(lg), linearToSrgb(lb)];
}

// =============================================================================
// CMYK
// =============================================================================

/**
 * `undefined` for pure black, where the ink ratios are undefined.
 */
export function rgbToCmyk([r, g, b]: Rgb): readonly [number, number, number, number] | undefined {
  const max = Math.max(r, g, b);
  if (max <= 0) return undefined;
  return [(max - r) / max, (max - g) / max, (max - b) / max, 1 - max];
}

export function cmykToRgb(c: number, m: number, y: number, k: number): Rgb {
  return [(1 - c) * (1 - k), (1 - m) * (1 - k), (1 - y) * (1 - k)];
}
