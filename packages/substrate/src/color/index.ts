/**
 * Color module - bit, integer and float colors plus the HSV, CMYK and
 * L*a*b* spaces.
 */

export * from "./bit-color";
export * from "./blend";
export { CMYKColor } from "./cmyk";
export * from "./color-space";
export { HSVColor } from "./hsv";
export { LABColor } from "./lab";
export { ByteColor, FloatColor, NibbleColor } from "./rgba";
