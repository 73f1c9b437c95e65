/**
 * Payee color utilities
 * Spreads hues by the golden angle so neighbouring payees stay distinct.
 */

const GOLDEN_ANGLE_DEGREES = 360 / (((1 + Math.sqrt(5)) / 2) + 1);
const SATURATION = 0.8;

/**
 * Darker lightness for the yellow/green and cyan/blue bands so text drawn in
 * the color stays readable on white.
 */
const lightnessForHue = (hue: number): number => {
  if (hue >= 40 && hue <= 180) return 0.28;
  if (hue >= 180 && hue <= 250) return 0.33;
  return 0.4;
};

const hueToChannel = (m1: number, m2: number, hue: number): number => {
  const h = ((hue % 1) + 1) % 1;
  if (h < 1 / 6) return m1 + (m2 - m1) * h * 6;
  if (h < 0.5) return m2;
  if (h < 2 / 3) return m1 + (m2 - m1) * (2 / 3 - h) * 6;
  return m1;
};

const toHex = (channel: number): string =>
  Math.trunc(channel * 255).toString(16).padStart(2, "0");

/**
 * Hex color for the payee at a position in the household.
 */
export function getPayeeColor(index: number): string {
  const hueDegrees = ((index * GOLDEN_ANGLE_DEGREES) % 360 + 360) % 360;
  const lightness = lightnessForHue(hueDegrees);
  const hue = hueDegrees / 360;

  const m2 = lightness <= 0.5 ? lightness * (1 + SATURATION) : lightness + SATURATION - lightness * SATURATION;
  const m1 = 2 * lightness - m2;

  return `#${toHex(hueToChannel(m1, m2, hue + 1 / 3))}${toHex(hueToChannel(m1, m2, hue))}${toHex(hueToChannel(m1, m2, hue - 1 / 3))}`;
}

/**
 * Colors keyed by payee name, assigned in alphabetical order.
 */
export const getPayeeColors = (names: readonly string[]): Record<string, string> =>
  Object.fromEntries(
    [...new Set(names)].sort((a, b) => a.localeCompare(b)).map((name, index) => [name, getPayeeColor(index)])
  );
