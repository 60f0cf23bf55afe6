import { color as colorTool } from 'echarts/core';

// Forecast segments are drawn 30 % lighter than their historical counterpart
export const FORECAST_LIGHTEN = 0.3;

/**
 * HSL lightness (0..1) of a CSS colour
 */
export function getLightness(value: string): number {
  const [r = 0, g = 0, b = 0] = colorTool.parse(value);
  return (Math.max(r, g, b) + Math.min(r, g, b)) / 2 / 255;
}

/**
 * Darken (negative change) or lighten (positive change) a lightness value.
 * Darkening scales towards black, lightening moves the given share towards white.
 */
export function adjustLightness(lightness: number, change: number): number {
  if (change < 0) return lightness * (1 + change);
  if (change > 0) return lightness + (1 - lightness) * change;
  return lightness;
}

/**
 * Same hue and saturation with a new lightness, as `#rrggbb`
 */
export function withLightness(value: string, lightness: number): string {
  return `#${colorTool.toHex(colorTool.modifyHSL(value, undefined, undefined, lightness))}`;
}

/**
 * Apply an optional luminance change and, for forecasts, the forecast lightening.
 */
export function deriveColor(base: string, luminanceChange = 0, forecast = false): string {
  let lightness = adjustLightness(getLightness(base), luminanceChange);
  if (forecast) {
    lightness = adjustLightness(lightness, FORECAST_LIGHTEN);
  }
  return withLightness(base, lightness);
}
