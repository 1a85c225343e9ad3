import type { Position } from '@route-plotter/shared';

const COORDINATE_PATTERN = /^(\d+)([NS])(\d+)([EW])$/;

/**
 * Degrees from a variable-width digit run: the leading digits are whole
 * degrees, followed by (digits / 2 - 1) two-digit sexagesimal fields.
 * "51" → 51, "5130" → 51.5, "513045" → 51.5125, "00010" → 0.1667
 */
function sexagesimal(digits: string): number {
  let whole = parseInt(digits, 10);
  let value = 0;

  for (let fields = Math.floor(digits.length / 2); fields > 1; fields--) {
    value += whole % 100;
    value /= 60;
    whole = Math.floor(whole / 100);
  }

  return value + whole;
}

/**
 * Parse a coordinate literal such as "51N001W", "5130N00045W" or
 * "513000N0004500W". Returns null for anything else so the caller can
 * fall back to a name lookup.
 */
export function parseCoordinate(text: string): Position | null {
  const match = COORDINATE_PATTERN.exec(text);
  if (!match) return null;

  const [, latDigits, latHemisphere, lonDigits, lonHemisphere] = match;
  const lat = sexagesimal(latDigits);
  const lon = sexagesimal(lonDigits);

  return {
    lat: latHemisphere === 'S' ? -lat : lat,
    lon: lonHemisphere === 'W' ? -lon : lon,
  };
}
