import type { Hold, NavDatabase, PlotResult, Route, RouteNode } from '@route-plotter/shared';
import { discontinuity, isDiscontinuity } from '@route-plotter/shared';
import { fail, type PlotInput, type PlotSource } from './PlotSource.js';

/**
 * Legacy coordinate strings.
 *
 * Every point is a group of seven symbols from a 62-letter alphabet
 * (A-Z = 0-25, a-z = 26-51, 0-9 = 52-61):
 *
 *   w0 flags  bit0 extension, bit1 south, bit2 lat +60,
 *             bit3 west, bits4-5 lon +60/+120/+180
 *   w1-w3     latitude degrees, minutes, seconds
 *   w4-w6     longitude degrees, minutes, seconds
 *
 * With the extension flag one more symbol follows: 60 or above marks the
 * point highlighted, anything lower is the hold course / 6 and is followed
 * by a hold symbol (bit5 +3°, bit4 left turns, bits0-3 length in nm).
 *
 * "-" is a discontinuity, "(TEXT)" labels the preceding point and a
 * leading "@" is ignored.
 */

const GROUP_SIZE = 7;
const HIGHLIGHT_THRESHOLD = 60;

type GroupResult =
  | { ok: true; node: RouteNode; next: number }
  | { ok: false; error: string };

/** Value of one alphabet symbol, or -1 */
export function decodeSymbol(c: string | undefined): number {
  if (c === undefined || c.length === 0) return -1;
  const code = c.charCodeAt(0);
  if (code >= 0x41 && code <= 0x5a) return code - 0x41;
  if (code >= 0x61 && code <= 0x7a) return 26 + code - 0x61;
  if (code >= 0x30 && code <= 0x39) return 52 + code - 0x30;
  return -1;
}

function readSymbol(body: string, index: number): number | string {
  if (index >= body.length) return 'truncated coordinate group';
  const value = decodeSymbol(body[index]);
  return value < 0 ? 'invalid character' : value;
}

function decodeGroup(body: string, start: number): GroupResult {
  const word: number[] = [];
  for (let i = 0; i < GROUP_SIZE; i++) {
    const value = readSymbol(body, start + i);
    if (typeof value === 'string') return { ok: false, error: value };
    word.push(value);
  }

  const flags = word[0];
  let lat = word[1] + (word[2] + word[3] / 60) / 60;
  let lon = word[4] + (word[5] + word[6] / 60) / 60;

  lat += 60 * ((flags >> 2) & 0b01);
  lon += 60 * ((flags >> 4) & 0b11);

  if (flags & 0b0010) lat = -lat;
  if (flags & 0b1000) lon = -lon;

  const node: RouteNode = { lat, lon, highlight: false };
  let next = start + GROUP_SIZE;

  if (flags & 1) {
    const extra1 = readSymbol(body, next++);
    if (typeof extra1 === 'string') return { ok: false, error: extra1 };

    if (extra1 >= HIGHLIGHT_THRESHOLD) {
      node.highlight = true;
    } else {
      const extra2 = readSymbol(body, next++);
      if (typeof extra2 === 'string') return { ok: false, error: extra2 };

      const hold: Hold = {
        length: extra2 & 0b1111,
        course: 6 * extra1 + ((extra2 >> 5) & 1 ? 3 : 0),
        leftTurns: ((extra2 >> 4) & 1) === 1,
      };
      node.hold = hold;
    }
  }

  return { ok: true, node, next };
}

/** Index of the bracket closing the one at `open`, honoring nesting; -1 if none */
function findClosingBracket(body: string, open: number): number {
  let depth = 1;
  for (let i = open + 1; i < body.length; i++) {
    if (body[i] === '(') depth++;
    else if (body[i] === ')' && --depth === 0) return i;
  }
  return -1;
}

/**
 * Decode a legacy coordinate string (without route name) into a route.
 * The first malformed character fails the whole string.
 */
export function decodeLegacyCoords(body: string): PlotResult {
  const route: Route = [];
  let i = body.startsWith('@') ? 1 : 0;

  while (i < body.length) {
    const c = body[i];

    if (c === '(') {
      const last = route.length > 0 ? route[route.length - 1] : undefined;
      if (!last || isDiscontinuity(last)) {
        return fail('malformedInput', 'label must follow a point');
      }

      const close = findClosingBracket(body, i);
      if (close < 0) return fail('malformedInput', 'missing closing bracket');

      last.label = body.slice(i + 1, close);
      i = close + 1;
      continue;
    }

    if (c === '-') {
      route.push(discontinuity());
      i++;
      continue;
    }

    if (decodeSymbol(c) < 0) {
      return fail('malformedInput', `invalid structural character '${c}'`);
    }

    const group = decodeGroup(body, i);
    if (!group.ok) return fail('malformedInput', group.error);

    route.push(group.node);
    i = group.next;
  }

  return { success: true, route };
}

/**
 * CoordsSource: plot a string of coordinates in the legacy encoding.
 *
 *   ".plot coords IzcnAbp-MEAAVAA"
 *   ".plot coords MYNAME IzcnAbp(LONDON)"
 */
export class CoordsSource implements PlotSource {
  readonly kind = 'coords' as const;
  readonly helpArguments = '<STRING>';
  readonly helpDescription = 'Plot a string of coordinates, encoded in the legacy format';

  parse(input: PlotInput, _navDatabase?: NavDatabase): PlotResult {
    const { tokens } = input;
    let body = input.rawArgs.trim();

    if (tokens.length === 0 || body.length === 0) {
      return fail('malformedInput', 'missing string');
    }

    // A name is only taken when it cannot be the start of a label
    let name: string | undefined;
    if (tokens.length > 1 && !tokens[0].includes('(')) {
      name = tokens[0];
      body = body.slice(name.length).trimStart();
    }

    const result = decodeLegacyCoords(body);
    if (result.success && name !== undefined) {
      return { ...result, name };
    }
    return result;
  }
}
