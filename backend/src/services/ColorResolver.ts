import cssColors from '../data/cssColors.json';
import { ValidationError } from '../errors/ChatErrors';

export const MAX_COLOR = 0xffffff;
export const DEFAULT_COLOR = 0x000000;

const NAMED_COLORS: Map<string, number> = new Map(
  Object.entries(cssColors).map(([name, hex]): [string, number] => [name, parseInt(hex.slice(1), 16)])
);

const COLOR_NAMES: string[] = Array.from(NAMED_COLORS.keys());

const HEX_PATTERN = /^#?([0-9a-f]{3}|[0-9a-f]{6})$/;

/**
 * Resolves a user-supplied color token to a 24-bit RGB value.
 *
 * Accepts `random`, a CSS color name, or a hex triplet (`#abc`, `abc`,
 * `#aabbcc`, `aabbcc`). Throws `ValidationError` for anything else.
 */
export function resolveColor(token: string, random: () => number = Math.random): number {
  let color = token.trim().toLowerCase();

  if (color === 'random') {
    color = COLOR_NAMES[Math.floor(random() * COLOR_NAMES.length)] ?? COLOR_NAMES[0];
  }

  const named = NAMED_COLORS.get(color);
  if (named !== undefined) {
    return named;
  }

  const match = HEX_PATTERN.exec(color);
  if (match) {
    let digits = match[1];
    if (digits.length === 3) {
      digits = digits.split('').map(d => d + d).join('');
    }
    const value = parseInt(digits, 16);
    if (value >= 0 && value <= MAX_COLOR) {
      return value;
    }
  }

  throw new ValidationError(`Unrecognized color '${token}'`, 'server');
}

export function resolveColorOrDefault(token: string | undefined, random?: () => number): number {
  if (!token) {
    return DEFAULT_COLOR;
  }
  try {
    return resolveColor(token, random);
  } catch (error) {
    if (error instanceof ValidationError) {
      return DEFAULT_COLOR;
    }
    throw error;
  }
}
