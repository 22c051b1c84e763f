export function hslToHex(h: number, s: number, l: number): string {
  s /= 100;
  l /= 100;
  const c = (1 - Math.abs(2 * l - 1)) * s;
  const x = c * (1 - Math.abs(((h / 60) % 2) - 1));
  const m = l - c / 2;
  let r = 0,
    g = 0,
    b = 0;
  if (0 <= h && h < 60) {
    r = c;
    g = x;
  } else if (60 <= h && h < 120) {
    r = x;
    g = c;
  } else if (120 <= h && h < 180) {
    g = c;
    b = x;
  } else if (180 <= h && h < 240) {
    g = x;
    b = c;
  } else if (240 <= h && h < 300) {
    r = x;
    b = c;
  } else {
    r = c;
    b = x;
  }
  const toHex = (n: number) => Math.round((n + m) * 255).toString(16).padStart(2, '0');
  return `#${toHex(r)}${toHex(g)}${toHex(b)}`;
}

/**
 * Evenly spaced hues around the wheel, so charts come out the same on every run.
 * Spans 300 degrees rather than 360 so the last line is not a second red.
 */
export function generateDistinctColors(count: number, offset = 0, saturation = 70): string[] {
  const colors: string[] = [];
  if (count <= 0) return colors;
  const span = count > 1 ? 300 / (count - 1) : 0;
  for (let i = 0; i < count; i++) {
    const hue = Math.round(i * span + offset) % 360;
    colors.push(hslToHex(hue, saturation, 45));
  }
  return colors;
}

/**
 * One color per line: a single color repeated, a given list (cycled when
 * shorter than `count`), or a generated palette.
 */
export function resolveLineColors(count: number, lineColors?: string | readonly string[]): string[] {
  if (typeof lineColors === 'string') return Array.from({ length: count }, () => lineColors);
  if (lineColors && lineColors.length) {
    return Array.from({ length: count }, (_, i) => lineColors[i % lineColors.length]);
  }
  return generateDistinctColors(count);
}
