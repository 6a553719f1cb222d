export type Color = Readonly<{
  r: number;
  g: number;
  b: number;
  a: number;
}>;

const HEX_COLOR = /^#([0-9a-fA-F]{6}|[0-9a-fA-F]{8})$/;

/**
 * Parses `#RRGGBB` or `#AARRGGBB` (alpha first, as the editor writes it).
 * Returns null for anything else; callers decide which error kind applies.
 */
export function parseColor(s: string): Color | null {
  const m = HEX_COLOR.exec(s);
  if (!m || m[1] === undefined) return null;
  const hex = m[1];

  const byteAt = (i: number): number => parseInt(hex.slice(i, i + 2), 16);

  if (hex.length === 8) {
    return { a: byteAt(0), r: byteAt(2), g: byteAt(4), b: byteAt(6) };
  }
  return { r: byteAt(0), g: byteAt(2), b: byteAt(4), a: 0xff };
}

export function formatColor(c: Color): string {
  const h = (v: number): string => v.toString(16).padStart(2, "0");
  return c.a === 0xff ? `#${h(c.r)}${h(c.g)}${h(c.b)}` : `#${h(c.a)}${h(c.r)}${h(c.g)}${h(c.b)}`;
}
