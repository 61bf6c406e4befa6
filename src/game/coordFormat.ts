import type { Coord } from "./coords.ts";
import { inBounds } from "./coords.ts";

const COORD_TEXT_RE = /^(?<file>[a-h])(?<rank>[1-8])$/;

export function coordToText(c: Coord): string {
  return `${String.fromCharCode(97 + c.file)}${String.fromCharCode(49 + c.rank)}`;
}

export function parseCoordText(text: string): Coord | null {
  const match = COORD_TEXT_RE.exec(text);
  if (!match || !match.groups) return null;

  const file = match.groups.file.charCodeAt(0) - 97;
  const rank = match.groups.rank.charCodeAt(0) - 49;
  if (!inBounds(file, rank)) return null;

  return { file, rank };
}

export function performedMoveToText(m: { from: Coord; to: Coord }): string {
  return `${coordToText(m.from)}${coordToText(m.to)}`;
}
