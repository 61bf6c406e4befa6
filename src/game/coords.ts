export interface Coord {
  readonly file: number;
  readonly rank: number;
}

export const BOARD_SIZE = 8;

export function inBounds(file: number, rank: number): boolean {
  return file >= 0 && file < BOARD_SIZE && rank >= 0 && rank < BOARD_SIZE;
}

export function makeCoord(file: number, rank: number): Coord {
  if (!Number.isInteger(file) || !Number.isInteger(rank) || !inBounds(file, rank)) {
    throw new Error(`Invalid coordinate: (${file}, ${rank})`);
  }
  return { file, rank };
}

export function sameCoord(a: Coord, b: Coord): boolean {
  return a.file === b.file && a.rank === b.rank;
}

export function coordIndex(c: Coord): number {
  return c.file + BOARD_SIZE * c.rank;
}

export function coordFromIndex(index: number): Coord {
  return makeCoord(index % BOARD_SIZE, Math.floor(index / BOARD_SIZE));
}

/** Returns null when the step leaves the board. */
export function offsetCoord(c: Coord, df: number, dr: number): Coord | null {
  const file = c.file + df;
  const rank = c.rank + dr;
  return inBounds(file, rank) ? { file, rank } : null;
}
