import type { PieceKind } from "../types.ts";

export const BACK_RANK_KINDS: readonly PieceKind[] = ["R", "N", "B", "Q", "K", "B", "N", "R"];

/**
 * Standard opening layout as coordinate text -> piece letter
 * (upper case White, lower case Black).
 */
export function standardLayout(): Record<string, string> {
  const layout: Record<string, string> = {};
  BACK_RANK_KINDS.forEach((kind, file) => {
    const f = String.fromCharCode(97 + file);
    layout[`${f}1`] = kind;
    layout[`${f}2`] = "P";
    layout[`${f}7`] = "p";
    layout[`${f}8`] = kind.toLowerCase();
  });
  return layout;
}
