import { FILES, RANKS } from "./constants";
import { BoundsError } from "./errors";
import { isInsideBoard } from "./board";
import type { Coord } from "./board";

export const formatSquare = (coord: Coord): string => {
  if (!isInsideBoard(coord)) {
    throw new BoundsError(coord);
  }
  return `${FILES[coord.col]}${RANKS[coord.row]}`;
};

export const parseSquare = (square: string): Coord | null => {
  const value = square.trim();
  if (value.length !== 2) return null;
  const col = FILES.indexOf(value[0]);
  const row = RANKS.indexOf(value[1]);
  if (col < 0 || row < 0) return null;
  return { row, col };
};
