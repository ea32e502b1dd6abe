import { BOARD_SIZE } from "./constants";
import { BoardShapeError, BoundsError } from "./errors";
import type { Square } from "../types";

export interface Coord {
  row: number;
  col: number;
}

export interface Board {
  readonly squares: ReadonlyArray<ReadonlyArray<Square>>;
}

export const isInsideBoard = (coord: Coord): boolean =>
  Number.isInteger(coord.row) &&
  Number.isInteger(coord.col) &&
  coord.row >= 0 &&
  coord.row < BOARD_SIZE &&
  coord.col >= 0 &&
  coord.col < BOARD_SIZE;

export const createBoard = (rows: ReadonlyArray<ReadonlyArray<Square>>): Board => {
  if (rows.length !== BOARD_SIZE) {
    throw new BoardShapeError(`Board must have ${BOARD_SIZE} rows, received ${rows.length}`);
  }
  const squares = rows.map((row, index) => {
    if (row.length !== BOARD_SIZE) {
      throw new BoardShapeError(`Board row ${index} must have ${BOARD_SIZE} squares, received ${row.length}`);
    }
    return Object.freeze(row.map((square) => (square ? Object.freeze({ ...square }) : null)));
  });
  return Object.freeze({ squares: Object.freeze(squares) });
};

export const createEmptyBoard = (): Board =>
  createBoard(Array.from({ length: BOARD_SIZE }, () => Array.from({ length: BOARD_SIZE }, (): Square => null)));

/** Throws BoundsError rather than clamping; callers check `isInsideBoard` first. */
export const squareAt = (board: Board, coord: Coord): Square => {
  if (!isInsideBoard(coord)) {
    throw new BoundsError(coord);
  }
  return board.squares[coord.row][coord.col];
};
