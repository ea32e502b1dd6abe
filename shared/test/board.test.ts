import { describe, expect, it } from "vitest";
import {
  BoardShapeError,
  BoundsError,
  createBoard,
  createEmptyBoard,
  createStartBoard,
  isInsideBoard,
  squareAt
} from "@movescan/shared";
import type { Square } from "@movescan/shared";

describe("board model", () => {
  it("reads occupants by row and column", () => {
    const board = createStartBoard();
    expect(squareAt(board, { row: 0, col: 4 })).toStrictEqual({ color: "black", kind: "king" });
    expect(squareAt(board, { row: 7, col: 6 })).toStrictEqual({ color: "white", kind: "knight" });
    expect(squareAt(board, { row: 4, col: 4 })).toBeNull();
  });

  it("throws BoundsError for coordinates off the board", () => {
    const board = createEmptyBoard();
    expect(() => squareAt(board, { row: 8, col: 0 })).toThrow(BoundsError);
    expect(() => squareAt(board, { row: 0, col: -1 })).toThrow(BoundsError);
    expect(() => squareAt(board, { row: 1.5, col: 2 })).toThrow("Square (col 2, row 1.5) is off the board");
  });

  it("rejects grids that are not 8x8", () => {
    const row = (): Square[] => Array.from({ length: 8 }, (): Square => null);
    expect(() => createBoard(Array.from({ length: 7 }, row))).toThrow(BoardShapeError);
    const ragged = Array.from({ length: 8 }, row);
    ragged[2] = ragged[2].slice(1);
    expect(() => createBoard(ragged)).toThrow("Board row 2 must have 8 squares, received 7");
  });

  it("freezes the grid and does not share input rows", () => {
    const rows = Array.from({ length: 8 }, () => Array.from({ length: 8 }, (): Square => null));
    rows[3][3] = { color: "white", kind: "queen" };
    const board = createBoard(rows);
    rows[3][3] = null;

    expect(squareAt(board, { row: 3, col: 3 })).toStrictEqual({ color: "white", kind: "queen" });
    expect(Object.isFrozen(board.squares)).toBe(true);
    expect(Object.isFrozen(board.squares[3])).toBe(true);
    expect(Object.isFrozen(board.squares[3][3])).toBe(true);
  });

  it("checks ranges", () => {
    expect(isInsideBoard({ row: 0, col: 0 })).toBe(true);
    expect(isInsideBoard({ row: 7, col: 7 })).toBe(true);
    expect(isInsideBoard({ row: 7, col: 8 })).toBe(false);
  });
});
