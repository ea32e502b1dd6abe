import { describe, expect, it } from "vitest";
import { collectPieces, createStartBoard, findPieceAt, formatSquare, generateMoves } from "@movescan/shared";
import type { Board, PlayerColor } from "@movescan/shared";
import { boardFrom } from "./fixtures";

const squaresOf = (board: Board, color: PlayerColor): string[] =>
  collectPieces(board, color).map((piece) => formatSquare(piece.position));

describe("piece collector", () => {
  const board = boardFrom({ h8: "wq", a7: "bp", c5: "wn", b5: "bk", a1: "wk", g1: "bb", b1: "wr" });

  it("lists white pieces top row first, left to right", () => {
    expect(squaresOf(board, "white")).toStrictEqual(["h8", "c5", "a1", "b1"]);
  });

  it("lists black pieces bottom row first, left to right", () => {
    expect(squaresOf(board, "black")).toStrictEqual(["g1", "b5", "a7"]);
  });

  it("builds pieces that mirror their squares", () => {
    const [queen] = collectPieces(board, "white");
    expect(queen).toStrictEqual({ color: "white", kind: "queen", position: { row: 0, col: 7 } });
    expect(findPieceAt(board, { row: 4, col: 4 })).toBeNull();
  });

  it("finds sixteen pieces a side in the start position", () => {
    const start = createStartBoard();
    expect(collectPieces(start, "white")).toHaveLength(16);
    expect(collectPieces(start, "black")).toHaveLength(16);
  });

  it("generates twenty opening moves for either side", () => {
    const start = createStartBoard();
    const count = (color: PlayerColor): number =>
      generateMoves(start, color).reduce((total, entry) => total + entry.moves.length, 0);
    expect(count("white")).toBe(20);
    expect(count("black")).toBe(20);
  });

  it("returns identical results for repeated calls", () => {
    const first = generateMoves(board, "white");
    const second = generateMoves(board, "white");
    expect(second).toStrictEqual(first);
  });
});
