import { describe, expect, it } from "vitest";
import { walk } from "@movescan/shared";
import { boardFrom, pieceOn, targets } from "./fixtures";

describe("ray walker", () => {
  it("passes through empty squares until the edge", () => {
    const board = boardFrom({ a1: "wr" });
    const moves = walk(board, pieceOn(board, "a1"), { dCol: 1, dRow: 0 }, 7);
    expect(targets(moves)).toStrictEqual(["b1", "c1", "d1", "e1", "f1", "g1", "h1"]);
    expect(moves.every((move) => move.capture === null && !move.promotion)).toBe(true);
  });

  it("stops after capturing the first opposing piece", () => {
    const board = boardFrom({ a1: "wr", a4: "bn", a6: "bq" });
    const moves = walk(board, pieceOn(board, "a1"), { dCol: 0, dRow: -1 }, 7);
    expect(targets(moves)).toStrictEqual(["a2", "a3", "a4"]);
    expect(moves[2].capture).toBe("knight");
  });

  it("stops before a piece of the same color", () => {
    const board = boardFrom({ c3: "bb", e5: "bp" });
    const moves = walk(board, pieceOn(board, "c3"), { dCol: 1, dRow: -1 }, 7);
    expect(targets(moves)).toStrictEqual(["d4"]);
  });

  it("honours the step limit", () => {
    const board = boardFrom({ d4: "wk" });
    expect(targets(walk(board, pieceOn(board, "d4"), { dCol: -1, dRow: 1 }, 1))).toStrictEqual(["c3"]);
    expect(targets(walk(board, pieceOn(board, "d4"), { dCol: -1, dRow: 1 }, 2))).toStrictEqual(["c3", "b2"]);
  });

  it("emits nothing when the first step leaves the board", () => {
    const board = boardFrom({ h1: "wr" });
    expect(walk(board, pieceOn(board, "h1"), { dCol: 1, dRow: 0 }, 7)).toStrictEqual([]);
  });
});
