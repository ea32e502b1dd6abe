import { PAWN_FORWARD, PAWN_START_ROW, PROMOTION_ROW, SLIDE_DISTANCE } from "./constants";
import { walk } from "./walk";
import type { Board } from "./board";
import type { Direction, Move } from "./move";
import type { Piece } from "../types";

const UP: Direction = { dCol: 0, dRow: -1 };
const RIGHT: Direction = { dCol: 1, dRow: 0 };
const DOWN: Direction = { dCol: 0, dRow: 1 };
const LEFT: Direction = { dCol: -1, dRow: 0 };
const UP_RIGHT: Direction = { dCol: 1, dRow: -1 };
const DOWN_RIGHT: Direction = { dCol: 1, dRow: 1 };
const DOWN_LEFT: Direction = { dCol: -1, dRow: 1 };
const UP_LEFT: Direction = { dCol: -1, dRow: -1 };

export const CROSS_DIRECTIONS: readonly Direction[] = [UP, RIGHT, DOWN, LEFT];
export const DIAGONAL_DIRECTIONS: readonly Direction[] = [UP_RIGHT, DOWN_RIGHT, DOWN_LEFT, UP_LEFT];
export const ALL_DIRECTIONS: readonly Direction[] = [...CROSS_DIRECTIONS, ...DIAGONAL_DIRECTIONS];

export const KNIGHT_OFFSETS: readonly Direction[] = [
  { dCol: -1, dRow: -2 },
  { dCol: 1, dRow: -2 },
  { dCol: 2, dRow: -1 },
  { dCol: 2, dRow: 1 },
  { dCol: 1, dRow: 2 },
  { dCol: -1, dRow: 2 },
  { dCol: -2, dRow: 1 },
  { dCol: -2, dRow: -1 }
];

const walkEach = (board: Board, piece: Piece, directions: readonly Direction[], maxSteps: number): Move[] =>
  directions.flatMap((direction) => walk(board, piece, direction, maxSteps));

export const knightMoves = (board: Board, piece: Piece): Move[] => walkEach(board, piece, KNIGHT_OFFSETS, 1);

export const pawnMoves = (board: Board, piece: Piece): Move[] => {
  const dRow = PAWN_FORWARD[piece.color];
  const distance = piece.position.row === PAWN_START_ROW[piece.color] ? 2 : 1;

  // Pawns never capture straight ahead, and only capture on the diagonals.
  const advances = walk(board, piece, { dCol: 0, dRow }, distance).filter((move) => move.capture === null);
  const captures = [1, -1].flatMap((dCol) =>
    walk(board, piece, { dCol, dRow }, 1).filter((move) => move.capture !== null)
  );

  const promotionRow = PROMOTION_ROW[piece.color];
  return [...advances, ...captures].map((move) =>
    move.to.row === promotionRow ? { ...move, promotion: true } : move
  );
};

export const findMoves = (board: Board, piece: Piece): Move[] => {
  switch (piece.kind) {
    case "rook":
      return walkEach(board, piece, CROSS_DIRECTIONS, SLIDE_DISTANCE);
    case "bishop":
      return walkEach(board, piece, DIAGONAL_DIRECTIONS, SLIDE_DISTANCE);
    case "queen":
      return walkEach(board, piece, ALL_DIRECTIONS, SLIDE_DISTANCE);
    case "king":
      return walkEach(board, piece, ALL_DIRECTIONS, 1);
    case "knight":
      return knightMoves(board, piece);
    case "pawn":
      return pawnMoves(board, piece);
    default: {
      const unknownKind: never = piece.kind;
      throw new Error(`Unsupported piece kind: ${String(unknownKind)}`);
    }
  }
};
