import { BOARD_SIZE } from "./constants";
import { squareAt } from "./board";
import { findMoves } from "./rules";
import type { Board, Coord } from "./board";
import type { PieceMoves } from "./move";
import type { Piece, PlayerColor } from "../types";

export const findPieceAt = (board: Board, coord: Coord): Piece | null => {
  const occupant = squareAt(board, coord);
  if (!occupant) return null;
  return { color: occupant.color, kind: occupant.kind, position: { ...coord } };
};

/** Black is scanned from row 7 upwards so each side lists its most advanced pieces first. */
export const collectPieces = (board: Board, color: PlayerColor): Piece[] => {
  const rows = Array.from({ length: BOARD_SIZE }, (_, index) => index);
  if (color === "black") {
    rows.reverse();
  }

  const pieces: Piece[] = [];
  for (const row of rows) {
    for (let col = 0; col < BOARD_SIZE; col += 1) {
      const piece = findPieceAt(board, { row, col });
      if (piece && piece.color === color) {
        pieces.push(piece);
      }
    }
  }
  return pieces;
};

export const generateMoves = (board: Board, color: PlayerColor): PieceMoves[] =>
  collectPieces(board, color).map((piece) => ({ piece, moves: findMoves(board, piece) }));
