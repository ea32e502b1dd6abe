import { BOARD_SIZE, EMPTY_TOKEN, findPieceAt, formatSquare, parseBoardRows, parseSquare } from "@movescan/shared";
import type { Board, Coord, Move, Piece } from "@movescan/shared";

export const coordOf = (square: string): Coord => {
  const coord = parseSquare(square);
  if (!coord) {
    throw new Error(`Unknown square ${square}`);
  }
  return coord;
};

/** Builds a board from `{ e4: "wq" }` style placements; every other square is empty. */
export const boardFrom = (placements: Record<string, string>): Board => {
  const rows = Array.from({ length: BOARD_SIZE }, () => Array.from({ length: BOARD_SIZE }, () => EMPTY_TOKEN));
  for (const [square, token] of Object.entries(placements)) {
    const { row, col } = coordOf(square);
    rows[row][col] = token;
  }
  const result = parseBoardRows(rows);
  if (!result.ok) {
    throw new Error(result.error);
  }
  return result.value;
};

export const pieceOn = (board: Board, square: string): Piece => {
  const piece = findPieceAt(board, coordOf(square));
  if (!piece) {
    throw new Error(`No piece on ${square}`);
  }
  return piece;
};

export const targets = (moves: Move[]): string[] => moves.map((move) => formatSquare(move.to));
