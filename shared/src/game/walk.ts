import { isInsideBoard, squareAt } from "./board";
import type { Board } from "./board";
import type { Direction, Move } from "./move";
import type { Piece } from "../types";

/**
 * Steps from the piece's square along `direction` for at most `maxSteps`
 * squares. Empty squares are emitted and passed through; the first occupied
 * square ends the ray and is emitted only when it holds an opposing piece.
 */
export const walk = (board: Board, piece: Piece, direction: Direction, maxSteps: number): Move[] => {
  const moves: Move[] = [];
  let { row, col } = piece.position;

  for (let step = 0; step < maxSteps; step += 1) {
    row += direction.dRow;
    col += direction.dCol;
    const target = { row, col };
    if (!isInsideBoard(target)) break;

    const occupant = squareAt(board, target);
    if (!occupant) {
      moves.push({ to: target, capture: null, promotion: false });
      continue;
    }
    if (occupant.color !== piece.color) {
      moves.push({ to: target, capture: occupant.kind, promotion: false });
    }
    break;
  }

  return moves;
};
