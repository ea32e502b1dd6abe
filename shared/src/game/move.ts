import type { Coord } from "./board";
import type { Piece, PieceKind } from "../types";

export interface Direction {
  dCol: number;
  dRow: number;
}

export interface Move {
  to: Coord;
  capture: PieceKind | null;
  promotion: boolean;
}

export interface PieceMoves {
  piece: Piece;
  moves: Move[];
}
