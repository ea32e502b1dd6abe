import { generateMoves } from "./collect";
import { formatSquare } from "./notation";
import { describeMove, renderReportLine } from "./render";
import { findMoves } from "./rules";
import type { Board } from "./board";
import type { PieceMoves } from "./move";
import type { Piece, PieceReport, PlayerColor, PositionReport } from "../types";

const toPieceReport = (entry: PieceMoves): PieceReport => ({
  kind: entry.piece.kind,
  from: formatSquare(entry.piece.position),
  moves: entry.moves.map((move) => ({
    to: formatSquare(move.to),
    capture: move.capture,
    promotion: move.promotion,
    text: describeMove(move)
  })),
  line: renderReportLine(entry)
});

export const buildReport = (board: Board, color: PlayerColor): PositionReport => ({
  color,
  pieces: generateMoves(board, color).map(toPieceReport)
});

export const buildPieceReport = (board: Board, piece: Piece): PositionReport => ({
  color: piece.color,
  pieces: [toPieceReport({ piece, moves: findMoves(board, piece) })]
});
