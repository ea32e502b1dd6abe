import { FILES, RANKS } from "./constants";
import { formatSquare } from "./notation";
import { toSquareToken } from "./parse";
import type { Board } from "./board";
import type { Move, PieceMoves } from "./move";
import type { Piece } from "../types";

export const capitalize = (value: string): string => value.charAt(0).toUpperCase() + value.slice(1);

export const describePiece = (piece: Piece): string =>
  `${capitalize(piece.kind)} (${formatSquare(piece.position)})`;

export const describeMove = (move: Move): string => {
  const capture = move.capture ? ` (Capture ${capitalize(move.capture)})` : "";
  const text = `${formatSquare(move.to)}${capture}`;
  return move.promotion ? `Promote on ${text}` : text;
};

export const renderReportLine = ({ piece, moves }: PieceMoves): string => {
  const label = `${describePiece(piece)}:`;
  if (moves.length === 0) return label;
  return `${label} ${moves.map(describeMove).join(", ")}`;
};

export const renderReport = (entries: PieceMoves[]): string => entries.map(renderReportLine).join("\n");

export const renderBoard = (board: Board): string => {
  const header = `   ${FILES.split("").join("   ")}`;
  const rows = board.squares.map((row, index) => {
    const cells = row.map((square) => ` ${toSquareToken(square)}`.padEnd(3));
    return `${RANKS[index]} ${cells.join(" ")}`.trimEnd();
  });
  return [header, ...rows].join("\n");
};
