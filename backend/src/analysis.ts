import { buildPieceReport, buildReport, findPieceAt, parseBoardRows, parseColor, parseSquare } from "@movescan/shared";
import type { PositionReport } from "@movescan/shared";
import type { MovesRequest } from "./schemas";

export type AnalysisResult =
  | { ok: true; value: PositionReport }
  | { ok: false; status: 400 | 404; error: string };

export const analyzePosition = (request: MovesRequest): AnalysisResult => {
  const board = parseBoardRows(request.board);
  if (!board.ok) {
    return { ok: false, status: 400, error: board.error };
  }
  const color = parseColor(request.color);
  if (!color.ok) {
    return { ok: false, status: 400, error: color.error };
  }

  if (request.square === undefined) {
    return { ok: true, value: buildReport(board.value, color.value) };
  }

  const coord = parseSquare(request.square);
  if (!coord) {
    return { ok: false, status: 400, error: `Unknown square ${request.square}` };
  }
  const piece = findPieceAt(board.value, coord);
  if (!piece || piece.color !== color.value) {
    return { ok: false, status: 404, error: `No ${color.value} piece on ${request.square}` };
  }
  return { ok: true, value: buildPieceReport(board.value, piece) };
};
