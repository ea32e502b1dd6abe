import { BOARD_SIZE, EMPTY_TOKEN, PIECE_KINDS, PLAYER_COLORS, RANKS } from "./constants";
import { createBoard } from "./board";
import { InvalidTokenError } from "./errors";
import { formatSquare } from "./notation";
import startPosition from "./startPosition.json";
import type { Board } from "./board";
import type { ColorCode, PieceKind, PlayerColor, Square, ValidationResult } from "../types";

const COLOR_CODES: Record<PlayerColor, ColorCode> = {
  white: "w",
  black: "b"
};

const KIND_CODES: Record<PieceKind, string> = {
  pawn: "p",
  knight: "n",
  bishop: "b",
  rook: "r",
  queen: "q",
  king: "k"
};

const invert = <K extends string>(keys: readonly K[], codes: Record<K, string>): Map<string, K> =>
  new Map(keys.map((key) => [codes[key], key] as const));

const COLORS_BY_CODE = invert(PLAYER_COLORS, COLOR_CODES);
const KINDS_BY_CODE = invert(PIECE_KINDS, KIND_CODES);

export const START_POSITION: ReadonlyArray<ReadonlyArray<string>> = startPosition;

export const parseSquareToken = (raw: string): Square => {
  const token = raw.trim();
  if (token === EMPTY_TOKEN) return null;
  if (token.length !== 2) {
    throw new InvalidTokenError(raw);
  }
  const color = COLORS_BY_CODE.get(token[0]);
  const kind = KINDS_BY_CODE.get(token[1]);
  if (!color || !kind) {
    throw new InvalidTokenError(raw);
  }
  return { color, kind };
};

export const toSquareToken = (square: Square): string =>
  square ? `${COLOR_CODES[square.color]}${KIND_CODES[square.kind]}` : EMPTY_TOKEN;

export const parseBoardRows = (rows: ReadonlyArray<ReadonlyArray<string>>): ValidationResult<Board> => {
  if (rows.length !== BOARD_SIZE) {
    return { ok: false, error: `Board must have ${BOARD_SIZE} rows, received ${rows.length}` };
  }

  const squares: Square[][] = [];
  for (const [row, tokens] of rows.entries()) {
    if (tokens.length !== BOARD_SIZE) {
      return {
        ok: false,
        error: `Rank ${RANKS[row]} must have ${BOARD_SIZE} squares, received ${tokens.length}`
      };
    }
    const parsedRow: Square[] = [];
    for (const [col, token] of tokens.entries()) {
      try {
        parsedRow.push(parseSquareToken(token));
      } catch (error) {
        if (error instanceof InvalidTokenError) {
          return { ok: false, error: `${error.message} at ${formatSquare({ row, col })}` };
        }
        throw error;
      }
    }
    squares.push(parsedRow);
  }

  return { ok: true, value: createBoard(squares) };
};

/** Eight comma-separated lines, top rank first. Blank lines are skipped. */
export const parseBoardText = (text: string): ValidationResult<Board> =>
  parseBoardRows(
    text
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0)
      .map((line) => line.split(","))
  );

export const parseColor = (raw: string): ValidationResult<PlayerColor> => {
  const color = COLORS_BY_CODE.get(raw.trim());
  if (!color) {
    return { ok: false, error: `Active color must be "w" or "b", received "${raw.trim()}"` };
  }
  return { ok: true, value: color };
};

export const boardToTokens = (board: Board): string[][] =>
  board.squares.map((row) => row.map(toSquareToken));

export const createStartBoard = (): Board => {
  const result = parseBoardRows(START_POSITION);
  if (!result.ok) {
    throw new Error(`Start position is invalid: ${result.error}`);
  }
  return result.value;
};
