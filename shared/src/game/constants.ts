import type { PieceKind, PlayerColor } from "../types";

export const BOARD_SIZE = 8;

export const FILES = "abcdefgh";
// Row 0 is the top of the grid, i.e. rank 8.
export const RANKS = "87654321";

export const EMPTY_TOKEN = "x";

export const PLAYER_COLORS: readonly PlayerColor[] = ["white", "black"];

export const PIECE_KINDS: readonly PieceKind[] = ["pawn", "knight", "bishop", "rook", "queen", "king"];

export const SLIDE_DISTANCE = BOARD_SIZE - 1;

export const PAWN_START_ROW: Record<PlayerColor, number> = {
  white: BOARD_SIZE - 2,
  black: 1
};

export const PAWN_FORWARD: Record<PlayerColor, number> = {
  white: -1,
  black: 1
};

export const PROMOTION_ROW: Record<PlayerColor, number> = {
  white: 0,
  black: BOARD_SIZE - 1
};
