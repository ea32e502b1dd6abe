import type { Coord } from "./game/board";

export type PlayerColor = "black" | "white";

export type ColorCode = "b" | "w";

export type PieceKind = "pawn" | "knight" | "bishop" | "rook" | "queen" | "king";

export interface Occupant {
  color: PlayerColor;
  kind: PieceKind;
}

export type Square = Occupant | null;

export interface Piece {
  color: PlayerColor;
  kind: PieceKind;
  position: Coord;
}

export interface ValidationError {
  ok: false;
  error: string;
}

export interface ValidationSuccess<T> {
  ok: true;
  value: T;
}

export type ValidationResult<T> = ValidationError | ValidationSuccess<T>;

export interface MoveReport {
  to: string;
  capture: PieceKind | null;
  promotion: boolean;
  text: string;
}

export interface PieceReport {
  kind: PieceKind;
  from: string;
  moves: MoveReport[];
  line: string;
}

export interface PositionReport {
  color: PlayerColor;
  pieces: PieceReport[];
}

export type ClientMessage =
  | {
      type: "analyze";
      requestId: string;
      board: string[][];
      color: ColorCode;
    }
  | {
      type: "ping";
    };

export type ServerMessage =
  | {
      type: "ack";
      connectionId: string;
    }
  | {
      type: "report";
      requestId: string;
      payload: PositionReport;
    }
  | {
      type: "pong";
    }
  | {
      type: "error";
      message: string;
      requestId?: string;
    };
