import type { Coord } from "./board";

export class BoundsError extends Error {
  readonly coord: Coord;

  constructor(coord: Coord) {
    super(`Square (col ${coord.col}, row ${coord.row}) is off the board`);
    this.name = "BoundsError";
    this.coord = { ...coord };
  }
}

export class BoardShapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BoardShapeError";
  }
}

export class InvalidTokenError extends Error {
  readonly token: string;

  constructor(token: string) {
    super(`Invalid square token "${token}"`);
    this.name = "InvalidTokenError";
    this.token = token;
  }
}
