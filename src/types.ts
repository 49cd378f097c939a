import { PreconditionError } from "./game/errors.ts";

export type Player = "W" | "B";
/** "E" marks an empty square. */
export type Piece = Player | "E";

export function opposite(p: Player): Player {
  return p === "B" ? "W" : "B";
}

export function isPlayer(piece: Piece): piece is Player {
  return piece === "W" || piece === "B";
}

export function oppositePiece(piece: Piece): Player {
  if (!isPlayer(piece)) {
    throw new PreconditionError("PRECONDITION_BAD_PIECE", "oppositePiece: empty square has no opposite");
  }
  return opposite(piece);
}

export function pieceAbbrev(piece: Piece): string {
  if (piece === "W") return "w";
  if (piece === "B") return "b";
  return "-";
}

export function pieceFullName(piece: Piece): string {
  if (piece === "W") return "White";
  if (piece === "B") return "Black";
  return "Empty";
}
