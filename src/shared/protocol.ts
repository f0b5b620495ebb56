import type { Player } from "../types.ts";
import type { Move } from "../game/moveTypes.ts";
import type { MoveResult } from "../game/makeMove.ts";
import type { BotTier } from "../bot/presets.ts";
import type { GameMode, WireSnapshot } from "./wireState.ts";

export type GameId = string;

export type ErrorResponse = {
  error: string;
};

export type CreateGameRequest = {
  mode?: GameMode;
  /** Bot mode only; defaults to Black. */
  botColor?: Player;
  botTier?: BotTier;
  /** FEN placement (optionally with side, castling and en passant fields). */
  placement?: string;
};

export type CreateGameResponse = { gameId: GameId; snapshot: WireSnapshot } | ErrorResponse;

export type GetGameResponse = { snapshot: WireSnapshot } | ErrorResponse;

export type LegalDestinationsResponse = { square: string; destinations: string[] } | ErrorResponse;

export type SubmitMoveRequest = {
  from: string;
  to: string;
  promotion?: string;
};

export type SubmitMoveResponse =
  | {
      result: MoveResult;
      /** The bot's reply, when bot mode answered the move. */
      botMove?: Move;
      snapshot: WireSnapshot;
    }
  | ErrorResponse;

export type BotMoveRequest = {
  tier?: BotTier;
};

export type BotMoveResponse = { move: Move | null; result?: MoveResult; snapshot: WireSnapshot } | ErrorResponse;

export type ResetGameRequest = {
  swapSides?: boolean;
};

export type ResetGameResponse = { snapshot: WireSnapshot } | ErrorResponse;

export type WsClientMessage = { type: "JOIN"; gameId: GameId };

export type WsServerMessage =
  | { event: "snapshot"; payload: { gameId: GameId; snapshot: WireSnapshot } }
  | { event: "error"; payload: { message: string } };
