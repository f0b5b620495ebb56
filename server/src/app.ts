import express from "express";
import cors from "cors";
import { randomBytes } from "node:crypto";
import { createServer, type Server } from "node:http";
import { setTimeout as delay } from "node:timers/promises";

import WebSocket, { WebSocketServer, type RawData } from "ws";

import type { Player } from "../../src/types.ts";
import type { GameState } from "../../src/game/state.ts";
import type { Move } from "../../src/game/moveTypes.ts";
import type { MoveResult } from "../../src/game/makeMove.ts";
import type { MoveStrategy } from "../../src/bot/strategy.ts";
import type { BotTier } from "../../src/bot/presets.ts";
import type { Seed } from "../../src/shared/prng.ts";
import { tryCreateGameState } from "../../src/game/state.ts";
import { STARTING_PLACEMENT } from "../../src/game/fen.ts";
import { attemptMove } from "../../src/game/makeMove.ts";
import { legalDestinations } from "../../src/game/legality.ts";
import { nameToSquare } from "../../src/game/coords.ts";
import { isTerminal } from "../../src/game/gameOver.ts";
import { selectMove } from "../../src/bot/strategy.ts";
import { DEFAULT_BOT_TIER, createStrategyForTier, isBotTier } from "../../src/bot/presets.ts";
import { opponentOf, playerName } from "../../src/types.ts";
import { serializeSnapshot, type GameMode, type WireSnapshot } from "../../src/shared/wireState.ts";
import type {
  BotMoveResponse,
  CreateGameResponse,
  GameId,
  GetGameResponse,
  LegalDestinationsResponse,
  ResetGameResponse,
  SubmitMoveResponse,
  WsServerMessage,
} from "../../src/shared/protocol.ts";

type Game = {
  gameId: GameId;
  state: GameState;
  mode: GameMode;
  botColor: Player | null;
  botTier: BotTier;
  /** Position the game was created from; reset returns to it. */
  placement: string;
  strategies: Record<BotTier, MoveStrategy>;
  version: number;
  /** Serialize all game mutations across concurrent HTTP and WS actions. */
  actionChain: Promise<void>;
  expiryTimer: NodeJS.Timeout | null;
};

export type ServerOpts = {
  /** Pause before the bot answers a human move. */
  botReplyDelayMs?: number;
  /** Seeds every game's strategies; unseeded games use fresh randomness. */
  seed?: Seed;
  /** How long a finished game nobody is watching stays in memory. 0 keeps it. */
  finishedGameTtlMs?: number;
};

export class GameNotFoundError extends Error {
  constructor(gameId: string) {
    super(`Unknown game: ${gameId}`);
    this.name = "GameNotFoundError";
  }
}

function field(body: unknown, key: string): unknown {
  if (typeof body !== "object" || body === null) return undefined;
  return Reflect.get(body, key);
}

function optionalString(body: unknown, key: string): string | undefined {
  const v = field(body, key);
  if (v === undefined || v === null) return undefined;
  if (typeof v !== "string") throw new Error(`Invalid ${key}: expected a string`);
  return v;
}

function requireString(body: unknown, key: string): string {
  const v = optionalString(body, key);
  if (v === undefined) throw new Error(`Missing ${key}`);
  return v;
}

function parseMode(raw: string | undefined): GameMode {
  if (raw === undefined || raw === "pvp") return "pvp";
  if (raw === "bot") return "bot";
  throw new Error(`Invalid mode: ${raw}`);
}

function parsePlayer(raw: string | undefined, fallback: Player): Player {
  if (raw === undefined) return fallback;
  if (raw === "W" || raw === "B") return raw;
  throw new Error(`Invalid color: ${raw}`);
}

function parseTier(raw: string | undefined, fallback: BotTier): BotTier {
  if (raw === undefined) return fallback;
  if (isBotTier(raw)) return raw;
  throw new Error(`Invalid bot tier: ${raw}`);
}

function rawToText(raw: RawData): string {
  if (Array.isArray(raw)) return Buffer.concat(raw).toString("utf8");
  if (raw instanceof ArrayBuffer) return Buffer.from(raw).toString("utf8");
  return raw.toString("utf8");
}

function errorMessage(err: unknown, fallback: string): string {
  return err instanceof Error ? err.message : fallback;
}

function snapshotForGame(game: Game): WireSnapshot {
  return serializeSnapshot(game.state, { mode: game.mode, botColor: game.botColor, version: game.version });
}

export function createChessApp(opts: ServerOpts = {}): {
  app: express.Express;
  games: Map<GameId, Game>;
  attachWebSockets: (server: Server) => void;
  shutdown: () => Promise<void>;
} {
  const botReplyDelayMs = Math.max(0, Number(opts.botReplyDelayMs ?? 0));
  const finishedGameTtlMs = Math.max(0, Number(opts.finishedGameTtlMs ?? 10 * 60_000));

  const games = new Map<GameId, Game>();
  const wsClients = new Map<GameId, Set<WebSocket>>();
  const alive = new WeakMap<WebSocket, boolean>();
  let wss: WebSocketServer | null = null;
  let wsHeartbeat: NodeJS.Timeout | null = null;
  let isShuttingDown = false;

  function strategiesFor(gameId: GameId): Record<BotTier, MoveStrategy> {
    const seed = opts.seed === undefined ? undefined : `${String(opts.seed)}:${gameId}`;
    return {
      beginner: createStrategyForTier("beginner", { seed }),
      strong: createStrategyForTier("strong", { seed }),
    };
  }

  function newState(placement: string): GameState {
    const created = tryCreateGameState(placement);
    if (!created.ok) throw new Error(created.error);
    return created.state;
  }

  function requireGame(gameId: string): Game {
    const game = games.get(gameId);
    if (!game) throw new GameNotFoundError(gameId);
    return game;
  }

  function queueGameAction<T>(game: Game, fn: () => Promise<T>): Promise<T> {
    if (isShuttingDown) return Promise.reject(new Error("Server shutting down"));

    // At most one action runs at a time per game; a failed action does not block the next.
    const run = game.actionChain.then(fn);
    game.actionChain = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  function sendWs(ws: WebSocket, msg: WsServerMessage): void {
    if (ws.readyState !== WebSocket.OPEN) return;
    ws.send(JSON.stringify(msg), (err) => {
      if (!err) return;
      // eslint-disable-next-line no-console
      console.error("[chess-server] ws send error", err.message);
    });
  }

  function broadcastSnapshot(game: Game): void {
    const sockets = wsClients.get(game.gameId);
    if (!sockets || sockets.size === 0) return;
    const msg: WsServerMessage = { event: "snapshot", payload: { gameId: game.gameId, snapshot: snapshotForGame(game) } };
    for (const ws of sockets) sendWs(ws, msg);
  }

  function scheduleExpiry(game: Game): void {
    if (game.expiryTimer) {
      clearTimeout(game.expiryTimer);
      game.expiryTimer = null;
    }
    if (finishedGameTtlMs <= 0 || !isTerminal(game.state.status)) return;

    game.expiryTimer = setTimeout(() => {
      game.expiryTimer = null;
      if (games.get(game.gameId) !== game || !isTerminal(game.state.status)) return;
      if (wsClients.has(game.gameId)) {
        // Still watched; look again later.
        scheduleExpiry(game);
        return;
      }
      games.delete(game.gameId);
      // eslint-disable-next-line no-console
      console.log(`[chess-server] dropped finished game ${game.gameId}`);
    }, finishedGameTtlMs);
    game.expiryTimer.unref();
  }

  function afterStateChange(game: Game): void {
    broadcastSnapshot(game);
    scheduleExpiry(game);
  }

  function isBotTurn(game: Game): boolean {
    return game.mode === "bot" && !isTerminal(game.state.status) && game.state.toMove === game.botColor;
  }

  function playBotMove(game: Game, tier: BotTier): { move: Move | null; result?: MoveResult } {
    const move = selectMove(game.strategies[tier], game.state);
    if (!move) return { move: null };
    const result = attemptMove(game.state, move.from, move.to);
    if (!result.ok) throw new Error(`Bot chose an unplayable move ${move.from}-${move.to}: ${result.message}`);
    game.version += 1;
    return { move, result };
  }

  function openIfBotMovesFirst(game: Game): void {
    if (isBotTurn(game)) playBotMove(game, game.botTier);
  }

  function removeWsClient(gameId: GameId, ws: WebSocket): void {
    const set = wsClients.get(gameId);
    if (!set) return;
    set.delete(ws);
    if (set.size === 0) wsClients.delete(gameId);
  }

  function attachWebSockets(server: Server): void {
    if (wss) return;

    wss = new WebSocketServer({ server, path: "/api/ws" });

    wss.on("connection", (ws: WebSocket) => {
      let joined: GameId | null = null;
      alive.set(ws, true);

      ws.on("pong", () => {
        alive.set(ws, true);
      });

      ws.on("message", (raw: RawData) => {
        try {
          const msg: unknown = JSON.parse(rawToText(raw));
          if (field(msg, "type") !== "JOIN") return;
          const gameId = requireString(msg, "gameId");
          const game = requireGame(gameId);

          if (joined && joined !== gameId) removeWsClient(joined, ws);
          joined = gameId;

          const set = wsClients.get(gameId) ?? new Set<WebSocket>();
          set.add(ws);
          wsClients.set(gameId, set);

          sendWs(ws, { event: "snapshot", payload: { gameId, snapshot: snapshotForGame(game) } });
        } catch (err) {
          sendWs(ws, { event: "error", payload: { message: errorMessage(err, "JOIN failed") } });
        }
      });

      ws.on("close", () => {
        if (joined) removeWsClient(joined, ws);
      });

      ws.on("error", (err) => {
        // eslint-disable-next-line no-console
        console.error("[chess-server] ws error", err.message);
      });
    });

    // Drop sockets that stop answering pings.
    wsHeartbeat = setInterval(() => {
      if (!wss) return;
      for (const ws of wss.clients) {
        if (!alive.get(ws)) {
          ws.terminate();
          continue;
        }
        alive.set(ws, false);
        ws.ping();
      }
    }, 15_000);
    wsHeartbeat.unref();
  }

  function statusFor(err: unknown): number {
    return err instanceof GameNotFoundError ? 404 : 400;
  }

  const app = express();
  app.use(cors());
  app.use(express.json({ limit: "64kb" }));

  app.use((req, _res, next) => {
    // eslint-disable-next-line no-console
    console.log(`[chess-server] ${req.method} ${req.path}`);
    next();
  });

  app.get("/api/health", (_req, res) => {
    res.json({ ok: true });
  });

  app.post("/api/games", (req, res) => {
    try {
      const body: unknown = req.body;
      const mode = parseMode(optionalString(body, "mode"));
      const botColor = mode === "bot" ? parsePlayer(optionalString(body, "botColor"), "B") : null;
      const botTier = parseTier(optionalString(body, "botTier"), DEFAULT_BOT_TIER);
      const placement = optionalString(body, "placement") ?? STARTING_PLACEMENT;

      const gameId: GameId = randomBytes(8).toString("hex");
      const game: Game = {
        gameId,
        state: newState(placement),
        mode,
        botColor,
        botTier,
        placement,
        strategies: strategiesFor(gameId),
        version: 0,
        actionChain: Promise.resolve(),
        expiryTimer: null,
      };
      games.set(gameId, game);
      openIfBotMovesFirst(game);
      scheduleExpiry(game);

      const response: CreateGameResponse = { gameId, snapshot: snapshotForGame(game) };
      res.json(response);
    } catch (err) {
      const msg = errorMessage(err, "Create failed");
      // eslint-disable-next-line no-console
      console.error("[chess-server] create error", msg);
      const response: CreateGameResponse = { error: msg };
      res.status(400).json(response);
    }
  });

  app.get("/api/games/:gameId", (req, res) => {
    try {
      const game = requireGame(req.params.gameId);
      const response: GetGameResponse = { snapshot: snapshotForGame(game) };
      res.json(response);
    } catch (err) {
      const response: GetGameResponse = { error: errorMessage(err, "Snapshot failed") };
      res.status(statusFor(err)).json(response);
    }
  });

  app.get("/api/games/:gameId/legal", (req, res) => {
    try {
      const game = requireGame(req.params.gameId);
      const square = requireString(req.query, "square");
      const parsed = nameToSquare(square);
      if (!parsed.ok) throw new Error(parsed.error);
      const response: LegalDestinationsResponse = {
        square: parsed.name,
        destinations: legalDestinations(game.state, parsed.name),
      };
      res.json(response);
    } catch (err) {
      const response: LegalDestinationsResponse = { error: errorMessage(err, "Legal move lookup failed") };
      res.status(statusFor(err)).json(response);
    }
  });

  app.post("/api/games/:gameId/move", async (req, res) => {
    try {
      const game = requireGame(req.params.gameId);
      const body: unknown = req.body;
      const from = requireString(body, "from");
      const to = requireString(body, "to");
      const promotion = optionalString(body, "promotion");

      const response = await queueGameAction(game, async (): Promise<SubmitMoveResponse> => {
        if (isBotTurn(game) && game.botColor) {
          throw new Error(`Not your turn: the bot plays ${playerName(game.botColor)}`);
        }

        const result = attemptMove(game.state, from, to, promotion);
        if (!result.ok) return { result, snapshot: snapshotForGame(game) };

        game.version += 1;
        afterStateChange(game);

        let botMove: Move | undefined;
        if (isBotTurn(game)) {
          if (botReplyDelayMs > 0) await delay(botReplyDelayMs);
          const reply = playBotMove(game, game.botTier);
          if (reply.move) {
            botMove = reply.move;
            afterStateChange(game);
          }
        }

        return { result, ...(botMove ? { botMove } : {}), snapshot: snapshotForGame(game) };
      });

      res.json(response);
    } catch (err) {
      const msg = errorMessage(err, "Move failed");
      // eslint-disable-next-line no-console
      console.error("[chess-server] move error", msg);
      const response: SubmitMoveResponse = { error: msg };
      res.status(statusFor(err)).json(response);
    }
  });

  app.post("/api/games/:gameId/bot-move", async (req, res) => {
    try {
      const game = requireGame(req.params.gameId);
      const tier = parseTier(optionalString(req.body, "tier"), game.botTier);

      const response = await queueGameAction(game, async (): Promise<BotMoveResponse> => {
        const played = playBotMove(game, tier);
        if (played.move) afterStateChange(game);
        return { ...played, snapshot: snapshotForGame(game) };
      });

      res.json(response);
    } catch (err) {
      const msg = errorMessage(err, "Bot move failed");
      // eslint-disable-next-line no-console
      console.error("[chess-server] bot-move error", msg);
      const response: BotMoveResponse = { error: msg };
      res.status(statusFor(err)).json(response);
    }
  });

  app.post("/api/games/:gameId/reset", async (req, res) => {
    try {
      const game = requireGame(req.params.gameId);
      const swapSides = field(req.body, "swapSides") === true;

      const response = await queueGameAction(game, async (): Promise<ResetGameResponse> => {
        game.state = newState(game.placement);
        if (swapSides && game.botColor) game.botColor = opponentOf(game.botColor);
        game.version += 1;
        openIfBotMovesFirst(game);
        afterStateChange(game);
        return { snapshot: snapshotForGame(game) };
      });

      res.json(response);
    } catch (err) {
      const msg = errorMessage(err, "Reset failed");
      // eslint-disable-next-line no-console
      console.error("[chess-server] reset error", msg);
      const response: ResetGameResponse = { error: msg };
      res.status(statusFor(err)).json(response);
    }
  });

  async function shutdown(): Promise<void> {
    isShuttingDown = true;

    if (wsHeartbeat) {
      clearInterval(wsHeartbeat);
      wsHeartbeat = null;
    }

    const closing = wss;
    wss = null;
    if (closing) {
      for (const ws of closing.clients) ws.terminate();
      await new Promise<void>((resolve, reject) => {
        closing.close((err) => (err ? reject(err) : resolve()));
      });
    }

    // Let in-flight game actions settle.
    await Promise.all(Array.from(games.values()).map((g) => g.actionChain));

    for (const game of games.values()) {
      if (game.expiryTimer) clearTimeout(game.expiryTimer);
      game.expiryTimer = null;
    }
  }

  return { app, games, attachWebSockets, shutdown };
}

export async function startChessServer(args: ServerOpts & { port?: number }): Promise<{
  app: express.Express;
  server: Server;
  url: string;
  close: () => Promise<void>;
}> {
  const { app, attachWebSockets, shutdown } = createChessApp({
    botReplyDelayMs: args.botReplyDelayMs,
    seed: args.seed,
    finishedGameTtlMs: args.finishedGameTtlMs,
  });

  const port = args.port !== undefined && Number.isFinite(args.port) ? args.port : 8788;

  // Explicit HTTP server so the WebSocket endpoint shares the port.
  const server = createServer(app);
  attachWebSockets(server);

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, () => {
      server.off("error", reject);
      resolve();
    });
  });

  const address = server.address();
  const actualPort = typeof address === "object" && address !== null ? address.port : port;

  const close = async (): Promise<void> => {
    await shutdown();
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  };

  return { app, server, url: `http://localhost:${actualPort}`, close };
}
