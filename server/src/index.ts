import { startChessServer } from "./app.ts";

function envNumber(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return undefined;
  const n = Number(raw);
  if (!Number.isFinite(n)) throw new Error(`${name} must be a number, got '${raw}'`);
  return n;
}

async function main(): Promise<void> {
  const port = envNumber("PORT") ?? 8788;
  const botReplyDelayMs = envNumber("CHESS_BOT_DELAY_MS") ?? 0;
  const seed = process.env.CHESS_BOT_SEED || undefined;
  const finishedGameTtlMs = envNumber("CHESS_FINISHED_GAME_TTL_MS");

  const { url } = await startChessServer({ port, botReplyDelayMs, seed, finishedGameTtlMs });
  // eslint-disable-next-line no-console
  console.log(`[chess-server] listening on ${url}`);
  if (seed !== undefined) {
    // eslint-disable-next-line no-console
    console.log(`[chess-server] bot seed: ${seed}`);
  }
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error("[chess-server] failed to start", err);
  process.exitCode = 1;
});
