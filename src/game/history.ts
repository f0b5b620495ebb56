import type { MoveRecord } from "./moveTypes.ts";
import { pieceSymbol } from "./board.ts";

/** `P:e2-e4` for White, `p:e7-e5` for Black. */
export function formatMoveRecord(record: MoveRecord): string {
  return `${pieceSymbol(record.piece)}:${record.from}-${record.to}`;
}

export type HistoryRow = { moveNumber: number; white: string; black: string | null };

/**
 * Pairs moves into numbered rows, White's move first. A game set up with Black
 * to move still fills the first column, as the history carries no side marker.
 */
export function historyRows(history: readonly MoveRecord[]): HistoryRow[] {
  const rows: HistoryRow[] = [];
  for (let i = 0; i < history.length; i += 2) {
    const white = history[i];
    if (!white) break;
    const black = history[i + 1];
    rows.push({
      moveNumber: i / 2 + 1,
      white: formatMoveRecord(white),
      black: black ? formatMoveRecord(black) : null,
    });
  }
  return rows;
}
