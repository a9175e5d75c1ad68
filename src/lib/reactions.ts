import type { ReactionTally } from '../types/board';

export interface ReactionRow {
  messageId: number;
  userId: string;
  emoji: string;
}

/** Group reaction rows into per-message tallies, emojis in first-seen order. */
export function tallyReactions(rows: readonly ReactionRow[]): Map<number, ReactionTally[]> {
  const byMessage = new Map<number, ReactionTally[]>();
  for (const row of rows) {
    let tallies = byMessage.get(row.messageId);
    if (!tallies) {
      tallies = [];
      byMessage.set(row.messageId, tallies);
    }
    const existing = tallies.find((tally) => tally.emoji === row.emoji);
    if (existing) {
      existing.count += 1;
    } else {
      tallies.push({ emoji: row.emoji, count: 1 });
    }
  }
  return byMessage;
}
