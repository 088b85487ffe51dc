import type { Board } from "./model";
import { cloneCard } from "./model";

export interface TagCount {
  tag: string;
  count: number;
}

/** Every tag in use, lowercased, by descending count then name. */
export function calculateTags(boards: Board[]): TagCount[] {
  const counts = new Map<string, number>();
  for (const board of boards) {
    for (const card of board.cards) {
      for (const raw of card.tags) {
        const tag = raw.trim().toLowerCase();
        if (!tag) continue;
        counts.set(tag, (counts.get(tag) ?? 0) + 1);
      }
    }
  }
  return [...counts.entries()]
    .map(([tag, count]) => ({ tag, count }))
    .sort((a, b) => (a.count !== b.count ? b.count - a.count : a.tag.localeCompare(b.tag)));
}

/**
 * Copies the board set keeping only cards carrying one of `tags`; boards
 * left without cards are omitted. Matching is case-insensitive.
 */
export function filterBoardsByTags(boards: Board[], tags: string[]): Board[] {
  const wanted = new Set(tags.map((t) => t.trim().toLowerCase()));
  const out: Board[] = [];
  for (const board of boards) {
    const cards = board.cards
      .filter((c) => c.tags.some((t) => wanted.has(t.trim().toLowerCase())))
      .map(cloneCard);
    if (cards.length > 0) out.push({ ...board, cards });
  }
  return out;
}

export const TAG_SUGGESTION_LIMIT = 6;

/**
 * Known tags completing the fragment after the last comma of a tags field.
 * Tags already in the field are left out, and so is an exact match.
 */
export function suggestTags(boards: Board[], input: string): string[] {
  const parts = input.split(",");
  const fragment = (parts.pop() ?? "").trim().toLowerCase();
  if (!fragment) return [];
  const taken = new Set(parts.map((p) => p.trim().toLowerCase()));
  return calculateTags(boards)
    .map((t) => t.tag)
    .filter((tag) => tag.startsWith(fragment) && tag !== fragment && !taken.has(tag))
    .slice(0, TAG_SUGGESTION_LIMIT);
}

/** Replaces the fragment after the last comma with `tag`. */
export function completeTag(input: string, tag: string): string {
  const cut = input.lastIndexOf(",");
  return cut === -1 ? tag : `${input.slice(0, cut + 1)} ${tag}`;
}
