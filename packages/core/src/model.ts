import { newId, type BoardId, type CardId } from "./ids";

export const FIELD_NOT_SET = "Not Set";

export type CardStatus = "Active" | "Complete" | "Stale";
export type CardPriority = "Low" | "Medium" | "High";

export const CARD_STATUSES: readonly CardStatus[] = ["Active", "Complete", "Stale"];
export const CARD_PRIORITIES: readonly CardPriority[] = ["Low", "Medium", "High"];

export interface Card {
  id: CardId;
  name: string;
  description: string;
  /** Either {@link FIELD_NOT_SET} or a date rendered in the configured format. */
  dueDate: string;
  status: CardStatus;
  priority: CardPriority;
  tags: string[];
  comments: string[];
  createdAt: string;
  modifiedAt: string;
  /** ISO timestamp iff status is Complete, otherwise {@link FIELD_NOT_SET}. */
  completedAt: string;
}

export interface Board {
  id: BoardId;
  name: string;
  description: string;
  cards: Card[];
}

export interface CreateCardArgs {
  name: string;
  description?: string;
  dueDate?: string;
  priority?: CardPriority;
  status?: CardStatus;
  tags?: string[];
  comments?: string[];
  now?: Date;
}

export function createCard(args: CreateCardArgs): Card {
  const ts = (args.now ?? new Date()).toISOString();
  const status = args.status ?? "Active";
  return {
    id: newId(),
    name: args.name,
    description: args.description ?? "",
    dueDate: args.dueDate ?? FIELD_NOT_SET,
    status,
    priority: args.priority ?? "Low",
    tags: [...(args.tags ?? [])],
    comments: [...(args.comments ?? [])],
    createdAt: ts,
    modifiedAt: ts,
    completedAt: status === "Complete" ? ts : FIELD_NOT_SET,
  };
}

export function createBoard(args: { name: string; description?: string; cards?: Card[] }): Board {
  return {
    id: newId(),
    name: args.name,
    description: args.description ?? "",
    cards: args.cards ?? [],
  };
}

/** Advances modifiedAt strictly, even when the clock has not moved. */
export function touchCard(card: Card, now: Date = new Date()): void {
  const previous = Date.parse(card.modifiedAt);
  const next = Number.isNaN(previous) || now.getTime() > previous ? now.getTime() : previous + 1;
  card.modifiedAt = new Date(next).toISOString();
}

export function setCardStatus(card: Card, status: CardStatus, now: Date = new Date()): void {
  if (card.status === status) return;
  card.status = status;
  card.completedAt = status === "Complete" ? now.toISOString() : FIELD_NOT_SET;
  touchCard(card, now);
}

export function setCardPriority(card: Card, priority: CardPriority, now: Date = new Date()): void {
  if (card.priority === priority) return;
  card.priority = priority;
  touchCard(card, now);
}

export function isStatusCoherent(card: Card): boolean {
  const parsable = card.completedAt !== FIELD_NOT_SET && !Number.isNaN(Date.parse(card.completedAt));
  if (card.status === "Complete") return parsable;
  return card.completedAt === FIELD_NOT_SET;
}

export function cloneCard(card: Card): Card {
  return { ...card, tags: [...card.tags], comments: [...card.comments] };
}

export function cloneBoard(board: Board): Board {
  return { ...board, cards: board.cards.map(cloneCard) };
}

export function cloneBoards(boards: Board[]): Board[] {
  return boards.map(cloneBoard);
}

export function isCardStatus(x: unknown): x is CardStatus {
  return x === "Active" || x === "Complete" || x === "Stale";
}

export function isCardPriority(x: unknown): x is CardPriority {
  return x === "Low" || x === "Medium" || x === "High";
}
