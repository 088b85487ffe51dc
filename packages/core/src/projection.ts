import type { BoardId, CardId } from "./ids";
import type { Board } from "./model";
import { boardIndex, cardIndex, findBoard } from "./boards";

/** Visible boards in order, each with its visible window of card ids. */
export type Projection = Map<BoardId, CardId[]>;

export interface Selection {
  boardId?: BoardId;
  cardId?: CardId;
}

export interface WindowSize {
  boardsShown: number;
  cardsShown: number;
}

export type Direction = "Left" | "Right" | "Up" | "Down";

export type NavigationErrorKind =
  | "AlreadyAtFirstBoard"
  | "AlreadyAtLastBoard"
  | "AlreadyAtFirstCard"
  | "AlreadyAtLastCard"
  | "NoBoardsFound"
  | "CurrentBoardHasNoCards"
  | "SomethingWentWrong";

export class NavigationError extends Error {
  readonly kind: NavigationErrorKind;
  readonly direction: Direction;

  constructor(kind: NavigationErrorKind, direction: Direction) {
    super(navigationMessage(kind, direction));
    this.name = "NavigationError";
    this.kind = kind;
    this.direction = direction;
  }
}

function navigationMessage(kind: NavigationErrorKind, direction: Direction): string {
  switch (kind) {
    case "AlreadyAtFirstBoard":
      return `Cannot go ${direction}: Already at first board`;
    case "AlreadyAtLastBoard":
      return `Cannot go ${direction}: Already at last board`;
    case "AlreadyAtFirstCard":
      return `Cannot go ${direction}: Already at first card`;
    case "AlreadyAtLastCard":
      return `Cannot go ${direction}: Already at last card`;
    case "NoBoardsFound":
      return `Cannot go ${direction}: No boards found`;
    case "CurrentBoardHasNoCards":
      return `Cannot go ${direction}: Current board has no cards`;
    case "SomethingWentWrong":
      return `Cannot go ${direction}: Something went wrong`;
  }
}

export interface ProjectionState {
  projection: Projection;
  selection: Selection;
}

export type NavigationResult = ({ ok: true } & ProjectionState) | { ok: false; error: NavigationError };

/** First `boardsShown` boards with their first `cardsShown` cards; selects the first of each. */
export function buildProjection(boards: Board[], size: WindowSize): ProjectionState {
  const projection: Projection = new Map();
  for (const board of boards.slice(0, size.boardsShown)) {
    projection.set(
      board.id,
      board.cards.slice(0, size.cardsShown).map((c) => c.id),
    );
  }
  const first = boards[0];
  return {
    projection,
    selection: first ? { boardId: first.id, cardId: first.cards[0]?.id } : {},
  };
}

function windowStart(total: number, shown: number, start: number, focus: number): number {
  let s = start;
  if (focus !== -1) {
    if (focus < s) s = focus;
    if (focus >= s + shown) s = focus - shown + 1;
  }
  return Math.max(0, Math.min(s, Math.max(0, total - shown)));
}

/**
 * Rebuilds the projection after the board set changed, keeping each window
 * where it was when possible and sliding it so that the selection stays
 * visible. Stale ids are dropped and the selection falls back to the first
 * visible board and card.
 */
export function reconcileProjection(args: {
  boards: Board[];
  previous: Projection;
  selection: Selection;
  size: WindowSize;
}): ProjectionState {
  const { boards, previous, size } = args;
  if (boards.length === 0) return { projection: new Map(), selection: {} };

  let start = 0;
  for (const id of previous.keys()) {
    const idx = boardIndex(boards, id);
    if (idx !== -1) {
      start = idx;
      break;
    }
  }

  const selectedBoardIdx = args.selection.boardId ? boardIndex(boards, args.selection.boardId) : -1;
  start = windowStart(boards.length, size.boardsShown, start, selectedBoardIdx);

  const projection: Projection = new Map();
  for (const board of boards.slice(start, start + size.boardsShown)) {
    let cardStart = 0;
    for (const id of previous.get(board.id) ?? []) {
      const idx = cardIndex(board, id);
      if (idx !== -1) {
        cardStart = idx;
        break;
      }
    }
    const focus =
      board.id === args.selection.boardId && args.selection.cardId
        ? cardIndex(board, args.selection.cardId)
        : -1;
    cardStart = windowStart(board.cards.length, size.cardsShown, cardStart, focus);
    projection.set(
      board.id,
      board.cards.slice(cardStart, cardStart + size.cardsShown).map((c) => c.id),
    );
  }

  const boardId =
    selectedBoardIdx !== -1 && projection.has(boards[selectedBoardIdx].id)
      ? boards[selectedBoardIdx].id
      : boards[start].id;
  const visibleCards = projection.get(boardId) ?? [];
  const cardId =
    args.selection.cardId && visibleCards.includes(args.selection.cardId)
      ? args.selection.cardId
      : visibleCards[0];
  return { projection, selection: { boardId, cardId } };
}

export function projectionHolds(state: ProjectionState, boards: Board[], size: WindowSize): boolean {
  if (state.projection.size > size.boardsShown) return false;
  let lastBoardIdx = -1;
  for (const [boardId, cardIds] of state.projection) {
    const bi = boardIndex(boards, boardId);
    if (bi <= lastBoardIdx) return false;
    if (lastBoardIdx !== -1 && bi !== lastBoardIdx + 1) return false;
    lastBoardIdx = bi;
    if (cardIds.length > size.cardsShown) return false;
    let lastCardIdx = -1;
    for (const cardId of cardIds) {
      const ci = cardIndex(boards[bi], cardId);
      if (ci === -1) return false;
      if (lastCardIdx !== -1 && ci !== lastCardIdx + 1) return false;
      lastCardIdx = ci;
    }
  }
  const { boardId, cardId } = state.selection;
  if (boardId && !state.projection.has(boardId)) return false;
  if (cardId && !(boardId && (state.projection.get(boardId) ?? []).includes(cardId))) return false;
  return true;
}

function fail(kind: NavigationErrorKind, direction: Direction): NavigationResult {
  return { ok: false, error: new NavigationError(kind, direction) };
}

function horizontal(
  boards: Board[],
  state: ProjectionState,
  size: WindowSize,
  direction: "Left" | "Right",
): NavigationResult {
  const visible = [...state.projection.keys()];
  const current = findBoard(boards, state.selection.boardId);
  if (!current || !state.projection.has(current.id)) {
    const first = visible[0];
    if (!first) return fail("SomethingWentWrong", direction);
    return {
      ok: true,
      projection: state.projection,
      selection: { boardId: first, cardId: state.projection.get(first)?.[0] },
    };
  }

  const pos = visible.indexOf(current.id);
  const step = direction === "Right" ? 1 : -1;
  const neighbour = visible[pos + step];
  if (neighbour) {
    return {
      ok: true,
      projection: state.projection,
      selection: { boardId: neighbour, cardId: state.projection.get(neighbour)?.[0] },
    };
  }

  const overall = boardIndex(boards, current.id);
  const next = boards[overall + step];
  if (!next) return fail(direction === "Right" ? "AlreadyAtLastBoard" : "AlreadyAtFirstBoard", direction);

  const entries = [...state.projection.entries()];
  const revealed: [BoardId, CardId[]] = [next.id, next.cards.slice(0, size.cardsShown).map((c) => c.id)];
  if (direction === "Right") {
    entries.push(revealed);
    if (entries.length > size.boardsShown) entries.shift();
  } else {
    entries.unshift(revealed);
    if (entries.length > size.boardsShown) entries.pop();
  }
  return {
    ok: true,
    projection: new Map(entries),
    selection: { boardId: next.id, cardId: revealed[1][0] },
  };
}

function vertical(
  boards: Board[],
  state: ProjectionState,
  size: WindowSize,
  direction: "Up" | "Down",
): NavigationResult {
  const board = findBoard(boards, state.selection.boardId);
  const visible = board ? state.projection.get(board.id) : undefined;
  if (!board || !visible) return fail("SomethingWentWrong", direction);
  if (board.cards.length === 0) return fail("CurrentBoardHasNoCards", direction);

  const pos = state.selection.cardId ? visible.indexOf(state.selection.cardId) : -1;
  if (pos === -1) {
    return {
      ok: true,
      projection: state.projection,
      selection: { boardId: board.id, cardId: visible[0] },
    };
  }

  const step = direction === "Down" ? 1 : -1;
  const neighbour = visible[pos + step];
  if (neighbour) {
    return { ok: true, projection: state.projection, selection: { boardId: board.id, cardId: neighbour } };
  }

  const overall = cardIndex(board, visible[pos]);
  const navIndex = overall + step;
  const next = board.cards[navIndex];
  if (!next) return fail(direction === "Down" ? "AlreadyAtLastCard" : "AlreadyAtFirstCard", direction);

  const from = direction === "Down" ? Math.max(0, navIndex - size.cardsShown + 1) : navIndex;
  const windowIds = board.cards.slice(from, from + size.cardsShown).map((c) => c.id);
  const projection: Projection = new Map(state.projection);
  projection.set(board.id, windowIds);
  return { ok: true, projection, selection: { boardId: board.id, cardId: next.id } };
}

export function navigate(args: {
  boards: Board[];
  state: ProjectionState;
  size: WindowSize;
  direction: Direction;
}): NavigationResult {
  const { boards, state, size, direction } = args;
  if (boards.length === 0) return fail("NoBoardsFound", direction);
  if (direction === "Left" || direction === "Right") return horizontal(boards, state, size, direction);
  return vertical(boards, state, size, direction);
}
