import type { BoardId } from "./ids";
import type { Board, Card } from "./model";
import { cloneBoard, cloneCard } from "./model";
import {
  findBoard,
  findCard,
  insertBoardAt,
  insertCardAt,
  removeBoard,
  removeCard,
  replaceCard,
  swapCards,
} from "./boards";

export const HISTORY_LIMIT = 100;

export type HistoryAction =
  | { type: "CreateCard"; card: Card; boardId: BoardId }
  | { type: "DeleteCard"; card: Card; boardId: BoardId; index: number }
  | { type: "CreateBoard"; board: Board }
  | { type: "DeleteBoard"; board: Board; index: number }
  | { type: "MoveCardWithinBoard"; boardId: BoardId; from: number; to: number }
  | {
      type: "MoveCardBetweenBoards";
      card: Card;
      sourceBoardId: BoardId;
      targetBoardId: BoardId;
      sourceIndex: number;
      targetIndex: number;
    }
  | { type: "EditCard"; oldCard: Card; newCard: Card; boardId: BoardId };

export type HistoryOutcome = { ok: true; message: string } | { ok: false; message: string };

/** Copies payloads so later mutation of live boards cannot reach recorded actions. */
function snapshot(action: HistoryAction): HistoryAction {
  switch (action.type) {
    case "CreateCard":
    case "DeleteCard":
      return { ...action, card: cloneCard(action.card) };
    case "CreateBoard":
    case "DeleteBoard":
      return { ...action, board: cloneBoard(action.board) };
    case "MoveCardWithinBoard":
      return { ...action };
    case "MoveCardBetweenBoards":
      return { ...action, card: cloneCard(action.card) };
    case "EditCard":
      return { ...action, oldCard: cloneCard(action.oldCard), newCard: cloneCard(action.newCard) };
  }
}

function actionCards(action: HistoryAction): Card[] {
  switch (action.type) {
    case "CreateCard":
    case "DeleteCard":
    case "MoveCardBetweenBoards":
      return [action.card];
    case "CreateBoard":
    case "DeleteBoard":
      return action.board.cards;
    case "MoveCardWithinBoard":
      return [];
    case "EditCard":
      return [action.oldCard, action.newCard];
  }
}

export function describeAction(action: HistoryAction, boards: Board[]): string {
  switch (action.type) {
    case "CreateCard":
      return `Create Card '${action.card.name}'`;
    case "DeleteCard":
      return `Delete Card '${action.card.name}'`;
    case "CreateBoard":
      return `Create Board '${action.board.name}'`;
    case "DeleteBoard":
      return `Delete Board '${action.board.name}'`;
    case "MoveCardWithinBoard": {
      const board = findBoard(boards, action.boardId);
      const name = board?.cards[action.to]?.name ?? board?.cards[action.from]?.name ?? "";
      return `Move Card '${name}'`;
    }
    case "MoveCardBetweenBoards":
      return `Move Card '${action.card.name}'`;
    case "EditCard":
      return `Edit Card '${action.oldCard.name}'`;
  }
}

class HistoryApplyError extends Error {}

function requireBoard(boards: Board[], boardId: BoardId): Board {
  const board = findBoard(boards, boardId);
  if (!board) throw new HistoryApplyError("board not found");
  return board;
}

/** Inverts `action` against `boards` in place. */
export function revertAction(boards: Board[], action: HistoryAction): void {
  switch (action.type) {
    case "CreateCard": {
      const board = requireBoard(boards, action.boardId);
      if (!removeCard(board, action.card.id)) throw new HistoryApplyError("card not found");
      return;
    }
    case "DeleteCard": {
      const board = requireBoard(boards, action.boardId);
      insertCardAt(board, cloneCard(action.card), action.index);
      return;
    }
    case "CreateBoard":
      if (!removeBoard(boards, action.board.id)) throw new HistoryApplyError("board not found");
      return;
    case "DeleteBoard":
      insertBoardAt(boards, cloneBoard(action.board), action.index);
      return;
    case "MoveCardWithinBoard": {
      const board = requireBoard(boards, action.boardId);
      if (!swapCards(board, action.from, action.to)) throw new HistoryApplyError("card not found");
      return;
    }
    case "MoveCardBetweenBoards": {
      const source = requireBoard(boards, action.sourceBoardId);
      const target = requireBoard(boards, action.targetBoardId);
      const removed = removeCard(target, action.card.id);
      if (!removed) throw new HistoryApplyError("card not found");
      insertCardAt(source, removed.card, action.sourceIndex);
      return;
    }
    case "EditCard": {
      const board = requireBoard(boards, action.boardId);
      if (!replaceCard(board, cloneCard(action.oldCard))) throw new HistoryApplyError("card not found");
      return;
    }
  }
}

/** Re-applies `action` against `boards` in place. */
export function applyAction(boards: Board[], action: HistoryAction): void {
  switch (action.type) {
    case "CreateCard": {
      const board = requireBoard(boards, action.boardId);
      insertCardAt(board, cloneCard(action.card), board.cards.length);
      return;
    }
    case "DeleteCard": {
      const board = requireBoard(boards, action.boardId);
      if (!removeCard(board, action.card.id)) throw new HistoryApplyError("card not found");
      return;
    }
    case "CreateBoard":
      insertBoardAt(boards, cloneBoard(action.board), boards.length);
      return;
    case "DeleteBoard":
      if (!removeBoard(boards, action.board.id)) throw new HistoryApplyError("board not found");
      return;
    case "MoveCardWithinBoard": {
      const board = requireBoard(boards, action.boardId);
      if (!swapCards(board, action.from, action.to)) throw new HistoryApplyError("card not found");
      return;
    }
    case "MoveCardBetweenBoards": {
      const source = requireBoard(boards, action.sourceBoardId);
      const target = requireBoard(boards, action.targetBoardId);
      const removed = removeCard(source, action.card.id);
      if (!removed) throw new HistoryApplyError("card not found");
      insertCardAt(target, removed.card, action.targetIndex);
      return;
    }
    case "EditCard": {
      const board = requireBoard(boards, action.boardId);
      if (!findCard(board, action.newCard.id)) throw new HistoryApplyError("card not found");
      replaceCard(board, cloneCard(action.newCard));
      return;
    }
  }
}

export class ActionHistoryManager {
  private entries: HistoryAction[] = [];
  private cursor = 0;

  constructor(private readonly limit: number = HISTORY_LIMIT) {}

  get size(): number {
    return this.entries.length;
  }

  get position(): number {
    return this.cursor;
  }

  canUndo(): boolean {
    return this.cursor > 0;
  }

  canRedo(): boolean {
    return this.cursor < this.entries.length;
  }

  record(action: HistoryAction): void {
    this.entries = this.entries.slice(0, this.cursor);
    this.entries.push(snapshot(action));
    if (this.entries.length > this.limit) this.entries.shift();
    this.cursor = this.entries.length;
  }

  undo(boards: Board[]): HistoryOutcome {
    if (!this.canUndo()) return { ok: false, message: "No more actions to undo" };
    const action = this.entries[this.cursor - 1];
    const label = describeAction(action, boards);
    try {
      revertAction(boards, action);
    } catch (err) {
      if (err instanceof HistoryApplyError) {
        return { ok: false, message: `Could not undo ${label}: ${err.message}` };
      }
      throw err;
    }
    this.cursor -= 1;
    return { ok: true, message: `Undo ${label}` };
  }

  redo(boards: Board[]): HistoryOutcome {
    if (!this.canRedo()) return { ok: false, message: "No more actions to redo" };
    const action = this.entries[this.cursor];
    try {
      applyAction(boards, action);
    } catch (err) {
      if (err instanceof HistoryApplyError) {
        return { ok: false, message: `Could not redo ${describeAction(action, boards)}: ${err.message}` };
      }
      throw err;
    }
    this.cursor += 1;
    return { ok: true, message: `Redo ${describeAction(action, boards)}` };
  }

  /** Visits every card copy held by recorded actions, so they can be rewritten in place. */
  forEachCard(visit: (card: Card) => void): void {
    for (const action of this.entries) {
      for (const card of actionCards(action)) visit(card);
    }
  }

  reset(): void {
    this.entries = [];
    this.cursor = 0;
  }
}
