import type { App, Hover } from "./app";
import { boardNameTaken, cardIndex, cardNameTaken, findBoard, insertCardAt, locateCard, removeBoard, removeCard, replaceCard, swapCards } from "./boards";
import { invalidDateMessage, normalizeDueDate } from "./dates";
import {
  FIELD_NOT_SET,
  cloneCard,
  createBoard,
  createCard,
  setCardPriority,
  setCardStatus,
  touchCard,
  type CardPriority,
  type CardStatus,
} from "./model";
import { navigate, type Direction } from "./projection";
import { ERROR_TOAST_DURATION_MS } from "./toast";
import { isKanbanView } from "./ui-state";

export function goDirection(app: App, direction: Direction): boolean {
  const result = navigate({
    boards: app.currentBoards(),
    state: app.visible,
    size: app.windowSize,
    direction,
  });
  if (!result.ok) {
    app.warn(result.error.message);
    return false;
  }
  app.visible = { projection: result.projection, selection: result.selection };
  return true;
}

/**
 * Moves the selected card one step. Up and down swap it with its neighbour;
 * left and right put it on top of the adjacent board.
 */
export function moveCard(app: App, direction: Direction): boolean {
  if (app.isFiltered()) {
    app.warn("Cannot move cards while a filter is active, clear the filter first");
    return false;
  }
  const location = app.locateCurrentCard();
  if (!location) {
    app.error("No card selected");
    return false;
  }
  const { board, card } = location;
  const from = location.cardIndex;

  if (direction === "Up" || direction === "Down") {
    const to = direction === "Up" ? from - 1 : from + 1;
    if (to < 0) {
      app.warn("Cannot move card up: already at the top of the board");
      return false;
    }
    if (to >= board.cards.length) {
      app.warn("Cannot move card down: already at the bottom of the board");
      return false;
    }
    swapCards(board, from, to);
    app.history.record({ type: "MoveCardWithinBoard", boardId: board.id, from, to });
    app.logger.info(`Moved card '${card.name}' ${direction.toLowerCase()}`);
    app.select(board.id, card.id);
    return true;
  }

  const target = app.boards[location.boardIndex + (direction === "Right" ? 1 : -1)];
  if (!target) {
    app.warn(`Cannot move card ${direction.toLowerCase()}: already in the ${direction === "Right" ? "last" : "first"} board`);
    return false;
  }
  removeCard(board, card.id);
  insertCardAt(target, card, 0);
  app.history.record({
    type: "MoveCardBetweenBoards",
    card,
    sourceBoardId: board.id,
    targetBoardId: target.id,
    sourceIndex: from,
    targetIndex: 0,
  });
  app.logger.info(`Moved card '${card.name}' to board '${target.name}'`);
  app.select(target.id, card.id);
  return true;
}

export function deleteCurrentCard(app: App): boolean {
  const location = app.locateCurrentCard();
  if (!location) {
    app.error("No card selected");
    return false;
  }
  const { board, card } = location;
  const removed = removeCard(board, card.id);
  if (!removed) return false;
  app.history.record({ type: "DeleteCard", card, boardId: board.id, index: removed.index });
  app.info(`Deleted card '${card.name}'`);
  const neighbour = board.cards[Math.min(removed.index, board.cards.length - 1)];
  app.visible = { projection: app.visible.projection, selection: { boardId: board.id, cardId: neighbour?.id } };
  app.refilter();
  return true;
}

export function deleteCurrentBoard(app: App): boolean {
  const current = app.currentBoard();
  const removed = current ? removeBoard(app.boards, current.id) : undefined;
  if (!removed) {
    app.error("No board selected");
    return false;
  }
  app.history.record({ type: "DeleteBoard", board: removed.board, index: removed.index });
  app.info(`Deleted board '${removed.board.name}'`);
  const neighbour = app.boards[Math.min(removed.index, app.boards.length - 1)];
  app.visible = {
    projection: app.visible.projection,
    selection: { boardId: neighbour?.id, cardId: neighbour?.cards[0]?.id },
  };
  app.refilter();
  return true;
}

export function changeCardStatus(app: App, status: CardStatus): boolean {
  const location = app.locateCurrentCard();
  if (!location) {
    app.error("No card selected");
    return false;
  }
  const { board, card } = location;
  if (card.status === status) {
    app.info(`Card '${card.name}' is already ${status}`);
    return false;
  }
  const old = cloneCard(card);
  setCardStatus(card, status, app.date());
  app.history.record({ type: "EditCard", oldCard: old, newCard: card, boardId: board.id });
  app.info(`Changed status of card '${card.name}' to ${status}`);
  app.refilter();
  return true;
}

export function changeCardPriority(app: App, priority: CardPriority): boolean {
  const location = app.locateCurrentCard();
  if (!location) {
    app.error("No card selected");
    return false;
  }
  const { board, card } = location;
  if (card.priority === priority) {
    app.info(`Card '${card.name}' is already ${priority} priority`);
    return false;
  }
  const old = cloneCard(card);
  setCardPriority(card, priority, app.date());
  app.history.record({ type: "EditCard", oldCard: old, newCard: card, boardId: board.id });
  app.info(`Changed priority of card '${card.name}' to ${priority}`);
  app.refilter();
  return true;
}

export function undo(app: App): boolean {
  const outcome = app.history.undo(app.boards);
  if (outcome.ok) app.info(outcome.message);
  else app.warn(outcome.message);
  app.refilter();
  return outcome.ok;
}

export function redo(app: App): boolean {
  const outcome = app.history.redo(app.boards);
  if (outcome.ok) app.info(outcome.message);
  else app.warn(outcome.message);
  app.refilter();
  return outcome.ok;
}

/** Leaves a form for the board view it came from, or the default one. */
function returnToBoards(app: App): void {
  const back = app.prevView && isKanbanView(app.prevView) ? app.prevView : app.config.defaultView;
  app.setView(back);
  app.prevView = undefined;
}

export function submitNewBoard(app: App): boolean {
  const name = app.buffers.boardName.text.trim();
  if (!name) {
    app.warn("Board name cannot be empty");
    app.setFocus("NewBoardName");
    return false;
  }
  if (boardNameTaken(app.boards, name)) {
    app.warn(`Board with name '${name}' already exists`);
    app.setFocus("NewBoardName");
    return false;
  }
  const board = createBoard({ name, description: app.buffers.boardDescription.text });
  app.clearFilter();
  app.boards.push(board);
  app.history.record({ type: "CreateBoard", board });
  app.info(`Created new board '${name}'`);
  app.status = "Initialized";
  returnToBoards(app);
  app.select(board.id, undefined);
  return true;
}

export function openNewCardForm(app: App): boolean {
  const board = app.currentBoard();
  if (!board) {
    app.error("No board selected, create a board first");
    return false;
  }
  app.newCardBoardId = board.id;
  app.setView("NewCard");
  return true;
}

export function submitNewCard(app: App): boolean {
  const board = findBoard(app.boards, app.newCardBoardId);
  if (!board) {
    app.error("No board selected");
    return false;
  }
  const name = app.buffers.newCardName.text.trim();
  if (!name) {
    app.warn("Card name cannot be empty");
    app.setFocus("NewCardName");
    return false;
  }
  if (cardNameTaken(board, name)) {
    app.warn(`Card with name '${name}' already exists in board '${board.name}'`);
    app.setFocus("NewCardName");
    return false;
  }
  const due = normalizeDueDate(app.buffers.newCardDueDate.text, app.config.dateTimeFormat);
  if (!due.ok) {
    app.logger.warn(invalidDateMessage(due.input));
    app.toasts.push("warning", invalidDateMessage(due.input), ERROR_TOAST_DURATION_MS);
  }
  const card = createCard({
    name,
    description: app.buffers.newCardDescription.text,
    dueDate: due.ok ? due.value : FIELD_NOT_SET,
    now: app.date(),
  });
  app.clearFilter();
  board.cards.push(card);
  app.history.record({ type: "CreateCard", card, boardId: board.id });
  app.info(`Created new card '${name}'`);
  app.newCardBoardId = undefined;
  app.status = "Initialized";
  returnToBoards(app);
  app.select(board.id, card.id);
  return true;
}

/** Commits the card-view buffers as one EditCard action. */
export function submitCardEdit(app: App): boolean {
  const draft = app.cardDraft();
  const location = app.locateViewedCard();
  if (!draft || !app.hasPendingCardEdits()) {
    app.closeAllPopups();
    return false;
  }
  if (!location) {
    app.error("Card not found");
    app.closeAllPopups();
    return false;
  }
  const { board, card } = location;
  if (!draft.name) {
    app.warn("Card name cannot be empty");
    return false;
  }
  if (cardNameTaken(board, draft.name, card.id)) {
    app.warn(`Card with name '${draft.name}' already exists in board '${board.name}'`);
    return false;
  }
  const due = normalizeDueDate(draft.dueDate, app.config.dateTimeFormat);
  if (!due.ok) {
    app.logger.warn(invalidDateMessage(due.input));
    app.toasts.push("warning", invalidDateMessage(due.input), ERROR_TOAST_DURATION_MS);
  }
  const now = app.date();
  const old = cloneCard(card);
  const next = cloneCard(card);
  next.name = draft.name;
  next.description = draft.description;
  next.dueDate = due.ok ? due.value : FIELD_NOT_SET;
  next.priority = draft.priority;
  next.tags = draft.tags;
  next.comments = draft.comments;
  setCardStatus(next, draft.status, now);
  touchCard(next, now);
  replaceCard(board, next);
  app.history.record({ type: "EditCard", oldCard: old, newCard: next, boardId: board.id });
  app.info(`Changes to Card '${next.name}' saved`);
  app.closeAllPopups();
  app.refilter();
  return true;
}

export function discardCardEdit(app: App): void {
  const location = app.locateViewedCard();
  if (location) app.warn(`Discarding changes to card '${location.card.name}'`);
  app.closeAllPopups();
}

/**
 * Ends a card drag. Dropping on another card of the same board swaps the
 * two; dropping on another board inserts at the hovered card's index, or
 * on top when no card of that board is hovered. A drop outside the body
 * cancels.
 */
export function dropDraggedCard(app: App, target: Hover | undefined): boolean {
  const drag = app.drag;
  app.drag = undefined;
  if (!drag) return false;
  if (!target?.boardId) {
    app.logger.debug("Card drag cancelled");
    return false;
  }
  if (app.isFiltered()) {
    app.warn("Cannot move cards while a filter is active, clear the filter first");
    return false;
  }
  const source = locateCard(app.boards, drag.cardId);
  const destination = findBoard(app.boards, target.boardId);
  if (!source || !destination) return false;
  const { board, card } = source;

  if (board.id === destination.id) {
    if (!target.cardId || target.cardId === card.id) return false;
    const to = cardIndex(board, target.cardId);
    if (to === -1 || !swapCards(board, source.cardIndex, to)) return false;
    app.history.record({ type: "MoveCardWithinBoard", boardId: board.id, from: source.cardIndex, to });
  } else {
    const hovered = target.cardId ? cardIndex(destination, target.cardId) : -1;
    const targetIndex = Math.max(0, hovered);
    removeCard(board, card.id);
    insertCardAt(destination, card, targetIndex);
    app.history.record({
      type: "MoveCardBetweenBoards",
      card,
      sourceBoardId: board.id,
      targetBoardId: destination.id,
      sourceIndex: source.cardIndex,
      targetIndex,
    });
  }
  app.logger.info(`Moved card '${card.name}' to board '${destination.name}'`);
  app.select(destination.id, card.id);
  return true;
}
