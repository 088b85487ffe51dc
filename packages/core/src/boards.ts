import type { BoardId, CardId } from "./ids";
import type { Board, Card } from "./model";

export interface CardLocation {
  board: Board;
  boardIndex: number;
  card: Card;
  cardIndex: number;
}

export function findBoard(boards: Board[], boardId: BoardId | undefined): Board | undefined {
  if (!boardId) return undefined;
  return boards.find((b) => b.id === boardId);
}

export function boardIndex(boards: Board[], boardId: BoardId): number {
  return boards.findIndex((b) => b.id === boardId);
}

export function findCard(board: Board, cardId: CardId | undefined): Card | undefined {
  if (!cardId) return undefined;
  return board.cards.find((c) => c.id === cardId);
}

export function cardIndex(board: Board, cardId: CardId): number {
  return board.cards.findIndex((c) => c.id === cardId);
}

export function locateCard(boards: Board[], cardId: CardId): CardLocation | undefined {
  for (let bi = 0; bi < boards.length; bi += 1) {
    const board = boards[bi];
    const ci = cardIndex(board, cardId);
    if (ci !== -1) return { board, boardIndex: bi, card: board.cards[ci], cardIndex: ci };
  }
  return undefined;
}

function clampIndex(index: number, length: number): number {
  return Math.max(0, Math.min(index, length));
}

export function insertBoardAt(boards: Board[], board: Board, index: number): void {
  boards.splice(clampIndex(index, boards.length), 0, board);
}

export function removeBoard(boards: Board[], boardId: BoardId): { board: Board; index: number } | undefined {
  const index = boardIndex(boards, boardId);
  if (index === -1) return undefined;
  const [board] = boards.splice(index, 1);
  return { board, index };
}

export function insertCardAt(board: Board, card: Card, index: number): void {
  board.cards.splice(clampIndex(index, board.cards.length), 0, card);
}

export function removeCard(board: Board, cardId: CardId): { card: Card; index: number } | undefined {
  const index = cardIndex(board, cardId);
  if (index === -1) return undefined;
  const [card] = board.cards.splice(index, 1);
  return { card, index };
}

export function replaceCard(board: Board, card: Card): boolean {
  const index = cardIndex(board, card.id);
  if (index === -1) return false;
  board.cards[index] = card;
  return true;
}

export function swapCards(board: Board, a: number, b: number): boolean {
  if (a < 0 || b < 0 || a >= board.cards.length || b >= board.cards.length) return false;
  const tmp = board.cards[a];
  board.cards[a] = board.cards[b];
  board.cards[b] = tmp;
  return true;
}

export function boardNameTaken(boards: Board[], name: string): boolean {
  return boards.some((b) => b.name === name);
}

export function cardNameTaken(board: Board, name: string, exceptId?: CardId): boolean {
  return board.cards.some((c) => c.name === name && c.id !== exceptId);
}
