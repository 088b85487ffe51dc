import type { App } from "./app";
import { locateCard } from "./boards";
import { openNewCardForm } from "./card-actions";
import { DATE_TIME_FORMATS } from "./dates";
import type { BoardId, CardId } from "./ids";
import type { Board } from "./model";
import { KANBAN_VIEWS, isKanbanView } from "./ui-state";

export type PaletteCommand =
  | "Change Current Card Priority"
  | "Change Current Card Status"
  | "Change Date Format"
  | "Change Theme"
  | "Change View"
  | "Clear Filter"
  | "Configure"
  | "Create a Theme"
  | "Export to JSON"
  | "Filter by Tag"
  | "Load a Save (Cloud)"
  | "Load a Save (Local)"
  | "Login"
  | "Logout"
  | "New Board"
  | "New Card"
  | "Open Help Menu"
  | "Open Main Menu"
  | "Quit"
  | "Reset Password"
  | "Reset UI"
  | "Save Kanban State"
  | "Sign Up"
  | "Sync Local Data";

export const PALETTE_COMMANDS: readonly PaletteCommand[] = [
  "Change Current Card Priority",
  "Change Current Card Status",
  "Change Date Format",
  "Change Theme",
  "Change View",
  "Clear Filter",
  "Configure",
  "Create a Theme",
  "Export to JSON",
  "Filter by Tag",
  "Load a Save (Cloud)",
  "Load a Save (Local)",
  "Login",
  "Logout",
  "New Board",
  "New Card",
  "Open Help Menu",
  "Open Main Menu",
  "Quit",
  "Reset Password",
  "Reset UI",
  "Save Kanban State",
  "Sign Up",
  "Sync Local Data",
];

export const NO_COMMANDS_FOUND = "No Commands Found";

export interface SearchHit<Id> {
  id: Id;
  label: string;
}

export interface PaletteResults {
  commands: PaletteCommand[];
  cards: Array<SearchHit<CardId>>;
  boards: Array<SearchHit<BoardId>>;
}

/** Commands containing the query, the ones starting with it first. An empty query lists them all. */
export function searchCommands(query: string): PaletteCommand[] {
  const q = query.trim().toLowerCase();
  if (!q) return [...PALETTE_COMMANDS];
  const leading: PaletteCommand[] = [];
  const rest: PaletteCommand[] = [];
  for (const command of PALETTE_COMMANDS) {
    const label = command.toLowerCase();
    if (label.startsWith(q)) leading.push(command);
    else if (label.includes(q)) rest.push(command);
  }
  return [...leading, ...rest];
}

export function searchCards(boards: Board[], query: string): Array<SearchHit<CardId>> {
  const q = query.trim().toLowerCase();
  if (!q) return [];
  const hits: Array<SearchHit<CardId>> = [];
  for (const board of boards) {
    for (const card of board.cards) {
      let field: string | undefined;
      if (card.name.toLowerCase().includes(q)) field = "Name";
      else if (card.description.toLowerCase().includes(q)) field = "Description";
      else if (card.tags.some((t) => t.toLowerCase().includes(q))) field = "Tags";
      else if (card.comments.some((c) => c.toLowerCase().includes(q))) field = "Comments";
      if (field) hits.push({ id: card.id, label: `${card.name} - Matched in ${field}` });
    }
  }
  return hits;
}

export function searchBoards(boards: Board[], query: string): Array<SearchHit<BoardId>> {
  const q = query.trim().toLowerCase();
  if (!q) return [];
  const hits: Array<SearchHit<BoardId>> = [];
  for (const board of boards) {
    if (board.name.toLowerCase().includes(q)) hits.push({ id: board.id, label: `${board.name} - Matched in Name` });
    else if (board.description.toLowerCase().includes(q)) {
      hits.push({ id: board.id, label: `${board.name} - Matched in Description` });
    }
  }
  return hits;
}

export function paletteResults(app: App): PaletteResults {
  const query = app.buffers.paletteSearch.text;
  return {
    commands: searchCommands(query),
    cards: searchCards(app.boards, query),
    boards: searchBoards(app.boards, query),
  };
}

/** Keeps palette list selections inside their result lists after the query changed. */
export function clampPaletteSelection(app: App): void {
  const results = paletteResults(app);
  app.lists.paletteCommand = Math.min(app.lists.paletteCommand, Math.max(0, results.commands.length - 1));
  app.lists.paletteCard = Math.min(app.lists.paletteCard, Math.max(0, results.cards.length - 1));
  app.lists.paletteBoard = Math.min(app.lists.paletteBoard, Math.max(0, results.boards.length - 1));
}

function requireBoardView(app: App, what: string): boolean {
  if (isKanbanView(app.view)) return true;
  app.error(`Cannot ${what} in this view`);
  return false;
}

export function runCommand(app: App, command: PaletteCommand): void {
  app.closeAllPopups();
  switch (command) {
    case "Change Current Card Priority":
      if (!requireBoardView(app, "change card priority")) return;
      if (!app.currentCard()) {
        app.error("No card selected");
        return;
      }
      app.setPopup("CardPrioritySelector");
      return;
    case "Change Current Card Status":
      if (!requireBoardView(app, "change card status")) return;
      if (!app.currentCard()) {
        app.error("No card selected");
        return;
      }
      app.setPopup("CardStatusSelector");
      return;
    case "Change Date Format":
      app.lists.dateFormat = Math.max(0, DATE_TIME_FORMATS.indexOf(app.config.dateTimeFormat));
      app.setPopup("ChangeDateFormat");
      return;
    case "Change Theme":
      app.setPopup("ChangeTheme");
      return;
    case "Change View":
      if (!requireBoardView(app, "change view")) return;
      app.lists.changeView = Math.max(0, KANBAN_VIEWS.indexOf(app.view));
      app.setPopup("ChangeView");
      return;
    case "Clear Filter":
      if (!app.isFiltered()) {
        app.warn("No filter is active");
        return;
      }
      app.clearFilter();
      app.info("Filter cleared");
      return;
    case "Configure":
      app.lists.config = 0;
      app.setView("ConfigMenu");
      return;
    case "Create a Theme":
      app.setView("CreateTheme");
      return;
    case "Export to JSON":
      app.dispatch({ type: "ExportToJson" });
      return;
    case "Filter by Tag":
      if (!requireBoardView(app, "filter by tag")) return;
      app.setPopup("FilterByTag");
      return;
    case "Load a Save (Cloud)":
      if (!app.session) {
        app.error("Not logged in");
        return;
      }
      app.setView("LoadCloudSave");
      app.dispatch({ type: "GetCloudData" });
      return;
    case "Load a Save (Local)":
      app.setView("LoadLocalSave");
      app.dispatch({ type: "LoadLocalPreview" });
      return;
    case "Login":
      app.setView("Login");
      return;
    case "Logout":
      app.dispatch({ type: "Logout" });
      return;
    case "New Board":
      if (!requireBoardView(app, "create a new board")) return;
      app.setView("NewBoard");
      return;
    case "New Card":
      if (!requireBoardView(app, "create a new card")) return;
      openNewCardForm(app);
      return;
    case "Open Help Menu":
      app.lists.help = 0;
      app.setView("HelpMenu");
      return;
    case "Open Main Menu":
      app.lists.mainMenu = 0;
      app.setView("MainMenu");
      return;
    case "Quit":
      app.quit();
      return;
    case "Reset Password":
      app.setView("ResetPassword");
      return;
    case "Reset UI":
      app.setView(app.config.defaultView);
      app.clearFilter();
      app.refreshVisible();
      app.toasts.clear();
      app.info("UI reset, all toasts cleared");
      return;
    case "Save Kanban State":
      app.dispatch({ type: "SaveLocalData" });
      return;
    case "Sign Up":
      app.setView("SignUp");
      return;
    case "Sync Local Data":
      app.dispatch({ type: "SyncLocalData" });
      return;
  }
}

/** Enter inside the palette: runs the selection of whichever result list has focus. */
export function paletteAccept(app: App): void {
  const results = paletteResults(app);
  switch (app.focus) {
    case "CommandPaletteCommand": {
      const command = results.commands[app.lists.paletteCommand];
      if (command) runCommand(app, command);
      else app.closeAllPopups();
      return;
    }
    case "CommandPaletteCard": {
      const hit = results.cards[app.lists.paletteCard];
      const location = hit ? locateCard(app.boards, hit.id) : undefined;
      if (!location) return;
      app.closeAllPopups();
      if (!isKanbanView(app.view)) app.setView(app.config.defaultView);
      app.clearFilter();
      app.select(location.board.id, location.card.id);
      app.setPopup("ViewCard");
      return;
    }
    case "CommandPaletteBoard": {
      const hit = results.boards[app.lists.paletteBoard];
      if (!hit) return;
      app.closeAllPopups();
      if (!isKanbanView(app.view)) app.setView(app.config.defaultView);
      app.clearFilter();
      const board = app.boards.find((b) => b.id === hit.id);
      app.select(hit.id, board?.cards[0]?.id);
      return;
    }
    default:
      return;
  }
}
