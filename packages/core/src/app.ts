import process from "node:process";
import { findBoard, locateCard, type CardLocation } from "./boards";
import type { CloudSave } from "./cloud";
import { CONFIG_FIELDS, configValueAsString, type AppConfig } from "./config";
import { openPicker, type DateTimePicker, type DueDateField } from "./date-picker";
import { filterBoardsByTags, suggestTags } from "./filter";
import { ActionHistoryManager } from "./history";
import type { BoardId, CardId } from "./ids";
import type { IoEvent } from "./io-events";
import type { Key } from "./keys";
import { Logger } from "./logger";
import { FIELD_NOT_SET, cloneCard, type Board, type Card, type CardPriority, type CardStatus } from "./model";
import type { SaveFileInfo } from "./persistence";
import { buildProjection, reconcileProjection, type ProjectionState, type WindowSize } from "./projection";
import { AsyncQueue } from "./queue";
import { TextBox } from "./text-box";
import { cloneTheme, builtInThemes, defaultTheme, type Theme } from "./themes";
import { ToastQueue } from "./toast";
import {
  availableTargets,
  clampFocus,
  isKanbanView,
  nextFocus,
  prevFocus,
  TIME_FOCUSES,
  type AppStatus,
  type Focus,
  type PopUp,
  type View,
} from "./ui-state";

export const PASSWORD_MASK = "•";

export interface TextBuffers {
  boardName: TextBox;
  boardDescription: TextBox;
  newCardName: TextBox;
  newCardDescription: TextBox;
  newCardDueDate: TextBox;
  cardName: TextBox;
  cardDescription: TextBox;
  cardDueDate: TextBox;
  cardTags: TextBox;
  cardComments: TextBox;
  email: TextBox;
  password: TextBox;
  confirmPassword: TextBox;
  resetLink: TextBox;
  /** Shared by the general config editor and the hex color prompts. */
  prompt: TextBox;
  themeName: TextBox;
  paletteSearch: TextBox;
}

function createBuffers(): TextBuffers {
  const line = () => new TextBox("", { singleLine: true });
  const secret = () => new TextBox("", { singleLine: true, mask: PASSWORD_MASK });
  return {
    boardName: line(),
    boardDescription: new TextBox(""),
    newCardName: line(),
    newCardDescription: new TextBox(""),
    newCardDueDate: line(),
    cardName: line(),
    cardDescription: new TextBox(""),
    cardDueDate: line(),
    cardTags: line(),
    cardComments: new TextBox(""),
    email: line(),
    password: secret(),
    confirmPassword: secret(),
    resetLink: line(),
    prompt: line(),
    themeName: line(),
    paletteSearch: line(),
  };
}

export type ListName =
  | "mainMenu"
  | "config"
  | "keybindings"
  | "loadSave"
  | "help"
  | "log"
  | "cardStatus"
  | "cardPriority"
  | "theme"
  | "themeEditor"
  | "styleFg"
  | "styleBg"
  | "styleModifier"
  | "dateFormat"
  | "tagFilter"
  | "changeView"
  | "defaultView"
  | "paletteCommand"
  | "paletteCard"
  | "paletteBoard"
  | "tagSuggestion";

function createLists(): Record<ListName, number> {
  return {
    mainMenu: 0,
    config: 0,
    keybindings: 0,
    loadSave: 0,
    help: 0,
    log: 0,
    cardStatus: 0,
    cardPriority: 0,
    theme: 0,
    themeEditor: 0,
    styleFg: 0,
    styleBg: 0,
    styleModifier: 0,
    dateFormat: 0,
    tagFilter: 0,
    changeView: 0,
    defaultView: 0,
    paletteCommand: 0,
    paletteCard: 0,
    paletteBoard: 0,
    tagSuggestion: 0,
  };
}

export type MainMenuItem =
  | "View your Boards"
  | "Configure"
  | "Help"
  | "Load a Save (local)"
  | "Load a Save (cloud)"
  | "Quit";

export function mainMenuItems(loggedIn: boolean): MainMenuItem[] {
  const items: MainMenuItem[] = ["View your Boards", "Configure", "Help", "Load a Save (local)"];
  if (loggedIn) items.push("Load a Save (cloud)");
  items.push("Quit");
  return items;
}

export interface UserSession {
  accessToken: string;
  refreshToken: string;
  email: string;
  userId: string;
}

/** The card open in the card-view popup. */
export interface ViewedCard {
  boardId: BoardId;
  cardId: CardId;
}

/** Started on the first edit in the card-view popup; status and priority are staged here until submit. */
export interface CardEdit {
  boardId: BoardId;
  original: Card;
  status: CardStatus;
  priority: CardPriority;
}

export interface SavePreview {
  name: string;
  boards: Board[];
  state: ProjectionState;
}

export interface Hover {
  boardId?: BoardId;
  cardId?: CardId;
}

export interface DragState {
  boardId: BoardId;
  cardId: CardId;
  x: number;
  y: number;
  /** Set once the pointer left the card it was pressed on; a release without it is a click. */
  moved: boolean;
}

/** A rectangle the renderer drew, tagged with what a click on it means. */
export interface Region {
  focus: Focus;
  x: number;
  y: number;
  width: number;
  height: number;
  boardId?: BoardId;
  cardId?: CardId;
  /** List row, for regions that are one row of a list. */
  row?: number;
  list?: ListName;
  /** Day of the month, for the cells of the date picker calendar. */
  day?: number;
}

/** Popups opened on top of another popup, which comes back when they close. */
const RETURNS_TO: Partial<Record<PopUp, PopUp>> = {
  CardStatusSelector: "ViewCard",
  CardPrioritySelector: "ViewCard",
  ConfirmDiscardCardChanges: "ViewCard",
  DateTimePicker: "ViewCard",
  CustomHexColorPromptFG: "EditThemeStyle",
  CustomHexColorPromptBG: "EditThemeStyle",
};

export function parseTagInput(raw: string): string[] {
  const out: string[] = [];
  for (const part of raw.split(",")) {
    const tag = part.trim();
    if (tag && !out.includes(tag)) out.push(tag);
  }
  return out;
}

export function parseCommentInput(raw: string): string[] {
  return raw
    .split("\n")
    .map((c) => c.trim())
    .filter(Boolean);
}

export interface AppOptions {
  config: AppConfig;
  configDir: string;
  logger?: Logger;
  now?: () => number;
  env?: NodeJS.ProcessEnv;
  themes?: Theme[];
  /** Key given on the command line for this run; wins over the key file. */
  encryptionKey?: string;
}

/**
 * The whole mutable application state. The UI task owns it under the app
 * mutex; the I/O task takes the same lock to read requests and write back
 * results.
 */
export class App {
  config: AppConfig;
  readonly configDir: string;
  readonly env: NodeJS.ProcessEnv;
  readonly logger: Logger;
  readonly toasts: ToastQueue;
  readonly history = new ActionHistoryManager();
  readonly io = new AsyncQueue<IoEvent>();
  readonly buffers = createBuffers();
  readonly lists = createLists();
  readonly now: () => number;
  readonly encryptionKey?: string;

  boards: Board[] = [];
  filteredBoards: Board[] = [];
  activeTags: string[] = [];
  visible: ProjectionState = { projection: new Map(), selection: {} };
  hovered: Hover = {};
  drag?: DragState;

  view: View = "MainMenu";
  prevView?: View;
  popup?: PopUp;
  private popupReturn?: { popup: PopUp; focus: Focus };
  focus: Focus = "MainMenu";
  mouseFocus?: Focus;
  status: AppStatus = "Initialized";

  viewedCard?: ViewedCard;
  cardEdit?: CardEdit;
  datePicker?: DateTimePicker;
  newCardBoardId?: BoardId;
  tagSelection: string[] = [];
  keybindingCapture: Key[] = [];
  showPassword = false;

  session?: UserSession;
  localSaves: SaveFileInfo[] = [];
  cloudSaves: CloudSave[] = [];
  preview?: SavePreview;
  lastResetLinkSentAt?: number;

  themes: Theme[];
  theme: Theme;
  themeDraft: Theme;
  /** ChangeTheme was opened from the config menu and sets the default theme. */
  defaultThemeMode = false;

  loading = false;
  shouldQuit = false;
  regions: Region[] = [];
  pointer?: { x: number; y: number };

  constructor(options: AppOptions) {
    this.config = options.config;
    this.configDir = options.configDir;
    this.env = options.env ?? process.env;
    this.logger = options.logger ?? new Logger();
    this.now = options.now ?? Date.now;
    this.toasts = new ToastQueue(this.now);
    this.encryptionKey = options.encryptionKey;
    this.themes = options.themes ?? builtInThemes();
    this.theme = this.themes.find((t) => t.name === this.config.defaultTheme) ?? defaultTheme();
    this.themeDraft = cloneTheme(this.theme);
  }

  get windowSize(): WindowSize {
    return { boardsShown: this.config.boardsShown, cardsShown: this.config.cardsShown };
  }

  date(): Date {
    return new Date(this.now());
  }

  isFiltered(): boolean {
    return this.filteredBoards.length > 0;
  }

  /** Boards that navigation and the projection work on: the filtered set when a filter is active. */
  currentBoards(): Board[] {
    return this.isFiltered() ? this.filteredBoards : this.boards;
  }

  currentBoard(): Board | undefined {
    return findBoard(this.currentBoards(), this.visible.selection.boardId);
  }

  currentCard(): Card | undefined {
    const board = this.currentBoard();
    const cardId = this.visible.selection.cardId;
    return board && cardId ? board.cards.find((c) => c.id === cardId) : undefined;
  }

  /** The selected card in the authoritative boards. */
  locateCurrentCard(): CardLocation | undefined {
    const cardId = this.visible.selection.cardId;
    return cardId ? locateCard(this.boards, cardId) : undefined;
  }

  refreshVisible(): void {
    this.visible = buildProjection(this.currentBoards(), this.windowSize);
  }

  reconcileVisible(): void {
    this.visible = reconcileProjection({
      boards: this.currentBoards(),
      previous: this.visible.projection,
      selection: this.visible.selection,
      size: this.windowSize,
    });
  }

  select(boardId: BoardId | undefined, cardId?: CardId): void {
    this.visible = { projection: this.visible.projection, selection: { boardId, cardId } };
    this.reconcileVisible();
  }

  /** Replaces the board set, dropping any filter. */
  setBoards(boards: Board[]): void {
    this.boards = boards;
    this.filteredBoards = [];
    this.activeTags = [];
    this.refreshVisible();
  }

  applyTagFilter(tags: string[]): boolean {
    if (tags.length === 0) {
      this.warn("No tags selected");
      return false;
    }
    const filtered = filterBoardsByTags(this.boards, tags);
    if (filtered.length === 0) {
      this.warn("No cards found with the selected tags");
      return false;
    }
    this.activeTags = [...tags];
    this.filteredBoards = filtered;
    this.refreshVisible();
    this.info(`Filtered by tags: ${tags.join(", ")}`);
    return true;
  }

  clearFilter(): void {
    if (!this.isFiltered()) return;
    const selection = this.visible.selection;
    this.filteredBoards = [];
    this.activeTags = [];
    this.visible = { projection: new Map(), selection };
    this.reconcileVisible();
  }

  /** Recomputes the filtered set after a mutation of the authoritative boards. */
  refilter(): void {
    if (this.isFiltered()) {
      this.filteredBoards = filterBoardsByTags(this.boards, this.activeTags);
      if (this.filteredBoards.length === 0) {
        this.activeTags = [];
        this.info("No cards match the filter anymore, filter cleared");
      }
    }
    this.reconcileVisible();
  }

  /** The time fields of the date picker only take focus while its time column is open. */
  targets(): readonly Focus[] {
    const targets = availableTargets(this.view, this.popup);
    if (this.popup !== "DateTimePicker" || this.datePicker?.timeOpen) return targets;
    return targets.filter((f) => !TIME_FOCUSES.includes(f));
  }

  setFocus(focus: Focus): void {
    this.focus = focus;
    this.clampFocus();
  }

  nextFocus(): void {
    this.focus = nextFocus(this.targets(), this.focus);
  }

  prevFocus(): void {
    this.focus = prevFocus(this.targets(), this.focus);
  }

  /** Board layouts land on the board body when the focused panel is gone. */
  private clampFocus(): void {
    const targets = this.targets();
    if (!this.popup && isKanbanView(this.view) && !targets.includes(this.focus)) {
      this.focus = "Body";
      return;
    }
    this.focus = clampFocus(targets, this.focus);
  }

  setView(view: View): void {
    this.prevView = this.prevView === view ? undefined : this.view;
    this.view = view;
    this.clampFocus();
    switch (view) {
      case "Login":
        this.buffers.email.reset();
        this.buffers.password.reset();
        break;
      case "SignUp":
      case "ResetPassword":
        this.buffers.email.reset();
        this.buffers.password.reset();
        this.buffers.confirmPassword.reset();
        this.buffers.resetLink.reset();
        break;
      case "NewBoard":
        this.buffers.boardName.reset();
        this.buffers.boardDescription.reset();
        break;
      case "NewCard":
        this.buffers.newCardName.reset();
        this.buffers.newCardDescription.reset();
        this.buffers.newCardDueDate.reset();
        break;
      case "CreateTheme":
        this.themeDraft = cloneTheme(this.theme);
        this.buffers.themeName.reset();
        this.lists.themeEditor = 0;
        break;
      case "MainMenu":
        this.clearFilter();
        break;
      case "LoadLocalSave":
      case "LoadCloudSave":
        this.lists.loadSave = 0;
        this.preview = undefined;
        break;
      default:
        break;
    }
    if (view === "Login" || view === "SignUp" || view === "ResetPassword") this.setShowPassword(false);
    if (isKanbanView(view)) this.reconcileVisible();
  }

  /** Back to the remembered view; the main menu when there is none or it is the current one. */
  goToPreviousView(): void {
    const target = this.prevView && this.prevView !== this.view ? this.prevView : "MainMenu";
    this.setView(target);
  }

  setShowPassword(show: boolean): void {
    this.showPassword = show;
    const mask = show ? undefined : PASSWORD_MASK;
    this.buffers.password.setMask(mask);
    this.buffers.confirmPassword.setMask(mask);
  }

  setPopup(popup: PopUp): void {
    const location = popup === "ViewCard" ? this.locateCurrentCard() : undefined;
    if (popup === "ViewCard" && !location) {
      this.error("No card selected");
      return;
    }
    const parent = RETURNS_TO[popup];
    this.popupReturn = parent && this.popup === parent ? { popup: parent, focus: this.focus } : undefined;
    if (location) {
      this.viewedCard = { boardId: location.board.id, cardId: location.card.id };
      this.cardEdit = undefined;
      this.loadCardBuffers(location.card);
    }
    this.popup = popup;
    this.status = "Initialized";
    this.focus = this.targets()[0] ?? "NoFocus";
    switch (popup) {
      case "CommandPalette":
        this.buffers.paletteSearch.reset();
        this.lists.paletteCommand = 0;
        this.lists.paletteCard = 0;
        this.lists.paletteBoard = 0;
        this.status = "UserInput";
        break;
      case "CustomHexColorPromptFG":
      case "CustomHexColorPromptBG":
        this.buffers.prompt.reset();
        this.status = "UserInput";
        break;
      case "EditGeneralConfig": {
        const field = CONFIG_FIELDS[this.lists.config];
        this.buffers.prompt.setText(field ? configValueAsString(this.config, field) : "");
        this.buffers.prompt.move("End");
        this.status = "UserInput";
        break;
      }
      case "FilterByTag":
        this.tagSelection = [...this.activeTags];
        this.lists.tagFilter = 0;
        break;
      case "EditSpecificKeyBinding":
        this.keybindingCapture = [];
        break;
      case "ChangeTheme":
        this.lists.theme = Math.max(
          0,
          this.themes.findIndex((t) => t.name === this.theme.name),
        );
        break;
      case "CardStatusSelector":
      case "CardPrioritySelector": {
        const staged = this.popupReturn ? this.cardEdit : undefined;
        const card = staged ? undefined : this.currentCard();
        const status = staged?.status ?? card?.status ?? "Active";
        const priority = staged?.priority ?? card?.priority ?? "Low";
        this.lists.cardStatus = ["Active", "Complete", "Stale"].indexOf(status);
        this.lists.cardPriority = ["Low", "Medium", "High"].indexOf(priority);
        break;
      }
      default:
        break;
    }
  }

  /** True when the active popup was opened on top of another one. */
  isNestedPopup(): boolean {
    return this.popupReturn !== undefined;
  }

  /**
   * Closes the active popup. Nested popups hand control back to their
   * parent; the card-view popup asks for confirmation first when its edits
   * are still pending.
   */
  closePopup(): void {
    if (!this.popup) return;
    if (this.popup === "ViewCard" && this.hasPendingCardEdits()) {
      this.setPopup("ConfirmDiscardCardChanges");
      return;
    }
    const back = this.popupReturn;
    this.popupReturn = undefined;
    const picker = this.popup === "DateTimePicker" ? this.datePicker : undefined;
    this.datePicker = undefined;
    if (this.popup === "ViewCard") {
      this.viewedCard = undefined;
      this.cardEdit = undefined;
    }
    if (this.popup === "ChangeTheme") this.defaultThemeMode = false;
    this.status = "Initialized";
    if (back) {
      this.popup = back.popup;
      this.focus = back.focus;
      this.clampFocus();
      return;
    }
    this.popup = undefined;
    if (picker) this.focus = picker.field;
    this.clampFocus();
  }

  /** Closes every popup, including the parent of a nested one, without asking. */
  closeAllPopups(): void {
    this.popupReturn = undefined;
    this.popup = undefined;
    this.viewedCard = undefined;
    this.cardEdit = undefined;
    this.datePicker = undefined;
    this.defaultThemeMode = false;
    this.status = "Initialized";
    this.clampFocus();
  }

  /** Text buffer that receives typing while `focus` is active, if any. */
  bufferFor(focus: Focus): TextBox | undefined {
    const b = this.buffers;
    switch (focus) {
      case "NewBoardName":
        return b.boardName;
      case "NewBoardDescription":
        return b.boardDescription;
      case "NewCardName":
        return b.newCardName;
      case "NewCardDescription":
        return b.newCardDescription;
      case "NewCardDueDate":
        return b.newCardDueDate;
      case "CardName":
        return b.cardName;
      case "CardDescription":
        return b.cardDescription;
      case "CardDueDate":
        return b.cardDueDate;
      case "CardTags":
        return b.cardTags;
      case "CardComments":
        return b.cardComments;
      case "EmailIDField":
        return b.email;
      case "PasswordField":
        return b.password;
      case "ConfirmPasswordField":
        return b.confirmPassword;
      case "ResetPasswordLinkField":
        return b.resetLink;
      case "TextInput":
      case "EditGeneralConfigPopup":
        return b.prompt;
      case "ThemeEditor":
        return this.lists.themeEditor === 0 ? b.themeName : undefined;
      case "CommandPaletteCommand":
      case "CommandPaletteCard":
      case "CommandPaletteBoard":
        return b.paletteSearch;
      default:
        return undefined;
    }
  }

  loadCardBuffers(card: Card): void {
    this.buffers.cardName.setText(card.name);
    this.buffers.cardDescription.setText(card.description);
    this.buffers.cardDueDate.setText(card.dueDate === FIELD_NOT_SET ? "" : card.dueDate);
    this.buffers.cardTags.setText(card.tags.join(", "));
    this.buffers.cardComments.setText(card.comments.join("\n"));
  }

  /** The viewed card in the authoritative boards. */
  locateViewedCard(): CardLocation | undefined {
    return this.viewedCard ? locateCard(this.boards, this.viewedCard.cardId) : undefined;
  }

  /** Opens the date picker on the value typed into `field`. */
  openDatePicker(field: DueDateField): void {
    const box = field === "CardDueDate" ? this.buffers.cardDueDate : this.buffers.newCardDueDate;
    this.datePicker = openPicker(field, box.text, this.config.dateTimeFormat, this.date());
    this.setPopup("DateTimePicker");
  }

  /** Completions for the tag being typed in the card view, empty when none apply. */
  tagSuggestions(): string[] {
    if (this.popup !== "ViewCard" || this.focus !== "CardTags" || this.status !== "UserInput") return [];
    return suggestTags(this.boards, this.buffers.cardTags.text);
  }

  /** Stages an edit of the viewed card; a no-op when one is already running. */
  beginCardEdit(): CardEdit | undefined {
    if (this.cardEdit) return this.cardEdit;
    const location = this.locateViewedCard();
    if (!location) {
      this.error("No card selected");
      return undefined;
    }
    this.cardEdit = {
      boardId: location.board.id,
      original: cloneCard(location.card),
      status: location.card.status,
      priority: location.card.priority,
    };
    this.info(`Editing Card '${location.card.name}'`);
    return this.cardEdit;
  }

  /** The card as it would be saved from the card-view buffers; dates are not yet normalized. */
  cardDraft(): Card | undefined {
    const edit = this.cardEdit;
    if (!edit) return undefined;
    const due = this.buffers.cardDueDate.text.trim();
    return {
      ...cloneCard(edit.original),
      name: this.buffers.cardName.text.trim(),
      description: this.buffers.cardDescription.text,
      dueDate: due || FIELD_NOT_SET,
      status: edit.status,
      priority: edit.priority,
      tags: parseTagInput(this.buffers.cardTags.text),
      comments: parseCommentInput(this.buffers.cardComments.text),
    };
  }

  hasPendingCardEdits(): boolean {
    const draft = this.cardDraft();
    const original = this.cardEdit?.original;
    if (!draft || !original) return false;
    const fields = (c: Card) =>
      JSON.stringify([c.name, c.description, c.dueDate, c.status, c.priority, c.tags, c.comments]);
    return fields(draft) !== fields(original);
  }

  selectNext(list: ListName, length: number): void {
    if (length <= 0) {
      this.lists[list] = 0;
      return;
    }
    this.lists[list] = this.lists[list] >= length - 1 ? 0 : this.lists[list] + 1;
  }

  selectPrev(list: ListName, length: number): void {
    if (length <= 0) {
      this.lists[list] = 0;
      return;
    }
    this.lists[list] = this.lists[list] <= 0 ? length - 1 : this.lists[list] - 1;
  }

  mainMenuItems(): MainMenuItem[] {
    return mainMenuItems(this.session !== undefined);
  }

  dispatch(event: IoEvent): void {
    this.loading = true;
    this.io.push(event);
  }

  info(message: string): void {
    this.logger.info(message);
    this.toasts.info(message);
  }

  warn(message: string): void {
    this.logger.warn(message);
    this.toasts.warn(message);
  }

  error(message: string): void {
    this.logger.error(message);
    this.toasts.error(message);
  }

  /** Quits, saving first when the config asks for it. */
  quit(): void {
    if (this.config.saveOnExit) this.dispatch({ type: "AutoSave" });
    this.shouldQuit = true;
  }
}
