import {
  CARD_PRIORITIES,
  CARD_STATUSES,
  COLOR_CHOICES,
  CONFIG_FIELDS,
  DATE_TIME_FORMATS,
  KANBAN_VIEWS,
  KEY_ACTIONS,
  MONTH_NAMES,
  NO_COMMANDS_FOUND,
  STYLE_MODIFIERS,
  TERMINAL_DEFAULT_CHOICE,
  THEME_STYLE_FIELDS,
  actionLabel,
  calculateTags,
  configRows,
  dueDateState,
  editedStyleField,
  graphemes,
  humanReadableFormat,
  isKanbanView,
  keyToString,
  levelPrefix,
  locateCard,
  monthGrid,
  paletteResults,
  viewLabel,
  viewTargets,
  weekdayHeader,
  type App,
  type Board,
  type Card,
  type CardPriority,
  type CardStatus,
  type Focus,
  type KeyAction,
  type ListName,
  type LogLevel,
  type ProjectionState,
  type Region,
  type Style,
  type TextBox,
  type ThemeStyleField,
  type ToastKind,
} from "@tui-kanban/core";
import { Frame, centered, clip, inset, splitColumns, splitRows, textWidth, wrap, type Rect } from "./frame";

export const MIN_WIDTH = 40;
export const MIN_HEIGHT = 12;

const SPINNER = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];
const SELECTED_MARKER = ">> ";
const LOG_PANEL_HEIGHT = 10;
const TOAST_MAX_LINES = 4;

interface Ctx {
  app: App;
  frame: Frame;
  styles: Record<ThemeStyleField, Style>;
  /** Focus highlights only show on the layer that owns the focus. */
  layer: "view" | "popup";
}

interface Span {
  text: string;
  style?: Style;
}

type Row = Span[];

function row(text: string, style?: Style): Row {
  return [{ text, style }];
}

function withModifier(style: Style, modifier: Style["modifiers"][number]): Style {
  return { ...style, modifiers: style.modifiers.includes(modifier) ? style.modifiers : [...style.modifiers, modifier] };
}

function owns(ctx: Ctx): boolean {
  return (ctx.layer === "popup") === (ctx.app.popup !== undefined);
}

function hasFocus(ctx: Ctx, focus: Focus): boolean {
  return owns(ctx) && ctx.app.focus === focus;
}

function addRegion(ctx: Ctx, rect: Rect, focus: Focus, extra: Omit<Region, "focus" | keyof Rect> = {}): void {
  if (rect.width <= 0 || rect.height <= 0) return;
  ctx.app.regions.push({ focus, ...rect, ...extra });
}

function borderStyle(ctx: Ctx, focus: Focus | undefined): Style {
  if (focus && hasFocus(ctx, focus)) return ctx.styles.keyboard_focus_style;
  if (focus && owns(ctx) && ctx.app.mouseFocus === focus) return ctx.styles.mouse_focus_style;
  return ctx.styles.general_style;
}

/** Draws a bordered panel, registers it for the pointer and returns its inner area. */
function panel(ctx: Ctx, rect: Rect, title: string | undefined, focus?: Focus): Rect {
  ctx.frame.box(rect, borderStyle(ctx, focus), title);
  if (focus) addRegion(ctx, rect, focus);
  return inset(rect);
}

function putRow(ctx: Ctx, x: number, y: number, spans: Row, maxWidth: number, fallback: Style): void {
  let col = x;
  for (const span of spans) {
    const left = x + maxWidth - col;
    if (left <= 0) return;
    col += ctx.frame.put(col, y, span.text, span.style ?? fallback, left, true);
  }
}

function putCentered(ctx: Ctx, rect: Rect, y: number, text: string, style: Style): void {
  const w = Math.min(textWidth(text), rect.width);
  ctx.frame.put(rect.x + Math.floor((rect.width - w) / 2), y, text, style, rect.width, true);
}

interface ListOptions {
  focus: Focus;
  list?: ListName;
  /** Row kept in view; highlighted when `highlight` is set. */
  selected: number;
  highlight: boolean;
  emptyText?: string;
}

function drawList(ctx: Ctx, inner: Rect, rows: Row[], opts: ListOptions): void {
  const { frame, styles, app } = ctx;
  if (inner.height <= 0) return;
  if (rows.length === 0) {
    if (opts.emptyText) frame.put(inner.x, inner.y, opts.emptyText, styles.inactive_text_style, inner.width, true);
    return;
  }
  const selected = Math.min(Math.max(0, opts.selected), rows.length - 1);
  const top = selected >= inner.height ? selected - inner.height + 1 : 0;
  const scrollBar = !app.config.disableScrollBar && rows.length > inner.height;
  const width = scrollBar ? inner.width - 1 : inner.width;
  for (let i = 0; i < inner.height && top + i < rows.length; i++) {
    const index = top + i;
    const y = inner.y + i;
    const spans = rows[index] ?? [];
    const isSelected = opts.highlight && index === selected;
    if (isSelected) {
      frame.fill({ x: inner.x, y, width, height: 1 }, styles.list_select_style);
      putRow(ctx, inner.x, y, [{ text: SELECTED_MARKER }, ...spans.map((s) => ({ text: s.text }))], width, styles.list_select_style);
    } else {
      putRow(ctx, inner.x, y, [{ text: " ".repeat(SELECTED_MARKER.length) }, ...spans], width, styles.general_style);
    }
    addRegion(ctx, { x: inner.x, y, width, height: 1 }, opts.focus, opts.list ? { list: opts.list, row: index } : {});
  }
  if (scrollBar) drawScrollBar(ctx, inner.x + inner.width - 1, inner.y, inner.height, top, inner.height, rows.length);
}

function drawScrollBar(ctx: Ctx, x: number, y: number, height: number, first: number, shown: number, total: number): void {
  if (total <= 0 || height <= 0) return;
  const size = Math.max(1, Math.round((shown / total) * height));
  const start = Math.min(height - size, Math.floor((first / total) * height));
  for (let i = 0; i < size; i++) ctx.frame.put(x, y + start + i, "┃", ctx.styles.progress_bar_style, 1);
}

function button(ctx: Ctx, rect: Rect, label: string, focus: Focus): void {
  const inner = panel(ctx, rect, undefined, focus);
  const style = hasFocus(ctx, focus) ? ctx.styles.keyboard_focus_style : ctx.styles.general_style;
  putCentered(ctx, inner, inner.y, label, style);
}

function checkbox(ctx: Ctx, rect: Rect, label: string, checked: boolean, focus: Focus): void {
  const inner = panel(ctx, rect, undefined, focus);
  ctx.frame.put(inner.x, inner.y, `[${checked ? "x" : " "}] ${label}`, ctx.styles.general_style, inner.width, true);
}

/** Draws a text buffer into `inner`, scrolled to its cursor while it is being edited. */
function drawText(ctx: Ctx, inner: Rect, box: TextBox, editing: boolean, hint?: string): void {
  const { frame, styles, app } = ctx;
  if (inner.height <= 0 || inner.width <= 0) return;
  box.viewportHeight = inner.height;
  const lines = box.displayLines();
  if (!editing && hint && box.isEmpty()) {
    frame.put(inner.x, inner.y, hint, styles.inactive_text_style, inner.width, true);
    return;
  }
  const cursor = box.cursor;
  const numbered = app.config.showLineNumbers && !box.singleLine;
  const gutter = numbered ? String(lines.length).length + 1 : 0;
  const avail = Math.max(1, inner.width - gutter);
  const top = editing ? Math.max(0, cursor.row - inner.height + 1) : 0;
  const left = editing ? Math.max(0, cursor.col - avail + 1) : 0;
  const selection = box.selectionRange();
  const cursorStyle = withModifier(styles.general_style, "reversed");
  const inSelection = (r: number, c: number) =>
    selection !== undefined &&
    (r > selection.start.row || (r === selection.start.row && c >= selection.start.col)) &&
    (r < selection.end.row || (r === selection.end.row && c < selection.end.col));

  for (let i = 0; i < inner.height; i++) {
    const r = top + i;
    const line = lines[r];
    if (line === undefined) break;
    const y = inner.y + i;
    if (numbered) frame.put(inner.x, y, String(r + 1).padStart(gutter - 1), styles.inactive_text_style, gutter);
    const gs = graphemes(line);
    let x = inner.x + gutter;
    const right = inner.x + inner.width;
    for (let c = left; c < gs.length && x < right; c++) {
      const g = gs[c] ?? "";
      let style = inSelection(r, c) ? styles.list_select_style : styles.general_style;
      if (editing && r === cursor.row && c === cursor.col) style = cursorStyle;
      const written = frame.put(x, y, g, style, right - x);
      if (written === 0) break;
      x += written;
    }
    if (editing && r === cursor.row && cursor.col >= gs.length && x < right) frame.put(x, y, " ", cursorStyle, 1);
  }
}

function textField(ctx: Ctx, rect: Rect, title: string, focus: Focus, box: TextBox, hint?: string): void {
  const inner = panel(ctx, rect, title, focus);
  const editing = hasFocus(ctx, focus) && ctx.app.status === "UserInput";
  drawText(ctx, inner, box, editing, hint);
}

function bindingText(app: App, action: KeyAction): string {
  return app.config.keybindings[action].map(keyToString).join(", ");
}

function helpRows(ctx: Ctx, actions: readonly KeyAction[]): Row[] {
  return actions.map((action) => [
    { text: `${bindingText(ctx.app, action)}: `, style: ctx.styles.help_key_style },
    { text: actionLabel(action), style: ctx.styles.help_text_style },
  ]);
}

const LOG_STYLES: Record<LogLevel, ThemeStyleField> = {
  debug: "log_debug_style",
  info: "log_info_style",
  warn: "log_warn_style",
  error: "log_error_style",
};

function drawLog(ctx: Ctx, rect: Rect): void {
  const inner = panel(ctx, rect, "Log", "Log");
  const entries = ctx.app.logger.entries();
  const rows = entries.map((e) => row(`${levelPrefix(e.level)}${e.message}`, ctx.styles[LOG_STYLES[e.level]]));
  const focused = hasFocus(ctx, "Log");
  drawList(ctx, inner, rows, {
    focus: "Log",
    list: "log",
    selected: focused ? ctx.app.lists.log : rows.length - 1,
    highlight: focused,
  });
}

function drawHelp(ctx: Ctx, rect: Rect): void {
  const inner = panel(ctx, rect, "Help", "Help");
  const focused = hasFocus(ctx, "Help");
  drawList(ctx, inner, helpRows(ctx, KEY_ACTIONS), {
    focus: "Help",
    list: "help",
    selected: focused ? ctx.app.lists.help : 0,
    highlight: focused,
  });
}

function drawTitle(ctx: Ctx, rect: Rect): void {
  const { app } = ctx;
  const inner = panel(ctx, rect, undefined, "Title");
  const parts = ["TUI Kanban"];
  if (app.activeTags.length > 0) parts.push(`Filtered by: ${app.activeTags.join(", ")}`);
  if (app.session) parts.push(app.session.email);
  putCentered(ctx, inner, inner.y, parts.join(" | "), ctx.styles.general_style);
}

const STATUS_STYLES: Record<CardStatus, ThemeStyleField> = {
  Active: "card_status_active_style",
  Complete: "card_status_completed_style",
  Stale: "card_status_stale_style",
};

const PRIORITY_STYLES: Record<CardPriority, ThemeStyleField> = {
  Low: "card_priority_low_style",
  Medium: "card_priority_medium_style",
  High: "card_priority_high_style",
};

function dueStyle(ctx: Ctx, card: Card): Style {
  const state = dueDateState({
    dueDate: card.dueDate,
    format: ctx.app.config.dateTimeFormat,
    warningDelta: ctx.app.config.warningDelta,
    now: ctx.app.date(),
  });
  switch (state) {
    case "overdue":
      return ctx.styles.card_due_overdue_style;
    case "warning":
      return ctx.styles.card_due_warning_style;
    case "default":
      return ctx.styles.card_due_default_style;
    case "unset":
      return ctx.styles.inactive_text_style;
  }
}

function drawCard(ctx: Ctx, rect: Rect, board: Board, card: Card, state: ProjectionState, interactive: boolean): void {
  const { app, styles, frame } = ctx;
  const selected = state.selection.cardId === card.id;
  let border = styles.general_style;
  if (interactive && selected && hasFocus(ctx, "Body")) border = styles.keyboard_focus_style;
  else if (interactive && app.hovered.cardId === card.id) border = styles.mouse_focus_style;
  else if (selected) border = withModifier(styles.general_style, "bold");
  frame.box(rect, border, card.name);
  const inner = inset(rect);
  const rows: Row[] = [
    [{ text: "Due: " }, { text: card.dueDate, style: dueStyle(ctx, card) }],
    [{ text: "Status: " }, { text: card.status, style: styles[STATUS_STYLES[card.status]] }],
    [{ text: "Priority: " }, { text: card.priority, style: styles[PRIORITY_STYLES[card.priority]] }],
  ];
  if (card.tags.length > 0) rows.push(row(`Tags: ${card.tags.join(", ")}`));
  const description = card.description.split("\n")[0];
  if (description) rows.push(row(description, styles.inactive_text_style));
  for (let i = 0; i < inner.height && i < rows.length; i++) {
    putRow(ctx, inner.x, inner.y + i, rows[i] ?? [], inner.width, styles.general_style);
  }
  if (interactive) addRegion(ctx, rect, "Body", { boardId: board.id, cardId: card.id });
}

/** Lays out the boards of a projection side by side; `interactive` boards publish pointer regions. */
function drawBoards(ctx: Ctx, rect: Rect, boards: Board[], state: ProjectionState, interactive: boolean): void {
  const { app, styles, frame } = ctx;
  const shown: Array<{ board: Board; cardIds: string[] }> = [];
  for (const [boardId, cardIds] of state.projection) {
    const board = boards.find((b) => b.id === boardId);
    if (board) shown.push({ board, cardIds });
  }
  if (shown.length === 0) {
    const hint = interactive
      ? `No boards found, press ${bindingText(app, "new_board")} to create a new board`
      : "No boards found";
    putCentered(ctx, rect, rect.y + Math.floor(rect.height / 2), hint, styles.inactive_text_style);
    return;
  }
  const columns = splitColumns(rect, shown.length);
  shown.forEach(({ board, cardIds }, i) => {
    const col = columns[i];
    if (!col) return;
    const current = state.selection.boardId === board.id;
    let border = styles.general_style;
    if (interactive && current && hasFocus(ctx, "Body")) border = styles.keyboard_focus_style;
    else if (interactive && app.hovered.boardId === board.id && !app.hovered.cardId) border = styles.mouse_focus_style;
    frame.box(col, border, `${board.name} (${board.cards.length})`);
    if (interactive) addRegion(ctx, col, "Body", { boardId: board.id });
    const inner = inset(col);
    if (cardIds.length === 0) {
      frame.put(inner.x, inner.y, "No cards", styles.inactive_text_style, inner.width);
      return;
    }
    const slot = Math.max(3, Math.floor(inner.height / Math.max(1, app.config.cardsShown)));
    cardIds.forEach((cardId, j) => {
      const y = inner.y + j * slot;
      if (y + slot > inner.y + inner.height) return;
      const card = board.cards.find((c) => c.id === cardId);
      if (card) drawCard(ctx, { x: inner.x, y, width: inner.width, height: slot }, board, card, state, interactive);
    });
    if (!app.config.disableScrollBar && board.cards.length > cardIds.length) {
      const first = board.cards.findIndex((c) => c.id === cardIds[0]);
      drawScrollBar(ctx, col.x + col.width - 1, inner.y, inner.height, Math.max(0, first), cardIds.length, board.cards.length);
    }
  });
}

function drawDraggedCard(ctx: Ctx, body: Rect): void {
  const { app } = ctx;
  const drag = app.drag;
  if (!drag?.moved) return;
  const card = locateCard(app.boards, drag.cardId)?.card;
  if (!card) return;
  const width = Math.min(30, body.width);
  const height = Math.min(3, body.height);
  const x = Math.min(Math.max(drag.x, body.x), body.x + body.width - width);
  const y = Math.min(Math.max(drag.y, body.y), body.y + body.height - height);
  const rect = { x, y, width, height };
  ctx.frame.box(rect, ctx.styles.keyboard_focus_style, "Moving");
  const inner = inset(rect);
  ctx.frame.put(inner.x, inner.y, card.name, ctx.styles.general_style, inner.width, true);
}

function drawKanban(ctx: Ctx, area: Rect): void {
  const { app } = ctx;
  const targets = viewTargets(app.view);
  const hasTitle = targets.includes("Title");
  const hasHelp = targets.includes("Help");
  const hasLog = targets.includes("Log");
  const heights: number[] = [];
  if (hasTitle) heights.push(3);
  heights.push(0);
  if (hasHelp || hasLog) heights.push(Math.min(LOG_PANEL_HEIGHT, Math.floor(area.height / 3)));
  const rects = splitRows(area, heights);
  let index = 0;
  if (hasTitle) {
    const title = rects[index++];
    if (title) drawTitle(ctx, title);
  }
  const body = rects[index++];
  if (body) {
    addRegion(ctx, body, "Body");
    drawBoards(ctx, body, app.currentBoards(), app.visible, true);
    drawDraggedCard(ctx, body);
  }
  const bottom = rects[index];
  if (!bottom) return;
  if (hasHelp && hasLog) {
    const [help, log] = splitColumns(bottom, 2);
    if (help) drawHelp(ctx, help);
    if (log) drawLog(ctx, log);
  } else if (hasHelp) drawHelp(ctx, bottom);
  else drawLog(ctx, bottom);
}

const MAIN_MENU_HELP: readonly KeyAction[] = [
  "up",
  "down",
  "accept",
  "next_focus",
  "prv_focus",
  "toggle_command_palette",
  "go_to_previous_view_or_cancel",
  "quit",
];

function drawMainMenu(ctx: Ctx, area: Rect): void {
  const { app } = ctx;
  const [top, log] = splitRows(area, [0, Math.min(LOG_PANEL_HEIGHT, Math.floor(area.height / 3))]);
  if (top) {
    const [menu, help] = splitColumns(top, 2);
    if (menu) {
      const inner = panel(ctx, menu, "Main Menu", "MainMenu");
      drawList(ctx, inner, app.mainMenuItems().map((item) => row(item)), {
        focus: "MainMenu",
        list: "mainMenu",
        selected: app.lists.mainMenu,
        highlight: true,
      });
    }
    if (help) {
      const inner = panel(ctx, help, "Help", "MainMenuHelp");
      helpRows(ctx, MAIN_MENU_HELP).forEach((r, i) => {
        if (i < inner.height) putRow(ctx, inner.x, inner.y + i, r, inner.width, ctx.styles.general_style);
      });
    }
  }
  if (log) drawLog(ctx, log);
}

function drawConfigMenu(ctx: Ctx, area: Rect): void {
  const { app } = ctx;
  const [table, buttons] = splitRows(area, [0, 3]);
  if (table) {
    const inner = panel(ctx, table, "Config", "ConfigTable");
    const rows = configRows(app.config).map(([label, value]) => [
      { text: `${label}: `, style: ctx.styles.help_key_style },
      { text: value },
    ]);
    drawList(ctx, inner, rows, { focus: "ConfigTable", list: "config", selected: app.lists.config, highlight: true });
  }
  if (buttons) {
    const [all, only] = splitColumns(buttons, 2);
    if (all) button(ctx, all, "Reset Config and Keybindings to Default", "SubmitButton");
    if (only) button(ctx, only, "Reset Only Config to Default", "ExtraFocus");
  }
}

function drawEditKeybindings(ctx: Ctx, area: Rect): void {
  const { app } = ctx;
  const [table, reset] = splitRows(area, [0, 3]);
  if (table) {
    const inner = panel(ctx, table, "Edit Keybindings", "EditKeybindingsTable");
    const rows = KEY_ACTIONS.map((action) => [
      { text: `${actionLabel(action)}: `, style: ctx.styles.help_text_style },
      { text: bindingText(app, action), style: ctx.styles.help_key_style },
    ]);
    drawList(ctx, inner, rows, {
      focus: "EditKeybindingsTable",
      list: "keybindings",
      selected: app.lists.keybindings,
      highlight: true,
    });
  }
  if (reset) button(ctx, reset, "Reset Keybindings to Default", "SubmitButton");
}

function formArea(area: Rect, width: number, height: number): Rect {
  return centered(area, Math.min(width, area.width - 2), Math.min(height, area.height));
}

function drawNewBoard(ctx: Ctx, area: Rect): void {
  const outer = formArea(area, 80, area.height);
  const inner = panel(ctx, outer, "New Board");
  const [name, description, submit] = splitRows(inner, [3, 0, 3]);
  const b = ctx.app.buffers;
  if (name) textField(ctx, name, "Board Name", "NewBoardName", b.boardName, "Press Enter to start typing");
  if (description) textField(ctx, description, "Board Description", "NewBoardDescription", b.boardDescription);
  if (submit) button(ctx, submit, "Create Board", "SubmitButton");
}

function drawNewCard(ctx: Ctx, area: Rect): void {
  const { app } = ctx;
  const board = app.boards.find((x) => x.id === app.newCardBoardId);
  const outer = formArea(area, 80, area.height);
  const inner = panel(ctx, outer, board ? `New Card in '${board.name}'` : "New Card");
  const [name, description, due, submit] = splitRows(inner, [3, 0, 3, 3]);
  const b = app.buffers;
  if (name) textField(ctx, name, "Card Name", "NewCardName", b.newCardName, "Press Enter to start typing");
  if (description) textField(ctx, description, "Card Description", "NewCardDescription", b.newCardDescription);
  if (due) {
    const format = humanReadableFormat(app.config.dateTimeFormat);
    textField(ctx, due, `Card Due Date (${format})`, "NewCardDueDate", b.newCardDueDate);
  }
  if (submit) button(ctx, submit, "Create Card", "SubmitButton");
}

function drawLoadSave(ctx: Ctx, area: Rect, cloud: boolean): void {
  const { app, styles } = ctx;
  const [main, hint] = splitRows(area, [0, 1]);
  if (main) {
    const listWidth = Math.max(20, Math.floor(main.width * 0.35));
    const listRect = { ...main, width: Math.min(listWidth, main.width) };
    const previewRect = { ...main, x: main.x + listRect.width, width: main.width - listRect.width };
    const inner = panel(ctx, listRect, cloud ? "Cloud Saves" : "Local Saves", "LoadSave");
    const rows = cloud
      ? app.cloudSaves.map((s) => row(`cloud_save_${s.saveId}`))
      : app.localSaves.map((s) => row(s.fileName));
    drawList(ctx, inner, rows, {
      focus: "LoadSave",
      list: "loadSave",
      selected: app.lists.loadSave,
      highlight: true,
      emptyText: "No saves found",
    });
    if (previewRect.width > 2) {
      const preview = app.preview;
      ctx.frame.box(previewRect, styles.general_style, preview ? `Preview: ${preview.name}` : "Preview");
      const body = inset(previewRect);
      if (preview) drawBoards(ctx, body, preview.boards, preview.state, false);
      else putCentered(ctx, body, body.y + Math.floor(body.height / 2), "Select a save to preview", styles.inactive_text_style);
    }
  }
  if (hint) {
    const text = `${bindingText(app, "accept")}: load | ${bindingText(app, "delete_card")}: delete | ${bindingText(app, "go_to_previous_view_or_cancel")}: back`;
    putCentered(ctx, hint, hint.y, text, styles.help_text_style);
  }
}

function drawLogin(ctx: Ctx, area: Rect): void {
  const { app } = ctx;
  const outer = formArea(area, 60, 14);
  const inner = panel(ctx, outer, app.session ? `Login (logged in as ${app.session.email})` : "Login");
  const [email, password, show, submit] = splitRows(inner, [3, 3, 3, 3]);
  if (email) textField(ctx, email, "Email", "EmailIDField", app.buffers.email);
  if (password) textField(ctx, password, "Password", "PasswordField", app.buffers.password);
  if (show) checkbox(ctx, show, "Show Password", app.showPassword, "ExtraFocus");
  if (submit) button(ctx, submit, "Login", "SubmitButton");
}

function drawSignUp(ctx: Ctx, area: Rect): void {
  const { app } = ctx;
  const outer = formArea(area, 60, 17);
  const inner = panel(ctx, outer, "Sign Up");
  const [email, password, confirm, show, submit] = splitRows(inner, [3, 3, 3, 3, 3]);
  if (email) textField(ctx, email, "Email", "EmailIDField", app.buffers.email);
  if (password) textField(ctx, password, "Password", "PasswordField", app.buffers.password);
  if (confirm) textField(ctx, confirm, "Confirm Password", "ConfirmPasswordField", app.buffers.confirmPassword);
  if (show) checkbox(ctx, show, "Show Password", app.showPassword, "ExtraFocus");
  if (submit) button(ctx, submit, "Sign Up", "SubmitButton");
}

function drawResetPassword(ctx: Ctx, area: Rect): void {
  const { app } = ctx;
  const outer = formArea(area, 60, 23);
  const inner = panel(ctx, outer, "Reset Password");
  const [email, send, link, password, confirm, show, submit] = splitRows(inner, [3, 3, 3, 3, 3, 3, 3]);
  const b = app.buffers;
  if (email) textField(ctx, email, "Email", "EmailIDField", b.email);
  if (send) button(ctx, send, "Send Reset Link", "SendResetPasswordLinkButton");
  if (link) textField(ctx, link, "Reset Link", "ResetPasswordLinkField", b.resetLink, "Paste the link from the email");
  if (password) textField(ctx, password, "New Password", "PasswordField", b.password);
  if (confirm) textField(ctx, confirm, "Confirm New Password", "ConfirmPasswordField", b.confirmPassword);
  if (show) checkbox(ctx, show, "Show Password", app.showPassword, "ExtraFocus");
  if (submit) button(ctx, submit, "Reset Password", "SubmitButton");
}

function drawCreateTheme(ctx: Ctx, area: Rect): void {
  const { app, styles } = ctx;
  const [editor, buttons] = splitRows(area, [0, 3]);
  if (editor) {
    const inner = panel(ctx, editor, "Create Theme", "ThemeEditor");
    const editingName = hasFocus(ctx, "ThemeEditor") && app.status === "UserInput";
    const name = app.buffers.themeName.text;
    const rows: Row[] = [
      [{ text: "Theme Name: ", style: styles.help_key_style }, { text: editingName ? `${name}▏` : name || "(unnamed)" }],
      ...THEME_STYLE_FIELDS.map((field) => [
        { text: `${field}: `, style: styles.help_key_style },
        { text: "Sample Text", style: app.themeDraft.styles[field] },
      ]),
    ];
    drawList(ctx, inner, rows, {
      focus: "ThemeEditor",
      list: "themeEditor",
      selected: app.lists.themeEditor,
      highlight: !editingName,
    });
  }
  if (buttons) {
    const [create, reset] = splitColumns(buttons, 2);
    if (create) button(ctx, create, "Create Theme", "SubmitButton");
    if (reset) button(ctx, reset, "Reset", "ExtraFocus");
  }
}

function drawView(ctx: Ctx, area: Rect): void {
  const { app } = ctx;
  if (isKanbanView(app.view)) {
    drawKanban(ctx, area);
    return;
  }
  switch (app.view) {
    case "MainMenu":
      drawMainMenu(ctx, area);
      return;
    case "ConfigMenu":
      drawConfigMenu(ctx, area);
      return;
    case "EditKeybindings":
      drawEditKeybindings(ctx, area);
      return;
    case "HelpMenu": {
      const [help, log] = splitRows(area, [0, Math.min(LOG_PANEL_HEIGHT, Math.floor(area.height / 3))]);
      if (help) drawHelp(ctx, help);
      if (log) drawLog(ctx, log);
      return;
    }
    case "LogsOnly":
      drawLog(ctx, area);
      return;
    case "NewBoard":
      drawNewBoard(ctx, area);
      return;
    case "NewCard":
      drawNewCard(ctx, area);
      return;
    case "LoadLocalSave":
      drawLoadSave(ctx, area, false);
      return;
    case "LoadCloudSave":
      drawLoadSave(ctx, area, true);
      return;
    case "Login":
      drawLogin(ctx, area);
      return;
    case "SignUp":
      drawSignUp(ctx, area);
      return;
    case "ResetPassword":
      drawResetPassword(ctx, area);
      return;
    case "CreateTheme":
      drawCreateTheme(ctx, area);
      return;
    default:
      return;
  }
}

function popupBox(ctx: Ctx, area: Rect, width: number, height: number, title: string): Rect {
  const rect = centered(area, Math.min(width, area.width - 2), Math.min(height, area.height - 2));
  return panel(ctx, rect, title);
}

function selectorPopup(
  ctx: Ctx,
  area: Rect,
  title: string,
  rows: Row[],
  focus: Focus,
  list: ListName,
  width = 40,
): void {
  const inner = popupBox(ctx, area, width, rows.length + 2, title);
  drawList(ctx, inner, rows, { focus, list, selected: ctx.app.lists[list], highlight: true });
}

function current(text: string, isCurrent: boolean): Row {
  return row(isCurrent ? `${text} (current)` : text);
}

function drawPalette(ctx: Ctx, area: Rect): void {
  const { app, styles } = ctx;
  const inner = popupBox(ctx, area, 90, 26, "Command Palette");
  const [search, commands, cards, boards] = splitRows(inner, [3, 0, 6, 6]);
  if (search) {
    const box = inset(search);
    ctx.frame.box(search, styles.keyboard_focus_style, "Search");
    drawText(ctx, box, app.buffers.paletteSearch, app.status === "UserInput", "Type to search");
  }
  const results = paletteResults(app);
  const section = (rect: Rect | undefined, title: string, focus: Focus, list: ListName, rows: Row[], empty: string) => {
    if (!rect) return;
    const body = panel(ctx, rect, title, focus);
    drawList(ctx, body, rows, { focus, list, selected: app.lists[list], highlight: hasFocus(ctx, focus), emptyText: empty });
  };
  section(commands, "Commands", "CommandPaletteCommand", "paletteCommand", results.commands.map((c) => row(c)), NO_COMMANDS_FOUND);
  section(cards, "Cards", "CommandPaletteCard", "paletteCard", results.cards.map((h) => row(h.label)), "No cards found");
  section(boards, "Boards", "CommandPaletteBoard", "paletteBoard", results.boards.map((h) => row(h.label)), "No boards found");
}

function drawViewCard(ctx: Ctx, area: Rect): void {
  const { app, styles } = ctx;
  const location = app.locateViewedCard();
  const inner = popupBox(ctx, area, 100, 34, location ? `${location.board.name} / ${location.card.name}` : "Card");
  if (!location) {
    ctx.frame.put(inner.x, inner.y, "Card not found", styles.error_text_style, inner.width);
    return;
  }
  const card = location.card;
  const status = app.cardEdit?.status ?? card.status;
  const priority = app.cardEdit?.priority ?? card.priority;
  const [name, description, due, statusRow, tags, comments, meta, submit] = splitRows(inner, [3, 0, 3, 3, 3, 6, 1, 3]);
  const b = app.buffers;
  if (name) textField(ctx, name, "Name", "CardName", b.cardName);
  if (description) textField(ctx, description, "Description", "CardDescription", b.cardDescription);
  if (due) {
    const format = humanReadableFormat(app.config.dateTimeFormat);
    textField(ctx, due, `Due Date (${format})`, "CardDueDate", b.cardDueDate, "Not Set");
  }
  if (statusRow) {
    const [prio, stat] = splitColumns(statusRow, 2);
    if (prio) {
      const body = panel(ctx, prio, "Priority", "CardPriority");
      ctx.frame.put(body.x, body.y, priority, styles[PRIORITY_STYLES[priority]], body.width);
    }
    if (stat) {
      const body = panel(ctx, stat, "Status", "CardStatus");
      ctx.frame.put(body.x, body.y, status, styles[STATUS_STYLES[status]], body.width);
    }
  }
  if (tags) textField(ctx, tags, "Tags (comma separated)", "CardTags", b.cardTags);
  if (comments) textField(ctx, comments, "Comments (one per line)", "CardComments", b.cardComments);
  if (meta) {
    const text = `Created: ${card.createdAt} | Modified: ${card.modifiedAt} | Completed: ${card.completedAt}`;
    ctx.frame.put(meta.x, meta.y, text, styles.inactive_text_style, meta.width, true);
  }
  if (submit) button(ctx, submit, app.hasPendingCardEdits() ? "Submit Changes" : "Submit", "SubmitButton");
  if (tags) drawTagSuggestions(ctx, tags);
}

/** Drops the suggestion list just below the tags field, over the comments. */
function drawTagSuggestions(ctx: Ctx, field: Rect): void {
  const { app } = ctx;
  const suggestions = app.tagSuggestions();
  if (suggestions.length === 0) return;
  const rect = { x: field.x + 1, y: field.y + field.height, width: Math.min(32, field.width - 2), height: suggestions.length + 2 };
  const inner = panel(ctx, rect, "Suggestions");
  drawList(ctx, inner, suggestions.map((tag) => row(tag)), {
    focus: "CardTags",
    list: "tagSuggestion",
    selected: app.lists.tagSuggestion,
    highlight: true,
  });
}

const CALENDAR_CELL_WIDTH = 3;

function drawDatePicker(ctx: Ctx, area: Rect): void {
  const { app, frame, styles } = ctx;
  const picker = app.datePicker;
  if (!picker) return;
  const { selected } = picker;
  const calendarWidth = CALENDAR_CELL_WIDTH * 7;
  const inner = popupBox(ctx, area, picker.timeOpen ? calendarWidth + 18 : calendarWidth + 4, 13, "Pick a Date");
  const focusStyle = (focus: Focus) => (hasFocus(ctx, focus) ? styles.keyboard_focus_style : styles.general_style);

  const month = MONTH_NAMES[selected.month - 1] ?? "";
  const year = String(selected.year);
  frame.put(inner.x, inner.y, month, focusStyle("DatePickerMonth"), calendarWidth);
  addRegion(ctx, { x: inner.x, y: inner.y, width: textWidth(month), height: 1 }, "DatePickerMonth");
  const yearX = inner.x + calendarWidth - textWidth(year);
  frame.put(yearX, inner.y, year, focusStyle("DatePickerYear"), textWidth(year));
  addRegion(ctx, { x: yearX, y: inner.y, width: textWidth(year), height: 1 }, "DatePickerYear");

  weekdayHeader(app.config.datePickerCalendarFormat).forEach((name, i) => {
    frame.put(inner.x + i * CALENDAR_CELL_WIDTH, inner.y + 1, name, styles.help_key_style, CALENDAR_CELL_WIDTH);
  });
  monthGrid(selected.year, selected.month, app.config.datePickerCalendarFormat).forEach((week, w) => {
    week.forEach((cell, i) => {
      const x = inner.x + i * CALENDAR_CELL_WIDTH;
      const y = inner.y + 2 + w;
      const isSelected = cell.inMonth && cell.day === selected.day;
      let style = cell.inMonth ? styles.general_style : styles.inactive_text_style;
      if (isSelected) style = hasFocus(ctx, "DatePickerCalendar") ? styles.keyboard_focus_style : styles.list_select_style;
      frame.put(x, y, String(cell.day).padStart(2), style, 2);
      if (cell.inMonth) addRegion(ctx, { x, y, width: 2, height: 1 }, "DatePickerCalendar", { day: cell.day });
    });
  });

  const toggle = { x: inner.x, y: inner.y + 8, width: calendarWidth, height: 3 };
  button(ctx, toggle, picker.timeOpen ? "Hide Time" : "Show Time", "DatePickerTimeToggle");

  if (!picker.timeOpen) return;
  const column = { x: inner.x + calendarWidth + 2, y: inner.y, width: inner.width - calendarWidth - 2, height: 11 };
  const fields: [Focus, string, number][] = [
    ["DatePickerHour", "Hour", selected.hour],
    ["DatePickerMinute", "Minute", selected.minute],
    ["DatePickerSecond", "Second", selected.second],
  ];
  fields.forEach(([focus, label, value], i) => {
    const body = panel(ctx, { x: column.x, y: column.y + i * 3, width: column.width, height: 3 }, label, focus);
    putCentered(ctx, body, body.y, String(value).padStart(2, "0"), focusStyle(focus));
  });
}

function drawConfirm(ctx: Ctx, area: Rect, title: string, message: string, yes: string, no: string): void {
  const inner = popupBox(ctx, area, 64, 8, title);
  const [text, buttons] = splitRows(inner, [2, 3]);
  if (text) wrap(message, text.width).slice(0, 2).forEach((line, i) => putCentered(ctx, text, text.y + i, line, ctx.styles.general_style));
  if (buttons) {
    const [a, b] = splitColumns(buttons, 2);
    if (a) button(ctx, a, yes, "SubmitButton");
    if (b) button(ctx, b, no, "ExtraFocus");
  }
}

function colorRows(selectedColor: string | undefined): Row[] {
  return COLOR_CHOICES.map((choice) => {
    const isCurrent = choice === TERMINAL_DEFAULT_CHOICE ? selectedColor === undefined : choice === selectedColor;
    return row(isCurrent ? `${choice} ✓` : choice);
  });
}

function drawEditThemeStyle(ctx: Ctx, area: Rect): void {
  const { app } = ctx;
  const field = editedStyleField(app);
  const inner = popupBox(ctx, area, 90, 26, field ? `Edit ${field}` : "Edit Style");
  if (!field) return;
  const style = app.themeDraft.styles[field];
  const [lists, sample, done] = splitRows(inner, [0, 1, 3]);
  if (lists) {
    const [fg, bg, mods] = splitColumns(lists, 3);
    const column = (rect: Rect | undefined, title: string, focus: Focus, list: ListName, rows: Row[]) => {
      if (!rect) return;
      const body = panel(ctx, rect, title, focus);
      drawList(ctx, body, rows, { focus, list, selected: app.lists[list], highlight: hasFocus(ctx, focus) });
    };
    column(fg, "Foreground", "StyleEditorFG", "styleFg", colorRows(style.fg));
    column(bg, "Background", "StyleEditorBG", "styleBg", colorRows(style.bg));
    column(
      mods,
      "Modifiers",
      "StyleEditorModifier",
      "styleModifier",
      STYLE_MODIFIERS.map((m) => row(`[${style.modifiers.includes(m) ? "x" : " "}] ${m}`)),
    );
  }
  if (sample) putCentered(ctx, sample, sample.y, "Sample Text", style);
  if (done) button(ctx, done, "Done", "SubmitButton");
}

function drawPromptPopup(ctx: Ctx, area: Rect, title: string, fieldTitle: string, focus: Focus, submitLabel: string): void {
  const inner = popupBox(ctx, area, 60, 8, title);
  const [field, submit] = splitRows(inner, [3, 3]);
  if (field) textField(ctx, field, fieldTitle, focus, ctx.app.buffers.prompt);
  if (submit) button(ctx, submit, submitLabel, "SubmitButton");
}

function drawFilterByTag(ctx: Ctx, area: Rect): void {
  const { app } = ctx;
  const tags = calculateTags(app.boards);
  const inner = popupBox(ctx, area, 50, Math.min(24, tags.length + 7), "Filter by Tag");
  const [list, submit] = splitRows(inner, [0, 3]);
  if (list) {
    const body = panel(ctx, list, "Tags", "FilterByTagPopup");
    const rows = tags.map((t) => row(`[${app.tagSelection.includes(t.tag) ? "x" : " "}] ${t.tag} (${t.count})`));
    drawList(ctx, body, rows, {
      focus: "FilterByTagPopup",
      list: "tagFilter",
      selected: app.lists.tagFilter,
      highlight: hasFocus(ctx, "FilterByTagPopup"),
      emptyText: "No tags found",
    });
  }
  if (submit) button(ctx, submit, "Apply Filter", "SubmitButton");
}

function drawKeybindingPopup(ctx: Ctx, area: Rect): void {
  const { app, styles } = ctx;
  const action = KEY_ACTIONS[app.lists.keybindings];
  const inner = popupBox(ctx, area, 64, 10, action ? `Edit '${actionLabel(action)}'` : "Edit Keybinding");
  const [hint, keys, submit] = splitRows(inner, [1, 3, 3]);
  if (hint) {
    const text =
      app.status === "KeyBindMode"
        ? "Press the new keys, Enter to finish, Esc to cancel"
        : "Press Enter here to start recording keys";
    putCentered(ctx, hint, hint.y, text, styles.help_text_style);
  }
  if (keys) {
    const body = panel(ctx, keys, "Keys", "EditSpecificKeyBindingPopup");
    const captured = app.keybindingCapture.map(keyToString).join(", ");
    const shown = captured || (action ? bindingText(app, action) : "");
    ctx.frame.put(body.x, body.y, shown, captured ? styles.help_key_style : styles.inactive_text_style, body.width, true);
  }
  if (submit) button(ctx, submit, "Save", "SubmitButton");
}

function drawPopup(ctx: Ctx, area: Rect): void {
  const { app } = ctx;
  switch (app.popup) {
    case undefined:
      return;
    case "CommandPalette":
      drawPalette(ctx, area);
      return;
    case "ViewCard":
      drawViewCard(ctx, area);
      return;
    case "ConfirmDiscardCardChanges":
      drawConfirm(ctx, area, "Unsaved Changes", "This card has unsaved changes.", "Save Changes", "Discard Changes");
      return;
    case "CardStatusSelector": {
      const selected = app.cardEdit?.status ?? app.currentCard()?.status;
      const rows = CARD_STATUSES.map((s) => [{ text: s === selected ? `${s} (current)` : s, style: ctx.styles[STATUS_STYLES[s]] }]);
      selectorPopup(ctx, area, "Change Card Status", rows, "ChangeCardStatusPopup", "cardStatus", 34);
      return;
    }
    case "CardPrioritySelector": {
      const selected = app.cardEdit?.priority ?? app.currentCard()?.priority;
      const rows = CARD_PRIORITIES.map((p) => [{ text: p === selected ? `${p} (current)` : p, style: ctx.styles[PRIORITY_STYLES[p]] }]);
      selectorPopup(ctx, area, "Change Card Priority", rows, "ChangeCardPriorityPopup", "cardPriority", 34);
      return;
    }
    case "ChangeTheme":
      selectorPopup(
        ctx,
        area,
        app.defaultThemeMode ? "Select Default Theme" : "Change Theme",
        app.themes.map((t) => current(t.name, t.name === app.theme.name)),
        "ThemeSelector",
        "theme",
      );
      return;
    case "EditThemeStyle":
      drawEditThemeStyle(ctx, area);
      return;
    case "CustomHexColorPromptFG":
      drawPromptPopup(ctx, area, "Custom Foreground", "Hex color (#rrggbb)", "TextInput", "Apply");
      return;
    case "CustomHexColorPromptBG":
      drawPromptPopup(ctx, area, "Custom Background", "Hex color (#rrggbb)", "TextInput", "Apply");
      return;
    case "ChangeDateFormat":
      selectorPopup(
        ctx,
        area,
        "Change Date Format",
        DATE_TIME_FORMATS.map((f) => current(humanReadableFormat(f), f === app.config.dateTimeFormat)),
        "ChangeDateFormatPopup",
        "dateFormat",
      );
      return;
    case "FilterByTag":
      drawFilterByTag(ctx, area);
      return;
    case "SaveThemePrompt":
      drawConfirm(ctx, area, "Save Theme", `Set '${app.themeDraft.name}' as your default theme?`, "Yes", "No");
      return;
    case "ChangeView":
      selectorPopup(
        ctx,
        area,
        "Change View",
        KANBAN_VIEWS.map((v) => current(viewLabel(v), v === app.view)),
        "ChangeViewPopup",
        "changeView",
      );
      return;
    case "SelectDefaultView":
      selectorPopup(
        ctx,
        area,
        "Select Default View",
        KANBAN_VIEWS.map((v) => current(viewLabel(v), v === app.config.defaultView)),
        "SelectDefaultView",
        "defaultView",
      );
      return;
    case "EditGeneralConfig": {
      const field = CONFIG_FIELDS[app.lists.config];
      drawPromptPopup(ctx, area, "Edit Config", field?.label ?? "Value", "EditGeneralConfigPopup", "Save");
      return;
    }
    case "EditSpecificKeyBinding":
      drawKeybindingPopup(ctx, area);
      return;
    case "DateTimePicker":
      if (app.datePicker?.field === "CardDueDate") drawViewCard(ctx, area);
      drawDatePicker(ctx, area);
      return;
  }
}

const TOAST_STYLES: Record<ToastKind, ThemeStyleField> = {
  info: "log_info_style",
  warning: "log_warn_style",
  error: "log_error_style",
  loading: "progress_bar_style",
};

const TOAST_TITLES: Record<ToastKind, string> = {
  info: "Info",
  warning: "Warning",
  error: "Error",
  loading: "Loading",
};

function spinner(app: App): string {
  if (app.config.disableAnimations) return "…";
  return SPINNER[Math.floor(app.now() / 100) % SPINNER.length] ?? "…";
}

function drawToasts(ctx: Ctx, area: Rect): void {
  const { app, frame, styles } = ctx;
  const width = Math.min(50, Math.max(24, Math.floor(area.width / 3)), area.width);
  let y = area.y;
  for (const toast of app.toasts.visible()) {
    const lines = wrap(toast.message, width - 2).slice(0, TOAST_MAX_LINES);
    const height = lines.length + 2;
    if (y + height > area.y + area.height) break;
    const style = styles[TOAST_STYLES[toast.kind]];
    const title = toast.kind === "loading" ? `${spinner(app)} ${TOAST_TITLES[toast.kind]}` : TOAST_TITLES[toast.kind];
    const rect = { x: area.x + area.width - width, y, width, height };
    frame.box(rect, style, title);
    lines.forEach((line, i) => frame.put(rect.x + 1, rect.y + 1 + i, line, styles.general_style, width - 2, true));
    y += height;
  }
}

function drawLoading(ctx: Ctx, area: Rect): void {
  if (!ctx.app.loading) return;
  const text = ` ${spinner(ctx.app)} Loading `;
  const w = textWidth(text);
  ctx.frame.put(area.x + area.width - w - 1, area.y + area.height - 1, text, ctx.styles.progress_bar_style, w);
}

/** Draws the whole UI into `frame` and publishes the pointer regions on `app.regions`, topmost last. */
export function render(app: App, frame: Frame): void {
  app.regions = [];
  const ctx: Ctx = { app, frame, styles: app.theme.styles, layer: "view" };
  const area = frame.bounds;
  frame.fill(area, ctx.styles.general_style);
  if (area.width < MIN_WIDTH || area.height < MIN_HEIGHT) {
    const text = clip(`Terminal too small, need at least ${MIN_WIDTH}x${MIN_HEIGHT}`, area.width);
    frame.put(0, 0, text, ctx.styles.error_text_style, area.width);
    return;
  }
  drawView(ctx, area);
  if (app.popup) drawPopup({ ...ctx, layer: "popup" }, area);
  drawToasts(ctx, area);
  drawLoading(ctx, area);
}
