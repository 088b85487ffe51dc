import type { App, ListName } from "./app";
import {
  changeCardPriority,
  changeCardStatus,
  deleteCurrentBoard,
  deleteCurrentCard,
  discardCardEdit,
  goDirection,
  moveCard,
  openNewCardForm,
  redo,
  submitCardEdit,
  submitNewBoard,
  submitNewCard,
  undo,
} from "./card-actions";
import { clampPaletteSelection, paletteAccept, paletteResults, runCommand } from "./command-palette";
import { CONFIG_FIELDS } from "./config";
import { DATE_TIME_FORMATS } from "./dates";
import {
  COLOR_CHOICES,
  availableTags,
  captureKey,
  chooseCardPriority,
  chooseCardStatus,
  chooseDateFormat,
  chooseDefaultView,
  chooseStyleColor,
  chooseTheme,
  chooseView,
  completeTagSuggestion,
  configMenuAction,
  moveDatePicker,
  resetKeybindings,
  saveThemeDraft,
  sendResetLink,
  submitDatePicker,
  submitGeneralConfig,
  submitHexColor,
  submitKeybinding,
  submitLogin,
  submitResetPassword,
  submitSignUp,
  submitTagFilter,
  themeEditorAction,
  themeEditorRows,
  toggleDatePickerTime,
  toggleStyleModifier,
  toggleTagSelection,
} from "./forms";
import { KEY_ACTIONS, actionForKey, keyChar, type Key, type KeyAction } from "./keys";
import { CARD_PRIORITIES, CARD_STATUSES } from "./model";
import type { Direction } from "./projection";
import { STYLE_MODIFIERS } from "./themes";
import { KANBAN_VIEWS, isKanbanView, type Focus, type View } from "./ui-state";

/** Card-view fields where Enter breaks the line instead of moving on. */
const MULTI_LINE_CARD_FIELDS: ReadonlySet<Focus> = new Set(["CardDescription", "CardComments"]);

/** Routes one key press by the current input mode. Focus stays on a target of the active view or popup. */
export function handleKey(app: App, key: Key): void {
  switch (app.status) {
    case "KeyBindMode":
      handleKeyBindMode(app, key);
      break;
    case "UserInput":
      handleUserInput(app, key);
      break;
    case "Initialized":
      handleAction(app, key);
      break;
  }
  app.setFocus(app.focus);
}

function handleKeyBindMode(app: App, key: Key): void {
  if (!key.ctrl && !key.alt && key.name === "esc") {
    app.keybindingCapture = [];
    app.status = "Initialized";
    return;
  }
  if (!key.ctrl && !key.alt && key.name === "enter") {
    app.status = "Initialized";
    app.setFocus("SubmitButton");
    return;
  }
  captureKey(app, key);
}

function isPlain(key: Key, name: string): boolean {
  return key.name === name && !key.ctrl && !key.alt;
}

function handleUserInput(app: App, key: Key): void {
  if (keyChar(key) === undefined) {
    const action = actionForKey(app.config.keybindings, key);
    if (action === "go_to_previous_view_or_cancel") {
      cancelUserInput(app);
      return;
    }
    if (action === "stop_user_input") {
      app.status = "Initialized";
      return;
    }
    if (action === "toggle_command_palette") {
      togglePalette(app);
      return;
    }
  }

  if (app.popup === "CommandPalette") {
    paletteInput(app, key);
    return;
  }

  if (tagSuggestionInput(app, key)) return;

  const buffer = app.bufferFor(app.focus);
  const multiLine = app.popup === "ViewCard" && MULTI_LINE_CARD_FIELDS.has(app.focus);

  if (isPlain(key, "enter") && !multiLine) {
    if (!buffer) {
      app.status = "Initialized";
      accept(app);
      return;
    }
    switch (app.popup) {
      case "EditGeneralConfig":
        submitGeneralConfig(app);
        return;
      case "CustomHexColorPromptFG":
      case "CustomHexColorPromptBG":
        submitHexColor(app);
        return;
      default:
        break;
    }
    if (app.view === "CreateTheme" && !app.popup) {
      app.status = "Initialized";
      return;
    }
    moveInputFocus(app, "next");
    return;
  }
  if (key.name === "tab" && !key.ctrl && !key.alt && !(app.popup === "ViewCard" && app.focus === "CardDescription")) {
    moveInputFocus(app, "next");
    return;
  }
  if (isPlain(key, "backtab")) {
    moveInputFocus(app, "prev");
    return;
  }
  if (!buffer) return;
  if (app.popup === "ViewCard" && !app.beginCardEdit()) return;
  if (buffer.input(key) && app.focus === "CardTags") app.lists.tagSuggestion = 0;
}

/** Up and down pick a tag suggestion, enter and tab take it. */
function tagSuggestionInput(app: App, key: Key): boolean {
  const suggestions = app.tagSuggestions();
  if (suggestions.length === 0) return false;
  if (isPlain(key, "up") || isPlain(key, "down")) {
    stepList(app, "tagSuggestion", suggestions.length, key.name === "up" ? "prev" : "next");
    return true;
  }
  if (isPlain(key, "enter") || isPlain(key, "tab")) return completeTagSuggestion(app);
  return false;
}

function moveInputFocus(app: App, direction: "next" | "prev"): void {
  if (direction === "next") app.nextFocus();
  else app.prevFocus();
  if (!app.bufferFor(app.focus)) app.status = "Initialized";
}

/**
 * Esc while typing. The card view asks before dropping pending edits, the
 * palette closes, any other form clears the field being typed in.
 */
function cancelUserInput(app: App): void {
  if (app.popup === "ViewCard") {
    if (app.hasPendingCardEdits()) app.setPopup("ConfirmDiscardCardChanges");
    else app.closePopup();
    return;
  }
  if (app.popup === "CommandPalette") {
    app.closePopup();
    return;
  }
  app.bufferFor(app.focus)?.reset();
  app.status = "Initialized";
}

const PALETTE_LISTS: Partial<Record<Focus, ListName>> = {
  CommandPaletteCommand: "paletteCommand",
  CommandPaletteCard: "paletteCard",
  CommandPaletteBoard: "paletteBoard",
};

function paletteInput(app: App, key: Key): void {
  const results = paletteResults(app);
  if (isPlain(key, "enter")) {
    paletteAccept(app);
    return;
  }
  if (isPlain(key, "tab") || isPlain(key, "backtab")) {
    const leaving = PALETTE_LISTS[app.focus];
    if (leaving) app.lists[leaving] = 0;
    if (key.name === "tab") app.nextFocus();
    else app.prevFocus();
    return;
  }
  if (isPlain(key, "up") || isPlain(key, "down")) {
    const step = key.name === "up" ? "prev" : "next";
    switch (app.focus) {
      case "CommandPaletteCommand":
        stepList(app, "paletteCommand", results.commands.length, step);
        return;
      case "CommandPaletteCard":
        stepList(app, "paletteCard", results.cards.length, step);
        return;
      case "CommandPaletteBoard":
        stepList(app, "paletteBoard", results.boards.length, step);
        return;
      default:
        return;
    }
  }
  const before = app.buffers.paletteSearch.text;
  app.buffers.paletteSearch.input(key);
  if (app.buffers.paletteSearch.text !== before) {
    app.lists.paletteCommand = 0;
    app.lists.paletteCard = 0;
    app.lists.paletteBoard = 0;
  }
  clampPaletteSelection(app);
}

function stepList(app: App, list: ListName, length: number, step: "next" | "prev"): void {
  if (step === "next") app.selectNext(list, length);
  else app.selectPrev(list, length);
}

/** Opens the palette, or closes it when open. Pending card edits are confirmed first. */
export function togglePalette(app: App): void {
  if (app.popup === "CommandPalette") {
    app.closePopup();
    return;
  }
  if (app.popup === "ViewCard" && app.hasPendingCardEdits()) {
    app.setPopup("ConfirmDiscardCardChanges");
    return;
  }
  app.closeAllPopups();
  app.setPopup("CommandPalette");
}

/** Enters typing mode on the focused text field. */
export function startUserInput(app: App): void {
  if (!app.bufferFor(app.focus)) return;
  if (app.popup === "ViewCard" && !app.beginCardEdit()) return;
  app.status = "UserInput";
}

const DIRECTIONS: Partial<Record<KeyAction, Direction>> = {
  up: "Up",
  down: "Down",
  left: "Left",
  right: "Right",
};

const CARD_MOVES: Partial<Record<KeyAction, Direction>> = {
  move_card_up: "Up",
  move_card_down: "Down",
  move_card_left: "Left",
  move_card_right: "Right",
};

function onBoards(app: App): boolean {
  return isKanbanView(app.view) && !app.popup;
}

function handleAction(app: App, key: Key): void {
  const action = actionForKey(app.config.keybindings, key);
  if (!action) return;

  const direction = DIRECTIONS[action];
  if (direction) {
    directional(app, direction);
    return;
  }
  const move = CARD_MOVES[action];
  if (move) {
    if (onBoards(app) && app.focus === "Body") moveCard(app, move);
    return;
  }

  switch (action) {
    case "quit":
      app.quit();
      return;
    case "next_focus":
      app.nextFocus();
      return;
    case "prv_focus":
      app.prevFocus();
      return;
    case "open_config_menu":
      if (app.popup) return;
      app.lists.config = 0;
      app.setView("ConfigMenu");
      return;
    case "take_user_input":
      startUserInput(app);
      return;
    case "stop_user_input":
      return;
    case "hide_ui_element":
      if (!app.popup) hideUiElement(app);
      return;
    case "save_state":
      app.dispatch({ type: "SaveLocalData" });
      return;
    case "new_board":
      if (onBoards(app)) app.setView("NewBoard");
      return;
    case "new_card":
      if (onBoards(app)) openNewCardForm(app);
      return;
    case "delete_card":
      if (app.popup) return;
      if (isKanbanView(app.view) && app.focus === "Body") deleteCurrentCard(app);
      else if (app.view === "LoadLocalSave") app.dispatch({ type: "DeleteLocalSave" });
      else if (app.view === "LoadCloudSave") app.dispatch({ type: "DeleteCloudSave" });
      return;
    case "delete_board":
      if (onBoards(app)) deleteCurrentBoard(app);
      return;
    case "change_card_status_to_completed":
      if (onBoards(app)) changeCardStatus(app, "Complete");
      return;
    case "change_card_status_to_active":
      if (onBoards(app)) changeCardStatus(app, "Active");
      return;
    case "change_card_status_to_stale":
      if (onBoards(app)) changeCardStatus(app, "Stale");
      return;
    case "change_card_priority_to_high":
      if (onBoards(app)) changeCardPriority(app, "High");
      return;
    case "change_card_priority_to_medium":
      if (onBoards(app)) changeCardPriority(app, "Medium");
      return;
    case "change_card_priority_to_low":
      if (onBoards(app)) changeCardPriority(app, "Low");
      return;
    case "reset_ui":
      runCommand(app, "Reset UI");
      return;
    case "go_to_main_menu":
      app.closeAllPopups();
      app.lists.mainMenu = 0;
      app.setView("MainMenu");
      return;
    case "toggle_command_palette":
      togglePalette(app);
      return;
    case "undo":
      if (onBoards(app)) undo(app);
      return;
    case "redo":
      if (onBoards(app)) redo(app);
      return;
    case "clear_all_toasts":
      app.toasts.clear();
      app.logger.info("Cleared all toasts");
      return;
    case "go_to_previous_view_or_cancel":
      goBack(app);
      return;
    case "accept":
      accept(app);
      return;
    default:
      return;
  }
}

/** Arrow keys: navigation on the board body, selection in lists, focus steps in forms. */
export function directional(app: App, direction: Direction): void {
  const vertical = direction === "Up" || direction === "Down";
  const step = direction === "Up" ? "prev" : "next";

  if (app.popup === "DateTimePicker") {
    moveDatePicker(app, direction);
    return;
  }
  if (app.popup) {
    if (!vertical) return;
    switch (app.focus) {
      case "ChangeCardStatusPopup":
        stepList(app, "cardStatus", CARD_STATUSES.length, step);
        return;
      case "ChangeCardPriorityPopup":
        stepList(app, "cardPriority", CARD_PRIORITIES.length, step);
        return;
      case "ThemeSelector":
        stepList(app, "theme", app.themes.length, step);
        return;
      case "ChangeDateFormatPopup":
        stepList(app, "dateFormat", DATE_TIME_FORMATS.length, step);
        return;
      case "FilterByTagPopup":
        stepList(app, "tagFilter", availableTags(app).length, step);
        return;
      case "ChangeViewPopup":
        stepList(app, "changeView", KANBAN_VIEWS.length, step);
        return;
      case "SelectDefaultView":
        stepList(app, "defaultView", KANBAN_VIEWS.length, step);
        return;
      case "StyleEditorFG":
        stepList(app, "styleFg", COLOR_CHOICES.length, step);
        return;
      case "StyleEditorBG":
        stepList(app, "styleBg", COLOR_CHOICES.length, step);
        return;
      case "StyleEditorModifier":
        stepList(app, "styleModifier", STYLE_MODIFIERS.length, step);
        return;
      case "CommandPaletteCommand":
      case "CommandPaletteCard":
      case "CommandPaletteBoard":
        app.status = "UserInput";
        paletteInput(app, { name: direction === "Up" ? "up" : "down", ctrl: false, alt: false, shift: false });
        return;
      default:
        if (step === "next") app.nextFocus();
        else app.prevFocus();
        return;
    }
  }

  switch (app.focus) {
    case "Body":
      goDirection(app, direction);
      return;
    case "Help":
      if (vertical) stepList(app, "help", KEY_ACTIONS.length, step);
      return;
    case "Log":
      if (vertical) stepList(app, "log", app.logger.entries().length, step);
      return;
    case "MainMenu":
      if (vertical) stepList(app, "mainMenu", app.mainMenuItems().length, step);
      return;
    case "ConfigTable":
      if (vertical) stepList(app, "config", CONFIG_FIELDS.length, step);
      return;
    case "EditKeybindingsTable":
      if (vertical) stepList(app, "keybindings", KEY_ACTIONS.length, step);
      return;
    case "ThemeEditor":
      if (vertical) stepList(app, "themeEditor", themeEditorRows().length, step);
      return;
    case "LoadSave": {
      if (!vertical) return;
      const local = app.view === "LoadLocalSave";
      stepList(app, "loadSave", local ? app.localSaves.length : app.cloudSaves.length, step);
      app.dispatch({ type: local ? "LoadLocalPreview" : "LoadCloudPreview" });
      return;
    }
    default:
      if (!vertical) return;
      if (step === "next") app.nextFocus();
      else app.prevFocus();
      return;
  }
}

interface Layout {
  title: boolean;
  help: boolean;
  log: boolean;
}

function layoutOf(view: View): Layout {
  return {
    title: view.startsWith("Title"),
    help: view.includes("Help"),
    log: view.includes("Log"),
  };
}

function viewOf(layout: Layout): View {
  const name = `${layout.title ? "Title" : ""}Body${layout.help ? "Help" : ""}${layout.log ? "Log" : ""}`;
  return KANBAN_VIEWS.find((v) => v === name) ?? "Zen";
}

/** Drops the focused panel from the board layout; from the body or Zen it leaves for the main menu. */
export function hideUiElement(app: App): void {
  if (!isKanbanView(app.view)) return;
  if (app.view === "Zen" || app.focus === "Body") {
    app.setView("MainMenu");
    return;
  }
  const layout = layoutOf(app.view);
  if (app.focus === "Title") layout.title = false;
  else if (app.focus === "Help") layout.help = false;
  else if (app.focus === "Log") layout.log = false;
  app.setView(viewOf(layout));
  app.setFocus("Body");
}

/** Esc outside typing mode: closes the popup, quits from the main menu, otherwise steps back. */
export function goBack(app: App): void {
  if (app.popup) {
    if (app.popup === "FilterByTag") app.tagSelection = [];
    if (app.popup === "EditSpecificKeyBinding") app.keybindingCapture = [];
    app.closePopup();
    return;
  }
  switch (app.view) {
    case "MainMenu":
      app.quit();
      return;
    case "EditKeybindings":
      app.setView("ConfigMenu");
      return;
    default:
      app.goToPreviousView();
      return;
  }
}

function mainMenuAction(app: App): void {
  const item = app.mainMenuItems()[app.lists.mainMenu];
  switch (item) {
    case "View your Boards":
      app.setView(app.config.defaultView);
      app.refreshVisible();
      return;
    case "Configure":
      app.lists.config = 0;
      app.setView("ConfigMenu");
      return;
    case "Help":
      app.lists.help = 0;
      app.setView("HelpMenu");
      return;
    case "Load a Save (local)":
      runCommand(app, "Load a Save (Local)");
      return;
    case "Load a Save (cloud)":
      runCommand(app, "Load a Save (Cloud)");
      return;
    case "Quit":
      app.quit();
      return;
    default:
      return;
  }
}

/** Enter outside typing mode, routed by popup, then view, then focus. */
export function accept(app: App): void {
  if (app.popup) {
    acceptInPopup(app);
    return;
  }
  if (isKanbanView(app.view)) {
    if (app.focus !== "Body") return;
    if (app.currentCard()) app.setPopup("ViewCard");
    else app.error("No card selected");
    return;
  }
  if (app.view === "NewCard" && app.focus === "NewCardDueDate") {
    app.openDatePicker("NewCardDueDate");
    return;
  }
  if (app.bufferFor(app.focus)) {
    startUserInput(app);
    return;
  }
  switch (app.view) {
    case "MainMenu":
      if (app.focus === "MainMenu") mainMenuAction(app);
      return;
    case "ConfigMenu":
      configMenuAction(app);
      return;
    case "EditKeybindings":
      if (app.focus === "SubmitButton") resetKeybindings(app);
      else app.setPopup("EditSpecificKeyBinding");
      return;
    case "NewBoard":
      if (app.focus === "SubmitButton") submitNewBoard(app);
      return;
    case "NewCard":
      if (app.focus === "SubmitButton") submitNewCard(app);
      return;
    case "LoadLocalSave":
      app.dispatch({ type: "LoadSaveLocal" });
      return;
    case "LoadCloudSave":
      app.dispatch({ type: "LoadSaveCloud" });
      return;
    case "Login":
      if (app.focus === "ExtraFocus") app.setShowPassword(!app.showPassword);
      else if (app.focus === "SubmitButton") submitLogin(app);
      return;
    case "SignUp":
      if (app.focus === "ExtraFocus") app.setShowPassword(!app.showPassword);
      else if (app.focus === "SubmitButton") submitSignUp(app);
      return;
    case "ResetPassword":
      if (app.focus === "ExtraFocus") app.setShowPassword(!app.showPassword);
      else if (app.focus === "SendResetPasswordLinkButton") sendResetLink(app);
      else if (app.focus === "SubmitButton") submitResetPassword(app);
      return;
    case "CreateTheme":
      themeEditorAction(app);
      return;
    default:
      return;
  }
}

function acceptInPopup(app: App): void {
  switch (app.popup) {
    case "CommandPalette":
      paletteAccept(app);
      return;
    case "ViewCard":
      if (app.focus === "SubmitButton") submitCardEdit(app);
      else if (app.focus === "CardStatus") {
        if (app.beginCardEdit()) app.setPopup("CardStatusSelector");
      } else if (app.focus === "CardPriority") {
        if (app.beginCardEdit()) app.setPopup("CardPrioritySelector");
      } else if (app.focus === "CardDueDate") {
        if (app.beginCardEdit()) app.openDatePicker("CardDueDate");
      } else startUserInput(app);
      return;
    case "ConfirmDiscardCardChanges":
      if (app.focus === "SubmitButton") submitCardEdit(app);
      else discardCardEdit(app);
      return;
    case "CardStatusSelector":
      chooseCardStatus(app);
      return;
    case "DateTimePicker":
      if (app.focus === "DatePickerTimeToggle") toggleDatePickerTime(app);
      else submitDatePicker(app);
      return;
    case "CardPrioritySelector":
      chooseCardPriority(app);
      return;
    case "ChangeTheme":
      chooseTheme(app);
      return;
    case "EditThemeStyle":
      if (app.focus === "StyleEditorFG") chooseStyleColor(app, "fg");
      else if (app.focus === "StyleEditorBG") chooseStyleColor(app, "bg");
      else if (app.focus === "StyleEditorModifier") toggleStyleModifier(app);
      else app.closePopup();
      return;
    case "CustomHexColorPromptFG":
    case "CustomHexColorPromptBG":
      if (app.focus === "SubmitButton") submitHexColor(app);
      else startUserInput(app);
      return;
    case "ChangeDateFormat":
      chooseDateFormat(app);
      return;
    case "FilterByTag":
      if (app.focus === "SubmitButton") submitTagFilter(app);
      else toggleTagSelection(app);
      return;
    case "SaveThemePrompt":
      saveThemeDraft(app, app.focus === "SubmitButton");
      return;
    case "ChangeView":
      chooseView(app);
      return;
    case "SelectDefaultView":
      chooseDefaultView(app);
      return;
    case "EditGeneralConfig":
      if (app.focus === "SubmitButton") submitGeneralConfig(app);
      else startUserInput(app);
      return;
    case "EditSpecificKeyBinding":
      if (app.focus === "SubmitButton") submitKeybinding(app);
      else {
        app.keybindingCapture = [];
        app.status = "KeyBindMode";
      }
      return;
    default:
      return;
  }
}
