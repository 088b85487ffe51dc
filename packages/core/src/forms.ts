import type { App } from "./app";
import { changeCardPriority, changeCardStatus } from "./card-actions";
import { CONFIG_FIELDS, defaultConfig, toggleConfigValue } from "./config";
import {
  pickerValue,
  selectDay,
  shiftDays,
  shiftMonths,
  shiftSeconds,
  shiftYears,
  toggleCalendarFormat,
  toggleTime,
} from "./date-picker";
import { DATE_TIME_FORMATS, convertDueDate, humanReadableFormat } from "./dates";
import { calculateTags, completeTag } from "./filter";
import { KEY_ACTIONS, actionLabel, defaultKeyBindings, findOverlaps, keyToString, type Key } from "./keys";
import { CARD_PRIORITIES, CARD_STATUSES, touchCard } from "./model";
import { NAMED_COLORS, STYLE_MODIFIERS, THEME_STYLE_FIELDS, cloneTheme, isHexColor, toggleModifier, type ThemeStyleField } from "./themes";
import type { Direction } from "./projection";
import { KANBAN_VIEWS, viewLabel, type Focus } from "./ui-state";

export function submitLogin(app: App): void {
  app.status = "Initialized";
  app.dispatch({ type: "Login", email: app.buffers.email.text.trim(), password: app.buffers.password.text });
}

export function submitSignUp(app: App): void {
  app.status = "Initialized";
  app.dispatch({
    type: "SignUp",
    email: app.buffers.email.text.trim(),
    password: app.buffers.password.text,
    confirmPassword: app.buffers.confirmPassword.text,
  });
}

export function sendResetLink(app: App): void {
  app.status = "Initialized";
  app.dispatch({ type: "SendResetPasswordEmail", email: app.buffers.email.text.trim() });
}

export function submitResetPassword(app: App): void {
  app.status = "Initialized";
  app.dispatch({
    type: "ResetPassword",
    resetLink: app.buffers.resetLink.text.trim(),
    password: app.buffers.password.text,
    confirmPassword: app.buffers.confirmPassword.text,
  });
}

export function resetConfigToDefault(app: App, resetKeybindings: boolean): void {
  const keybindings = app.config.keybindings;
  const next = defaultConfig(app.env);
  if (!resetKeybindings) next.keybindings = keybindings;
  app.config = next;
  app.theme = app.themes.find((t) => t.name === next.defaultTheme) ?? app.theme;
  app.lists.config = 0;
  app.setFocus("ConfigTable");
  app.refreshVisible();
  app.dispatch({
    type: "SaveConfig",
    message: resetKeybindings ? "Reset Config and KeyBindings to default" : "Reset Config to default",
  });
}

/** Enter on the config menu: each row opens its own editor, booleans flip in place. */
export function configMenuAction(app: App): void {
  if (app.focus === "SubmitButton") {
    resetConfigToDefault(app, true);
    return;
  }
  if (app.focus === "ExtraFocus") {
    resetConfigToDefault(app, false);
    return;
  }
  const field = CONFIG_FIELDS[app.lists.config];
  if (!field) return;
  switch (field.kind) {
    case "keybindings":
      app.lists.keybindings = 0;
      app.setView("EditKeybindings");
      return;
    case "view":
      app.lists.defaultView = Math.max(0, KANBAN_VIEWS.indexOf(app.config.defaultView));
      app.setPopup("SelectDefaultView");
      return;
    case "boolean":
      app.config = toggleConfigValue(app.config, field.key);
      app.dispatch({ type: "SaveConfig", message: `${field.label} set to ${String(app.config[field.key])}` });
      return;
    case "theme":
      app.setPopup("ChangeTheme");
      app.defaultThemeMode = true;
      return;
    case "dateFormat":
      app.lists.dateFormat = Math.max(0, DATE_TIME_FORMATS.indexOf(app.config.dateTimeFormat));
      app.setPopup("ChangeDateFormat");
      return;
    case "calendarFormat": {
      const format = toggleCalendarFormat(app.config.datePickerCalendarFormat);
      app.config = { ...app.config, datePickerCalendarFormat: format };
      app.dispatch({ type: "SaveConfig", message: `${field.label} set to ${format}` });
      return;
    }
    case "path":
    case "number":
      app.setPopup("EditGeneralConfig");
      return;
  }
}

export function submitGeneralConfig(app: App): void {
  const field = CONFIG_FIELDS[app.lists.config];
  if (!field) {
    app.closePopup();
    return;
  }
  app.dispatch({ type: "UpdateConfig", field: field.key, value: app.buffers.prompt.text });
  app.buffers.prompt.reset();
  app.closePopup();
}

export function chooseDefaultView(app: App): void {
  const view = KANBAN_VIEWS[app.lists.defaultView];
  if (!view) return;
  app.config = { ...app.config, defaultView: view };
  app.dispatch({ type: "SaveConfig", message: `Default view set to ${viewLabel(view)}` });
  app.closePopup();
}

export function chooseView(app: App): void {
  const view = KANBAN_VIEWS[app.lists.changeView];
  app.closePopup();
  if (view) app.setView(view);
}

/**
 * Switches the date format and rewrites every stored due date into it,
 * undo history included, so restored cards read in the new format.
 */
export function chooseDateFormat(app: App): void {
  const format = DATE_TIME_FORMATS[app.lists.dateFormat];
  if (!format) return;
  const from = app.config.dateTimeFormat;
  const now = app.date();
  for (const board of app.boards) {
    for (const card of board.cards) {
      const dueDate = convertDueDate(card.dueDate, from, format);
      if (dueDate === card.dueDate) continue;
      card.dueDate = dueDate;
      touchCard(card, now);
    }
  }
  app.history.forEachCard((card) => {
    card.dueDate = convertDueDate(card.dueDate, from, format);
  });
  app.config = { ...app.config, dateTimeFormat: format };
  app.refilter();
  app.dispatch({ type: "SaveConfig", message: `Date format changed to ${humanReadableFormat(format)}` });
  app.closePopup();
}

export function chooseTheme(app: App): void {
  const theme = app.themes[app.lists.theme];
  if (!theme) return;
  app.theme = theme;
  if (app.defaultThemeMode) {
    app.config = { ...app.config, defaultTheme: theme.name };
    app.dispatch({ type: "SaveConfig", message: `Default theme set to '${theme.name}'` });
  } else {
    app.info(`Theme changed to '${theme.name}'`);
  }
  app.closePopup();
}

/** From a nested selector the choice is staged on the card edit; otherwise it applies to the selected card. */
export function chooseCardStatus(app: App): void {
  const status = CARD_STATUSES[app.lists.cardStatus];
  if (!status) return;
  if (app.isNestedPopup() && app.cardEdit) app.cardEdit.status = status;
  else changeCardStatus(app, status);
  app.closePopup();
}

export function chooseCardPriority(app: App): void {
  const priority = CARD_PRIORITIES[app.lists.cardPriority];
  if (!priority) return;
  if (app.isNestedPopup() && app.cardEdit) app.cardEdit.priority = priority;
  else changeCardPriority(app, priority);
  app.closePopup();
}

export function availableTags(app: App): string[] {
  return calculateTags(app.boards).map((t) => t.tag);
}

export function toggleTagSelection(app: App): void {
  const tag = availableTags(app)[app.lists.tagFilter];
  if (!tag) return;
  app.tagSelection = app.tagSelection.includes(tag)
    ? app.tagSelection.filter((t) => t !== tag)
    : [...app.tagSelection, tag];
}

export function submitTagFilter(app: App): void {
  if (app.applyTagFilter(app.tagSelection)) app.closePopup();
}

export function captureKey(app: App, key: Key): void {
  if (app.keybindingCapture.some((k) => keyToString(k) === keyToString(key))) return;
  app.keybindingCapture = [...app.keybindingCapture, key];
}

export function submitKeybinding(app: App): boolean {
  const action = KEY_ACTIONS[app.lists.keybindings];
  if (!action) return false;
  if (app.keybindingCapture.length === 0) {
    app.warn("No keys entered");
    return false;
  }
  const bindings = { ...app.config.keybindings, [action]: app.keybindingCapture };
  const clash = findOverlaps(bindings).find((o) => o.actions.includes(action));
  if (clash) {
    const other = clash.actions.find((a) => a !== action) ?? action;
    app.error(`Key '${clash.key}' is already bound to '${actionLabel(other)}'`);
    return false;
  }
  app.config = { ...app.config, keybindings: bindings };
  app.keybindingCapture = [];
  app.dispatch({ type: "SaveConfig", message: `Keybinding for '${actionLabel(action)}' updated` });
  app.closePopup();
  return true;
}

export function resetKeybindings(app: App): void {
  app.config = { ...app.config, keybindings: defaultKeyBindings() };
  app.dispatch({ type: "SaveConfig", message: "Reset keybindings to default" });
}

export const CUSTOM_HEX_CHOICE = "Custom Hex";
export const TERMINAL_DEFAULT_CHOICE = "Terminal Default";

/** Rows of the fg and bg lists in the style editor. */
export const COLOR_CHOICES: readonly string[] = [TERMINAL_DEFAULT_CHOICE, ...NAMED_COLORS, CUSTOM_HEX_CHOICE];

/** Row 0 is the theme name, then one row per style. */
export function themeEditorRows(): string[] {
  return ["Theme Name", ...THEME_STYLE_FIELDS];
}

export function editedStyleField(app: App): ThemeStyleField | undefined {
  return THEME_STYLE_FIELDS[app.lists.themeEditor - 1];
}

export function themeEditorAction(app: App): void {
  if (app.focus === "SubmitButton") {
    submitThemeDraft(app);
    return;
  }
  if (app.focus === "ExtraFocus") {
    app.themeDraft = cloneTheme(app.theme);
    app.buffers.themeName.reset();
    app.info("Theme editor reset");
    return;
  }
  if (app.lists.themeEditor === 0) {
    app.status = "UserInput";
    return;
  }
  if (!editedStyleField(app)) return;
  app.lists.styleFg = 0;
  app.lists.styleBg = 0;
  app.lists.styleModifier = 0;
  app.setPopup("EditThemeStyle");
}

function setDraftColor(app: App, which: "fg" | "bg", color: string | undefined): void {
  const field = editedStyleField(app);
  if (!field) return;
  const style = { ...app.themeDraft.styles[field] };
  if (color === undefined) delete style[which];
  else style[which] = color;
  app.themeDraft.styles[field] = style;
}

export function chooseStyleColor(app: App, which: "fg" | "bg"): void {
  const choice = COLOR_CHOICES[which === "fg" ? app.lists.styleFg : app.lists.styleBg];
  if (choice === undefined) return;
  if (choice === CUSTOM_HEX_CHOICE) {
    app.setPopup(which === "fg" ? "CustomHexColorPromptFG" : "CustomHexColorPromptBG");
    return;
  }
  setDraftColor(app, which, choice === TERMINAL_DEFAULT_CHOICE ? undefined : choice);
}

export function toggleStyleModifier(app: App): void {
  const field = editedStyleField(app);
  const modifier = STYLE_MODIFIERS[app.lists.styleModifier];
  if (!field || !modifier) return;
  app.themeDraft.styles[field] = toggleModifier(app.themeDraft.styles[field], modifier);
}

export function submitHexColor(app: App): boolean {
  const raw = app.buffers.prompt.text.trim();
  if (!isHexColor(raw)) {
    app.warn(`Invalid hex color '${raw}', expected #rrggbb`);
    return false;
  }
  setDraftColor(app, app.popup === "CustomHexColorPromptBG" ? "bg" : "fg", raw.toLowerCase());
  app.buffers.prompt.reset();
  app.closePopup();
  return true;
}

export function submitThemeDraft(app: App): boolean {
  const name = app.buffers.themeName.text.trim();
  if (!name) {
    app.warn("Theme name cannot be empty");
    return false;
  }
  app.themeDraft.name = name;
  app.setPopup("SaveThemePrompt");
  return true;
}

export function saveThemeDraft(app: App, setDefault: boolean): void {
  const theme = cloneTheme(app.themeDraft);
  app.themes = [...app.themes.filter((t) => t.name !== theme.name), theme];
  app.theme = theme;
  app.dispatch({ type: "SaveTheme", theme, setDefault });
  app.closeAllPopups();
  app.goToPreviousView();
}

const TIME_STEPS: Partial<Record<Focus, number>> = {
  DatePickerHour: 3600,
  DatePickerMinute: 60,
  DatePickerSecond: 1,
};

const TIME_NEIGHBOURS: Partial<Record<Focus, { Left?: Focus; Right?: Focus }>> = {
  DatePickerHour: { Right: "DatePickerMinute" },
  DatePickerMinute: { Left: "DatePickerHour", Right: "DatePickerSecond" },
  DatePickerSecond: { Left: "DatePickerMinute" },
};

/**
 * Arrow keys in the date picker. The calendar moves by day and week, the
 * month and year headers page, and the time fields count up and down with
 * left and right moving between them.
 */
export function moveDatePicker(app: App, direction: Direction): void {
  const picker = app.datePicker;
  if (!picker) return;
  const back = direction === "Up" || direction === "Left";
  let selected = picker.selected;
  switch (app.focus) {
    case "DatePickerCalendar": {
      const days = { Up: -7, Down: 7, Left: -1, Right: 1 }[direction];
      selected = shiftDays(selected, days);
      break;
    }
    case "DatePickerMonth":
      selected = shiftMonths(selected, back ? -1 : 1);
      break;
    case "DatePickerYear":
      selected = shiftYears(selected, back ? -1 : 1);
      break;
    default: {
      const step = TIME_STEPS[app.focus];
      if (step === undefined) return;
      if (direction === "Left" || direction === "Right") {
        const next = TIME_NEIGHBOURS[app.focus]?.[direction];
        if (next) app.setFocus(next);
        return;
      }
      selected = shiftSeconds(selected, direction === "Up" ? -step : step);
    }
  }
  app.datePicker = { ...picker, selected };
}

export function toggleDatePickerTime(app: App): void {
  if (app.datePicker) app.datePicker = toggleTime(app.datePicker);
}

/** Selects a day of the month shown, as a click on the calendar does. */
export function pickDay(app: App, day: number): void {
  if (app.datePicker) app.datePicker = selectDay(app.datePicker, day);
}

/** Writes the picked date into the field the picker was opened from and closes it. */
export function submitDatePicker(app: App): void {
  const picker = app.datePicker;
  if (!picker) {
    app.closePopup();
    return;
  }
  const box = picker.field === "CardDueDate" ? app.buffers.cardDueDate : app.buffers.newCardDueDate;
  box.setText(pickerValue(picker, app.config.dateTimeFormat));
  app.closePopup();
}

/** Replaces the tag being typed with the highlighted suggestion. */
export function completeTagSuggestion(app: App): boolean {
  const suggestions = app.tagSuggestions();
  const tag = suggestions[app.lists.tagSuggestion] ?? suggestions[0];
  if (!tag) return false;
  app.buffers.cardTags.setText(completeTag(app.buffers.cardTags.text, tag));
  app.lists.tagSuggestion = 0;
  return true;
}
