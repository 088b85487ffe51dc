export type View =
  | "Zen"
  | "TitleBody"
  | "BodyHelp"
  | "BodyLog"
  | "TitleBodyHelp"
  | "TitleBodyLog"
  | "BodyHelpLog"
  | "TitleBodyHelpLog"
  | "MainMenu"
  | "ConfigMenu"
  | "EditKeybindings"
  | "HelpMenu"
  | "LogsOnly"
  | "NewBoard"
  | "NewCard"
  | "LoadLocalSave"
  | "LoadCloudSave"
  | "Login"
  | "SignUp"
  | "ResetPassword"
  | "CreateTheme";

export type PopUp =
  | "CommandPalette"
  | "ViewCard"
  | "ConfirmDiscardCardChanges"
  | "CardStatusSelector"
  | "CardPrioritySelector"
  | "ChangeTheme"
  | "EditThemeStyle"
  | "CustomHexColorPromptFG"
  | "CustomHexColorPromptBG"
  | "ChangeDateFormat"
  | "FilterByTag"
  | "SaveThemePrompt"
  | "ChangeView"
  | "SelectDefaultView"
  | "EditGeneralConfig"
  | "EditSpecificKeyBinding"
  | "DateTimePicker";

export type Focus =
  | "Title"
  | "Body"
  | "Help"
  | "Log"
  | "ConfigTable"
  | "EditKeybindingsTable"
  | "MainMenu"
  | "MainMenuHelp"
  | "NewBoardName"
  | "NewBoardDescription"
  | "NewCardName"
  | "NewCardDescription"
  | "NewCardDueDate"
  | "CardName"
  | "CardDescription"
  | "CardDueDate"
  | "CardPriority"
  | "CardStatus"
  | "CardTags"
  | "CardComments"
  | "LoadSave"
  | "EmailIDField"
  | "PasswordField"
  | "ConfirmPasswordField"
  | "ResetPasswordLinkField"
  | "SendResetPasswordLinkButton"
  | "CommandPaletteCommand"
  | "CommandPaletteCard"
  | "CommandPaletteBoard"
  | "ChangeCardStatusPopup"
  | "ChangeCardPriorityPopup"
  | "ChangeDateFormatPopup"
  | "ChangeViewPopup"
  | "SelectDefaultView"
  | "ThemeSelector"
  | "ThemeEditor"
  | "StyleEditorFG"
  | "StyleEditorBG"
  | "StyleEditorModifier"
  | "TextInput"
  | "FilterByTagPopup"
  | "EditGeneralConfigPopup"
  | "EditSpecificKeyBindingPopup"
  | "DatePickerCalendar"
  | "DatePickerMonth"
  | "DatePickerYear"
  | "DatePickerTimeToggle"
  | "DatePickerHour"
  | "DatePickerMinute"
  | "DatePickerSecond"
  | "SubmitButton"
  | "ExtraFocus"
  | "NoFocus";

export type AppStatus = "Initialized" | "UserInput" | "KeyBindMode";

/** Board layouts, in the order the change-view popup lists them. */
export const KANBAN_VIEWS: readonly View[] = [
  "Zen",
  "TitleBody",
  "BodyHelp",
  "BodyLog",
  "TitleBodyHelp",
  "TitleBodyLog",
  "BodyHelpLog",
  "TitleBodyHelpLog",
];

const VIEW_LABELS: Record<View, string> = {
  Zen: "Zen",
  TitleBody: "Title and Body",
  BodyHelp: "Body and Help",
  BodyLog: "Body and Log",
  TitleBodyHelp: "Title, Body and Help",
  TitleBodyLog: "Title, Body and Log",
  BodyHelpLog: "Body, Help and Log",
  TitleBodyHelpLog: "Title, Body, Help and Log",
  MainMenu: "Main Menu",
  ConfigMenu: "Config",
  EditKeybindings: "Edit Keybindings",
  HelpMenu: "Help Menu",
  LogsOnly: "Logs Only",
  NewBoard: "New Board",
  NewCard: "New Card",
  LoadLocalSave: "Load a Save (local)",
  LoadCloudSave: "Load a Save (cloud)",
  Login: "Login",
  SignUp: "Sign Up",
  ResetPassword: "Reset Password",
  CreateTheme: "Create Theme",
};

const VIEW_TARGETS: Record<View, readonly Focus[]> = {
  Zen: ["Body"],
  TitleBody: ["Title", "Body"],
  BodyHelp: ["Body", "Help"],
  BodyLog: ["Body", "Log"],
  TitleBodyHelp: ["Title", "Body", "Help"],
  TitleBodyLog: ["Title", "Body", "Log"],
  BodyHelpLog: ["Body", "Help", "Log"],
  TitleBodyHelpLog: ["Title", "Body", "Help", "Log"],
  MainMenu: ["MainMenu", "MainMenuHelp", "Log"],
  ConfigMenu: ["ConfigTable", "SubmitButton", "ExtraFocus"],
  EditKeybindings: ["EditKeybindingsTable", "SubmitButton"],
  HelpMenu: ["Help", "Log"],
  LogsOnly: ["Log"],
  NewBoard: ["NewBoardName", "NewBoardDescription", "SubmitButton"],
  NewCard: ["NewCardName", "NewCardDescription", "NewCardDueDate", "SubmitButton"],
  LoadLocalSave: ["LoadSave"],
  LoadCloudSave: ["LoadSave"],
  Login: ["EmailIDField", "PasswordField", "ExtraFocus", "SubmitButton"],
  SignUp: ["EmailIDField", "PasswordField", "ConfirmPasswordField", "ExtraFocus", "SubmitButton"],
  ResetPassword: [
    "EmailIDField",
    "SendResetPasswordLinkButton",
    "ResetPasswordLinkField",
    "PasswordField",
    "ConfirmPasswordField",
    "ExtraFocus",
    "SubmitButton",
  ],
  CreateTheme: ["ThemeEditor", "SubmitButton", "ExtraFocus"],
};

const POPUP_TARGETS: Record<PopUp, readonly Focus[]> = {
  CommandPalette: ["CommandPaletteCommand", "CommandPaletteCard", "CommandPaletteBoard"],
  ViewCard: [
    "CardName",
    "CardDescription",
    "CardDueDate",
    "CardPriority",
    "CardStatus",
    "CardTags",
    "CardComments",
    "SubmitButton",
  ],
  ConfirmDiscardCardChanges: ["SubmitButton", "ExtraFocus"],
  CardStatusSelector: ["ChangeCardStatusPopup"],
  CardPrioritySelector: ["ChangeCardPriorityPopup"],
  ChangeTheme: ["ThemeSelector"],
  EditThemeStyle: ["StyleEditorFG", "StyleEditorBG", "StyleEditorModifier", "SubmitButton"],
  CustomHexColorPromptFG: ["TextInput", "SubmitButton"],
  CustomHexColorPromptBG: ["TextInput", "SubmitButton"],
  ChangeDateFormat: ["ChangeDateFormatPopup"],
  FilterByTag: ["FilterByTagPopup", "SubmitButton"],
  SaveThemePrompt: ["SubmitButton", "ExtraFocus"],
  ChangeView: ["ChangeViewPopup"],
  SelectDefaultView: ["SelectDefaultView"],
  EditGeneralConfig: ["EditGeneralConfigPopup", "SubmitButton"],
  EditSpecificKeyBinding: ["EditSpecificKeyBindingPopup", "SubmitButton"],
  DateTimePicker: [
    "DatePickerCalendar",
    "DatePickerMonth",
    "DatePickerYear",
    "DatePickerTimeToggle",
    "DatePickerHour",
    "DatePickerMinute",
    "DatePickerSecond",
  ],
};

export const TIME_FOCUSES: readonly Focus[] = ["DatePickerHour", "DatePickerMinute", "DatePickerSecond"];

export function isView(x: unknown): x is View {
  return typeof x === "string" && Object.prototype.hasOwnProperty.call(VIEW_LABELS, x);
}

export function isKanbanView(view: View): boolean {
  return KANBAN_VIEWS.includes(view);
}

export function viewLabel(view: View): string {
  return VIEW_LABELS[view];
}

export function viewFromLabel(label: string): View | undefined {
  for (const [view, text] of Object.entries(VIEW_LABELS)) {
    if (text === label && isView(view)) return view;
  }
  return undefined;
}

export function viewTargets(view: View): readonly Focus[] {
  return VIEW_TARGETS[view];
}

export function popupTargets(popup: PopUp): readonly Focus[] {
  return POPUP_TARGETS[popup];
}

export function availableTargets(view: View, popup: PopUp | undefined): readonly Focus[] {
  return popup ? popupTargets(popup) : viewTargets(view);
}

/** Keeps focus when it is still available, else the first target. */
export function clampFocus(targets: readonly Focus[], current: Focus): Focus {
  if (targets.length === 0) return "NoFocus";
  if (targets.includes(current)) return current;
  return targets[0];
}

export function nextFocus(targets: readonly Focus[], current: Focus): Focus {
  if (targets.length === 0) return "NoFocus";
  if (targets.length === 1) return targets[0];
  const idx = targets.indexOf(current);
  return targets[(idx + 1) % targets.length];
}

export function prevFocus(targets: readonly Focus[], current: Focus): Focus {
  if (targets.length === 0) return "NoFocus";
  if (targets.length === 1) return targets[0];
  const idx = targets.indexOf(current);
  if (idx === -1) return targets[targets.length - 1];
  return targets[(idx - 1 + targets.length) % targets.length];
}
