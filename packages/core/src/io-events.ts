import type { ConfigField } from "./config";
import type { Theme } from "./themes";

/** Work the UI hands to the I/O task; processed one at a time, in order. */
export type IoEvent =
  | { type: "Initialize" }
  | { type: "SaveLocalData" }
  | { type: "LoadSaveLocal" }
  | { type: "DeleteLocalSave" }
  | { type: "LoadLocalPreview" }
  | { type: "AutoSave" }
  | { type: "ExportToJson" }
  | { type: "Login"; email: string; password: string }
  | { type: "Logout" }
  | { type: "SignUp"; email: string; password: string; confirmPassword: string }
  | { type: "SendResetPasswordEmail"; email: string }
  | { type: "ResetPassword"; resetLink: string; password: string; confirmPassword: string }
  | { type: "SyncLocalData" }
  | { type: "GetCloudData" }
  | { type: "LoadSaveCloud" }
  | { type: "LoadCloudPreview" }
  | { type: "DeleteCloudSave" }
  | { type: "SaveConfig"; message?: string }
  | { type: "UpdateConfig"; field: ConfigField["key"]; value: string }
  | { type: "SaveTheme"; theme: Theme; setDefault: boolean };

export type IoEventType = IoEvent["type"];
