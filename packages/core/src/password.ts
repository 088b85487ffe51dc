export const MIN_PASSWORD_LENGTH = 8;
export const MAX_PASSWORD_LENGTH = 32;
export const MIN_SECONDS_BETWEEN_RESET_LINKS = 60;

export type PasswordStatus =
  | "Strong"
  | "TooShort"
  | "TooLong"
  | "MissingUppercase"
  | "MissingLowercase"
  | "MissingNumber"
  | "MissingSpecialChar";

export interface PasswordPolicy {
  minLength: number;
  maxLength: number;
}

export const DEFAULT_PASSWORD_POLICY: PasswordPolicy = {
  minLength: MIN_PASSWORD_LENGTH,
  maxLength: MAX_PASSWORD_LENGTH,
};

const ASCII_PUNCTUATION = /[!-/:-@[-`{-~]/;

/** Length is checked before character classes, counted in code points. */
export function checkPassword(password: string, policy: PasswordPolicy = DEFAULT_PASSWORD_POLICY): PasswordStatus {
  const length = [...password].length;
  if (length < policy.minLength) return "TooShort";
  if (length > policy.maxLength) return "TooLong";
  if (!/\p{Lu}/u.test(password)) return "MissingUppercase";
  if (!/\p{Ll}/u.test(password)) return "MissingLowercase";
  if (!/\p{N}/u.test(password)) return "MissingNumber";
  if (!ASCII_PUNCTUATION.test(password)) return "MissingSpecialChar";
  return "Strong";
}

export function passwordStatusMessage(
  status: Exclude<PasswordStatus, "Strong">,
  policy: PasswordPolicy = DEFAULT_PASSWORD_POLICY,
): string {
  switch (status) {
    case "TooShort":
      return `Password must be at least ${policy.minLength} characters long`;
    case "TooLong":
      return `Password must be at most ${policy.maxLength} characters long`;
    case "MissingUppercase":
      return "Password must contain at least one uppercase character";
    case "MissingLowercase":
      return "Password must contain at least one lowercase character";
    case "MissingNumber":
      return "Password must contain at least one number";
    case "MissingSpecialChar":
      return "Password must contain at least one special character";
  }
}

export type NewPasswordCheck = { ok: true } | { ok: false; message: string };

/** The checks shared by signup and password reset, in the order they are reported. */
export function validateNewPassword(
  password: string,
  confirmPassword: string,
  policy: PasswordPolicy = DEFAULT_PASSWORD_POLICY,
): NewPasswordCheck {
  if (!password || !confirmPassword) return { ok: false, message: "Password cannot be empty" };
  if (password !== confirmPassword) return { ok: false, message: "Passwords do not match" };
  const status = checkPassword(password, policy);
  if (status === "Strong") return { ok: true };
  return { ok: false, message: passwordStatusMessage(status, policy) };
}

/** Seconds left before another reset link may be requested, 0 when allowed. */
export function resetLinkWaitSeconds(lastSentAt: number | undefined, now: number): number {
  if (lastSentAt === undefined) return 0;
  const elapsed = (now - lastSentAt) / 1000;
  if (elapsed >= MIN_SECONDS_BETWEEN_RESET_LINKS) return 0;
  return Math.ceil(MIN_SECONDS_BETWEEN_RESET_LINKS - elapsed);
}
