export type ToastKind = "info" | "warning" | "error" | "loading";

export const DEFAULT_TOAST_DURATION_MS = 5_000;
export const ERROR_TOAST_DURATION_MS = 10_000;
export const MAX_VISIBLE_TOASTS = 5;

export interface Toast {
  kind: ToastKind;
  message: string;
  createdAt: number;
  durationMs: number;
}

export class ToastQueue {
  private toasts: Toast[] = [];

  constructor(private readonly now: () => number = Date.now) {}

  push(kind: ToastKind, message: string, durationMs?: number): Toast {
    const toast: Toast = {
      kind,
      message,
      createdAt: this.now(),
      durationMs: durationMs ?? (kind === "error" ? ERROR_TOAST_DURATION_MS : DEFAULT_TOAST_DURATION_MS),
    };
    this.toasts.push(toast);
    return toast;
  }

  info(message: string): Toast {
    return this.push("info", message);
  }

  warn(message: string): Toast {
    return this.push("warning", message);
  }

  error(message: string): Toast {
    return this.push("error", message);
  }

  loading(message: string): Toast {
    return this.push("loading", message);
  }

  /** Drops expired toasts. */
  prune(): void {
    const t = this.now();
    this.toasts = this.toasts.filter((x) => t - x.createdAt < x.durationMs);
  }

  clear(): void {
    this.toasts = [];
  }

  all(): readonly Toast[] {
    return this.toasts;
  }

  /** Newest first, at most {@link MAX_VISIBLE_TOASTS}. */
  visible(): Toast[] {
    return this.toasts.slice(-MAX_VISIBLE_TOASTS).reverse();
  }

  last(): Toast | undefined {
    return this.toasts[this.toasts.length - 1];
  }
}
