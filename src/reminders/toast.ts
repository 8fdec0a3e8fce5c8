import type { ToastAction } from "../types";

export const TOAST_DURATION_MS = 15_000;
export const MAX_TOAST_ACTIONS = 2;

export type ToastState = {
  id: number;
  message: string;
  actions: ToastAction[];
};

type Listener = (toast: ToastState | null) => void;

/**
 * The in-page toast. One toast at a time; a new one replaces the old.
 * Toasts without actions hide themselves after `durationMs`, toasts with
 * actions stay until an action or `hide()`.
 */
export class ToastController {
  private current: ToastState | null = null;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private seq = 0;
  private readonly listeners = new Set<Listener>();
  private readonly durationMs: number;

  constructor(durationMs = TOAST_DURATION_MS) {
    this.durationMs = durationMs;
  }

  get(): ToastState | null {
    return this.current;
  }

  show(message: string, actions: ToastAction[] = []): ToastState {
    this.clearTimer();
    this.seq += 1;
    const toast: ToastState = { id: this.seq, message, actions: actions.slice(0, MAX_TOAST_ACTIONS) };
    this.current = toast;
    if (toast.actions.length === 0) {
      this.timer = setTimeout(() => {
        this.timer = null;
        this.hide();
      }, this.durationMs);
    }
    this.emit();
    return toast;
  }

  hide(): void {
    this.clearTimer();
    if (!this.current) return;
    this.current = null;
    this.emit();
  }

  runAction(index: number): void {
    const action = this.current?.actions[index];
    if (!action) return;
    this.hide();
    try {
      action.run();
    } catch (e) {
      console.error("[toast] action failed:", e);
    }
  }

  subscribe(listener: Listener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  dispose(): void {
    this.clearTimer();
    this.listeners.clear();
  }

  private clearTimer() {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private emit() {
    for (const listener of this.listeners) listener(this.current);
  }
}
