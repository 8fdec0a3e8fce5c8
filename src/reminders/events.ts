import type { ReminderController } from "./controller";

export const NEXT_TASK_REQUEST_EVENT = "next-task-request";
export const TASK_COMPLETED_EVENT = "task-completed";
export const TICK_INTERVAL_MS = 60_000;

export type ReminderEventOptions = {
  win?: Window;
  doc?: Document;
  tickMs?: number;
};

/**
 * Wake sources for the controller. Focus runs a normal evaluation, a tab
 * coming back runs a forced one, the tick only refreshes elapsed labels.
 */
export function wireReminderEvents(controller: ReminderController, options: ReminderEventOptions = {}): () => void {
  const win = options.win ?? window;
  const doc = options.doc ?? document;

  const onFocus = () => controller.evaluate();
  const onVisibility = () => {
    if (doc.visibilityState === "visible") controller.evaluate(true);
  };
  const onUnload = () => controller.endSession();
  const onNextTask = () => controller.recordNextTaskRequest();
  const onCompleted = (event: Event) => {
    controller.recordCompletion("detail" in event ? event.detail : null);
  };

  win.addEventListener("focus", onFocus);
  doc.addEventListener("visibilitychange", onVisibility);
  win.addEventListener("beforeunload", onUnload);
  win.addEventListener("pagehide", onUnload);
  win.addEventListener(NEXT_TASK_REQUEST_EVENT, onNextTask);
  win.addEventListener(TASK_COMPLETED_EVENT, onCompleted);
  const tick = setInterval(() => controller.tick(), options.tickMs ?? TICK_INTERVAL_MS);

  return () => {
    win.removeEventListener("focus", onFocus);
    doc.removeEventListener("visibilitychange", onVisibility);
    win.removeEventListener("beforeunload", onUnload);
    win.removeEventListener("pagehide", onUnload);
    win.removeEventListener(NEXT_TASK_REQUEST_EVENT, onNextTask);
    win.removeEventListener(TASK_COMPLETED_EVENT, onCompleted);
    clearInterval(tick);
  };
}

export function announceNextTaskRequest(win: Window = window): void {
  win.dispatchEvent(new CustomEvent(NEXT_TASK_REQUEST_EVENT));
}

export function announceTaskCompleted(count = 1, win: Window = window): void {
  win.dispatchEvent(new CustomEvent(TASK_COMPLETED_EVENT, { detail: { count } }));
}
