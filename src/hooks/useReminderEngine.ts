import { useEffect, useState } from "react";
import { createReminderEngine, type ReminderEngine, type ReminderEngineOptions } from "../reminders";
import type { ReminderController } from "../reminders/controller";
import type { ToastController, ToastState } from "../reminders/toast";

/** one engine per mounted app; options are read on the first render only */
export function useReminderEngine(options?: ReminderEngineOptions): ReminderEngine {
  const [engine] = useState(() => createReminderEngine(options));
  useEffect(() => engine.start(), [engine]);
  return engine;
}

// the controller mutates its state in place, so re-render on a counter
export function useControllerVersion(controller: ReminderController): number {
  const [version, setVersion] = useState(0);
  useEffect(() => controller.subscribe(() => setVersion((v) => v + 1)), [controller]);
  return version;
}

export function useToastState(toasts: ToastController): ToastState | null {
  const [toast, setToast] = useState<ToastState | null>(() => toasts.get());
  useEffect(() => {
    setToast(toasts.get());
    return toasts.subscribe(setToast);
  }, [toasts]);
  return toast;
}
