import type { RequestPlan } from "../types";
import { ServiceWorkerBridge, type ServiceWorkerContainerLike } from "./bridge";
import { ReminderController, type Clock, type CompletionDelegate, type RandomSource } from "./controller";
import { NotificationDispatcher, browserNotificationPlatform, type NotificationPlatform } from "./dispatcher";
import { submitCompletionForm } from "./domBindings";
import { wireReminderEvents } from "./events";
import { ReminderStore, type StorageLike } from "./store";
import { ToastController } from "./toast";

export { ReminderController } from "./controller";
export type { ActiveTaskView } from "./controller";
export { NotificationDispatcher, browserNotificationPlatform } from "./dispatcher";
export { ServiceWorkerBridge } from "./bridge";
export { ReminderStore, STORAGE_KEY } from "./store";
export { ToastController } from "./toast";
export type { ToastState } from "./toast";
export { bindReminderControls, submitCompletionForm } from "./domBindings";
export { announceNextTaskRequest, announceTaskCompleted, wireReminderEvents } from "./events";
export { PRESETS, DEFAULT_SETTINGS, SETTING_KEYS } from "./settings";

export type ReminderEngineOptions = {
  storage?: StorageLike | null;
  storageKey?: string;
  now?: Clock;
  random?: RandomSource;
  getRequestPlan?: () => RequestPlan | undefined;
  onTaskDone?: CompletionDelegate;
  platform?: NotificationPlatform;
  /** null disables the service worker channel; omitted means navigator.serviceWorker */
  serviceWorker?: ServiceWorkerContainerLike | null;
  win?: Window;
  doc?: Document;
  tickMs?: number;
  toastDurationMs?: number;
};

export type ReminderEngine = {
  store: ReminderStore;
  toasts: ToastController;
  dispatcher: NotificationDispatcher;
  controller: ReminderController;
  bridge: ServiceWorkerBridge;
  /** initial evaluation plus every listener; returns the teardown */
  start(): () => void;
};

function defaultServiceWorkerContainer(): ServiceWorkerContainerLike | null {
  if (typeof navigator === "undefined" || !("serviceWorker" in navigator)) return null;
  return navigator.serviceWorker;
}

function windowRequestPlan(): RequestPlan | undefined {
  return typeof window !== "undefined" ? window.requestPlan : undefined;
}

export function createReminderEngine(options: ReminderEngineOptions = {}): ReminderEngine {
  const store = new ReminderStore({ storage: options.storage, key: options.storageKey });
  const toasts = new ToastController(options.toastDurationMs);
  const dispatcher = new NotificationDispatcher(options.platform ?? browserNotificationPlatform(), toasts);
  const controller = new ReminderController({
    store,
    presenter: dispatcher,
    toasts,
    now: options.now,
    random: options.random,
    getRequestPlan: options.getRequestPlan ?? windowRequestPlan,
    onTaskDone: options.onTaskDone ?? submitCompletionForm(),
  });
  const bridge = new ServiceWorkerBridge();

  function start() {
    void dispatcher.primePermission().catch((e: unknown) => console.debug("[reminders] permission prompt failed", e));
    controller.init();
    const stopEvents = wireReminderEvents(controller, { win: options.win, doc: options.doc, tickMs: options.tickMs });
    const disconnect = bridge.connect((payload) => controller.handleNotificationAction(payload));
    const container = options.serviceWorker === undefined ? defaultServiceWorkerContainer() : options.serviceWorker;
    const stopListening = container
      ? bridge.listen(container, (registration) => void dispatcher.attachRegistration(registration))
      : () => undefined;

    return () => {
      stopListening();
      disconnect();
      stopEvents();
      toasts.hide();
    };
  }

  return { store, toasts, dispatcher, controller, bridge, start };
}
