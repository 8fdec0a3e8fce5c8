import { afterEach, describe, expect, it, vi } from "vitest";
import type { SystemNotificationOptions } from "../types";
import { NOTIFICATION_ACTION_MESSAGE, type ServiceWorkerContainerLike } from "./bridge";
import type { NotificationPlatform } from "./dispatcher";
import { createReminderEngine } from "./index";

const START = new Date(2024, 2, 5, 9, 0).getTime();

function fakeContainer() {
  const listeners = new Set<(event: MessageEvent) => void>();
  const showNotification = vi.fn(async (_title: string, _options?: SystemNotificationOptions) => undefined);
  const container: ServiceWorkerContainerLike = {
    ready: Promise.resolve({ showNotification }),
    addEventListener: (_type, listener) => {
      listeners.add(listener);
    },
    removeEventListener: (_type, listener) => {
      listeners.delete(listener);
    },
  };
  const post = (data: unknown) => {
    for (const listener of listeners) listener(new MessageEvent("message", { data }));
  };
  return { container, listeners, post, showNotification };
}

const grantedPlatform: NotificationPlatform = {
  supported: () => true,
  permission: () => "granted",
  requestPermission: async () => "granted",
  showDirect: () => undefined,
};

afterEach(() => {
  vi.restoreAllMocks();
});

describe("createReminderEngine", () => {
  it("evaluates on start and routes worker messages to the controller", async () => {
    const { container, listeners, post, showNotification } = fakeContainer();
    const engine = createReminderEngine({
      storage: null,
      platform: grantedPlatform,
      serviceWorker: container,
      now: () => START,
      random: () => 0,
      getRequestPlan: () => undefined,
    });

    const stop = engine.start();
    // first visit with nothing recorded counts as idle
    expect(engine.toasts.get()?.message).toBe("Want to pick up where you left off?");
    expect(engine.dispatcher.pendingCount()).toBe(1);

    await container.ready;
    expect(showNotification).toHaveBeenCalledTimes(1);
    expect(showNotification.mock.calls[0][0]).toBe("Need a nudge?");

    post({ type: NOTIFICATION_ACTION_MESSAGE, payload: { type: "momentum", action: "momentum_snooze" } });
    expect(engine.controller.state.snoozes.momentumUntil).toBe(START + 30 * 60_000);
    expect(engine.toasts.get()?.message).toBe("Momentum reminder snoozed for 30 minutes.");

    stop();
    expect(listeners.size).toBe(0);
    expect(engine.toasts.get()).toBeNull();
  });

  it("runs without a service worker", () => {
    const engine = createReminderEngine({
      storage: null,
      platform: { ...grantedPlatform, supported: () => false },
      serviceWorker: null,
      now: () => START,
      getRequestPlan: () => undefined,
    });
    const stop = engine.start();
    engine.bridge.receive({ type: NOTIFICATION_ACTION_MESSAGE, payload: { type: "completion", action: "completion_stop" } });
    expect(engine.controller.state.stopForNow).toBe(true);
    stop();
  });
});
