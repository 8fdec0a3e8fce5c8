// Runs inside the service worker. The worker and the page share no memory, so a
// notification action reaches the controller only as a posted message.
import { z } from "zod";
import { NOTIFICATION_ACTION_MESSAGE, type NotificationActionMessage } from "./bridge";

const notificationDataSchema = z.object({
  type: z.enum(["momentum", "checkin", "completion"]),
  taskId: z.union([z.string(), z.number().finite()]).optional().catch(undefined),
});

export interface NotificationClickEventLike {
  action: string;
  notification: { data: unknown; close(): void };
  waitUntil(promise: Promise<unknown>): void;
}

export interface WindowClientLike {
  focused?: boolean;
  postMessage(message: unknown): void;
  focus?(): Promise<unknown>;
}

export interface ServiceWorkerScopeLike {
  clients: {
    matchAll(options: { type: "window"; includeUncontrolled: boolean }): Promise<readonly WindowClientLike[]>;
    openWindow(url: string): Promise<WindowClientLike | null>;
  };
  addEventListener(type: "notificationclick", listener: (event: NotificationClickEventLike) => void): void;
}

export function buildActionMessage(data: unknown, action: string): NotificationActionMessage | null {
  const parsed = notificationDataSchema.safeParse(data);
  if (!parsed.success) return null;
  return { type: NOTIFICATION_ACTION_MESSAGE, payload: { ...parsed.data, action } };
}

/** posts to one open page (focused first), or opens one when none is left */
export async function relayNotificationClick(
  scope: ServiceWorkerScopeLike,
  event: NotificationClickEventLike,
  openUrl = "/",
): Promise<void> {
  event.notification.close();
  const message = buildActionMessage(event.notification.data, event.action);
  if (!message) return;

  const windows = await scope.clients.matchAll({ type: "window", includeUncontrolled: true });
  const target = windows.find((client) => client.focused) ?? windows[0];
  if (target) {
    target.postMessage(message);
    await target.focus?.();
    return;
  }
  const opened = await scope.clients.openWindow(openUrl);
  opened?.postMessage(message);
}

export function installNotificationActionRelay(scope: ServiceWorkerScopeLike, openUrl = "/"): void {
  scope.addEventListener("notificationclick", (event) => {
    event.waitUntil(
      relayNotificationClick(scope, event, openUrl).catch((e: unknown) => {
        console.debug("[sw] notification relay failed", e);
      }),
    );
  });
}
