import { z } from "zod";
import type { NotificationActionPayload } from "../types";
import type { NotificationRegistration } from "./dispatcher";

export const NOTIFICATION_ACTION_MESSAGE = "notification-action";

export const notificationActionPayloadSchema = z.object({
  type: z.enum(["momentum", "checkin", "completion"]),
  action: z.string().catch(""),
  taskId: z.union([z.string(), z.number().finite()]).optional().catch(undefined),
});

const actionMessageSchema = z.object({
  type: z.literal(NOTIFICATION_ACTION_MESSAGE),
  payload: notificationActionPayloadSchema,
});

export type NotificationActionMessage = z.infer<typeof actionMessageSchema>;

// the slice of navigator.serviceWorker the bridge listens on
export interface ServiceWorkerContainerLike {
  ready: Promise<NotificationRegistration>;
  addEventListener(type: "message", listener: (event: MessageEvent) => void): void;
  removeEventListener(type: "message", listener: (event: MessageEvent) => void): void;
  startMessages?(): void;
}

type ActionHandler = (payload: NotificationActionPayload) => void;

/**
 * Inbound channel from the service worker. Messages are validated and queued;
 * the queue drains into the connected handler, so actions that arrive before
 * the controller is ready are not lost.
 */
export class ServiceWorkerBridge {
  private readonly queue: NotificationActionPayload[] = [];
  private handler: ActionHandler | null = null;

  receive(data: unknown): boolean {
    const parsed = actionMessageSchema.safeParse(data);
    if (!parsed.success) {
      console.debug("[sw-bridge] ignored message", data);
      return false;
    }
    this.queue.push(parsed.data.payload);
    this.drain();
    return true;
  }

  connect(handler: ActionHandler): () => void {
    this.handler = handler;
    this.drain();
    return () => {
      if (this.handler === handler) this.handler = null;
    };
  }

  pendingCount(): number {
    return this.queue.length;
  }

  listen(container: ServiceWorkerContainerLike, onRegistration?: (registration: NotificationRegistration) => void): () => void {
    let active = true;
    const onMessage = (event: MessageEvent) => {
      this.receive(event.data);
    };
    container.addEventListener("message", onMessage);
    // messages posted while the page was still loading are held until this
    container.startMessages?.();
    void container.ready
      .then((registration) => {
        if (active) onRegistration?.(registration);
      })
      .catch((e: unknown) => console.debug("[sw-bridge] service worker never became ready", e));
    return () => {
      active = false;
      container.removeEventListener("message", onMessage);
    };
  }

  private drain() {
    while (this.handler && this.queue.length) {
      const payload = this.queue.shift();
      if (!payload) break;
      try {
        this.handler(payload);
      } catch (e) {
        console.error("[sw-bridge] action handler failed:", e);
      }
    }
  }
}
