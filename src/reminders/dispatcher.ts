import type { ReminderPresentation, SystemNotificationOptions } from "../types";
import type { ToastController } from "./toast";

export interface NotificationPlatform {
  supported(): boolean;
  permission(): NotificationPermission;
  requestPermission(): Promise<NotificationPermission>;
  showDirect(title: string, options: SystemNotificationOptions): void;
}

// the slice of ServiceWorkerRegistration the dispatcher needs
export interface NotificationRegistration {
  showNotification(title: string, options?: SystemNotificationOptions): Promise<void>;
}

export interface ReminderPresenter {
  present(presentation: ReminderPresentation): void;
}

export function browserNotificationPlatform(): NotificationPlatform {
  return {
    supported: () => typeof window !== "undefined" && "Notification" in window,
    permission: () => Notification.permission,
    requestPermission: () => Notification.requestPermission(),
    showDirect: (title, options) => {
      const n = new Notification(title, options);
      n.onclick = () => {
        window.focus();
        n.close();
      };
    },
  };
}

type PendingNotification = { title: string; options: SystemNotificationOptions };

/**
 * Delivers reminder presentations.
 *
 * The inline toast is always shown. A system notification goes out on top of
 * it when the platform has one and permission allows: through the service
 * worker registration when attached (action buttons work there), as a plain
 * page notification when the presentation has no actions, or queued until the
 * registration arrives when it does.
 */
export class NotificationDispatcher implements ReminderPresenter {
  private readonly platform: NotificationPlatform;
  private readonly toasts: ToastController;
  private registration: NotificationRegistration | null = null;
  private pending: PendingNotification[] = [];
  private permissionRequest: Promise<NotificationPermission> | null = null;

  constructor(platform: NotificationPlatform, toasts: ToastController) {
    this.platform = platform;
    this.toasts = toasts;
  }

  present(presentation: ReminderPresentation): Promise<void> {
    this.toasts.show(presentation.message, presentation.toastActions);
    return this.deliver(presentation.title, {
      body: presentation.message,
      tag: presentation.tag,
      data: presentation.data,
      actions: presentation.actions,
    }).catch((e: unknown) => console.debug("[notify] delivery failed:", e));
  }

  attachRegistration(registration: NotificationRegistration): Promise<void> {
    this.registration = registration;
    return this.flushPending();
  }

  pendingCount(): number {
    return this.pending.length;
  }

  /** asks for permission up front; tells the user once if they said no */
  async primePermission(): Promise<NotificationPermission | null> {
    if (!this.platform.supported()) return null;
    if (this.platform.permission() !== "default") return this.platform.permission();
    const result = await this.requestPermission();
    if (result === "denied") {
      this.toasts.show("Notifications are disabled. Allow them in your browser settings to see reminders outside the app.");
    }
    return result;
  }

  private async deliver(title: string, options: SystemNotificationOptions): Promise<void> {
    if (!this.platform.supported()) return;
    const permission = this.platform.permission();
    if (permission === "denied") return;
    if (permission === "granted") {
      await this.display(title, options);
      return;
    }
    const result = await this.requestPermission();
    if (result === "granted") {
      await this.display(title, options);
    } else {
      console.debug("[notify] permission not granted, toast only");
    }
  }

  // one prompt per session, shared by every caller that hits it
  private requestPermission(): Promise<NotificationPermission> {
    if (!this.permissionRequest) {
      this.permissionRequest = this.platform.requestPermission().catch((e: unknown) => {
        console.debug("[notify] requestPermission failed", e);
        return "denied" as const;
      });
    }
    return this.permissionRequest;
  }

  private async display(title: string, options: SystemNotificationOptions): Promise<void> {
    if (this.registration) {
      await this.showViaRegistration(this.registration, { title, options });
      return;
    }
    if (options.actions?.length) {
      this.pending = this.pending.filter((p) => p.options.tag !== options.tag);
      this.pending.push({ title, options });
      return;
    }
    try {
      this.platform.showDirect(title, options);
    } catch (e) {
      console.debug("[notify] page Notification failed:", e);
    }
  }

  private async showViaRegistration(registration: NotificationRegistration, item: PendingNotification) {
    try {
      await registration.showNotification(item.title, { ...item.options, renotify: true });
    } catch (e) {
      console.debug("[notify] sw showNotification failed:", e);
    }
  }

  private async flushPending(): Promise<void> {
    const registration = this.registration;
    if (!registration) return;
    while (this.pending.length) {
      const item = this.pending.shift();
      if (item) await this.showViaRegistration(registration, item);
    }
  }
}
