// Service worker entry: only the notification action relay lives here.
import { installNotificationActionRelay, type ServiceWorkerScopeLike } from "./reminders/serviceWorkerRelay";

declare const self: ServiceWorkerScopeLike;

installNotificationActionRelay(self, "/");
