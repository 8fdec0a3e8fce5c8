import { useToastState } from "../hooks/useReminderEngine";
import type { ToastController } from "../reminders/toast";

type Props = { toasts: ToastController };

export default function ReminderToast({ toasts }: Props) {
  const toast = useToastState(toasts);
  if (!toast) return null;

  return (
    <div
      role="status"
      aria-live="polite"
      data-toast-id={toast.id}
      style={{
        position: "fixed", right: 12, bottom: 12, zIndex: 9999, maxWidth: 320,
        background: "var(--app-card)", color: "var(--app-text)", padding: "10px 12px",
        borderRadius: 8, boxShadow: "0 6px 20px rgba(2, 6, 23, 0.6)",
      }}
    >
      <div style={{ fontSize: 13, fontWeight: 600 }}>{toast.message}</div>
      <div style={{ marginTop: 8, display: "flex", gap: 8, justifyContent: "flex-end" }}>
        {toast.actions.map((action, i) => (
          <button key={action.label} className="snooze-btn" onClick={() => toasts.runAction(i)}>
            {action.label}
          </button>
        ))}
        <button className="btn-plain" aria-label="Dismiss reminder" onClick={() => toasts.hide()}>
          Dismiss
        </button>
      </div>
    </div>
  );
}
