import { useControllerVersion } from "../hooks/useReminderEngine";
import type { ReminderController } from "../reminders/controller";
import type { CheckinAction } from "../types";

type Props = { controller: ReminderController };

const ACTIONS: { action: CheckinAction; label: string }[] = [
  { action: "done", label: "Done" },
  { action: "still-going", label: "Still going" },
  { action: "switch", label: "Switch" },
  { action: "stop", label: "Stop" },
];

export default function ActiveTaskCard({ controller }: Props) {
  useControllerVersion(controller);
  const view = controller.describeActiveTask();
  if (!view) return null;

  return (
    <section
      aria-label="Active task"
      style={{ padding: 12, borderRadius: 10, border: "1px solid #eef2f7", background: "#fbfdff", display: "grid", gap: 6 }}
    >
      <div style={{ fontWeight: 700 }}>{view.title}</div>
      <div style={{ fontSize: 12, color: "#6b7280" }}>{view.meta}</div>
      <div style={{ fontSize: 12, color: "#6b7280" }} data-checkin-hint>{view.hint}</div>
      <div style={{ display: "flex", gap: 8, flexWrap: "wrap", marginTop: 6 }}>
        {ACTIONS.map(({ action, label }) => (
          <button key={action} className="btn-plain" onClick={() => controller.handleActiveTaskAction(action)}>
            {label}
          </button>
        ))}
        <button className="btn-plain" style={{ marginLeft: "auto" }} onClick={() => controller.snoozeCheckinsForToday()}>
          Snooze check-ins today
        </button>
      </div>
    </section>
  );
}
