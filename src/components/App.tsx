import { useReminderEngine, useControllerVersion } from "../hooks/useReminderEngine";
import { announceNextTaskRequest, type ReminderEngineOptions } from "../reminders";
import type { TaskRef } from "../types";
import ActiveTaskCard from "./ActiveTaskCard";
import ReminderSettingsPanel from "./ReminderSettingsPanel";
import ReminderToast from "./ReminderToast";

type Props = {
  tasks?: TaskRef[];
  engineOptions?: ReminderEngineOptions;
};

export default function App({ tasks = [], engineOptions }: Props) {
  const { controller, toasts } = useReminderEngine(engineOptions);
  useControllerVersion(controller);
  const activeId = controller.state.activeTask?.id;

  // what the planner page does when the user asks for work
  function askForNextTask() {
    announceNextTaskRequest();
    void controller.launchNextTask(true);
  }

  return (
    <div style={{ minHeight: "100vh", background: "#f8fafc", padding: 20, fontFamily: "Inter, system-ui, sans-serif" }}>
      <div style={{ maxWidth: 780, margin: "0 auto", background: "white", padding: 20, borderRadius: 12, boxShadow: "0 6px 20px rgba(2,6,23,0.06)", display: "grid", gap: 16 }}>
        <header style={{ display: "flex", justifyContent: "space-between", alignItems: "center" }}>
          <h1 style={{ margin: 0, fontSize: 20 }}>Focus</h1>
          <button className="btn-plain" onClick={askForNextTask}>Next task</button>
        </header>

        <ActiveTaskCard controller={controller} />

        <ul style={{ listStyle: "none", padding: 0, margin: 0, display: "grid", gap: 8 }}>
          {tasks.length === 0 && <li style={{ color: "#9ca3af", textAlign: "center", padding: 20 }}>No tasks planned</li>}
          {tasks.map((task) => (
            <li key={task.id} style={{ display: "flex", gap: 12, alignItems: "center", padding: 12, borderRadius: 10, border: "1px solid #eef2f7" }}>
              <div style={{ flex: 1 }}>
                <div>{task.title}</div>
                <div style={{ fontSize: 12, color: "#6b7280", marginTop: 6 }}>{task.project || task.area || ""}</div>
              </div>
              <button className="btn-plain" disabled={activeId === task.id} onClick={() => controller.setActiveTask(task)}>
                {activeId === task.id ? "Working" : "Start"}
              </button>
            </li>
          ))}
        </ul>

        <ReminderSettingsPanel controller={controller} />
      </div>
      <ReminderToast toasts={toasts} />
    </div>
  );
}
