import { createRoot } from "react-dom/client";
import App from "./components/App";
import { submitCompletionForm } from "./reminders";
import type { TaskRef } from "./types";
import "./index.css";

const swUrl = import.meta.env.VITE_SERVICE_WORKER_URL;
if (swUrl && "serviceWorker" in navigator) {
  void navigator.serviceWorker.register(swUrl, { type: "module" }).catch((err: unknown) => console.debug("SW register failed", err));
}

const sampleTasks: TaskRef[] = [
  { id: 1, title: "Draft outline", project: "Essay" },
  { id: 2, title: "Reply to review comments", area: "Work" },
  { id: 3, title: "Water the plants", area: "Home" },
];

const rootEl = document.getElementById("root");
if (rootEl) {
  createRoot(rootEl).render(
    <App
      tasks={sampleTasks}
      engineOptions={{ onTaskDone: submitCompletionForm(import.meta.env.VITE_COMPLETION_ENDPOINT || "/daily-tasks") }}
    />,
  );
}
