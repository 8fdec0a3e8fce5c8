import { act } from "react";
import { createRoot, type Root } from "react-dom/client";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ReminderController } from "../reminders/controller";
import { ReminderStore } from "../reminders/store";
import { ToastController } from "../reminders/toast";
import type { ActiveTask } from "../types";
import ActiveTaskCard from "./ActiveTaskCard";

const START = new Date(2024, 2, 5, 9, 0).getTime();

let container: HTMLDivElement;
let root: Root;

beforeEach(() => {
  globalThis.IS_REACT_ACT_ENVIRONMENT = true;
  container = document.createElement("div");
  document.body.appendChild(container);
  root = createRoot(container);
});

afterEach(() => {
  act(() => root.unmount());
  container.remove();
});

function setup() {
  const toasts = new ToastController();
  const onTaskDone = vi.fn((_task: ActiveTask) => undefined);
  const controller = new ReminderController({
    store: new ReminderStore({ storage: null }),
    presenter: { present: () => undefined },
    toasts,
    now: () => START,
    random: () => 0,
    onTaskDone,
  });
  return { controller, toasts, onTaskDone };
}

function button(label: string): HTMLButtonElement | undefined {
  return Array.from(container.querySelectorAll("button")).find((b) => b.textContent === label);
}

describe("ActiveTaskCard", () => {
  it("is hidden without an active task", () => {
    const { controller } = setup();
    act(() => root.render(<ActiveTaskCard controller={controller} />));
    expect(container.innerHTML).toBe("");
  });

  it("shows the task and the next check-in", () => {
    const { controller } = setup();
    controller.setActiveTask({ id: 3, title: "Review notes", area: "Study" });
    act(() => root.render(<ActiveTaskCard controller={controller} />));

    const card = container.querySelector('[aria-label="Active task"]');
    expect(card?.textContent).toContain("Review notes");
    expect(card?.textContent).toContain("Working on Study · started just now");
    expect(container.querySelector("[data-checkin-hint]")?.textContent).toBe("Next check-in in 20m");
  });

  it("updates when the controller changes", () => {
    const { controller, toasts, onTaskDone } = setup();
    act(() => root.render(<ActiveTaskCard controller={controller} />));
    act(() => {
      controller.setActiveTask({ id: 3, title: "Review notes" });
    });
    expect(container.querySelector('[aria-label="Active task"]')).not.toBeNull();

    act(() => button("Snooze check-ins today")?.click());
    expect(container.querySelector("[data-checkin-hint]")?.textContent).toBe("Check-ins are snoozed for today.");
    expect(toasts.get()?.message).toBe("Check-ins snoozed for the rest of the day.");

    act(() => button("Done")?.click());
    expect(onTaskDone).toHaveBeenCalledTimes(1);
    expect(container.innerHTML).toBe("");
  });
});
