import { act } from "react";
import { createRoot, type Root } from "react-dom/client";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ReminderController } from "../reminders/controller";
import { ReminderStore } from "../reminders/store";
import { ToastController } from "../reminders/toast";
import ReminderSettingsPanel from "./ReminderSettingsPanel";

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
  const controller = new ReminderController({
    store: new ReminderStore({ storage: null }),
    presenter: { present: () => undefined },
    toasts,
  });
  act(() => root.render(<ReminderSettingsPanel controller={controller} />));
  return { controller, toasts };
}

function input(name: string): HTMLInputElement | null {
  return container.querySelector<HTMLInputElement>(`input[name="${name}"]`);
}

describe("ReminderSettingsPanel", () => {
  it("shows the current settings", () => {
    setup();
    expect(input("momentumThresholdMinutes")?.value).toBe("90");
    expect(input("completionCooldownMinutes")?.value).toBe("5");
  });

  it("applies a preset", () => {
    const { controller, toasts } = setup();
    const sprint = Array.from(container.querySelectorAll("button")).find((b) => b.textContent === "sprint");
    act(() => sprint?.click());
    expect(controller.settings().momentumThresholdMinutes).toBe(15);
    expect(input("momentumThresholdMinutes")?.value).toBe("15");
    expect(toasts.get()?.message).toBe("Applied Sprint.");
  });

  it("toggles stop for now", () => {
    const { controller } = setup();
    const toggle = container.querySelector<HTMLInputElement>('input[type="checkbox"]');
    act(() => toggle?.click());
    expect(controller.state.stopForNow).toBe(true);
    expect(toggle?.checked).toBe(true);
  });
});
