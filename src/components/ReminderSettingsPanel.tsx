import { useState, type ChangeEvent } from "react";
import { useControllerVersion } from "../hooks/useReminderEngine";
import type { ReminderController } from "../reminders/controller";
import { PRESETS, SETTING_KEYS, isPresetName } from "../reminders/settings";
import type { SettingKey } from "../types";

type Props = { controller: ReminderController };

const LABELS: Record<SettingKey, string> = {
  momentumThresholdMinutes: "Nudge after idle (min)",
  momentumSnoozeMinutes: "Nudge snooze (min)",
  checkinMinMinutes: "Check-in earliest (min)",
  checkinMaxMinutes: "Check-in latest (min)",
  completionCooldownMinutes: "Completion cooldown (min)",
};

const PRESET_NAMES = Object.keys(PRESETS).filter(isPresetName);

export default function ReminderSettingsPanel({ controller }: Props) {
  useControllerVersion(controller);
  const settings = controller.settings();
  // text being edited; committed on change/blur, dropped afterwards
  const [drafts, setDrafts] = useState<Partial<Record<SettingKey, string>>>({});

  function commit(key: SettingKey) {
    const raw = drafts[key];
    if (raw === undefined) return;
    controller.updateSetting(key, raw);
    setDrafts((d) => {
      const next = { ...d };
      delete next[key];
      return next;
    });
  }

  function onStopChange(e: ChangeEvent<HTMLInputElement>) {
    controller.setStopForNow(e.target.checked);
  }

  return (
    <section aria-label="Reminder settings" style={{ display: "grid", gap: 10 }}>
      <label style={{ display: "flex", gap: 8, alignItems: "center" }}>
        <input type="checkbox" checked={controller.state.stopForNow} onChange={onStopChange} />
        Stop reminders for now
      </label>

      <div style={{ display: "grid", gridTemplateColumns: "1fr 90px", gap: 6, alignItems: "center" }}>
        {SETTING_KEYS.map((key) => (
          <label key={key} style={{ display: "contents" }}>
            <span style={{ fontSize: 13 }}>{LABELS[key]}</span>
            <input
              type="number"
              min={0}
              name={key}
              value={drafts[key] ?? String(settings[key])}
              onChange={(e) => {
                const value = e.target.value;
                setDrafts((d) => ({ ...d, [key]: value }));
              }}
              onBlur={() => commit(key)}
              onKeyDown={(e) => {
                if (e.key === "Enter") commit(key);
              }}
              style={{ padding: "4px 8px", borderRadius: 8, border: "1px solid #e5e7eb" }}
            />
          </label>
        ))}
      </div>

      <div style={{ display: "flex", gap: 8, flexWrap: "wrap" }}>
        {PRESET_NAMES.map((name) => (
          <button
            key={name}
            className="btn-plain"
            onClick={() => {
              controller.applyPreset(name);
              setDrafts({});
            }}
          >
            {name}
          </button>
        ))}
        <button className="btn-plain" style={{ marginLeft: "auto" }} onClick={() => controller.snoozeMomentum()}>
          Snooze nudges
        </button>
      </div>
    </section>
  );
}
