import type { RequestPlan } from "./types";

export {};

declare global {
  interface Window {
    // provided by the planner page
    requestPlan?: RequestPlan;
  }
}
