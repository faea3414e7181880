import type { OrderOutcome } from "../types.js";

export function formatOutcome(outcome: OrderOutcome): string {
  return JSON.stringify(outcome, null, 2) + "\n";
}
