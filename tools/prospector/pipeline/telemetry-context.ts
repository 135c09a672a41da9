import { AsyncLocalStorage } from "async_hooks";
import type { StepName } from "./types.js";

export interface TelemetryContextValue {
  runId?: string;
  step: StepName | "system";
  attempt: number;
}

const storage = new AsyncLocalStorage<TelemetryContextValue>();

export function runWithTelemetryContext<T>(
  value: TelemetryContextValue,
  fn: () => Promise<T>
): Promise<T> {
  const parent = storage.getStore();
  return storage.run({ ...value, runId: value.runId ?? parent?.runId }, fn);
}

export function getTelemetryContext(): TelemetryContextValue {
  return storage.getStore() ?? { step: "system", attempt: 0 };
}
