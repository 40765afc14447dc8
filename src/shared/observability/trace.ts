import { AsyncLocalStorage } from "async_hooks";
import { randomUUID } from "crypto";

type TraceStore = {
  traceId: string;
  fields: Record<string, unknown>;
};

const storage = new AsyncLocalStorage<TraceStore>();

export const runWithTrace = <T>(traceId: string, fn: () => T): T => {
  return storage.run({ traceId, fields: {} }, fn);
};

export const getTraceId = (): string | undefined => {
  return storage.getStore()?.traceId;
};

export const getTraceFields = (): Record<string, unknown> => {
  return { ...storage.getStore()?.fields };
};

// No-op outside a trace scope.
export const setTraceField = (key: string, value: unknown): void => {
  const store = storage.getStore();
  if (store) {
    store.fields[key] = value;
  }
};

export const createTraceId = (): string => {
  return randomUUID();
};
