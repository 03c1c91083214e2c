import { AsyncLocalStorage } from "node:async_hooks";

export type RequestContext = {
  requestId: string;
  migrationRunId?: string;
  entity?: string;
};

const storage = new AsyncLocalStorage<RequestContext>();

export function getRequestContext(): RequestContext | undefined {
  return storage.getStore();
}

export function runWithRequestContext<T>(
  context: Partial<RequestContext>,
  fn: () => T,
): T {
  const current = storage.getStore();
  const merged: RequestContext = {
    ...(current ?? {}),
    ...context,
    requestId: context.requestId ?? current?.requestId ?? "unknown",
  };
  return storage.run(merged, fn);
}

export function getRequestId(): string | undefined {
  return storage.getStore()?.requestId;
}

export function getMigrationRunId(): string | undefined {
  return storage.getStore()?.migrationRunId;
}
