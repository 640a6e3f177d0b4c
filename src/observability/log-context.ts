import { AsyncLocalStorage } from 'node:async_hooks';

/** Fields merged into every log line written while the context is active. */
export type LogContext = {
  correlation_id?: string;
  session_id?: string;
  asset_uid?: string;
  trace_id?: string;
  span_id?: string;
};

const storage = new AsyncLocalStorage<LogContext>();

export function getLogContext(): LogContext {
  return storage.getStore() ?? {};
}

export function setLogContext(context: LogContext): void {
  const store = storage.getStore();

  if (store) {
    Object.assign(store, context);
    return;
  }

  storage.enterWith({ ...context });
}

// Nested scopes inherit the outer fields, so per-asset work keeps the request's correlation id.
export function runWithLogContext<T>(context: LogContext, fn: () => Promise<T>): Promise<T> {
  return storage.run({ ...getLogContext(), ...context }, fn);
}
