import {AsyncLocalStorage} from 'node:async_hooks';

import {z} from 'zod';

const IdentifierSchema = z.string().min(1);

export const LogContextSchema = z
  .object({
    correlation_id: z.string().min(1).max(128).optional(),
    request_id: z.string().min(1).max(128).optional(),
    session_id: IdentifierSchema.optional(),
    certificate_id: IdentifierSchema.optional(),
    route: z.string().min(1).optional(),
    method: z.string().min(1).optional()
  })
  .strict();

export type LogContext = z.infer<typeof LogContextSchema>;

const storage = new AsyncLocalStorage<LogContext>();

/**
 * Runs `operation` with `context` bound to every event logged beneath it. A
 * nested scope starts from a copy of the enclosing one, so a provisioning
 * mutation keeps the correlation id of the request that queued it while its
 * own fields stay out of the request's scope.
 */
export const runWithLogContext = <T>(context: LogContext, operation: () => T): T => {
  const scoped = LogContextSchema.parse(context);
  return storage.run({...storage.getStore(), ...scoped}, operation);
};

export const getLogContext = (): LogContext | undefined => storage.getStore();

/** Adds fields to the current scope in place. Outside any scope it does nothing. */
export const setLogContextFields = (fields: Partial<LogContext>): LogContext | undefined => {
  const current = storage.getStore();
  if (current) {
    Object.assign(current, LogContextSchema.partial().parse(fields));
  }
  return current;
};
