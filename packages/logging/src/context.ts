import {AsyncLocalStorage} from 'node:async_hooks';

import {ApiDialectSchema, AuthModeSchema, EndpointOperationSchema} from '@jira-relay/schemas';
import {z} from 'zod';

const IdentifierSchema = z.string().min(1).max(128);

/**
 * Fields attached to every log line written while a request is in flight.
 * The transport opens the scope with the ids; the relay fills in what the
 * request turned out to be once the route is mapped and credentials resolve.
 */
export const LogContextSchema = z
  .object({
    correlation_id: IdentifierSchema.optional(),
    request_id: IdentifierSchema.optional(),
    route: z.string().min(1).optional(),
    method: z.string().min(1).optional(),
    operation: EndpointOperationSchema.optional(),
    dialect: ApiDialectSchema.optional(),
    auth_mode: AuthModeSchema.optional()
  })
  .strict();

export type LogContext = z.infer<typeof LogContextSchema>;

const requestScope = new AsyncLocalStorage<LogContext>();

export const runWithLogContext = <T>(context: LogContext, callback: () => T): T =>
  requestScope.run({...LogContextSchema.parse(context)}, callback);

export const getLogContext = (): LogContext | undefined => requestScope.getStore();

// Outside a scope there is nothing to annotate.
export const setLogContextFields = (fields: LogContext): LogContext | undefined => {
  const scope = requestScope.getStore();
  if (scope === undefined) {
    return undefined;
  }

  return Object.assign(scope, LogContextSchema.parse(fields));
};
