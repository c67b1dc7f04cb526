import {z} from 'zod';

export const apiDialects = ['v2', 'latest'] as const;
export const ApiDialectSchema = z.enum(apiDialects);
export type ApiDialect = z.infer<typeof ApiDialectSchema>;

export const forwardedOperations = [
  'server_info',
  'search',
  'search_jql',
  'issue_get',
  'issue_update',
  'issue_create',
  'transitions_list',
  'transition_execute',
  'project_list',
  'project_get'
] as const;
export type ForwardedOperation = (typeof forwardedOperations)[number];

export const endpointOperations = [...forwardedOperations, 'health'] as const;
export const EndpointOperationSchema = z.enum(endpointOperations);
export type EndpointOperation = z.infer<typeof EndpointOperationSchema>;

// Mirrors the `mode` tag of the credential resolver's decisions.
export const authModes = ['per_request', 'service_account', 'service_account_impersonation'] as const;
export const AuthModeSchema = z.enum(authModes);
export type AuthMode = z.infer<typeof AuthModeSchema>;
