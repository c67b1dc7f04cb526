import type {HeaderMap} from '@jira-relay/shared';

/**
 * A request as handed over by the transport layer. `path` and `query` keep
 * their raw percent-encoding; `query` has no leading `?`.
 */
export type InboundRequest = {
  readonly method: string;
  readonly path: string;
  readonly query: string;
  readonly headers: HeaderMap;
  readonly body?: Buffer;
};
