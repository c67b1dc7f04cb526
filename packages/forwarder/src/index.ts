export {
  DEFAULT_FORWARDER_TIMEOUTS,
  ForwarderTimeoutsSchema,
  type FetchLike,
  type ForwarderTimeouts,
  type OutboundCall,
  type RawUpstreamFailure,
  type UpstreamReply
} from './contracts';
export {buildOutboundCall, buildUpstreamUrl, forwardUpstreamCall, type ForwardOutcome} from './forward';
export {readContentType, readRedirectLocation, toHeadersObject} from './headers';
export {isTimeoutError, normalizeUpstreamFailure, toHttpStatus} from './normalize';
export {probeUpstream} from './probe';
