export {err, ok, type Failure, type Result, type Success} from './result';
export {
  HeaderMap,
  isValidHeaderName,
  isValidHeaderValue,
  normalizeHeaderName,
  type RawHeaderValue
} from './headerMap';
