import {err, ok, type Result} from '@jira-relay/shared';

import type {BasicCredentials, BearerCredentials, InboundCredentials} from './types';

const AUTHORIZATION_REGEX = /^(\S+)\s+(\S.*)$/u;
const BASE64_REGEX = /^[A-Za-z0-9+/]+={0,2}$/u;
const CONTROL_CHARACTER_REGEX = /[\u0000-\u001f\u007f]/u;

export type CredentialParseFailure =
  | 'authorization_missing'
  | 'authorization_scheme_unsupported'
  | 'basic_encoding_invalid'
  | 'basic_separator_missing'
  | 'basic_username_invalid'
  | 'bearer_token_missing';

const utf8Decoder = new TextDecoder('utf-8', {fatal: true});

const decodeBase64Utf8 = (encoded: string): string | null => {
  const padded = encoded.length % 4 === 0 ? encoded : encoded.padEnd(encoded.length + (4 - (encoded.length % 4)), '=');
  if (!BASE64_REGEX.test(padded)) {
    return null;
  }

  const decoded = Buffer.from(padded, 'base64');
  if (decoded.toString('base64') !== padded) {
    return null;
  }

  try {
    return utf8Decoder.decode(decoded);
  } catch {
    return null;
  }
};

export const encodeBasicCredentials = ({username, secret}: {username: string; secret: string}) =>
  Buffer.from(`${username}:${secret}`, 'utf8').toString('base64');

/**
 * Decodes the payload of a Basic credential. The payload is split on the
 * first colon only, so secrets may themselves contain colons.
 */
export const decodeBasicCredentials = (encoded: string): Result<BasicCredentials, CredentialParseFailure> => {
  const decoded = decodeBase64Utf8(encoded.trim());
  if (decoded === null) {
    return err('basic_encoding_invalid');
  }

  const separatorIndex = decoded.indexOf(':');
  if (separatorIndex === -1) {
    return err('basic_separator_missing');
  }

  const username = decoded.slice(0, separatorIndex);
  if (username.length === 0 || CONTROL_CHARACTER_REGEX.test(username)) {
    return err('basic_username_invalid');
  }

  return ok({scheme: 'basic', username, secret: decoded.slice(separatorIndex + 1)});
};

const parseBearerToken = (token: string): Result<BearerCredentials, CredentialParseFailure> => {
  const trimmed = token.trim();
  if (trimmed.length === 0) {
    return err('bearer_token_missing');
  }

  return ok({scheme: 'bearer', token: trimmed});
};

export const parseAuthorizationHeader = (
  headerValue: string | undefined
): Result<InboundCredentials, CredentialParseFailure> => {
  if (!headerValue || headerValue.trim().length === 0) {
    return err('authorization_missing');
  }

  const match = AUTHORIZATION_REGEX.exec(headerValue.trim());
  const scheme = match?.[1]?.toLowerCase();
  const payload = match?.[2];
  if (!scheme || !payload) {
    return err('authorization_scheme_unsupported');
  }

  switch (scheme) {
    case 'basic':
      return decodeBasicCredentials(payload);
    case 'bearer':
      return parseBearerToken(payload);
    default:
      return err('authorization_scheme_unsupported');
  }
};
