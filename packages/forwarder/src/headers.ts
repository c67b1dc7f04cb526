import type {HeaderMap} from '@jira-relay/shared';

export const toHeadersObject = (headers: HeaderMap): Headers => {
  const upstreamHeaders = new Headers();
  for (const [name, value] of headers) {
    upstreamHeaders.append(name, value);
  }

  return upstreamHeaders;
};

const readNonEmpty = (response: Response, name: string) => {
  const value = response.headers.get(name);
  return value && value.trim().length > 0 ? value : undefined;
};

export const readContentType = (response: Response) => readNonEmpty(response, 'content-type');

export const readRedirectLocation = (response: Response) =>
  response.status >= 300 && response.status < 400 ? readNonEmpty(response, 'location') : undefined;
