import { formatParams, parseParams, splitOutside, type HeaderParams } from './headers';

export interface SipUri {
  scheme: 'sip' | 'sips';
  user?: string;
  host: string;
  port?: number;
  params: HeaderParams;
}

export interface NameAddr {
  displayName?: string;
  uri: string;
  params: HeaderParams;
}

const URI_PATTERN = /^(sips?):(?:([^@;]+)@)?(\[[^\]]+\]|[^:;?]+)(?::(\d+))?([^?]*)/i;

export const parseUri = (text: string): SipUri | undefined => {
  const match = text.trim().match(URI_PATTERN);
  if (!match) return undefined;
  const [, scheme, user, host, port, rest] = match;
  const [, ...segments] = splitOutside(rest, ';');
  return {
    scheme: scheme.toLowerCase() === 'sips' ? 'sips' : 'sip',
    user: user ? decodeURIComponent(user) : undefined,
    host: host.toLowerCase(),
    port: port ? Number.parseInt(port, 10) : undefined,
    params: parseParams(segments),
  };
};

export const formatUri = (uri: SipUri): string => {
  const user = uri.user ? `${encodeURIComponent(uri.user)}@` : '';
  const port = uri.port ? `:${uri.port}` : '';
  return `${uri.scheme}:${user}${uri.host}${port}${formatParams(uri.params)}`;
};

export const parseNameAddr = (value: string): NameAddr => {
  const trimmed = value.trim();
  const open = trimmed.indexOf('<');
  const close = trimmed.indexOf('>', open);

  if (open !== -1 && close !== -1) {
    const display = trimmed.slice(0, open).trim();
    const [, ...segments] = splitOutside(trimmed.slice(close + 1), ';');
    return {
      displayName: display ? display.replace(/^"|"$/g, '') : undefined,
      uri: trimmed.slice(open + 1, close).trim(),
      params: parseParams(segments),
    };
  }

  // addr-spec form: parameters after the URI belong to the header
  const [uri, ...segments] = splitOutside(trimmed, ';');
  return { uri: uri.trim(), params: parseParams(segments) };
};

export const formatNameAddr = (nameAddr: NameAddr): string => {
  const display = nameAddr.displayName ? `"${nameAddr.displayName}" ` : '';
  return `${display}<${nameAddr.uri}>${formatParams(nameAddr.params)}`;
};

/** Adds a `sip:` scheme and the default domain to a bare number or user. */
export const normalizeTarget = (target: string, defaultDomain: string): string => {
  const trimmed = target.trim();
  if (/^sips?:/i.test(trimmed)) return trimmed;
  if (trimmed.includes('@')) return `sip:${trimmed}`;
  return `sip:${trimmed}@${defaultDomain}`;
};
