const COMPACT_FORMS: Record<string, string> = {
  i: 'Call-ID',
  f: 'From',
  t: 'To',
  v: 'Via',
  m: 'Contact',
  l: 'Content-Length',
  c: 'Content-Type',
  k: 'Supported',
  s: 'Subject',
  e: 'Content-Encoding',
  o: 'Event',
  r: 'Refer-To',
  u: 'Allow-Events',
};

const IRREGULAR_NAMES: Record<string, string> = {
  'call-id': 'Call-ID',
  cseq: 'CSeq',
  'www-authenticate': 'WWW-Authenticate',
  'mime-version': 'MIME-Version',
  rack: 'RAck',
  rseq: 'RSeq',
};

const LIST_HEADERS = new Set([
  'Via',
  'Route',
  'Record-Route',
  'Contact',
  'Allow',
  'Supported',
  'Require',
  'Proxy-Require',
  'Unsupported',
  'Accept',
  'Allow-Events',
]);

export const ROUTING_HEADERS = ['Route', 'Record-Route'] as const;

export type HeaderParams = Record<string, string | null>;

export const canonicalHeaderName = (name: string): string => {
  const lower = name.trim().toLowerCase();
  const expanded = COMPACT_FORMS[lower];
  if (expanded) return expanded;
  const irregular = IRREGULAR_NAMES[lower];
  if (irregular) return irregular;
  return lower
    .split('-')
    .map(part => part.charAt(0).toUpperCase() + part.slice(1))
    .join('-');
};

export const isListHeader = (canonicalName: string): boolean => LIST_HEADERS.has(canonicalName);

/**
 * Splits `value` on `separator` while ignoring separators inside quoted
 * strings and angle-bracketed URIs.
 */
export const splitOutside = (value: string, separator: string): string[] => {
  const parts: string[] = [];
  let current = '';
  let quoted = false;
  let angle = 0;

  for (let i = 0; i < value.length; i++) {
    const ch = value[i];
    if (ch === '\\' && quoted && i + 1 < value.length) {
      current += ch + value[i + 1];
      i++;
      continue;
    }
    if (ch === '"') quoted = !quoted;
    else if (!quoted && ch === '<') angle++;
    else if (!quoted && ch === '>' && angle > 0) angle--;

    if (ch === separator && !quoted && angle === 0) {
      parts.push(current);
      current = '';
      continue;
    }
    current += ch;
  }
  parts.push(current);
  return parts;
};

export const splitHeaderList = (value: string): string[] =>
  splitOutside(value, ',')
    .map(part => part.trim())
    .filter(Boolean);

export const unquote = (value: string): string => {
  const trimmed = value.trim();
  if (trimmed.length >= 2 && trimmed.startsWith('"') && trimmed.endsWith('"')) {
    return trimmed.slice(1, -1).replace(/\\(.)/g, '$1');
  }
  return trimmed;
};

/** Parses `;name=value;flag` segments; parameter names are lower-cased. */
export const parseParams = (segments: string[]): HeaderParams => {
  const params: HeaderParams = {};
  for (const segment of segments) {
    const trimmed = segment.trim();
    if (!trimmed) continue;
    const eq = trimmed.indexOf('=');
    if (eq === -1) {
      params[trimmed.toLowerCase()] = null;
    } else {
      params[trimmed.slice(0, eq).trim().toLowerCase()] = unquote(trimmed.slice(eq + 1));
    }
  }
  return params;
};

export const formatParams = (params: HeaderParams): string =>
  Object.entries(params)
    .map(([name, value]) => (value === null ? `;${name}` : `;${name}=${value}`))
    .join('');

/**
 * Header parameters of a Via, From, To or Contact value. Parameters inside
 * an angle-bracketed URI belong to the URI, not the header.
 */
export const getHeaderParams = (value: string): HeaderParams => {
  const close = value.lastIndexOf('>');
  const tail = close === -1 ? value : value.slice(close + 1);
  const [, ...segments] = splitOutside(tail, ';');
  return parseParams(segments);
};

export const getHeaderParam = (value: string, name: string): string | null | undefined =>
  getHeaderParams(value)[name.toLowerCase()];
