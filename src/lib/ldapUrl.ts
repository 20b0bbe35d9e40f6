/**
 * LDAP URL parser (RFC 4516)
 *
 * ldap[s]://host[:port][/dn[?attributes[?scope[?filter[?extensions]]]]]
 *
 * Parsing is pure: malformed URLs are rejected with an InvalidUrlError
 * before anything touches the network.
 */
import { InvalidUrlError } from './errors';
import { percentDecode } from './utils';

export type LdapScheme = 'ldap' | 'ldaps';
export type UrlScope = 'base' | 'one' | 'sub';

export interface LdapUrlExtension {
  critical: boolean;
  type: string;
  value?: string;
}

export interface LdapUrl {
  scheme: LdapScheme;
  // empty when the URL gives no host, the transport then uses localhost
  host: string;
  port: number;
  dn: string;
  attributes: string[];
  scope?: UrlScope;
  filter?: string;
  extensions: LdapUrlExtension[];
}

export const DEFAULT_PORTS: Record<LdapScheme, number> = {
  ldap: 389,
  ldaps: 636,
};

export const URL_ERRORS = {
  badScheme: 'Bad URL scheme',
  badEnclosure: 'URL is missing trailing ">"',
  badUrl: 'Bad URL',
  badHost: 'Host/port is invalid',
  badAttributes: 'Bad (or missing) attributes',
  badScope: 'Scope string is invalid (or missing)',
  badFilter: 'Bad or missing filter',
  badExtensions: 'Bad or missing extensions',
} as const;

const scopeAliases: Record<string, UrlScope> = {
  base: 'base',
  one: 'one',
  onelevel: 'one',
  sub: 'sub',
  subtree: 'sub',
};

function fail(message: string): never {
  throw new InvalidUrlError(message);
}

const isScheme = (value: string): value is LdapScheme =>
  value === 'ldap' || value === 'ldaps';

/**
 * Validate and decompose an LDAP URL
 *
 * @throws InvalidUrlError
 */
export function parseLdapUrl(uri: string): LdapUrl {
  let str = uri.trim();
  if (str.startsWith('<')) {
    if (!str.endsWith('>')) fail(URL_ERRORS.badEnclosure);
    str = str.slice(1, -1).trim();
  }
  if (/^URL:/i.test(str)) str = str.slice(4);

  const match = /^([A-Za-z][A-Za-z0-9+.-]*):\/\/(.*)$/.exec(str);
  if (!match) fail(URL_ERRORS.badScheme);
  const scheme = match[1].toLowerCase();
  if (!isScheme(scheme)) fail(URL_ERRORS.badScheme);

  const rest = match[2];
  const slash = rest.indexOf('/');
  const hostport = slash < 0 ? rest : rest.slice(0, slash);
  // a query needs a path before it
  if (hostport.includes('?')) fail(URL_ERRORS.badUrl);

  const { host, port } = parseHostPort(hostport, DEFAULT_PORTS[scheme]);
  const url: LdapUrl = {
    scheme,
    host,
    port,
    dn: '',
    attributes: [],
    extensions: [],
  };
  if (slash < 0) return url;

  const parts = rest.slice(slash + 1).split('?');
  if (parts.length > 5) fail(URL_ERRORS.badUrl);
  const [dn = '', attributes = '', scope = '', filter = '', extensions = ''] =
    parts;

  const decodedDn = percentDecode(dn);
  if (decodedDn === undefined) fail(URL_ERRORS.badUrl);
  url.dn = decodedDn;
  url.attributes = parseAttributes(attributes);
  url.scope = parseScope(scope);
  url.filter = parseFilter(filter);
  url.extensions = parseExtensions(extensions);
  return url;
}

function parseHostPort(
  hostport: string,
  defaultPort: number
): { host: string; port: number } {
  let host: string;
  let portStr: string | undefined;

  if (hostport.startsWith('[')) {
    const end = hostport.indexOf(']');
    if (end < 0) fail(URL_ERRORS.badHost);
    host = hostport.slice(1, end);
    if (!/^[0-9A-Fa-f:.]+$/.test(host)) fail(URL_ERRORS.badHost);
    const after = hostport.slice(end + 1);
    if (after !== '' && !after.startsWith(':')) fail(URL_ERRORS.badHost);
    portStr = after === '' ? undefined : after.slice(1);
  } else {
    const colon = hostport.indexOf(':');
    if (colon !== hostport.lastIndexOf(':')) fail(URL_ERRORS.badHost);
    const decoded = percentDecode(colon < 0 ? hostport : hostport.slice(0, colon));
    if (decoded === undefined) fail(URL_ERRORS.badUrl);
    if (!/^[A-Za-z0-9._~-]*$/.test(decoded)) fail(URL_ERRORS.badHost);
    host = decoded;
    portStr = colon < 0 ? undefined : hostport.slice(colon + 1);
  }

  if (portStr === undefined || portStr === '') {
    return { host, port: defaultPort };
  }
  if (!/^\d+$/.test(portStr)) fail(URL_ERRORS.badUrl);
  const port = parseInt(portStr, 10);
  if (port < 1 || port > 65535) fail(URL_ERRORS.badUrl);
  return { host, port };
}

function parseAttributes(value: string): string[] {
  if (value === '') return [];
  return value.split(',').map(attr => {
    const decoded = percentDecode(attr);
    if (!decoded) fail(URL_ERRORS.badAttributes);
    return decoded;
  });
}

function parseScope(value: string): UrlScope | undefined {
  if (value === '') return undefined;
  const scope = scopeAliases[value.toLowerCase()];
  if (!scope) fail(URL_ERRORS.badScope);
  return scope;
}

function parseFilter(value: string): string | undefined {
  if (value === '') return undefined;
  let filter = percentDecode(value);
  if (filter === undefined) fail(URL_ERRORS.badFilter);
  filter = filter.trim();
  if (filter === '') return undefined;
  if (!filter.startsWith('(')) filter = `(${filter})`;
  // literal parentheses inside values must be escaped as \28 and \29
  let depth = 0;
  for (const char of filter) {
    if (char === '(') depth++;
    else if (char === ')' && --depth < 0) fail(URL_ERRORS.badFilter);
  }
  if (depth !== 0) fail(URL_ERRORS.badFilter);
  return filter;
}

function parseExtensions(value: string): LdapUrlExtension[] {
  if (value === '') return [];
  return value.split(',').map(ext => {
    const critical = ext.startsWith('!');
    const body = critical ? ext.slice(1) : ext;
    const eq = body.indexOf('=');
    const type = percentDecode(eq < 0 ? body : body.slice(0, eq));
    if (!type) fail(URL_ERRORS.badExtensions);
    if (eq < 0) return { critical, type };
    const extValue = percentDecode(body.slice(eq + 1));
    if (extValue === undefined) fail(URL_ERRORS.badExtensions);
    return { critical, type, value: extValue };
  });
}

/**
 * scheme://host:port string handed to the transport
 */
export function formatServerUrl(url: LdapUrl): string {
  let host = url.host || 'localhost';
  if (host.includes(':')) host = `[${host}]`;
  return `${url.scheme}://${host}:${url.port}`;
}
