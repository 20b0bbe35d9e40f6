/**
 * In-process stand-in for a directory server
 *
 * Serves a flat list of entries through the LdapTransport interface and
 * records every call, so tests can check what reached the "wire".
 * Filters are not evaluated: every entry in scope matches.
 */
import { InvalidCredentialsError, NoSuchObjectError } from 'ldapts';
import type { Entry } from 'ldapts';

import { ProtocolError } from '../../src/lib/errors';
import type { LdapUrl } from '../../src/lib/ldapUrl';
import type { SaslDefaults } from '../../src/lib/sasl';
import type {
  LdapMessage,
  LdapTransport,
  SearchRequest,
  TransportFactory,
  TransportOptions,
} from '../../src/lib/transport';

export type FakeOperation =
  | 'startTls'
  | 'bind'
  | 'search'
  | 'delete'
  | 'whoAmI'
  | 'unbind';

const lower = (s: string): string => s.toLowerCase();

export class FakeServer {
  entries: Entry[] = [];
  rootDSE?: Entry;
  // bind DN -> password
  users: Record<string, string> = {};
  // appended to every search response
  extraMessages: LdapMessage[] = [];
  failures: Partial<Record<FakeOperation, Error>> = {};
  // searches wait for this promise when set
  searchGate?: Promise<void>;

  calls: string[] = [];
  searches: SearchRequest[] = [];
  saslDefaults?: SaslDefaults;
  transports: FakeTransport[] = [];
  urls: LdapUrl[] = [];
  options: TransportOptions[] = [];

  factory: TransportFactory = (url, options) => {
    const transport = new FakeTransport(this, url);
    this.transports.push(transport);
    this.urls.push(url);
    this.options.push(options);
    return transport;
  };

  fail(operation: FakeOperation): void {
    const error = this.failures[operation];
    if (error) throw error;
  }

  exists(dn: string): boolean {
    const base = lower(dn);
    return this.entries.some(
      e => lower(e.dn) === base || lower(e.dn).endsWith(`,${base}`)
    );
  }

  inScope(entry: Entry, request: SearchRequest): boolean {
    const dn = lower(entry.dn);
    const base = lower(request.base);
    switch (request.scope) {
      case 'base':
        return dn === base;
      case 'one':
        return dn.slice(dn.indexOf(',') + 1) === base && dn !== base;
      case 'sub':
        return dn === base || dn.endsWith(`,${base}`);
    }
  }

  select(entry: Entry, request: SearchRequest): Entry {
    const wanted = request.attributes?.map(lower);
    const result: Entry = { dn: entry.dn };
    for (const [name, value] of Object.entries(entry)) {
      if (name === 'dn') continue;
      if (wanted && !wanted.includes(lower(name))) continue;
      result[name] = request.attributesOnly ? [] : value;
    }
    return result;
  }
}

export class FakeTransport implements LdapTransport {
  identity = '';
  version?: number;
  private tlsInPlace: boolean;

  constructor(
    private server: FakeServer,
    url: LdapUrl
  ) {
    this.tlsInPlace = url.scheme === 'ldaps';
  }

  setProtocolVersion(version: number): void {
    this.server.calls.push(`version:${version}`);
    if (version !== 3) {
      throw new ProtocolError(`LDAP protocol version ${version} is not supported`, 2);
    }
    this.version = version;
  }

  isTlsInPlace(): boolean {
    return this.tlsInPlace;
  }

  async startTls(): Promise<void> {
    this.server.calls.push('startTls');
    this.server.fail('startTls');
    this.tlsInPlace = true;
  }

  async simpleBind(dn: string, password: string): Promise<void> {
    this.server.calls.push(`simpleBind:${dn}`);
    this.server.fail('bind');
    if (dn && this.server.users[dn] !== password) {
      throw new InvalidCredentialsError('invalid credentials');
    }
    this.identity = dn ? `dn:${dn}` : '';
  }

  async saslInteractiveBind(
    _dn: string,
    mechanism: string,
    defaults: SaslDefaults
  ): Promise<void> {
    this.server.calls.push(`saslBind:${mechanism}`);
    this.server.saslDefaults = defaults;
    this.server.fail('bind');
    this.identity = `u:${defaults.interact('authname')}`;
  }

  async search(request: SearchRequest): Promise<LdapMessage[]> {
    const { server } = this;
    server.calls.push(`search:${request.base}`);
    server.searches.push(request);
    if (server.searchGate) await server.searchGate;
    server.fail('search');

    let found: Entry[];
    if (request.base === '' && request.scope === 'base') {
      found = server.rootDSE ? [server.rootDSE] : [];
    } else {
      if (!server.exists(request.base)) throw new NoSuchObjectError();
      found = server.entries.filter(e => server.inScope(e, request));
    }
    if (request.sizeLimit > 0) found = found.slice(0, request.sizeLimit);
    return [
      ...found.map(
        (e): LdapMessage => ({
          type: 'searchEntry',
          entry: server.select(e, request),
        })
      ),
      ...server.extraMessages,
    ];
  }

  async delete(dn: string): Promise<void> {
    this.server.calls.push(`delete:${dn}`);
    this.server.fail('delete');
    const index = this.server.entries.findIndex(
      e => lower(e.dn) === lower(dn)
    );
    if (index < 0) throw new NoSuchObjectError();
    this.server.entries.splice(index, 1);
  }

  async whoAmI(): Promise<string> {
    this.server.calls.push('whoAmI');
    this.server.fail('whoAmI');
    return this.identity;
  }

  async unbind(): Promise<void> {
    this.server.calls.push('unbind');
    this.server.fail('unbind');
  }
}
