/**
 * LDAP client session
 *
 * One client holds at most one connection. Operations are awaited one at
 * a time: the client has no internal locking, concurrent calls on the
 * same instance must be serialized by the caller.
 *
 * @example
 * const client = new LdapClient({ uri: 'ldap://ldap.example.org/' });
 * await client.connect(simpleCredentials('cn=admin,dc=example,dc=org', 'secret'));
 * const users = await client.search({ base: 'ou=users,dc=example,dc=org', scope: SCOPE.SUBTREE });
 * await client.close();
 */
import type { ConnectionOptions } from 'tls';

import { LRUCache } from 'lru-cache';
import type winston from 'winston';

import { loadConfig, type Config } from '../config/args';
import { buildLogger } from '../logger/winston';

import {
  negotiateBind,
  simpleCredentials,
  toBindCredentials,
  type BindCredentials,
  type ConnectParameters,
} from './bind';
import { LdapEntry } from './entry';
import { NotConnectedError, ProtocolError } from './errors';
import { parseLdapUrl, type LdapUrl } from './ldapUrl';
import {
  LDAP_VERSION3,
  LdaptsTransport,
  MATCH_ALL_FILTER,
} from './ldaptsTransport';
import {
  normalizeSearch,
  runSearch,
  type EntryBuilder,
  type SearchConstraints,
} from './search';
import {
  SCOPE,
  type LdapTransport,
  type SearchRequest,
  type TransportFactory,
  type TransportOptions,
} from './transport';
import { diagnostic, resultCodeOf } from './utils';

export const DEFAULT_URI = 'ldap://localhost:389/';
export const ANONYMOUS_IDENTITY = 'anonym';
export const ROOT_DSE_ATTRIBUTES = [
  'namingContexts',
  'altServer',
  'supportedExtension',
  'supportedControl',
  'supportedSASLMechanisms',
  'supportedLDAPVersion',
] as const;

export interface LdapClientOptions {
  uri?: string;
  // ignored for ldaps:// URLs
  useStartTls?: boolean;
  logger?: winston.Logger;
  // milliseconds, 0 = no timeout
  timeout?: number;
  connectTimeout?: number;
  tlsOptions?: ConnectionOptions;
  // base-scope search cache, disabled when cacheMax is 0
  cacheMax?: number;
  // seconds
  cacheTtl?: number;
  transportFactory?: TransportFactory;
}

const ldaptsTransport: TransportFactory = (url, options) =>
  new LdaptsTransport(url, options);

const isBindCredentials = (
  value: BindCredentials | ConnectParameters
): value is BindCredentials => 'type' in value;

// Connections of clients garbage-collected without close()
const orphans = new FinalizationRegistry<{
  transport: LdapTransport;
  logger: winston.Logger;
  uri: string;
}>(({ transport, logger, uri }) => {
  void transport
    .unbind()
    .catch((error: unknown) =>
      logger.warn(`LDAP unbind of dropped client ${uri} failed:`, error)
    );
});

export class LdapClient {
  readonly uri: string;
  readonly url: LdapUrl;
  readonly logger: winston.Logger;
  private readonly startTls: boolean;
  private readonly transportOptions: TransportOptions;
  private readonly transportFactory: TransportFactory;
  // defined if and only if the client is connected
  private transport?: LdapTransport;
  private pending = 0;
  private searchCache?: LRUCache<string, LdapEntry[]>;

  /**
   * @throws InvalidUrlError
   */
  constructor(options: LdapClientOptions = {}) {
    this.uri = options.uri ?? DEFAULT_URI;
    this.url = parseLdapUrl(this.uri);
    // ldaps is already encrypted, no second TLS layer
    this.startTls =
      this.url.scheme === 'ldaps' ? false : (options.useStartTls ?? false);
    this.logger =
      options.logger ??
      buildLogger({ log_level: 'error', logger: 'console', log_file: '' });
    this.transportOptions = {
      timeout: options.timeout ?? 0,
      connectTimeout: options.connectTimeout ?? 0,
      tlsOptions: options.tlsOptions,
    };
    this.transportFactory = options.transportFactory ?? ldaptsTransport;

    const cacheMax = options.cacheMax ?? 0;
    if (cacheMax > 0) {
      const cacheTtl = (options.cacheTtl ?? 300) * 1000;
      this.searchCache = new LRUCache<string, LdapEntry[]>({
        max: cacheMax,
        ttl: cacheTtl,
        updateAgeOnGet: false,
        updateAgeOnHas: false,
      });
      this.logger.info(
        `LDAP search cache initialized: max=${cacheMax}, ttl=${cacheTtl / 1000}s`
      );
    }
  }

  /**
   * Build a client from the environment configuration
   */
  static fromConfig(
    config: Config = loadConfig(),
    overrides: Partial<LdapClientOptions> = {}
  ): LdapClient {
    return new LdapClient({
      uri: config.uri,
      useStartTls: config.starttls,
      timeout: config.timeout,
      connectTimeout: config.connect_timeout,
      tlsOptions: { minVersion: config.tls_min_version },
      cacheMax: config.cache_max,
      cacheTtl: config.cache_ttl,
      logger: buildLogger(config),
      ...overrides,
    });
  }

  get connected(): boolean {
    return this.transport !== undefined;
  }

  get useStartTls(): boolean {
    return this.startTls;
  }

  /**
   * Open the connection and bind. Without credentials the bind is
   * anonymous. A connected client is closed first.
   *
   * @throws ProtocolError for an unsupported protocol version
   * @throws TlsError
   * @throws BindError
   */
  async connect(
    credentials: BindCredentials | ConnectParameters = simpleCredentials(),
    protocolVersion: number = LDAP_VERSION3
  ): Promise<void> {
    const bindCredentials = isBindCredentials(credentials)
      ? credentials
      : toBindCredentials(credentials);
    if (this.transport) {
      this.logger.debug(`LDAP reconnecting to ${this.uri}`);
      await this.close();
    }

    const transport = this.transportFactory(this.url, this.transportOptions);
    try {
      await this.track(() =>
        negotiateBind(transport, bindCredentials, {
          useStartTls: this.startTls,
          protocolVersion,
          logger: this.logger,
        })
      );
    } catch (error) {
      await transport
        .unbind()
        .catch((e: unknown) =>
          this.logger.debug('LDAP unbind after failed connect:', e)
        );
      throw error;
    }

    this.transport = transport;
    orphans.register(
      this,
      { transport, logger: this.logger, uri: this.uri },
      this
    );
    this.logger.notice(`Connected to ${this.uri}`);
  }

  /**
   * Unbind and release the connection. Does nothing when not connected.
   *
   * @throws ProtocolError
   */
  async close(): Promise<void> {
    const transport = this.transport;
    if (!transport) return;
    if (this.pending > 0) {
      throw new ProtocolError(
        'Cannot close the connection while an operation is in progress'
      );
    }
    this.transport = undefined;
    orphans.unregister(this);
    this.searchCache?.clear();
    try {
      await transport.unbind();
    } catch (error) {
      throw new ProtocolError(diagnostic(error), resultCodeOf(error));
    }
    this.logger.debug(`Disconnected from ${this.uri}`);
  }

  /**
   * Every entry matching the constraints, in server order
   *
   * @throws NotConnectedError
   * @throws ParameterError
   * @throws SearchError
   */
  async search(constraints: SearchConstraints): Promise<LdapEntry[]> {
    const transport = this.requireConnected();
    const request = normalizeSearch(constraints);
    const key = this.cacheKey(request);
    const cached = key === undefined ? undefined : this.cacheGet(key);
    if (cached) return [...cached];

    const entries = await this.track(() =>
      runSearch(transport, request, false, this.buildEntry, this.logger)
    );
    if (key !== undefined) this.searchCache?.set(key, [...entries]);
    return entries;
  }

  /**
   * First entry with at least one attribute, or undefined
   */
  async searchFirst(
    constraints: SearchConstraints
  ): Promise<LdapEntry | undefined> {
    const transport = this.requireConnected();
    const request = normalizeSearch(constraints);
    const key = this.cacheKey(request);
    const cached = key === undefined ? undefined : this.cacheGet(key);
    if (cached) return cached[0];

    const entry = await this.track(() =>
      runSearch(transport, request, true, this.buildEntry, this.logger)
    );
    if (key !== undefined) this.searchCache?.set(key, entry ? [entry] : []);
    return entry;
  }

  /**
   * Entry with the given DN, undefined when it does not exist
   */
  async getEntry(dn: string): Promise<LdapEntry | undefined> {
    this.requireConnected();
    return this.searchFirst({ base: dn, scope: SCOPE.BASE });
  }

  async getRootDSE(): Promise<LdapEntry | undefined> {
    this.requireConnected();
    return this.searchFirst({
      base: '',
      scope: SCOPE.BASE,
      filter: MATCH_ALL_FILTER,
      attributes: [...ROOT_DSE_ATTRIBUTES],
    });
  }

  /**
   * Delete an entry. An empty DN is a no-op.
   *
   * @throws NotConnectedError
   * @throws ProtocolError
   */
  async deleteEntry(dn: string): Promise<void> {
    const transport = this.requireConnected();
    if (!dn) return;
    try {
      await this.track(() => transport.delete(dn));
    } catch (error) {
      this.logger.warn(`LDAP delete error on "${dn}": ${diagnostic(error)}`);
      throw new ProtocolError(diagnostic(error), resultCodeOf(error));
    }
    this.invalidateCache(dn);
    this.logger.debug(`LDAP delete: ${dn}`);
  }

  /**
   * LDAPv3 "Who am I?" (RFC 4532), "anonym" for an anonymous session
   *
   * @throws NotConnectedError
   * @throws ProtocolError
   */
  async whoAmI(): Promise<string> {
    const transport = this.requireConnected();
    let identity: string;
    try {
      identity = await this.track(() => transport.whoAmI());
    } catch (error) {
      throw new ProtocolError(diagnostic(error), resultCodeOf(error));
    }
    return identity || ANONYMOUS_IDENTITY;
  }

  /**
   * Drop cached searches based on this DN (DNs compare case-insensitively)
   */
  invalidateCache(dn: string): void {
    if (!this.searchCache) return;
    const prefix = dn.toLowerCase();
    for (const key of [...this.searchCache.keys()]) {
      if (key.startsWith(prefix)) {
        this.searchCache.delete(key);
      }
    }
  }

  private requireConnected(): LdapTransport {
    if (!this.transport) throw new NotConnectedError();
    return this.transport;
  }

  private buildEntry: EntryBuilder = message =>
    LdapEntry.fromMessage(message, this);

  private async track<T>(operation: () => Promise<T>): Promise<T> {
    this.pending++;
    try {
      return await operation();
    } finally {
      this.pending--;
    }
  }

  // Only base-scope searches are cached
  private cacheKey(request: SearchRequest): string | undefined {
    if (!this.searchCache || request.scope !== SCOPE.BASE) return undefined;
    const attributes = request.attributes
      ? [...request.attributes].sort().join(',')
      : '*';
    return `${request.base.toLowerCase()}:${request.scope}:${request.filter ?? MATCH_ALL_FILTER}:${attributes}:${request.attributesOnly}`;
  }

  private cacheGet(key: string): LdapEntry[] | undefined {
    const cached = this.searchCache?.get(key);
    if (cached) this.logger.debug(`LDAP search cache hit: ${key}`);
    return cached;
  }
}
