/**
 * LdapTransport on top of ldapts
 *
 * ldapts owns the socket, the TLS handshake and the BER codec. It opens
 * the connection lazily on the first request, so creating the transport
 * performs no I/O.
 */
import { isIP } from 'net';
import type { ConnectionOptions } from 'tls';

import { Client } from 'ldapts';
import type { ClientOptions, SearchOptions, SearchResult } from 'ldapts';

import { ProtocolError } from './errors';
import { formatServerUrl, type LdapUrl } from './ldapUrl';
import { getSaslMechanism, type SaslDefaults } from './sasl';
import type {
  LdapMessage,
  LdapTransport,
  SearchRequest,
  TransportOptions,
} from './transport';

export const WHOAMI_OID = '1.3.6.1.4.1.4203.1.11.3';
export const MATCH_ALL_FILTER = '(objectclass=*)';
export const LDAP_VERSION3 = 3;
const PROTOCOL_ERROR = 2;

// The part of ldapts.Client driven by this transport
export interface DirectoryConnection {
  bind(dnOrSaslMechanism: string, password?: string): Promise<void>;
  startTLS(options?: ConnectionOptions): Promise<void>;
  search(baseDN: string, options?: SearchOptions): Promise<SearchResult>;
  del(dn: string): Promise<void>;
  exop(
    oid: string,
    value?: string
  ): Promise<{ oid?: string; value?: string }>;
  unbind(): Promise<void>;
}

export type ConnectionFactory = (
  options: ClientOptions
) => DirectoryConnection;

const ldaptsConnection: ConnectionFactory = options => new Client(options);

export class LdaptsTransport implements LdapTransport {
  readonly clientOptions: ClientOptions;
  readonly tlsOptions: ConnectionOptions;
  private connection: DirectoryConnection;
  private tlsInPlace: boolean;

  constructor(
    url: LdapUrl,
    options: TransportOptions = {},
    createConnection: ConnectionFactory = ldaptsConnection
  ) {
    const host = url.host || 'localhost';
    this.tlsOptions = {
      minVersion: 'TLSv1.2',
      // SNI only takes host names
      ...(isIP(host) === 0 ? { servername: host } : {}),
      ...options.tlsOptions,
    };
    this.tlsInPlace = url.scheme === 'ldaps';
    this.clientOptions = {
      url: formatServerUrl(url),
      timeout: options.timeout ?? 0,
      connectTimeout: options.connectTimeout ?? 0,
      strictDN: false,
    };
    if (this.tlsInPlace) {
      this.clientOptions.tlsOptions = this.tlsOptions;
    }
    this.connection = createConnection(this.clientOptions);
  }

  setProtocolVersion(version: number): void {
    if (version !== LDAP_VERSION3) {
      throw new ProtocolError(
        `LDAP protocol version ${version} is not supported`,
        PROTOCOL_ERROR
      );
    }
  }

  isTlsInPlace(): boolean {
    return this.tlsInPlace;
  }

  async startTls(): Promise<void> {
    await this.connection.startTLS(this.tlsOptions);
    this.tlsInPlace = true;
  }

  async simpleBind(dn: string, password: string): Promise<void> {
    await this.connection.bind(dn, password);
  }

  // ldapts sends SASL binds with an empty name, the DN is not used
  async saslInteractiveBind(
    _dn: string,
    mechanism: string,
    defaults: SaslDefaults
  ): Promise<void> {
    const sasl = getSaslMechanism(mechanism);
    await this.connection.bind(sasl.name, sasl.initialResponse(defaults));
  }

  async search(request: SearchRequest): Promise<LdapMessage[]> {
    const options: SearchOptions = {
      scope: request.scope,
      filter: request.filter ?? MATCH_ALL_FILTER,
      returnAttributeValues: !request.attributesOnly,
      sizeLimit: request.sizeLimit,
      timeLimit: request.timeLimit,
    };
    if (request.attributes) options.attributes = request.attributes;

    const { searchEntries, searchReferences } = await this.connection.search(
      request.base,
      options
    );
    return [
      ...searchEntries.map(
        (entry): LdapMessage => ({ type: 'searchEntry', entry })
      ),
      ...searchReferences.map(
        (uri): LdapMessage => ({ type: 'searchReference', uris: [uri] })
      ),
    ];
  }

  async delete(dn: string): Promise<void> {
    await this.connection.del(dn);
  }

  async whoAmI(): Promise<string> {
    const { value } = await this.connection.exop(WHOAMI_OID);
    return value ?? '';
  }

  async unbind(): Promise<void> {
    await this.connection.unbind();
  }
}
