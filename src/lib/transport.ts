/**
 * Transport collaborator
 *
 * Everything the session needs from the wire: connection setup, StartTLS,
 * binds and the directory operations. Implementations throw on any
 * non-success status; ldapts `ResultCodeError`s carry the result code.
 */
import type { ConnectionOptions } from 'tls';
import type { Entry } from 'ldapts';

import type { LdapUrl } from './ldapUrl';
import type { SaslDefaults } from './sasl';

export type SearchScope = 'base' | 'one' | 'sub';

export const SCOPE = {
  BASE: 'base',
  ONE_LEVEL: 'one',
  SUBTREE: 'sub',
} as const satisfies Record<string, SearchScope>;

// Search request as handed to the transport, already normalized
export interface SearchRequest {
  base: string;
  scope: SearchScope;
  filter?: string;
  attributes?: string[];
  attributesOnly: boolean;
  // seconds, 0 means no limit
  timeLimit: number;
  // 0 means no limit
  sizeLimit: number;
}

// Server messages of a search response, in arrival order
export interface SearchEntryMessage {
  type: 'searchEntry';
  entry: Entry;
}

export interface SearchReferenceMessage {
  type: 'searchReference';
  uris: string[];
}

export interface OtherMessage {
  type: 'other';
  description: string;
}

export type LdapMessage =
  | SearchEntryMessage
  | SearchReferenceMessage
  | OtherMessage;

export interface LdapTransport {
  setProtocolVersion(version: number): void;
  // true when the socket is already encrypted (ldaps or a previous StartTLS)
  isTlsInPlace(): boolean;
  startTls(): Promise<void>;
  simpleBind(dn: string, password: string): Promise<void>;
  saslInteractiveBind(
    dn: string,
    mechanism: string,
    defaults: SaslDefaults
  ): Promise<void>;
  search(request: SearchRequest): Promise<LdapMessage[]>;
  delete(dn: string): Promise<void>;
  // authorization identity, empty string for an anonymous session
  whoAmI(): Promise<string>;
  unbind(): Promise<void>;
}

export interface TransportOptions {
  // milliseconds, 0 means no timeout
  timeout?: number;
  connectTimeout?: number;
  tlsOptions?: ConnectionOptions;
}

export type TransportFactory = (
  url: LdapUrl,
  options: TransportOptions
) => LdapTransport;
