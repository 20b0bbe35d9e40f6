/**
 * @packageDocumentation ldap-session-client
 *
 * Stateful LDAP client: connect (optionally through StartTLS), bind with
 * simple or SASL credentials, then search, read, delete and ask the
 * server who we are.
 *
 * @example
 * const client = LdapClient.fromConfig();
 *
 * await client.connect();
 * console.log(await client.whoAmI());
 * await client.close();
 */
export {
  LdapClient,
  DEFAULT_URI,
  ANONYMOUS_IDENTITY,
  ROOT_DSE_ATTRIBUTES,
} from './lib/ldapClient';
export type { LdapClientOptions } from './lib/ldapClient';
export {
  simpleCredentials,
  saslCredentials,
  toBindCredentials,
} from './lib/bind';
export type {
  BindCredentials,
  SimpleCredentials,
  SaslCredentials,
  ConnectParameters,
} from './lib/bind';
export { LdapEntry } from './lib/entry';
export type {
  AttributeValue,
  AttributeValues,
  AttributesList,
} from './lib/entry';
export { SCOPE } from './lib/transport';
export type {
  SearchScope,
  SearchRequest,
  LdapMessage,
  LdapTransport,
  TransportFactory,
  TransportOptions,
} from './lib/transport';
export type { SearchConstraints } from './lib/search';
export { parseLdapUrl, formatServerUrl } from './lib/ldapUrl';
export type { LdapUrl, LdapUrlExtension } from './lib/ldapUrl';
export { LdaptsTransport, WHOAMI_OID } from './lib/ldaptsTransport';
export {
  SaslDefaults,
  getSaslMechanism,
  supportedSaslMechanisms,
} from './lib/sasl';
export type { SaslMechanism, SaslPrompt } from './lib/sasl';
export { loadConfig, resolveConfig } from './config/args';
export type { Config, LogLevel } from './config/args';
export { buildLogger } from './logger/winston';
export {
  LdapClientError,
  InvalidUrlError,
  ParameterError,
  NotConnectedError,
  TlsError,
  BindError,
  SearchError,
  ProtocolError,
  OutOfMemoryError,
} from './lib/errors';
