/**
 * Bind negotiation
 *
 * Order matters: protocol version, then StartTLS when requested, then a
 * single bind. Credentials never go over a plain channel once StartTLS
 * was asked for.
 */
import type winston from 'winston';

import { BindError, TlsError } from './errors';
import { SaslDefaults } from './sasl';
import type { LdapTransport } from './transport';
import { diagnostic, resultCodeOf } from './utils';

export interface SimpleCredentials {
  type: 'simple';
  // empty for an anonymous bind
  bindDN: string;
  password?: string;
}

export interface SaslCredentials {
  type: 'sasl';
  mechanism: string;
  bindDN?: string;
  authenticationID?: string;
  realm?: string;
  authorizationID?: string;
  password?: string;
}

export type BindCredentials = SimpleCredentials | SaslCredentials;

// Flat connect parameters, `mechanism` selects a SASL bind
export interface ConnectParameters {
  bindDN?: string;
  password?: string;
  mechanism?: string;
  authenticationID?: string;
  realm?: string;
  authorizationID?: string;
}

export const simpleCredentials = (
  bindDN = '',
  password?: string
): SimpleCredentials => ({ type: 'simple', bindDN, password });

export const saslCredentials = (
  init: Omit<SaslCredentials, 'type'>
): SaslCredentials => ({ type: 'sasl', ...init });

export function toBindCredentials(
  params: ConnectParameters = {}
): BindCredentials {
  const { mechanism, bindDN, password } = params;
  if (mechanism) {
    return saslCredentials({
      mechanism,
      bindDN,
      password,
      authenticationID: params.authenticationID,
      realm: params.realm,
      authorizationID: params.authorizationID,
    });
  }
  return simpleCredentials(bindDN, password);
}

export interface BindOptions {
  useStartTls: boolean;
  protocolVersion: number;
  logger: winston.Logger;
}

/**
 * @throws ProtocolError when the protocol version is refused
 * @throws TlsError when StartTLS fails
 * @throws BindError when the server rejects the bind
 */
export async function negotiateBind(
  transport: LdapTransport,
  credentials: BindCredentials,
  { useStartTls, protocolVersion, logger }: BindOptions
): Promise<void> {
  transport.setProtocolVersion(protocolVersion);

  if (useStartTls && !transport.isTlsInPlace()) {
    try {
      await transport.startTls();
    } catch (error) {
      logger.error('LDAP StartTLS error:', error);
      throw new TlsError(diagnostic(error), resultCodeOf(error));
    }
    logger.debug('LDAP StartTLS negotiated');
  }

  try {
    if (credentials.type === 'sasl') {
      const defaults = new SaslDefaults(credentials);
      logger.debug(`LDAP SASL bind, mechanism ${defaults.mechanism}`);
      await transport.saslInteractiveBind(
        credentials.bindDN ?? '',
        defaults.mechanism,
        defaults
      );
    } else {
      logger.debug(`LDAP simple bind as "${credentials.bindDN}"`);
      await transport.simpleBind(credentials.bindDN, credentials.password ?? '');
    }
  } catch (error) {
    logger.error('LDAP bind error:', error);
    throw new BindError(diagnostic(error), resultCodeOf(error));
  }
}
