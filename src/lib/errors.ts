/**
 * Client error classes
 *
 * Every failure of the client is one of these. `resultCode` is the LDAP
 * result code returned by the server, when there was one.
 */

/**
 * Base LDAP client error
 */
export class LdapClientError extends Error {
  constructor(
    message: string,
    public resultCode?: number
  ) {
    super(message);
    this.name = 'LdapClientError';
  }
}

/**
 * Construction errors
 */
export class InvalidUrlError extends LdapClientError {
  constructor(message = 'Invalid LDAP URL') {
    super(message);
    this.name = 'InvalidUrlError';
  }
}

export class ParameterError extends LdapClientError {
  constructor(message = 'Wrong parameter') {
    super(message);
    this.name = 'ParameterError';
  }
}

/**
 * Session errors
 */
export class NotConnectedError extends LdapClientError {
  constructor(message = 'Client has to connect to the server first.') {
    super(message);
    this.name = 'NotConnectedError';
  }
}

export class TlsError extends LdapClientError {
  constructor(message = 'StartTLS failed', resultCode?: number) {
    super(message, resultCode);
    this.name = 'TlsError';
  }
}

export class BindError extends LdapClientError {
  constructor(message = 'Bind failed', resultCode?: number) {
    super(message, resultCode);
    this.name = 'BindError';
  }
}

/**
 * Operation errors
 */
export class SearchError extends LdapClientError {
  constructor(message = 'Search failed', resultCode?: number) {
    super(message, resultCode);
    this.name = 'SearchError';
  }
}

export class ProtocolError extends LdapClientError {
  constructor(message = 'Protocol error', resultCode?: number) {
    super(message, resultCode);
    this.name = 'ProtocolError';
  }
}

export class OutOfMemoryError extends LdapClientError {
  constructor(message = 'Out of memory') {
    super(message);
    this.name = 'OutOfMemoryError';
  }
}
