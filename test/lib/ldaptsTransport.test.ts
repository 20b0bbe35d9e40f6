import type { ConnectionOptions } from 'tls';

import { expect } from 'chai';
import type { ClientOptions, SearchOptions, SearchResult } from 'ldapts';

import { ProtocolError } from '../../src/lib/errors';
import { parseLdapUrl } from '../../src/lib/ldapUrl';
import {
  LdaptsTransport,
  WHOAMI_OID,
  type DirectoryConnection,
} from '../../src/lib/ldaptsTransport';
import { SaslDefaults } from '../../src/lib/sasl';
import { SCOPE } from '../../src/lib/transport';
import { normalizeSearch } from '../../src/lib/search';
import { rejectionOf } from '../helpers/assert';

class FakeConnection implements DirectoryConnection {
  binds: [string, string | undefined][] = [];
  startTlsOptions?: ConnectionOptions;
  searches: [string, SearchOptions | undefined][] = [];
  deleted: string[] = [];
  exops: string[] = [];
  unbound = false;
  result: SearchResult = { searchEntries: [], searchReferences: [] };
  identity?: string;

  constructor(readonly options: ClientOptions) {}

  async bind(dnOrSaslMechanism: string, password?: string): Promise<void> {
    this.binds.push([dnOrSaslMechanism, password]);
  }

  async startTLS(options?: ConnectionOptions): Promise<void> {
    this.startTlsOptions = options;
  }

  async search(baseDN: string, options?: SearchOptions): Promise<SearchResult> {
    this.searches.push([baseDN, options]);
    return this.result;
  }

  async del(dn: string): Promise<void> {
    this.deleted.push(dn);
  }

  async exop(oid: string): Promise<{ oid?: string; value?: string }> {
    this.exops.push(oid);
    return { value: this.identity };
  }

  async unbind(): Promise<void> {
    this.unbound = true;
  }
}

const open = (
  uri: string,
  tlsOptions?: ConnectionOptions
): { transport: LdaptsTransport; connection: FakeConnection } => {
  const created: FakeConnection[] = [];
  const transport = new LdaptsTransport(
    parseLdapUrl(uri),
    { timeout: 2000, tlsOptions },
    options => {
      const connection = new FakeConnection(options);
      created.push(connection);
      return connection;
    }
  );
  const [connection] = created;
  if (!connection) throw new Error('connection was not created');
  return { transport, connection };
};

describe('LdaptsTransport', () => {
  it('should build ldapts options for a plain URL', () => {
    const { transport, connection } = open(
      'ldap://dir.example.com:1389/dc=example,dc=com'
    );
    expect(connection.options).to.deep.equal({
      url: 'ldap://dir.example.com:1389',
      timeout: 2000,
      connectTimeout: 0,
      strictDN: false,
    });
    expect(transport.isTlsInPlace()).to.equal(false);
    expect(transport.tlsOptions).to.deep.equal({
      minVersion: 'TLSv1.2',
      servername: 'dir.example.com',
    });
  });

  it('should pass TLS options to ldaps connections', () => {
    const { transport, connection } = open('ldaps://127.0.0.1/', {
      minVersion: 'TLSv1.3',
    });
    expect(transport.isTlsInPlace()).to.equal(true);
    expect(connection.options.url).to.equal('ldaps://127.0.0.1:636');
    // no SNI for an IP address
    expect(connection.options.tlsOptions).to.deep.equal({
      minVersion: 'TLSv1.3',
    });
  });

  it('should run StartTLS with the TLS options', async () => {
    const { transport, connection } = open('ldap://dir.example.com/');
    await transport.startTls();
    expect(transport.isTlsInPlace()).to.equal(true);
    expect(connection.startTlsOptions).to.deep.equal({
      minVersion: 'TLSv1.2',
      servername: 'dir.example.com',
    });
  });

  it('should only accept protocol version 3', () => {
    const { transport } = open('ldap://localhost/');
    expect(() => transport.setProtocolVersion(3)).to.not.throw();
    expect(() => transport.setProtocolVersion(2)).to.throw(
      ProtocolError,
      'LDAP protocol version 2 is not supported'
    );
  });

  it('should send simple binds as they are', async () => {
    const { transport, connection } = open('ldap://localhost/');
    await transport.simpleBind('cn=admin,dc=example,dc=com', 'test-secret');
    expect(connection.binds).to.deep.equal([
      ['cn=admin,dc=example,dc=com', 'test-secret'],
    ]);
  });

  it('should encode a SASL PLAIN bind', async () => {
    const { transport, connection } = open('ldap://localhost/');
    const defaults = new SaslDefaults({
      mechanism: 'plain',
      authenticationID: 'alice',
      password: 'test-secret',
    });
    await transport.saslInteractiveBind('', defaults.mechanism, defaults);
    expect(connection.binds).to.deep.equal([
      ['PLAIN', '\0alice\0test-secret'],
    ]);
  });

  it('should refuse an unsupported SASL mechanism', async () => {
    const { transport, connection } = open('ldap://localhost/');
    const defaults = new SaslDefaults({ mechanism: 'GSSAPI' });
    const error = await rejectionOf(
      transport.saslInteractiveBind('', defaults.mechanism, defaults)
    );
    expect((error as Error).message).to.equal(
      'SASL mechanism GSSAPI is not supported'
    );
    expect(connection.binds).to.deep.equal([]);
  });

  it('should map search requests and results', async () => {
    const { transport, connection } = open('ldap://localhost/');
    connection.result = {
      searchEntries: [{ dn: 'uid=alice,dc=example,dc=com', cn: 'Alice' }],
      searchReferences: ['ldap://replica.example.com/dc=example,dc=com'],
    };
    const messages = await transport.search(
      normalizeSearch({
        base: 'dc=example,dc=com',
        scope: SCOPE.SUBTREE,
        attributes: ['cn'],
        attributesOnly: true,
        timeLimitSeconds: 5,
        sizeLimit: 10,
      })
    );
    expect(connection.searches).to.deep.equal([
      [
        'dc=example,dc=com',
        {
          scope: 'sub',
          filter: '(objectclass=*)',
          returnAttributeValues: false,
          sizeLimit: 10,
          timeLimit: 5,
          attributes: ['cn'],
        },
      ],
    ]);
    expect(messages).to.deep.equal([
      {
        type: 'searchEntry',
        entry: { dn: 'uid=alice,dc=example,dc=com', cn: 'Alice' },
      },
      {
        type: 'searchReference',
        uris: ['ldap://replica.example.com/dc=example,dc=com'],
      },
    ]);
  });

  it('should not send an attribute list when none is requested', async () => {
    const { transport, connection } = open('ldap://localhost/');
    await transport.search(
      normalizeSearch({ base: '', scope: SCOPE.BASE, filter: '(cn=*)' })
    );
    const [, options] = connection.searches[0];
    expect(options?.filter).to.equal('(cn=*)');
    expect(options).to.not.have.property('attributes');
  });

  it('should ask "Who am I?" through the extended operation', async () => {
    const { transport, connection } = open('ldap://localhost/');
    expect(await transport.whoAmI()).to.equal('');
    connection.identity = 'dn:uid=alice,dc=example,dc=com';
    expect(await transport.whoAmI()).to.equal('dn:uid=alice,dc=example,dc=com');
    expect(connection.exops).to.deep.equal([WHOAMI_OID, WHOAMI_OID]);
  });

  it('should delete and unbind', async () => {
    const { transport, connection } = open('ldap://localhost/');
    await transport.delete('uid=alice,dc=example,dc=com');
    await transport.unbind();
    expect(connection.deleted).to.deep.equal(['uid=alice,dc=example,dc=com']);
    expect(connection.unbound).to.equal(true);
  });
});
