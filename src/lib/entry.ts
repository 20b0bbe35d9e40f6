/**
 * Directory entry built from one search result message
 */
import type { LdapClient } from './ldapClient';
import type { SearchEntryMessage } from './transport';

export type AttributeValue = Buffer | Buffer[] | string[] | string;
export type AttributeValues = Buffer[] | string[];
export type AttributesList = Record<string, AttributeValues>;

const toValues = (value: AttributeValue): AttributeValues => {
  if (Array.isArray(value)) return value;
  if (Buffer.isBuffer(value)) return [value];
  return [value];
};

export class LdapEntry {
  readonly dn: string;
  readonly client: LdapClient;
  // attribute names are case-insensitive, keyed by their lower-case form
  private attributes = new Map<
    string,
    { name: string; values: AttributeValues }
  >();

  constructor(dn: string, attributes: AttributesList, client: LdapClient) {
    this.dn = dn;
    this.client = client;
    for (const [name, values] of Object.entries(attributes)) {
      this.attributes.set(name.toLowerCase(), { name, values });
    }
  }

  static fromMessage(
    message: SearchEntryMessage,
    client: LdapClient
  ): LdapEntry {
    const { dn, ...rest } = message.entry;
    const attributes: AttributesList = {};
    for (const [name, value] of Object.entries(rest)) {
      attributes[name] = toValues(value);
    }
    return new LdapEntry(dn, attributes, client);
  }

  attributeCount(): number {
    return this.attributes.size;
  }

  attributeNames(): string[] {
    return [...this.attributes.values()].map(a => a.name);
  }

  has(name: string): boolean {
    return this.attributes.has(name.toLowerCase());
  }

  get(name: string): AttributeValues | undefined {
    return this.attributes.get(name.toLowerCase())?.values;
  }

  // First value of an attribute as a string
  first(name: string): string | undefined {
    const value = this.get(name)?.[0];
    if (value === undefined) return undefined;
    return typeof value === 'string' ? value : value.toString();
  }

  toJSON(): Record<string, string | AttributeValues> {
    const json: Record<string, string | AttributeValues> = { dn: this.dn };
    for (const { name, values } of this.attributes.values()) {
      json[name] = values;
    }
    return json;
  }
}
