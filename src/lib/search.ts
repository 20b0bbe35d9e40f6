/**
 * Search pipeline
 *
 * Issues one search request, walks the response messages in arrival
 * order and assembles either the first usable entry or the full list.
 */
import type winston from 'winston';

import type { LdapEntry } from './entry';
import { OutOfMemoryError, ParameterError, SearchError } from './errors';
import {
  SCOPE,
  type LdapMessage,
  type LdapTransport,
  type SearchEntryMessage,
  type SearchRequest,
  type SearchScope,
} from './transport';
import { diagnostic, isNoSuchObject, resultCodeOf } from './utils';

export interface SearchConstraints {
  base: string;
  scope: SearchScope;
  // empty or absent matches every entry
  filter?: string;
  // absent returns every user attribute
  attributes?: string[];
  attributesOnly?: boolean;
  timeLimitSeconds?: number;
  sizeLimit?: number;
}

export type EntryBuilder = (message: SearchEntryMessage) => LdapEntry;

const scopes: readonly string[] = Object.values(SCOPE);

/**
 * Validate search constraints and convert them to a transport request.
 * A time limit that is not positive and an absent size limit both mean
 * "no limit".
 *
 * @throws ParameterError
 */
export function normalizeSearch(constraints: SearchConstraints): SearchRequest {
  const { base, scope, filter, attributes, timeLimitSeconds, sizeLimit } =
    constraints;
  if (!scopes.includes(scope)) {
    throw new ParameterError(`Invalid search scope: ${String(scope)}`);
  }
  if (timeLimitSeconds !== undefined && !Number.isInteger(timeLimitSeconds)) {
    throw new ParameterError('timeLimitSeconds must be an integer');
  }
  if (
    sizeLimit !== undefined &&
    (!Number.isInteger(sizeLimit) || sizeLimit < 0)
  ) {
    throw new ParameterError('sizeLimit must be a non-negative integer');
  }
  return {
    base,
    scope,
    filter: filter ? filter : undefined,
    attributes: attributes ? [...attributes] : undefined,
    attributesOnly: constraints.attributesOnly ?? false,
    timeLimit: timeLimitSeconds && timeLimitSeconds > 0 ? timeLimitSeconds : 0,
    sizeLimit: sizeLimit ?? 0,
  };
}

/**
 * Run a search and collect its entries
 *
 * "No such object" is an empty result, not an error. Entries without any
 * attribute are dropped before the first-only shortcut applies.
 * Continuation references are not followed.
 *
 * @throws SearchError
 */
export async function runSearch(
  transport: LdapTransport,
  request: SearchRequest,
  firstOnly: true,
  buildEntry: EntryBuilder,
  logger: winston.Logger
): Promise<LdapEntry | undefined>;
export async function runSearch(
  transport: LdapTransport,
  request: SearchRequest,
  firstOnly: false,
  buildEntry: EntryBuilder,
  logger: winston.Logger
): Promise<LdapEntry[]>;
export async function runSearch(
  transport: LdapTransport,
  request: SearchRequest,
  firstOnly: boolean,
  buildEntry: EntryBuilder,
  logger: winston.Logger
): Promise<LdapEntry[] | LdapEntry | undefined> {
  let messages: LdapMessage[];
  try {
    messages = await transport.search(request);
  } catch (error) {
    if (isNoSuchObject(error)) {
      logger.debug(`LDAP search: no such object ${request.base}`);
      return firstOnly ? undefined : [];
    }
    logger.warn(`LDAP search error on "${request.base}": ${diagnostic(error)}`);
    throw new SearchError(diagnostic(error), resultCodeOf(error));
  }

  const entries: LdapEntry[] = [];
  try {
    for (const message of messages) {
      switch (message.type) {
        case 'searchEntry': {
          const entry = buildEntry(message);
          if (entry.attributeCount() === 0) {
            logger.debug(`LDAP search: dropping empty entry "${entry.dn}"`);
            break;
          }
          if (firstOnly) return entry;
          entries.push(entry);
          break;
        }
        case 'searchReference':
          logger.debug(
            `LDAP search: ignoring reference ${message.uris.join(' ')}`
          );
          break;
        case 'other':
          logger.debug(`LDAP search: ignoring message ${message.description}`);
          break;
      }
    }
  } catch (error) {
    if (error instanceof RangeError) {
      throw new OutOfMemoryError(`Cannot build search result: ${error.message}`);
    }
    throw error;
  }
  return firstOnly ? undefined : entries;
}
