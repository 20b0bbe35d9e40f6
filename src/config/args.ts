/**
 * command-line options, corresponding environment variables, default values and types
 * Contains also the typescript declaration of config
 */
import type { SecureVersion } from 'tls';

import { ParameterError } from '../lib/errors';
import {
  parseConfig,
  type ConfigTemplate,
  type ConfigValues,
} from '../lib/parseConfig';

export const LOG_LEVELS = ['error', 'warn', 'notice', 'info', 'debug'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const TLS_VERSIONS: readonly SecureVersion[] = [
  'TLSv1',
  'TLSv1.1',
  'TLSv1.2',
  'TLSv1.3',
];

/**
 * Typescript declaration of config
 *
 * See below for config arguments, corresponding environment variables,
 * default value and type
 */
export interface Config {
  uri: string;
  starttls: boolean;
  // milliseconds, 0 = no timeout
  timeout: number;
  connect_timeout: number;
  tls_min_version: SecureVersion;
  // search cache, disabled when cache_max is 0
  cache_max: number;
  cache_ttl: number;
  log_level: LogLevel;
  logger: 'console' | 'file';
  log_file: string;
}

const configTemplate: ConfigTemplate = [
  ['--uri', 'LDAP_CLIENT_URI', 'ldap://localhost:389/'],
  ['--starttls', 'LDAP_CLIENT_STARTTLS', false, 'boolean'],
  ['--timeout', 'LDAP_CLIENT_TIMEOUT', 0, 'number'],
  ['--connect-timeout', 'LDAP_CLIENT_CONNECT_TIMEOUT', 0, 'number'],
  ['--tls-min-version', 'LDAP_CLIENT_TLS_MIN_VERSION', 'TLSv1.2'],
  ['--cache-max', 'LDAP_CLIENT_CACHE_MAX', 0, 'number'],
  ['--cache-ttl', 'LDAP_CLIENT_CACHE_TTL', 300, 'number'],
  ['--log-level', 'LDAP_CLIENT_LOG_LEVEL', 'error'],
  ['--logger', 'LDAP_CLIENT_LOGGER', 'console'],
  ['--log-file', 'LDAP_CLIENT_LOG_FILE', 'ldap-client.log'],
];

export default configTemplate;

const logLevels: readonly string[] = LOG_LEVELS;
const tlsVersions: readonly string[] = TLS_VERSIONS;

const isLogLevel = (value: string): value is LogLevel =>
  logLevels.includes(value);

const isLoggerKind = (value: string): value is Config['logger'] =>
  value === 'console' || value === 'file';

const isTlsVersion = (value: string): value is SecureVersion =>
  tlsVersions.includes(value);

function stringValue(values: ConfigValues, key: string): string {
  const value = values[key];
  if (typeof value !== 'string') {
    throw new ParameterError(`Configuration ${key} must be a string`);
  }
  return value;
}

function numberValue(values: ConfigValues, key: string): number {
  const value = values[key];
  if (typeof value !== 'number' || value < 0) {
    throw new ParameterError(
      `Configuration ${key} must be a non-negative number`
    );
  }
  return value;
}

/**
 * Check parsed values and type them as a Config
 *
 * @throws ParameterError
 */
export function resolveConfig(values: ConfigValues): Config {
  const logLevel = stringValue(values, 'log_level');
  if (!isLogLevel(logLevel)) {
    throw new ParameterError(`Unknown log level "${logLevel}"`);
  }
  const logger = stringValue(values, 'logger');
  if (!isLoggerKind(logger)) {
    throw new ParameterError(`Unknown logger "${logger}"`);
  }
  const tlsMinVersion = stringValue(values, 'tls_min_version');
  if (!isTlsVersion(tlsMinVersion)) {
    throw new ParameterError(`Unknown TLS version "${tlsMinVersion}"`);
  }
  return {
    uri: stringValue(values, 'uri'),
    starttls: values.starttls === true,
    timeout: numberValue(values, 'timeout'),
    connect_timeout: numberValue(values, 'connect_timeout'),
    tls_min_version: tlsMinVersion,
    cache_max: numberValue(values, 'cache_max'),
    cache_ttl: numberValue(values, 'cache_ttl'),
    log_level: logLevel,
    logger,
    log_file: stringValue(values, 'log_file'),
  };
}

/**
 * Read the configuration from the environment and, when given, from
 * command-line style arguments (`['node', 'script', '--uri', ...]`)
 */
export function loadConfig(
  argv: string[] = [],
  env: NodeJS.ProcessEnv = process.env
): Config {
  return resolveConfig(parseConfig(configTemplate, argv, env));
}
