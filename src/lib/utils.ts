/**
 * @file src/lib/utils.ts
 * @description Utility functions
 */
import { NoSuchObjectError, ResultCodeError } from 'ldapts';

export const NO_SUCH_OBJECT = 32;

// Server diagnostic text of a failed operation
export const diagnostic = (error: unknown): string => {
  if (error instanceof Error) return error.message;
  return String(error);
};

// LDAP result code carried by an ldapts error, if any
export const resultCodeOf = (error: unknown): number | undefined => {
  return error instanceof ResultCodeError ? error.code : undefined;
};

export const isNoSuchObject = (error: unknown): boolean => {
  return (
    error instanceof NoSuchObjectError ||
    resultCodeOf(error) === NO_SUCH_OBJECT
  );
};

// Percent-decoding used by the URL parser, returns undefined on a bad escape
export const percentDecode = (value: string): string | undefined => {
  try {
    return decodeURIComponent(value);
  } catch {
    return undefined;
  }
};
