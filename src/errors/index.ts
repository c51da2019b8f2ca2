import createError from '@fastify/error';
import type { z } from 'zod';

// Configuration errors (CONFIG_*)
export const ConfigInvalidError = createError<[string]>(
  'CONFIG_INVALID',
  'Invalid configuration: %s',
  500
);

export const ConfigMissingError = createError<[string]>(
  'CONFIG_MISSING',
  'Missing configuration file: %s',
  500
);

export const ConfigParseError = createError<[string]>(
  'CONFIG_PARSE_ERROR',
  'Failed to parse configuration: %s',
  500
);

// Server errors (SERVER_*)
export const ServerStartError = createError<[string]>(
  'SERVER_START_ERROR',
  'Failed to start server: %s',
  500
);

// Ledger errors (LEDGER_*) - re-exported from ledger domain
export {
  LedgerInvalidAmountError,
  LedgerInvalidRequestError,
  LedgerCallerRequiredError,
  LedgerAmountOverflowError,
} from '../ledger/errors.js';

/**
 * Flatten Zod issues into one readable line: "path: message, path: message".
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
}
