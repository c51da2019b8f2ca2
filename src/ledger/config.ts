import { z } from 'zod';

import { AccountIdSchema } from './account.js';
import { DecimalAmountSchema } from './amount.js';

/**
 * Ledger configuration Zod schema.
 *
 * The issuer is fixed for the lifetime of the process: it receives the
 * initial supply and is the only account allowed to issue.
 */
export const LedgerConfigSchema = z.object({
  /** Account that creates the ledger and holds issue rights */
  issuer: AccountIdSchema,
  /** Initial supply credited to the issuer, as a decimal string */
  initialSupply: DecimalAmountSchema.default('0'),
  /** Request header carrying the caller identity */
  callerHeader: z
    .string()
    .regex(/^[a-z0-9-]+$/, 'Header names must be lowercase')
    .default('x-ledger-caller'),
});

export type LedgerConfig = z.infer<typeof LedgerConfigSchema>;
