import { describe, it, expect } from 'vitest';

import { AccountIdSchema, parseAccountId } from '@/ledger/account.js';

const LOWER = 'ab'.repeat(32);
const UPPER = 'AB'.repeat(32);

describe('Account identifiers', () => {
  it('should normalize to lowercase without prefix', () => {
    expect(parseAccountId(`0x${UPPER}`)).toBe(LOWER);
    expect(parseAccountId(LOWER)).toBe(LOWER);
  });

  it.each([
    ['too short', 'ab'.repeat(31)],
    ['too long', 'ab'.repeat(33)],
    ['non-hex', 'zz'.repeat(32)],
    ['uppercase prefix', `0X${LOWER}`],
    ['a name', 'alice'],
  ])('should return null for %s input', (_label, raw) => {
    expect(parseAccountId(raw)).toBeNull();
  });

  it('should normalize through the Zod schema', () => {
    expect(AccountIdSchema.parse(`0x${UPPER}`)).toBe(LOWER);
    expect(AccountIdSchema.safeParse('0x1234').success).toBe(false);
  });
});
