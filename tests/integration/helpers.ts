import type { FastifyInstance, LightMyRequestResponse } from 'fastify';

import { ConfigSchema } from '@/config/schema.js';
import type { Config } from '@/config/index.js';

export const ISSUER = 'aa'.repeat(32);
export const BOB = 'bb'.repeat(32);
export const CAROL = 'cc'.repeat(32);

export const CALLER_HEADER = 'x-ledger-caller';

/** Quiet test config with a 1000-token ledger owned by ISSUER */
export function createTestConfig(overrides: Record<string, unknown> = {}): Config {
  return ConfigSchema.parse({
    env: 'test',
    logging: { level: 'fatal' },
    ledger: { issuer: ISSUER, initialSupply: '1000' },
    ...overrides,
  });
}

/** POST a ledger operation as `caller` */
export function postAs(
  server: FastifyInstance,
  caller: string,
  url: string,
  payload: Record<string, unknown>
): Promise<LightMyRequestResponse> {
  return server.inject({
    method: 'POST',
    url,
    headers: { [CALLER_HEADER]: caller },
    payload,
  });
}

export async function balanceOf(server: FastifyInstance, account: string): Promise<string> {
  const response = await server.inject({ method: 'GET', url: `/accounts/${account}/balance` });
  return (response.json() as { balance: string }).balance;
}

export async function totalSupply(server: FastifyInstance): Promise<string> {
  const response = await server.inject({ method: 'GET', url: '/supply' });
  return (response.json() as { totalSupply: string }).totalSupply;
}
