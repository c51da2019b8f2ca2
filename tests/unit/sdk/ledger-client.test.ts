import { describe, it, expect, beforeEach, vi, afterEach, type MockInstance } from 'vitest';

import { LedgerClient, LedgerClientError } from '@/sdk/ledger-client.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const ALICE = '11'.repeat(32);
const BOB = '22'.repeat(32);

function mockFetchResponse(body: unknown, status = 200, statusText = 'OK'): Response {
  return new Response(JSON.stringify(body), {
    status,
    statusText,
    headers: { 'Content-Type': 'application/json' },
  });
}

function lastInit(spy: MockInstance<typeof fetch>): RequestInit {
  const call = spy.mock.calls[spy.mock.calls.length - 1];
  return call[1] as RequestInit;
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('LedgerClient', () => {
  let fetchSpy: MockInstance<typeof fetch>;

  beforeEach(() => {
    fetchSpy = vi.spyOn(globalThis, 'fetch').mockResolvedValue(mockFetchResponse({}));
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('reads', () => {
    it('should strip trailing slash from baseUrl', async () => {
      const client = new LedgerClient({ baseUrl: 'http://localhost:3000/' });
      fetchSpy.mockResolvedValueOnce(mockFetchResponse({ totalSupply: '1000' }));

      await client.totalSupply();

      expect(fetchSpy).toHaveBeenCalledWith('http://localhost:3000/supply', expect.any(Object));
    });

    it('should fetch ledger info', async () => {
      const client = new LedgerClient({ baseUrl: 'http://localhost:3000' });
      fetchSpy.mockResolvedValueOnce(mockFetchResponse({ issuer: ALICE, totalSupply: '1000' }));

      const info = await client.info();

      expect(info).toEqual({ issuer: ALICE, totalSupply: '1000' });
      expect(fetchSpy).toHaveBeenCalledWith('http://localhost:3000/ledger', expect.any(Object));
    });

    it('should fetch a balance without a caller header', async () => {
      const client = new LedgerClient({ baseUrl: 'http://localhost:3000', caller: ALICE });
      fetchSpy.mockResolvedValueOnce(mockFetchResponse({ account: BOB, balance: '25' }));

      const balance = await client.balanceOf(BOB);

      expect(balance.balance).toBe('25');
      expect(fetchSpy).toHaveBeenCalledWith(
        `http://localhost:3000/accounts/${BOB}/balance`,
        expect.any(Object)
      );
      const init = lastInit(fetchSpy);
      expect(init.method).toBe('GET');
      expect(init.headers).toEqual({});
      expect(init.body).toBeUndefined();
    });

    it('should fetch an allowance', async () => {
      const client = new LedgerClient({ baseUrl: 'http://localhost:3000' });
      fetchSpy.mockResolvedValueOnce(
        mockFetchResponse({ owner: ALICE, spender: BOB, allowance: '7' })
      );

      const result = await client.allowance(ALICE, BOB);

      expect(result.allowance).toBe('7');
      expect(fetchSpy).toHaveBeenCalledWith(
        `http://localhost:3000/allowances/${ALICE}/${BOB}`,
        expect.any(Object)
      );
    });

    it('should page through events', async () => {
      const client = new LedgerClient({ baseUrl: 'http://localhost:3000' });
      fetchSpy.mockResolvedValueOnce(
        mockFetchResponse({
          total: 1,
          offset: 0,
          events: [{ type: 'Created', from: ALICE, totalSupply: '1000' }],
        })
      );

      const page = await client.events(0, 10);

      expect(page.events).toHaveLength(1);
      expect(fetchSpy).toHaveBeenCalledWith(
        'http://localhost:3000/events?offset=0&limit=10',
        expect.any(Object)
      );
    });
  });

  describe('mutations', () => {
    it('should send the caller header and JSON body on transfer', async () => {
      const client = new LedgerClient({ baseUrl: 'http://localhost:3000', caller: ALICE });
      fetchSpy.mockResolvedValueOnce(
        mockFetchResponse({
          success: true,
          event: { type: 'Transfer', from: ALICE, to: BOB, value: '10' },
        })
      );

      const result = await client.transfer({ to: BOB, value: '10' });

      expect(result.success).toBe(true);
      const init = lastInit(fetchSpy);
      expect(init.method).toBe('POST');
      expect(init.headers).toEqual({
        'Content-Type': 'application/json',
        'x-ledger-caller': ALICE,
      });
      expect(init.body).toBe(JSON.stringify({ to: BOB, value: '10' }));
    });

    it('should honor a custom caller header and extra headers', async () => {
      const client = new LedgerClient({
        baseUrl: 'http://localhost:3000',
        caller: ALICE,
        callerHeader: 'x-account',
        headers: { 'x-request-id': 'req-1' },
      });
      fetchSpy.mockResolvedValueOnce(
        mockFetchResponse({ success: true, event: { type: 'Burn', from: ALICE, value: '5' } })
      );

      await client.burn('5');

      expect(lastInit(fetchSpy).headers).toEqual({
        'x-request-id': 'req-1',
        'Content-Type': 'application/json',
        'x-account': ALICE,
      });
      expect(fetchSpy).toHaveBeenCalledWith('http://localhost:3000/burn', expect.any(Object));
    });

    it('should return failed outcomes without throwing', async () => {
      const client = new LedgerClient({ baseUrl: 'http://localhost:3000', caller: BOB });
      fetchSpy.mockResolvedValueOnce(
        mockFetchResponse({
          success: false,
          reason: 'not_issuer',
          message: 'Only the issuer may issue new tokens',
        })
      );

      const result = await client.issue('100');

      expect(result).toEqual({
        success: false,
        reason: 'not_issuer',
        message: 'Only the issuer may issue new tokens',
      });
    });

    it('should act as another account via withCaller', async () => {
      const client = new LedgerClient({ baseUrl: 'http://localhost:3000', caller: ALICE });
      fetchSpy.mockResolvedValueOnce(
        mockFetchResponse({
          success: true,
          event: { type: 'TransferFrom', from: BOB, owner: ALICE, to: BOB, value: '1' },
        })
      );

      await client.withCaller(BOB).transferFrom({ owner: ALICE, to: BOB, value: '1' });

      expect(lastInit(fetchSpy).headers).toEqual({
        'Content-Type': 'application/json',
        'x-ledger-caller': BOB,
      });
      expect(fetchSpy).toHaveBeenCalledWith(
        'http://localhost:3000/transfer-from',
        expect.any(Object)
      );
    });

    it('should refuse mutations without a caller', async () => {
      const client = new LedgerClient({ baseUrl: 'http://localhost:3000' });

      await expect(client.approve({ spender: BOB, value: '1' })).rejects.toThrow(
        'LedgerClient: a caller is required for POST /approve'
      );
      expect(fetchSpy).not.toHaveBeenCalled();
    });
  });

  describe('errors', () => {
    it('should raise LedgerClientError with the server error code', async () => {
      const client = new LedgerClient({ baseUrl: 'http://localhost:3000', caller: ALICE });
      fetchSpy.mockResolvedValueOnce(
        mockFetchResponse(
          {
            error: {
              code: 'LEDGER_INVALID_REQUEST',
              message: 'Invalid ledger request: value: Invalid',
              statusCode: 400,
            },
          },
          400,
          'Bad Request'
        )
      );

      const error = await client.transfer({ to: BOB, value: 'x' }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(LedgerClientError);
      const clientError = error as LedgerClientError;
      expect(clientError.statusCode).toBe(400);
      expect(clientError.code).toBe('LEDGER_INVALID_REQUEST');
      expect(clientError.message).toBe('Invalid ledger request: value: Invalid');
    });

    it('should fall back to status text for unstructured error bodies', async () => {
      const client = new LedgerClient({ baseUrl: 'http://localhost:3000' });
      fetchSpy.mockResolvedValueOnce(mockFetchResponse({ oops: true }, 502, 'Bad Gateway'));

      await expect(client.info()).rejects.toThrow('Ledger returned 502 Bad Gateway');
    });

    it('should reject responses that fail schema validation', async () => {
      const client = new LedgerClient({ baseUrl: 'http://localhost:3000' });
      fetchSpy.mockResolvedValueOnce(mockFetchResponse({ totalSupply: 1000 }));

      await expect(client.totalSupply()).rejects.toThrow('Invalid ledger response');
    });

    it('should report timeouts', async () => {
      const client = new LedgerClient({ baseUrl: 'http://localhost:3000', timeout: 5 });
      fetchSpy.mockImplementation(
        (_url: string | URL | Request, init?: RequestInit) =>
          new Promise<Response>((_resolve, reject) => {
            const signal = init?.signal;
            if (signal) {
              signal.addEventListener('abort', () => {
                const err = new Error('The operation was aborted');
                err.name = 'AbortError';
                reject(err);
              });
            }
          })
      );

      await expect(client.totalSupply()).rejects.toThrow(
        'Ledger request to /supply timed out after 5ms'
      );
    });
  });
});
