// LedgerClient -- HTTP wrapper for the token ledger API.
//
// Uses native fetch (Node 20+) with AbortController timeout and Zod
// validation of every response. The caller identity is fixed per client;
// use withCaller() to act as a different account.

import { z } from 'zod';

import type {
  AllowanceResponse,
  ApproveRequest,
  BalanceResponse,
  EventsResponse,
  LedgerInfoResponse,
  OperationResponse,
  SupplyResponse,
  TransferFromRequest,
  TransferRequest,
} from './types.js';
import {
  AllowanceResponseSchema,
  BalanceResponseSchema,
  EventsResponseSchema,
  LedgerInfoResponseSchema,
  OperationResponseSchema,
  SupplyResponseSchema,
} from './types.js';

export interface LedgerClientOptions {
  /** Base URL of the ledger service (e.g. "http://localhost:3000") */
  baseUrl: string;
  /** Account the client acts as on mutating calls (64 hex chars) */
  caller?: string;
  /** Header carrying the caller identity (default: "x-ledger-caller") */
  callerHeader?: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
  /** Additional headers to send with every request */
  headers?: Record<string, string>;
}

const ErrorBodySchema = z.object({
  error: z.object({ code: z.string(), message: z.string() }),
});

/** Non-2xx response from the ledger service */
export class LedgerClientError extends Error {
  constructor(
    message: string,
    readonly statusCode: number,
    readonly code?: string
  ) {
    super(message);
    this.name = 'LedgerClientError';
  }
}

export class LedgerClient {
  private readonly options: LedgerClientOptions;
  private readonly baseUrl: string;
  private readonly timeout: number;
  private readonly callerHeader: string;

  constructor(options: LedgerClientOptions) {
    this.options = options;
    // Strip trailing slash for consistent URL building
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeout = options.timeout ?? 30_000;
    this.callerHeader = options.callerHeader ?? 'x-ledger-caller';
  }

  /** A client with the same settings acting as `caller` */
  withCaller(caller: string): LedgerClient {
    return new LedgerClient({ ...this.options, caller });
  }

  // ---- Reads ----

  async info(): Promise<LedgerInfoResponse> {
    return this.request('GET', '/ledger', undefined, LedgerInfoResponseSchema);
  }

  async totalSupply(): Promise<SupplyResponse> {
    return this.request('GET', '/supply', undefined, SupplyResponseSchema);
  }

  async balanceOf(account: string): Promise<BalanceResponse> {
    return this.request(
      'GET',
      `/accounts/${encodeURIComponent(account)}/balance`,
      undefined,
      BalanceResponseSchema
    );
  }

  async allowance(owner: string, spender: string): Promise<AllowanceResponse> {
    return this.request(
      'GET',
      `/allowances/${encodeURIComponent(owner)}/${encodeURIComponent(spender)}`,
      undefined,
      AllowanceResponseSchema
    );
  }

  async events(offset = 0, limit = 100): Promise<EventsResponse> {
    return this.request(
      'GET',
      `/events?offset=${offset}&limit=${limit}`,
      undefined,
      EventsResponseSchema
    );
  }

  // ---- Mutations (caller required) ----

  async transfer(request: TransferRequest): Promise<OperationResponse> {
    return this.request('POST', '/transfer', request, OperationResponseSchema);
  }

  async approve(request: ApproveRequest): Promise<OperationResponse> {
    return this.request('POST', '/approve', request, OperationResponseSchema);
  }

  async transferFrom(request: TransferFromRequest): Promise<OperationResponse> {
    return this.request('POST', '/transfer-from', request, OperationResponseSchema);
  }

  async burn(value: string): Promise<OperationResponse> {
    return this.request('POST', '/burn', { value }, OperationResponseSchema);
  }

  async issue(value: string): Promise<OperationResponse> {
    return this.request('POST', '/issue', { value }, OperationResponseSchema);
  }

  // ---- Private helpers ----

  private async request<T>(
    method: 'GET' | 'POST',
    path: string,
    body: unknown,
    schema: z.ZodType<T>
  ): Promise<T> {
    const headers: Record<string, string> = { ...this.options.headers };
    if (method === 'POST') {
      if (!this.options.caller) {
        throw new Error(`LedgerClient: a caller is required for POST ${path}`);
      }
      headers['Content-Type'] = 'application/json';
      headers[this.callerHeader] = this.options.caller;
    }

    const url = `${this.baseUrl}${path}`;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await fetch(url, {
        method,
        headers,
        ...(body !== undefined && { body: JSON.stringify(body) }),
        signal: controller.signal,
      });

      const json: unknown = await response.json();

      if (!response.ok) {
        const errorBody = ErrorBodySchema.safeParse(json);
        throw new LedgerClientError(
          errorBody.success
            ? errorBody.data.error.message
            : `Ledger returned ${response.status} ${response.statusText}`,
          response.status,
          errorBody.success ? errorBody.data.error.code : undefined
        );
      }

      const parsed = schema.safeParse(json);
      if (!parsed.success) {
        throw new Error(`Invalid ledger response: ${parsed.error.message}`);
      }

      return parsed.data;
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new Error(`Ledger request to ${path} timed out after ${this.timeout}ms`);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
