/**
 * @module api-client
 * Minimal JSON client for the mendgraph HTTP API.
 */

import type { z } from 'zod';
import type { StructuredError } from 'mendgraph-core';

export const DEFAULT_API_URL = 'http://127.0.0.1:9190';

/** A non-2xx answer, carrying the server's structured error when it sent one. */
export class ApiError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly code?: string,
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

function isStructuredError(value: unknown): value is Pick<StructuredError, 'code' | 'message'> {
  return typeof value === 'object' && value !== null &&
    'code' in value && typeof value.code === 'string' &&
    'message' in value && typeof value.message === 'string';
}

export class ApiClient {
  private readonly baseUrl: string;

  constructor(baseUrl: string = DEFAULT_API_URL, private readonly fetchImpl: typeof fetch = fetch) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  get<S extends z.ZodTypeAny>(schema: S, path: string, query: Record<string, string | number | undefined> = {}): Promise<z.output<S>> {
    const params = new URLSearchParams();
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined && value !== '') params.set(key, String(value));
    }
    const qs = params.toString();
    return this.request(schema, 'GET', qs ? `${path}?${qs}` : path);
  }

  post<S extends z.ZodTypeAny>(schema: S, path: string, body?: unknown): Promise<z.output<S>> {
    return this.request(schema, 'POST', path, body);
  }

  /** @throws {ApiError} on transport errors, non-2xx answers and unexpected shapes */
  private async request<S extends z.ZodTypeAny>(schema: S, method: string, path: string, body?: unknown): Promise<z.output<S>> {
    let res: Response;
    try {
      res = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method,
        headers: body === undefined ? {} : { 'Content-Type': 'application/json' },
        body: body === undefined ? undefined : JSON.stringify(body),
      });
    } catch (err) {
      throw new ApiError(`Cannot reach ${this.baseUrl}: ${err instanceof Error ? err.message : String(err)}`, 0);
    }

    const text = await res.text();
    let payload: unknown;
    try {
      payload = text ? JSON.parse(text) : {};
    } catch {
      throw new ApiError(`${method} ${path} returned non-JSON (${res.status})`, res.status);
    }

    if (!res.ok) {
      const error = typeof payload === 'object' && payload !== null && 'error' in payload ? payload.error : undefined;
      if (isStructuredError(error)) throw new ApiError(error.message, res.status, error.code);
      throw new ApiError(`${method} ${path} failed with ${res.status}`, res.status);
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new ApiError(`${method} ${path} returned an unexpected body: ${parsed.error.issues[0]?.message ?? 'invalid'}`, res.status);
    }
    return parsed.data;
  }
}
