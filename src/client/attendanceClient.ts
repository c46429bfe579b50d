/**
 * HTTP client for the /api/u routes.
 *
 * Keeps the last status it fetched together with an expiry. `getStatus()` never
 * goes to the network: it answers from the cache or returns null, and callers
 * decide when to `refreshStatus()`. Clocking in or out drops the cache.
 */

import { AppError } from '../utils/errors';

export interface ClientStatus {
  state: 'I' | 'O';
  since: number;
  delta: { day: number; month: number };
}

export interface ClientEntry {
  eid: number;
  from: number;
  to: number;
  valid: boolean;
}

export interface ClientDay {
  day: number;
  date: string;
  entries: ClientEntry[];
}

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface AttendanceClientOptions {
  // e.g. http://localhost:5000/api
  baseUrl: string;
  getToken: () => string;
  fetch?: FetchLike;
  // how long a refreshed status stays fresh
  statusTtlMs?: number;
}

const DEFAULT_STATUS_TTL_MS = 60 * 1000;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isStatus(value: unknown): value is ClientStatus {
  return (
    isRecord(value) &&
    (value.state === 'I' || value.state === 'O') &&
    typeof value.since === 'number' &&
    isRecord(value.delta) &&
    typeof value.delta.day === 'number' &&
    typeof value.delta.month === 'number'
  );
}

function isEntry(value: unknown): value is ClientEntry {
  return (
    isRecord(value) &&
    typeof value.eid === 'number' &&
    typeof value.from === 'number' &&
    typeof value.to === 'number' &&
    typeof value.valid === 'boolean'
  );
}

function isDay(value: unknown): value is ClientDay {
  return (
    isRecord(value) &&
    typeof value.day === 'number' &&
    typeof value.date === 'string' &&
    Array.isArray(value.entries) &&
    value.entries.every(isEntry)
  );
}

export class AttendanceClient {
  private cachedStatus: ClientStatus | null = null;
  private cachedExpiry = 0;
  private readonly fetchImpl: FetchLike;
  private readonly statusTtlMs: number;

  constructor(private readonly options: AttendanceClientOptions) {
    this.fetchImpl = options.fetch ?? fetch;
    this.statusTtlMs = options.statusTtlMs ?? DEFAULT_STATUS_TTL_MS;
  }

  private async request(path: string, method: 'GET' | 'PUT' = 'GET'): Promise<unknown> {
    const response = await this.fetchImpl(this.options.baseUrl.replace(/\/+$/, '') + path, {
      method,
      headers: { Authorization: `Bearer ${this.options.getToken()}` },
    });

    const body: unknown = await response.json();
    if (!isRecord(body)) {
      throw new AppError(`Unexpected response from ${path}`, response.status);
    }
    if (!response.ok || body.success !== true) {
      const message = typeof body.error === 'string' ? body.error : `Request to ${path} failed`;
      throw new AppError(message, response.status);
    }
    return body.data;
  }

  async list(timeZone?: string): Promise<ClientDay[]> {
    const query = timeZone ? `?tz=${encodeURIComponent(timeZone)}` : '';
    const data = await this.request(`/u/entries${query}`);
    if (!isRecord(data) || !Array.isArray(data.days) || !data.days.every(isDay)) {
      throw new AppError('Malformed entries response', 502);
    }
    return data.days;
  }

  /**
   * Cached status, or null once it has expired or been invalidated
   */
  getStatus(): ClientStatus | null {
    if (this.cachedExpiry < Date.now()) {
      return null;
    }
    return this.cachedStatus;
  }

  async refreshStatus(): Promise<ClientStatus> {
    const data = await this.request('/u/status');
    if (!isStatus(data)) {
      throw new AppError('Malformed status response', 502);
    }
    this.cachedStatus = data;
    this.cachedExpiry = Date.now() + this.statusTtlMs;
    return data;
  }

  invalidateStatus(): void {
    this.cachedExpiry = 0;
  }

  async clockIn(): Promise<void> {
    try {
      await this.request('/u/clock/in', 'PUT');
    } finally {
      this.invalidateStatus();
    }
  }

  async clockOut(): Promise<void> {
    try {
      await this.request('/u/clock/out', 'PUT');
    } finally {
      this.invalidateStatus();
    }
  }
}

export default AttendanceClient;
