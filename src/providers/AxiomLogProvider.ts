/**
 * Axiom log provider.
 * Buffers events and sends them in batches to Axiom's ingest API.
 * Non-blocking: a failed delivery keeps the batch for the next flush and is
 * reported through `lastDeliveryError`. No-op when apiToken is empty.
 */

import type { ILogProvider, LogEvent } from './ILogProvider.js';
import { prepareEvent } from './redact.js';

export interface AxiomLogProviderOptions {
  /** Axiom API token (Bearer). Empty string disables sending. */
  apiToken: string;
  /** Axiom dataset name. */
  dataset: string;
  /** Added to every event so several engines can share a dataset. Default: 'intent-shell'. */
  service?: string;
  /** Flush after this many buffered events. Default: 50. */
  flushThreshold?: number;
  /** Auto-flush interval in ms. Default: 10_000 (10s). 0 disables. */
  flushIntervalMs?: number;
  /** Oldest events are dropped beyond this many buffered. Default: 1000. */
  maxBuffered?: number;
}

const AXIOM_INGEST_URL = 'https://api.axiom.co/v1/datasets';

export class AxiomLogProvider implements ILogProvider {
  private buffer: Array<LogEvent & { service: string }> = [];
  private readonly apiToken: string;
  private readonly dataset: string;
  private readonly service: string;
  private readonly flushThreshold: number;
  private readonly flushIntervalMs: number;
  private readonly maxBuffered: number;
  private flushTimer: ReturnType<typeof setInterval> | null = null;
  private readonly enabled: boolean;
  private _lastDeliveryError: string | null = null;
  private _dropped = 0;

  constructor(options: AxiomLogProviderOptions) {
    this.apiToken = options.apiToken;
    this.dataset = options.dataset;
    this.service = options.service ?? 'intent-shell';
    this.flushThreshold = options.flushThreshold ?? 50;
    this.flushIntervalMs = options.flushIntervalMs ?? 10_000;
    this.maxBuffered = options.maxBuffered ?? 1000;
    this.enabled = Boolean(this.apiToken);

    if (this.enabled && this.flushIntervalMs > 0) {
      this.flushTimer = setInterval(() => {
        void this.flush();
      }, this.flushIntervalMs);
      // Don't hold the process open for the timer
      this.flushTimer.unref();
    }
  }

  /** Message of the most recent failed delivery, cleared by the next success. */
  get lastDeliveryError(): string | null {
    return this._lastDeliveryError;
  }

  /** Events discarded because the buffer was full. */
  get dropped(): number {
    return this._dropped;
  }

  get pending(): number {
    return this.buffer.length;
  }

  log(event: LogEvent): void {
    if (!this.enabled) return;

    this.buffer.push({ ...prepareEvent(event), service: this.service });

    if (this.buffer.length > this.maxBuffered) {
      const overflow = this.buffer.length - this.maxBuffered;
      this.buffer.splice(0, overflow);
      this._dropped += overflow;
    }

    if (this.buffer.length >= this.flushThreshold) {
      void this.flush();
    }
  }

  async flush(): Promise<void> {
    if (!this.enabled || this.buffer.length === 0) return;

    const batch = [...this.buffer];

    try {
      const response = await fetch(`${AXIOM_INGEST_URL}/${this.dataset}/ingest`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiToken}`,
        },
        body: JSON.stringify(batch),
      });

      if (response.ok) {
        // Only clear the events that were in this batch
        this.buffer.splice(0, batch.length);
        this._lastDeliveryError = null;
      } else {
        this._lastDeliveryError = `Axiom ingest returned ${response.status}`;
      }
    } catch (err) {
      this._lastDeliveryError = err instanceof Error ? err.message : String(err);
    }
  }

  /** Stop the auto-flush timer and flush remaining events. */
  async dispose(): Promise<void> {
    if (this.flushTimer) {
      clearInterval(this.flushTimer);
      this.flushTimer = null;
    }
    await this.flush();
  }

  info(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'info', message, fields });
  }

  warn(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'warn', message, fields });
  }

  error(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'error', message, fields });
  }

  debug(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'debug', message, fields });
  }
}
