/**
 * Async Utility Functions
 *
 * Locks, single-flight, retries and cooperative cancellation.
 *
 * @module
 */

import { CancelledError } from "../core/errors.js";

// =============================================================================
// Sleep
// =============================================================================

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// =============================================================================
// Mutex
// =============================================================================

/**
 * A simple async mutex for serializing access to a shared resource.
 * Uses a FIFO queue so waiters are served in order.
 */
export class Mutex {
  private _locked = false;
  private _waiters: Array<() => void> = [];

  get locked(): boolean {
    return this._locked;
  }

  /** Acquires the mutex, waiting if it's currently held. */
  async acquire(): Promise<void> {
    if (!this._locked) {
      this._locked = true;
      return;
    }
    return new Promise<void>((resolve) => {
      this._waiters.push(resolve);
    });
  }

  /** Releases the mutex, waking the next waiter if any. */
  release(): void {
    const next = this._waiters.shift();
    if (next) {
      next();
    } else {
      this._locked = false;
    }
  }

  /** Runs a function while holding the mutex, releasing on completion. */
  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}

/**
 * One mutex per key. Entries are dropped once no holder or waiter remains.
 */
export class KeyedMutex {
  private readonly entries = new Map<string, { mutex: Mutex; users: number }>();

  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    let entry = this.entries.get(key);
    if (!entry) {
      entry = { mutex: new Mutex(), users: 0 };
      this.entries.set(key, entry);
    }
    entry.users++;
    try {
      return await entry.mutex.runExclusive(fn);
    } finally {
      entry.users--;
      if (entry.users === 0) {
        this.entries.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.entries.get(key)?.mutex.locked ?? false;
  }
}

// =============================================================================
// Reader-Writer Lock
// =============================================================================

/**
 * Many concurrent readers or one writer. Writers are preferred: once a writer
 * is waiting, new readers queue behind it.
 */
export class ReadWriteLock {
  private readers = 0;
  private writing = false;
  private readonly readQueue: Array<() => void> = [];
  private readonly writeQueue: Array<() => void> = [];

  async read<T>(fn: () => Promise<T> | T): Promise<T> {
    await this.acquireRead();
    try {
      return await fn();
    } finally {
      this.releaseRead();
    }
  }

  async write<T>(fn: () => Promise<T> | T): Promise<T> {
    await this.acquireWrite();
    try {
      return await fn();
    } finally {
      this.releaseWrite();
    }
  }

  private acquireRead(): Promise<void> {
    if (!this.writing && this.writeQueue.length === 0) {
      this.readers++;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => this.readQueue.push(resolve));
  }

  private releaseRead(): void {
    this.readers--;
    if (this.readers === 0) {
      this.wakeWriter();
    }
  }

  private acquireWrite(): Promise<void> {
    if (!this.writing && this.readers === 0) {
      this.writing = true;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => this.writeQueue.push(resolve));
  }

  private releaseWrite(): void {
    this.writing = false;
    if (!this.wakeWriter()) {
      while (this.readQueue.length > 0) {
        const next = this.readQueue.shift();
        if (next) {
          this.readers++;
          next();
        }
      }
    }
  }

  private wakeWriter(): boolean {
    const next = this.writeQueue.shift();
    if (!next) return false;
    this.writing = true;
    next();
    return true;
  }
}

// =============================================================================
// Single Flight
// =============================================================================

/**
 * Collapses concurrent calls with the same key into one in-flight promise.
 */
export class SingleFlight<T> {
  private readonly inFlight = new Map<string, Promise<T>>();

  run(key: string, fn: () => Promise<T>): Promise<T> {
    const existing = this.inFlight.get(key);
    if (existing) return existing;

    const promise = fn().finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, promise);
    return promise;
  }

  has(key: string): boolean {
    return this.inFlight.has(key);
  }
}

// =============================================================================
// Retry
// =============================================================================

export interface RetryOptions {
  /** Maximum number of attempts (including initial attempt) */
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  /** Multiplier for exponential backoff */
  backoffFactor: number;
  retryIf?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number) => void;
}

const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxAttempts: 3,
  initialDelayMs: 100,
  maxDelayMs: 5000,
  backoffFactor: 2,
};

/**
 * Retries a function with exponential backoff.
 */
export async function retry<T>(
  fn: () => Promise<T>,
  options: Partial<RetryOptions> = {}
): Promise<T> {
  const opts = { ...DEFAULT_RETRY_OPTIONS, ...options };
  let lastError: unknown;
  let delay = opts.initialDelayMs;

  for (let attempt = 1; attempt <= opts.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (opts.retryIf && !opts.retryIf(error)) {
        throw error;
      }
      if (attempt === opts.maxAttempts) {
        throw error;
      }

      opts.onRetry?.(error, attempt);
      await sleep(delay);
      delay = Math.min(delay * opts.backoffFactor, opts.maxDelayMs);
    }
  }

  throw lastError;
}

// =============================================================================
// Cancellation
// =============================================================================

/**
 * A token that can be used to cancel async operations.
 * Follows the cancellation token pattern for cooperative cancellation.
 */
export class CancellationToken {
  private _cancelled = false;
  private _reason?: string;
  private listeners: Array<() => void> = [];

  get cancelled(): boolean {
    return this._cancelled;
  }

  get reason(): string | undefined {
    return this._reason;
  }

  cancel(reason?: string): void {
    if (!this._cancelled) {
      this._cancelled = true;
      this._reason = reason;
      const listeners = this.listeners;
      this.listeners = [];
      listeners.forEach((fn) => fn());
    }
  }

  /**
   * Registers a callback to be called when the token is cancelled.
   * If already cancelled, the callback is invoked immediately.
   *
   * @returns Unsubscribe function
   */
  onCancel(fn: () => void): () => void {
    if (this._cancelled) {
      fn();
      return () => {};
    }
    this.listeners.push(fn);
    return () => {
      const idx = this.listeners.indexOf(fn);
      if (idx >= 0) this.listeners.splice(idx, 1);
    };
  }

  /**
   * Throws CancelledError if the token has been cancelled.
   */
  throwIfCancelled(): void {
    if (this._cancelled) {
      throw new CancelledError(this._reason);
    }
  }
}

/**
 * A CancellationToken source that owns and can cancel a token.
 */
export class CancellationTokenSource {
  readonly token: CancellationToken;

  constructor() {
    this.token = new CancellationToken();
  }

  cancel(reason?: string): void {
    this.token.cancel(reason);
  }
}
