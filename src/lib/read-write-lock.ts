/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

export type LockMode = 'read' | 'write';

/**
 * An async read/write lock. Any number of readers may hold it at once; a
 * writer holds it alone. Waiters are granted in arrival order, so a queued
 * writer holds back readers that arrive after it.
 *
 * Usage:
 *   const lock = new ReadWriteLock();
 *
 *   async function read() {
 *     await lock.acquireRead();
 *     try {
 *       // ... read shared state ...
 *     } finally {
 *       lock.releaseRead();
 *     }
 *   }
 */
export class ReadWriteLock {
  private readers = 0;
  private writer = false;
  private waiting: Array<{
    mode: LockMode;
    resolve: () => void;
  }> = [];

  /**
   * Acquire the lock in shared mode. Resolves immediately when no writer
   * holds or is waiting for the lock.
   */
  acquireRead(): Promise<void> {
    if (!this.writer && this.waiting.length === 0) {
      this.readers++;
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      this.waiting.push({ mode: 'read', resolve });
    });
  }

  /**
   * Acquire the lock in exclusive mode. Resolves immediately when the lock
   * is free and nobody is queued ahead.
   */
  acquireWrite(): Promise<void> {
    if (!this.writer && this.readers === 0 && this.waiting.length === 0) {
      this.writer = true;
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      this.waiting.push({ mode: 'write', resolve });
    });
  }

  releaseRead(): void {
    if (this.readers === 0) {
      throw new Error('ReadWriteLock released for read without a read hold');
    }
    this.readers--;
    this.grant();
  }

  releaseWrite(): void {
    if (!this.writer) {
      throw new Error('ReadWriteLock released for write without a write hold');
    }
    this.writer = false;
    this.grant();
  }

  /**
   * Run fn while holding the lock in the given mode, releasing it whether fn
   * returns or throws.
   */
  async withLock<R>(mode: LockMode, fn: () => R | Promise<R>): Promise<R> {
    if (mode === 'read') {
      await this.acquireRead();
      try {
        return await fn();
      } finally {
        this.releaseRead();
      }
    }

    await this.acquireWrite();
    try {
      return await fn();
    } finally {
      this.releaseWrite();
    }
  }

  /**
   * Returns the number of readers currently holding the lock.
   */
  activeReaders(): number {
    return this.readers;
  }

  /**
   * Returns true while a writer holds the lock.
   */
  isWriteLocked(): boolean {
    return this.writer;
  }

  /**
   * Returns the number of waiters queued for the lock.
   */
  queueLength(): number {
    return this.waiting.length;
  }

  // Hand the lock to the head of the queue: one writer, or every reader up to
  // the next queued writer.
  private grant(): void {
    while (this.waiting.length > 0) {
      const next = this.waiting[0];
      if (next.mode === 'write') {
        if (this.writer || this.readers > 0) {
          return;
        }
        this.waiting.shift();
        this.writer = true;
        next.resolve();
        return;
      }

      if (this.writer) {
        return;
      }
      this.waiting.shift();
      this.readers++;
      next.resolve();
    }
  }
}
