/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import winston from 'winston';

import defaultLogger from '../log.js';
import { domainSuffixLockWaitHistogram } from '../metrics.js';
import {
  DomainSuffixNode,
  SharedDomainSuffixLookup,
  SharedDomainSuffixNode,
} from '../types.js';
import { DomainSuffixTrie } from './domain-suffix-trie.js';
import { EmptySuffixError } from './error.js';
import { LockMode, ReadWriteLock } from './read-write-lock.js';

// One per trie; shared with every node handle the trie hands out.
export class TrieGuard {
  private log: winston.Logger;
  private lock = new ReadWriteLock();

  constructor(log: winston.Logger) {
    this.log = log;
  }

  async run<R>(mode: LockMode, fn: () => R): Promise<R> {
    if (
      this.lock.isWriteLocked() ||
      this.lock.queueLength() > 0 ||
      (mode === 'write' && this.lock.activeReaders() > 0)
    ) {
      this.log.debug('Waiting for trie lock', {
        mode,
        queueLength: this.lock.queueLength(),
      });
    }

    const stopTimer = domainSuffixLockWaitHistogram.startTimer({ mode });
    return this.lock.withLock(mode, () => {
      stopTimer();
      return fn();
    });
  }
}

/**
 * A handle on one trie node. Reads take the trie lock shared, writes take it
 * exclusively, so a handle stays safe to use while other callers insert.
 * Handles are views: two lookups reaching the same node return distinct
 * handle objects.
 */
export class SyncDomainSuffixTrieNode<T> implements SharedDomainSuffixNode<T> {
  protected readonly guard: TrieGuard;
  private readonly node: DomainSuffixNode<T>;

  protected constructor(guard: TrieGuard, node: DomainSuffixNode<T>) {
    this.guard = guard;
    this.node = node;
  }

  getLabel(): Promise<string> {
    return this.guard.run('read', () => this.node.getLabel());
  }

  getPath(): Promise<string> {
    return this.guard.run('read', () => this.node.getPath());
  }

  getParent(): Promise<SharedDomainSuffixNode<T> | undefined> {
    return this.guard.run('read', () => this.wrap(this.node.getParent()));
  }

  getChild(label: string): Promise<SharedDomainSuffixNode<T> | undefined> {
    return this.guard.run('read', () => this.wrap(this.node.getChild(label)));
  }

  getChildren(): Promise<Map<string, SharedDomainSuffixNode<T>>> {
    return this.guard.run('read', () => {
      const children = new Map<string, SharedDomainSuffixNode<T>>();
      for (const [label, child] of this.node.getChildren()) {
        children.set(label, this.handle(child));
      }
      return children;
    });
  }

  hasValue(): Promise<boolean> {
    return this.guard.run('read', () => this.node.hasValue());
  }

  getValue(): Promise<T | undefined> {
    return this.guard.run('read', () => this.node.getValue());
  }

  setValue(value: T): Promise<T | undefined> {
    return this.guard.run('write', () => this.node.setValue(value));
  }

  clearValue(): Promise<T | undefined> {
    return this.guard.run('write', () => this.node.clearValue());
  }

  protected handle(node: DomainSuffixNode<T>): SyncDomainSuffixTrieNode<T> {
    return new SyncDomainSuffixTrieNode(this.guard, node);
  }

  protected wrap(
    node: DomainSuffixNode<T> | undefined,
  ): SyncDomainSuffixTrieNode<T> | undefined {
    return node !== undefined ? this.handle(node) : undefined;
  }
}

/**
 * DomainSuffixTrie behind a single read/write lock covering the whole tree.
 * Lookups run concurrently with each other; inserts and value updates run
 * alone. Errors from the trie are passed through unchanged and the lock is
 * always released.
 *
 * Usage:
 *   const trie = new SyncDomainSuffixTrie<string>();
 *   await trie.insert('google.com', 'search');
 *   await trie.matchValue('maps.google.com'); // 'search'
 */
export class SyncDomainSuffixTrie<T>
  extends SyncDomainSuffixTrieNode<T>
  implements SharedDomainSuffixLookup<T>
{
  private log: winston.Logger;
  private readonly trie: DomainSuffixTrie<T>;

  constructor({ log = defaultLogger }: { log?: winston.Logger } = {}) {
    const classLog = log.child({ class: 'SyncDomainSuffixTrie' });
    const trie = new DomainSuffixTrie<T>({ log });
    super(new TrieGuard(classLog), trie);
    this.log = classLog;
    this.trie = trie;
  }

  getSize(): Promise<number> {
    return this.guard.run('read', () => this.trie.size);
  }

  insert(suffix: string, value: T): Promise<void> {
    return this.guard.run('write', () => {
      try {
        this.trie.insert(suffix, value);
      } catch (error) {
        if (error instanceof EmptySuffixError) {
          this.log.warn('Rejected empty domain suffix');
        }
        throw error;
      }
    });
  }

  match(domain: string): Promise<SharedDomainSuffixNode<T>> {
    return this.guard.run('read', () =>
      this.handle(this.trie.match(domain)),
    );
  }

  matchValue(domain: string): Promise<T | undefined> {
    return this.guard.run('read', () => this.trie.matchValue(domain));
  }

  matchRegistered(
    domain: string,
  ): Promise<SharedDomainSuffixNode<T> | undefined> {
    return this.guard.run('read', () =>
      this.wrap(this.trie.matchRegistered(domain)),
    );
  }

  suffixes(): Promise<Array<[string, T]>> {
    return this.guard.run('read', () => this.trie.suffixes());
  }
}
