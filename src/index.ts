/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
export { DomainSuffixTrie, LABEL_SEPARATOR } from './lib/domain-suffix-trie.js';
export {
  SyncDomainSuffixTrie,
  SyncDomainSuffixTrieNode,
} from './lib/sync-domain-suffix-trie.js';
export { ReadWriteLock } from './lib/read-write-lock.js';
export type { LockMode } from './lib/read-write-lock.js';
export { DetailedError, EmptySuffixError } from './lib/error.js';
export type {
  DomainSuffixLookup,
  DomainSuffixNode,
  MatchOutcome,
  SharedDomainSuffixLookup,
  SharedDomainSuffixNode,
} from './types.js';
