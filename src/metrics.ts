/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import * as promClient from 'prom-client';

//
// Trie metrics
//

export const domainSuffixInsertsCounter = new promClient.Counter({
  name: 'domain_suffix_inserts_total',
  help: 'Count of domain suffixes inserted, including overwrites',
});

export const domainSuffixNodesCreatedCounter = new promClient.Counter({
  name: 'domain_suffix_nodes_created_total',
  help: 'Count of trie nodes created by inserts',
});

export const domainSuffixMatchesCounter = new promClient.Counter({
  name: 'domain_suffix_matches_total',
  help: 'Count of domain lookups by the kind of node they ended on',
  labelNames: ['outcome'] as const,
});

//
// Lock metrics
//

export const domainSuffixLockWaitHistogram = new promClient.Histogram({
  name: 'domain_suffix_lock_wait_seconds',
  help: 'Time spent waiting to acquire the trie lock',
  labelNames: ['mode'] as const,
  buckets: [0.0001, 0.001, 0.01, 0.1, 1],
});
