/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { Writable } from 'node:stream';
import winston from 'winston';

import { createTestLogger } from '../../test/test-logger.js';
import { domainSuffixLockWaitHistogram } from '../metrics.js';
import { DomainSuffixTrie } from './domain-suffix-trie.js';
import { EmptySuffixError } from './error.js';
import { LockMode } from './read-write-lock.js';
import { SyncDomainSuffixTrie } from './sync-domain-suffix-trie.js';

const log = createTestLogger({ suite: 'SyncDomainSuffixTrie' });

async function lockWaitCount(mode: LockMode): Promise<number> {
  const metric = await domainSuffixLockWaitHistogram.get();
  return (
    metric.values.find(
      (v) =>
        v.metricName === 'domain_suffix_lock_wait_seconds_count' &&
        v.labels.mode === mode,
    )?.value ?? 0
  );
}

// A debug-level logger that keeps every message it receives.
function capturingLogger(messages: string[]): winston.Logger {
  const stream = new Writable({
    objectMode: true,
    write(info: { message: string }, _encoding, callback) {
      messages.push(info.message);
      callback();
    },
  });
  return winston.createLogger({
    level: 'debug',
    transports: [new winston.transports.Stream({ stream })],
  });
}

const SUFFIXES: Array<[string, string]> = [
  ['google.com', 'google'],
  ['map.google.com', 'google-maps'],
  ['baidu.com', 'baidu'],
  ['jd.com', 'jd'],
  ['api.example.org', 'example-api'],
];

const QUERIES = [
  'test.google.com',
  'test.map.google.com',
  'www.baidu.com',
  'item.jd.com',
  'foo.example.org',
  'v1.api.example.org',
  'nothing.net',
  '',
];

describe('SyncDomainSuffixTrie', () => {
  let trie: SyncDomainSuffixTrie<string>;

  beforeEach(async () => {
    trie = new SyncDomainSuffixTrie<string>({ log });
    for (const [suffix, value] of SUFFIXES) {
      await trie.insert(suffix, value);
    }
  });

  describe('insert and match', () => {
    it('should resolve the longest registered suffix', async () => {
      assert.strictEqual(
        await trie.matchValue('x.map.google.com'),
        'google-maps',
      );
      assert.strictEqual(await trie.matchValue('x.google.com'), 'google');
      assert.strictEqual(await trie.matchValue('x.example.org'), undefined);
    });

    it('should return node handles that read through the lock', async () => {
      const node = await trie.match('test.baidu.com');

      assert.strictEqual(await node.getPath(), 'baidu.com');
      assert.strictEqual(await node.getLabel(), 'baidu');
      assert.strictEqual(await node.getValue(), 'baidu');

      const parent = await node.getParent();
      assert.ok(parent);
      assert.strictEqual(await parent.getLabel(), 'com');
    });

    it('should return the root handle when nothing matches', async () => {
      const node = await trie.match('nothing.net');

      assert.strictEqual(await node.getPath(), '');
      assert.strictEqual(await node.hasValue(), false);
      assert.strictEqual(await node.getParent(), undefined);
    });

    it('should reject the empty suffix and keep the lock usable', async () => {
      await assert.rejects(trie.insert('', 'v'), EmptySuffixError);

      await trie.insert('new.org', 'new');
      assert.strictEqual(await trie.matchValue('www.new.org'), 'new');
      assert.strictEqual(await trie.getSize(), SUFFIXES.length + 1);
    });
  });

  describe('node handles', () => {
    it('should write values through a matched handle', async () => {
      const node = await trie.match('www.google.com');

      assert.strictEqual(await node.setValue('search'), 'google');
      assert.strictEqual(await trie.matchValue('google.com'), 'search');
    });

    it('should clear values through a matched handle', async () => {
      const node = await trie.match('google.com');

      assert.strictEqual(await node.clearValue(), 'google');
      assert.strictEqual(await trie.matchValue('www.google.com'), undefined);
      assert.strictEqual(await trie.getSize(), SUFFIXES.length - 1);
    });

    it('should wrap children in handles', async () => {
      const children = await trie.getChildren();
      assert.deepStrictEqual([...children.keys()], ['com', 'org']);

      const com = children.get('com');
      assert.ok(com);
      const jd = await com.getChild('jd');
      assert.ok(jd);
      assert.strictEqual(await jd.getValue(), 'jd');
      assert.strictEqual(await com.getChild('missing'), undefined);
    });
  });

  describe('matchRegistered', () => {
    it('should skip intermediate nodes', async () => {
      await trie.insert('org', 'tld');

      const node = await trie.matchRegistered('foo.example.org');
      assert.ok(node);
      assert.strictEqual(await node.getPath(), 'org');
      assert.strictEqual(await trie.matchRegistered('nothing.net'), undefined);
    });
  });

  describe('suffixes', () => {
    it('should list every registered suffix', async () => {
      assert.deepStrictEqual(new Map(await trie.suffixes()), new Map(SUFFIXES));
    });
  });

  describe('concurrency', () => {
    it('should answer concurrent lookups like a single caller would', async () => {
      const reference = new DomainSuffixTrie<string>({ log });
      for (const [suffix, value] of SUFFIXES) {
        reference.insert(suffix, value);
      }
      const expected = QUERIES.map((query) => reference.matchValue(query));

      const rounds = await Promise.all(
        Array.from({ length: 50 }, () =>
          Promise.all(QUERIES.map((query) => trie.matchValue(query))),
        ),
      );

      for (const results of rounds) {
        assert.deepStrictEqual(results, expected);
      }
    });

    it('should match concurrently to the same nodes as a single caller', async () => {
      const reference = new DomainSuffixTrie<string>({ log });
      for (const [suffix, value] of SUFFIXES) {
        reference.insert(suffix, value);
      }
      const expected = QUERIES.map((query) => reference.match(query).getPath());

      const rounds = await Promise.all(
        Array.from({ length: 50 }, () =>
          Promise.all(
            QUERIES.map(async (query) => {
              const node = await trie.match(query);
              return node.getPath();
            }),
          ),
        ),
      );

      for (const paths of rounds) {
        assert.deepStrictEqual(paths, expected);
      }
    });

    it('should order an insert between the lookups around it', async () => {
      const before = trie.matchValue('x.map.google.com');
      const write = trie.insert('x.map.google.com', 'exact');
      const after = trie.matchValue('x.map.google.com');

      assert.strictEqual(await before, 'google-maps');
      await write;
      assert.strictEqual(await after, 'exact');
    });

    it('should let handle writes wait for running readers', async () => {
      const node = await trie.match('jd.com');

      const read = node.getValue();
      const write = node.setValue('jd-mall');
      const reread = node.getValue();

      assert.deepStrictEqual(await Promise.all([read, write, reread]), [
        'jd',
        'jd',
        'jd-mall',
      ]);
    });
  });

  describe('observability', () => {
    it('should record lock waits by mode', async () => {
      const reads = await lockWaitCount('read');
      const writes = await lockWaitCount('write');

      await trie.matchValue('www.google.com');
      await trie.insert('shop.jd.com', 'jd-shop');

      assert.strictEqual(await lockWaitCount('read'), reads + 1);
      assert.strictEqual(await lockWaitCount('write'), writes + 1);
    });

    it('should log a writer waiting for active readers', async () => {
      const messages: string[] = [];
      const logged = new SyncDomainSuffixTrie<string>({
        log: capturingLogger(messages),
      });
      await logged.insert('google.com', 'google');

      const read = logged.matchValue('www.google.com');
      const write = logged.insert('map.google.com', 'google-maps');
      await Promise.all([read, write]);
      await new Promise((resolve) => setImmediate(resolve));

      assert.strictEqual(
        messages.filter((message) => message === 'Waiting for trie lock')
          .length,
        1,
      );
    });
  });
});
