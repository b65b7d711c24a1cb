/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import winston from 'winston';

import defaultLogger from '../log.js';
import {
  domainSuffixInsertsCounter,
  domainSuffixMatchesCounter,
  domainSuffixNodesCreatedCounter,
} from '../metrics.js';
import {
  DomainSuffixLookup,
  DomainSuffixNode,
  MatchOutcome,
} from '../types.js';
import { EmptySuffixError } from './error.js';

export const LABEL_SEPARATOR = '.';

// Shared by every node of one trie so values set directly on a node still
// count towards the trie's size.
interface TrieCounts {
  registered: number;
}

class TrieNode<T> implements DomainSuffixNode<T> {
  private readonly label: string;
  private readonly parent: TrieNode<T> | undefined;
  private readonly children = new Map<string, TrieNode<T>>();
  private readonly counts: TrieCounts;
  private slot: { value: T } | undefined;

  constructor(label: string, parent?: TrieNode<T>) {
    this.label = label;
    this.parent = parent;
    this.counts = parent !== undefined ? parent.counts : { registered: 0 };
  }

  getLabel(): string {
    return this.label;
  }

  getPath(): string {
    const labels: string[] = [];
    let node: TrieNode<T> | undefined = this;
    while (node !== undefined && !node.isRoot()) {
      labels.push(node.label);
      node = node.parent;
    }
    return labels.join(LABEL_SEPARATOR);
  }

  getParent(): TrieNode<T> | undefined {
    return this.parent;
  }

  getChild(label: string): TrieNode<T> | undefined {
    return this.children.get(label);
  }

  getChildren(): Map<string, DomainSuffixNode<T>> {
    return new Map<string, DomainSuffixNode<T>>(this.children);
  }

  hasValue(): boolean {
    return this.slot !== undefined;
  }

  getValue(): T | undefined {
    return this.slot?.value;
  }

  setValue(value: T): T | undefined {
    const previous = this.slot;
    if (previous === undefined) {
      this.counts.registered++;
    }
    this.slot = { value };
    return previous?.value;
  }

  clearValue(): T | undefined {
    const previous = this.slot;
    if (previous !== undefined) {
      this.counts.registered--;
      this.slot = undefined;
    }
    return previous?.value;
  }

  isRoot(): boolean {
    return this.parent === undefined;
  }

  registeredCount(): number {
    return this.counts.registered;
  }

  /**
   * Returns the child for label, creating and linking it when missing. The
   * second element is true when the node was created.
   */
  childOrCreate(label: string): [TrieNode<T>, boolean] {
    const existing = this.children.get(label);
    if (existing !== undefined) {
      return [existing, false];
    }
    const child = new TrieNode<T>(label, this);
    this.children.set(label, child);
    return [child, true];
  }

  /**
   * [path, value] for every node with a value at or below this one, parents
   * before their children.
   */
  *entries(): Generator<[string, T]> {
    if (this.slot !== undefined) {
      yield [this.getPath(), this.slot.value];
    }
    for (const child of this.children.values()) {
      yield* child.entries();
    }
  }
}

/**
 * Longest-suffix lookup over dot-separated domain names.
 *
 * Suffixes are stored label by label from the top-level label down, so
 * 'api.google.com' lives at root -> com -> google -> api. A lookup walks the
 * query's labels the same way and stops at the first label with no child,
 * returning the deepest node it reached.
 *
 * Not safe for interleaved async use; see SyncDomainSuffixTrie.
 */
export class DomainSuffixTrie<T> implements DomainSuffixLookup<T> {
  private log: winston.Logger;
  private readonly root = new TrieNode<T>('');

  constructor({ log = defaultLogger }: { log?: winston.Logger } = {}) {
    this.log = log.child({ class: this.constructor.name });
  }

  /**
   * Number of nodes carrying a value.
   */
  get size(): number {
    return this.root.registeredCount();
  }

  /**
   * Register suffix with value, creating any missing nodes along its path.
   * Inserting an already registered suffix replaces its value.
   *
   * @throws EmptySuffixError when suffix is ''
   */
  insert(suffix: string, value: T): void {
    if (suffix === '') {
      throw new EmptySuffixError(suffix);
    }

    const labels = suffix.split(LABEL_SEPARATOR);
    let node = this.root;
    let nodesCreated = 0;
    for (let i = labels.length - 1; i >= 0; i--) {
      const [child, created] = node.childOrCreate(labels[i]);
      if (created) {
        nodesCreated++;
      }
      node = child;
    }

    const overwritten = node.hasValue();
    node.setValue(value);

    domainSuffixInsertsCounter.inc();
    if (nodesCreated > 0) {
      domainSuffixNodesCreatedCounter.inc(nodesCreated);
    }
    this.log.debug('Inserted domain suffix', {
      suffix,
      nodesCreated,
      overwritten,
    });
  }

  /**
   * Find the node for the longest suffix of domain present in the trie.
   *
   * The node returned may have no value: it can be an intermediate node that
   * only exists because a longer suffix was inserted. When nothing matches
   * the root is returned.
   */
  match(domain: string): DomainSuffixNode<T> {
    const labels = domain.split(LABEL_SEPARATOR);
    let node = this.root;
    for (let i = labels.length - 1; i >= 0; i--) {
      const child = node.getChild(labels[i]);
      if (child === undefined) {
        break;
      }
      node = child;
    }

    domainSuffixMatchesCounter.inc({ outcome: outcomeOf(node) });
    return node;
  }

  matchValue(domain: string): T | undefined {
    return this.match(domain).getValue();
  }

  /**
   * Like match, but skips nodes without a value, walking towards the root
   * until one carries a value. Returns undefined when none does.
   */
  matchRegistered(domain: string): DomainSuffixNode<T> | undefined {
    let node: DomainSuffixNode<T> | undefined = this.match(domain);
    while (node !== undefined && !node.hasValue()) {
      node = node.getParent();
    }
    return node;
  }

  /**
   * Every registered suffix with its value, depth-first.
   */
  suffixes(): Array<[string, T]> {
    return [...this.root.entries()];
  }

  //
  // Root accessors
  //

  getLabel(): string {
    return this.root.getLabel();
  }

  getPath(): string {
    return this.root.getPath();
  }

  getParent(): undefined {
    return undefined;
  }

  getChild(label: string): DomainSuffixNode<T> | undefined {
    return this.root.getChild(label);
  }

  getChildren(): Map<string, DomainSuffixNode<T>> {
    return this.root.getChildren();
  }

  hasValue(): boolean {
    return this.root.hasValue();
  }

  getValue(): T | undefined {
    return this.root.getValue();
  }

  setValue(value: T): T | undefined {
    return this.root.setValue(value);
  }

  clearValue(): T | undefined {
    return this.root.clearValue();
  }
}

function outcomeOf<T>(node: DomainSuffixNode<T>): MatchOutcome {
  if (node.getParent() === undefined) {
    return 'root';
  }
  return node.hasValue() ? 'registered' : 'intermediate';
}
