/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

/**
 * Where a lookup stopped: at the root (nothing matched), at a node that only
 * exists as part of a longer suffix, or at a node carrying a value.
 */
export type MatchOutcome = 'root' | 'intermediate' | 'registered';

/**
 * One label's position in a domain suffix trie.
 */
export interface DomainSuffixNode<T> {
  /** The label this node represents, '' for the root. */
  getLabel(): string;

  /** The full suffix this node represents, e.g. 'api.google.com'. */
  getPath(): string;

  getParent(): DomainSuffixNode<T> | undefined;
  getChild(label: string): DomainSuffixNode<T> | undefined;

  /** A copy of the children map; changing it does not change the trie. */
  getChildren(): Map<string, DomainSuffixNode<T>>;

  /**
   * True when a value was set on this node. Separate from getValue so a
   * stored undefined is not mistaken for "no value".
   */
  hasValue(): boolean;
  getValue(): T | undefined;

  /** Returns the previous value. */
  setValue(value: T): T | undefined;

  /** Returns the removed value. */
  clearValue(): T | undefined;
}

export interface DomainSuffixLookup<T> extends DomainSuffixNode<T> {
  readonly size: number;
  insert(suffix: string, value: T): void;
  match(domain: string): DomainSuffixNode<T>;
  matchValue(domain: string): T | undefined;
  matchRegistered(domain: string): DomainSuffixNode<T> | undefined;
  suffixes(): Array<[string, T]>;
}

/**
 * A node handle whose every operation goes through the owning trie's lock.
 */
export interface SharedDomainSuffixNode<T> {
  getLabel(): Promise<string>;
  getPath(): Promise<string>;
  getParent(): Promise<SharedDomainSuffixNode<T> | undefined>;
  getChild(label: string): Promise<SharedDomainSuffixNode<T> | undefined>;
  getChildren(): Promise<Map<string, SharedDomainSuffixNode<T>>>;
  hasValue(): Promise<boolean>;
  getValue(): Promise<T | undefined>;
  setValue(value: T): Promise<T | undefined>;
  clearValue(): Promise<T | undefined>;
}

export interface SharedDomainSuffixLookup<T> extends SharedDomainSuffixNode<T> {
  getSize(): Promise<number>;
  insert(suffix: string, value: T): Promise<void>;
  match(domain: string): Promise<SharedDomainSuffixNode<T>>;
  matchValue(domain: string): Promise<T | undefined>;
  matchRegistered(
    domain: string,
  ): Promise<SharedDomainSuffixNode<T> | undefined>;
  suffixes(): Promise<Array<[string, T]>>;
}
