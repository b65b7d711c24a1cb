/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

interface DetailedErrorOptions {
  stack?: string;
  [key: string]: unknown;
}

export class DetailedError extends Error {
  constructor(message: string, options?: DetailedErrorOptions) {
    super(message);
    this.name = this.constructor.name;
    Object.assign(this, options);
    this.stack = options?.stack ?? new Error().stack;
  }

  toJSON() {
    const { name, message, ...rest } = this;
    return {
      message: this.message,
      stack: this.stack,
      ...rest,
    };
  }
}

/**
 * Thrown by insert when the suffix to register is the empty string. Nothing
 * in the trie has been touched when this is raised.
 */
export class EmptySuffixError extends DetailedError {
  public readonly suffix: string;

  constructor(suffix = '') {
    super('Domain suffix must not be empty', { suffix });
    this.suffix = suffix;
  }
}
