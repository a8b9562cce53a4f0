// SPDX-License-Identifier: Apache-2.0

import { Registry } from 'prom-client';

export class RegistryFactory {
  /**
   * Holds the process-wide Registry instance used when callers do not pass their own.
   */
  private static instance: Registry | undefined;

  /**
   * Returns the shared registry, creating it on first use or when `forceCreate` is set.
   *
   * @param forceCreate - replace the current registry with a fresh one
   */
  static getInstance(forceCreate: boolean = false): Registry {
    if (!this.instance || forceCreate) this.instance = new Registry();

    return this.instance;
  }
}
