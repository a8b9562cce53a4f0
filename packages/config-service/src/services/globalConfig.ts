// SPDX-License-Identifier: Apache-2.0

/**
 * Describes a single configuration entry read from the environment.
 */
export interface ConfigProperty {
  envName: string;
  type: 'string' | 'number';
  required: boolean;
  defaultValue: string | number | null;
}

const _CONFIG = {
  CACHE_BLOCK_MAX_ENTRIES: {
    envName: 'CACHE_BLOCK_MAX_ENTRIES',
    type: 'number',
    required: false,
    defaultValue: 1000,
  },
  CACHE_BLOCK_TTL_FINALIZED_MS: {
    envName: 'CACHE_BLOCK_TTL_FINALIZED_MS',
    type: 'number',
    required: false,
    defaultValue: 3_600_000,
  },
  CACHE_BLOCK_TTL_RECENT_MS: {
    envName: 'CACHE_BLOCK_TTL_RECENT_MS',
    type: 'number',
    required: false,
    defaultValue: 12_000,
  },
  FINALITY_DEPTH: {
    envName: 'FINALITY_DEPTH',
    type: 'number',
    required: false,
    defaultValue: 100,
  },
  LOG_LEVEL: {
    envName: 'LOG_LEVEL',
    type: 'string',
    required: false,
    defaultValue: 'info',
  },
  MAX_TRAVERSE_DEPTH: {
    envName: 'MAX_TRAVERSE_DEPTH',
    type: 'number',
    required: false,
    defaultValue: 100,
  },
} as const satisfies Record<string, ConfigProperty>;

export type ConfigKey = keyof typeof _CONFIG;

type KeysWhere<Match> = {
  [K in ConfigKey]: (typeof _CONFIG)[K] extends Match ? K : never;
}[ConfigKey];

/** Keys whose value is a number; all of them carry a default. */
export type NumberConfigKey = KeysWhere<{ type: 'number' }>;

/** String keys that always resolve to a value. */
export type StringConfigKey = KeysWhere<{ type: 'string'; defaultValue: string }>;

export class GlobalConfig {
  public static readonly ENTRIES: Readonly<Record<ConfigKey, ConfigProperty>> = _CONFIG;

  /**
   * Narrows an arbitrary environment variable name to a known configuration key.
   */
  public static isConfigKey(name: string): name is ConfigKey {
    return Object.prototype.hasOwnProperty.call(GlobalConfig.ENTRIES, name);
  }
}
