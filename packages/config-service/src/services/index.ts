// SPDX-License-Identifier: Apache-2.0

import dotenv from 'dotenv';
import { pino } from 'pino';

import type { ConfigKey, NumberConfigKey, StringConfigKey } from './globalConfig';
import { GlobalConfig } from './globalConfig';

export class ConfigService {
  /**
   * @private
   */
  private static readonly logger = pino({
    name: 'config-service',
    level: process.env.LOG_LEVEL || 'info',
  });

  /**
   * The singleton instance
   * @private
   */
  private static instance: ConfigService | undefined;

  /**
   * Loads the `.env` file once and checks that every required entry is present.
   * Values themselves are read from `process.env` on each `get`, so overrides made
   * after start-up are honoured.
   *
   * @private
   */
  private constructor() {
    dotenv.config();

    for (const key of Object.keys(GlobalConfig.ENTRIES)) {
      if (!GlobalConfig.isConfigKey(key)) continue;
      const entry = GlobalConfig.ENTRIES[key];
      if (entry.required && process.env[entry.envName] === undefined) {
        throw new Error(`Configuration error: ${key} is a mandatory configuration for block-query operation.`);
      }
    }

    if (ConfigService.logger.isLevelEnabled('debug')) {
      for (const key of Object.keys(GlobalConfig.ENTRIES)) {
        ConfigService.logger.debug(`${key} = ${process.env[key]}`);
      }
    }
  }

  /**
   * Get the singleton instance of the current service
   * @public
   */
  public static getInstance(): ConfigService {
    if (this.instance == null) {
      this.instance = new ConfigService();
    }

    return this.instance;
  }

  /**
   * Get an env var by name, falling back to its declared default.
   *
   * @param name - the configuration key
   * @throws Error when a numeric entry cannot be parsed
   */
  public static get(name: NumberConfigKey): number;
  public static get(name: StringConfigKey): string;
  public static get(name: ConfigKey): string | number | undefined {
    ConfigService.getInstance();
    const entry = GlobalConfig.ENTRIES[name];
    const raw = process.env[entry.envName];

    if (raw === undefined || raw === '') {
      return entry.defaultValue ?? undefined;
    }

    if (entry.type === 'number') {
      const value = Number(raw);
      if (Number.isNaN(value)) {
        throw new Error(`Configuration error: ${name} must be a number, got "${raw}".`);
      }
      return value;
    }

    return raw;
  }
}

export type { ConfigKey, NumberConfigKey, StringConfigKey } from './globalConfig';
export { GlobalConfig } from './globalConfig';
