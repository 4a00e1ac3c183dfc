// SPDX-License-Identifier: Apache-2.0

import { ConfigKey, GlobalConfig, ParsedConfig } from './globalConfig';

/**
 * Reads typed configuration values from the environment.
 *
 * The environment is parsed once, on first access, and cached. Empty strings
 * are treated as unset so that the declared default applies.
 */
export class ConfigService {
  private static parsed: ParsedConfig | null = null;

  public static get<K extends ConfigKey>(key: K): ParsedConfig[K] {
    return ConfigService.load()[key];
  }

  /**
   * Drops the cached configuration so the next read sees the current environment.
   */
  public static reset(): void {
    ConfigService.parsed = null;
  }

  private static load(): ParsedConfig {
    if (ConfigService.parsed !== null) {
      return ConfigService.parsed;
    }

    const raw: Record<string, string | undefined> = {};
    for (const key of Object.keys(GlobalConfig.shape)) {
      const value = process.env[key];
      raw[key] = value === undefined || value.trim() === '' ? undefined : value.trim();
    }

    const result = GlobalConfig.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      throw new Error(`Invalid configuration: ${issues}`);
    }

    ConfigService.parsed = result.data;
    return result.data;
  }
}
