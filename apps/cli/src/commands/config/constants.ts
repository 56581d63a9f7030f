export const CONFIG_KEYS = ["fallbackOffset", "format", "skipUnmatched"] as const;

export type ConfigKey = (typeof CONFIG_KEYS)[number];

export const isConfigKey = (key: string): key is ConfigKey =>
  CONFIG_KEYS.some((configKey) => configKey === key);

/**
 * Environment variable that overrides each key, if any
 */
export const CONFIG_ENV_VARS: Readonly<Partial<Record<ConfigKey, string>>> = {
  fallbackOffset: "LOGSTAMP_FALLBACK_OFFSET",
  format: "LOGSTAMP_FORMAT",
};
