const ENV_DEFAULTS = {
  TICKET_CSV_DEFAULT_ENCODING: "utf-8",
  DATASET_TTL_MS: "1800000",
  SAMPLE_EXPORT_PATH: "fixtures/sample-export.csv",
  DETAIL_PAGE_SIZE: "25"
} as const;

type EnvKey = keyof typeof ENV_DEFAULTS;

type ServerEnv = Record<EnvKey, string>;

let cachedEnv: ServerEnv | null = null;

function loadEnv(): ServerEnv {
  if (cachedEnv) {
    return cachedEnv;
  }

  const env: ServerEnv = { ...ENV_DEFAULTS };
  for (const key of Object.keys(ENV_DEFAULTS)) {
    if (!isEnvKey(key)) continue;
    const value = process.env[key]?.trim();
    if (value) {
      env[key] = value;
    }
  }

  cachedEnv = env;
  return cachedEnv;
}

function isEnvKey(key: string): key is EnvKey {
  return key in ENV_DEFAULTS;
}

export function getServerEnv(key: EnvKey) {
  return loadEnv()[key];
}

export function getNumericEnv(key: EnvKey) {
  const parsed = Number(getServerEnv(key));
  if (Number.isFinite(parsed) && parsed > 0) {
    return parsed;
  }
  console.warn(`Ignoring invalid numeric value for ${key}; using default ${ENV_DEFAULTS[key]}`);
  return Number(ENV_DEFAULTS[key]);
}

export const __testables = {
  resetEnvCache() {
    cachedEnv = null;
  }
};
