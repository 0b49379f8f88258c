type Env = Record<string, string | undefined>;

export interface AppConfig {
  displayPrecision: number; // decimals shown for grams and ratios
  analyticsEnabled: boolean;
  debugRecompute: boolean;
}

export const DEFAULT_CONFIG: AppConfig = {
  displayPrecision: 2,
  analyticsEnabled: true,
  debugRecompute: false,
};

const MAX_PRECISION = 6;

// We *cannot* reference `import.meta` here because Jest runs the code through CommonJS.
// The entry point copies Vite's env onto `globalThis.importMeta` before anything reads it.
function isEnv(value: unknown): value is Env {
  return typeof value === 'object' && value !== null;
}

function readViteEnv(): Env | undefined {
  const carrier: unknown = Reflect.get(globalThis, 'importMeta');
  if (typeof carrier === 'object' && carrier !== null && 'env' in carrier && isEnv(carrier.env)) {
    return carrier.env;
  }
  return undefined;
}

export function resolveEnv(): Env {
  return readViteEnv() ?? (typeof process !== 'undefined' ? process.env : {});
}

function parsePrecision(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === '') {
    return DEFAULT_CONFIG.displayPrecision;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0 || value > MAX_PRECISION) {
    console.warn(`Ignoring VITE_DISPLAY_PRECISION=${raw}; expected an integer from 0 to ${MAX_PRECISION}`);
    return DEFAULT_CONFIG.displayPrecision;
  }
  return value;
}

function parseFlag(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined) return fallback;
  const normalized = raw.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized === 'false' || normalized === '0') return false;
  return fallback;
}

export function loadConfig(env: Env = resolveEnv()): AppConfig {
  return {
    displayPrecision: parsePrecision(env.VITE_DISPLAY_PRECISION),
    analyticsEnabled: parseFlag(env.VITE_ENABLE_ANALYTICS, DEFAULT_CONFIG.analyticsEnabled),
    debugRecompute: parseFlag(env.VITE_DEBUG_RECOMPUTE, DEFAULT_CONFIG.debugRecompute),
  };
}

export const appConfig: AppConfig = loadConfig();
