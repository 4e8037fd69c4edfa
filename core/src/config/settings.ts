export interface LayeringSettings {
  debug: boolean;
  resolver: {
    // Memoize resolved facilities per call site
    cache: boolean;
    // Debug-log deferrals whose target layer already loads earlier
    adviseUnneededDeferral: boolean;
  };
}

export const DEFAULT_SETTINGS: LayeringSettings = {
  debug: false,
  resolver: {
    cache: true,
    adviseUnneededDeferral: true
  }
};

type Env = Record<string, string | undefined>;

const isTruthy = (value: string | undefined): boolean =>
  value !== undefined && value !== '' && value !== '0' && value.toLowerCase() !== 'false';

export function loadSettings(env: Env = process.env, overrides: Partial<LayeringSettings> = {}): LayeringSettings {
  return {
    debug: overrides.debug ?? isTruthy(env.DEBUG),
    resolver: {
      cache: !isTruthy(env.SCHEME_LAYERS_NO_CACHE),
      adviseUnneededDeferral: DEFAULT_SETTINGS.resolver.adviseUnneededDeferral,
      ...overrides.resolver
    }
  };
}
