import type { DeadwoodConfig } from "../config/schema.js";
import { BUILTIN_PROVIDERS } from "./builtin.js";
import type { FrameworkPatternProvider } from "./types.js";

export interface ProviderSelection {
  providers: FrameworkPatternProvider[];
  /** Names in plugins.enabled/disabled that no provider answers to */
  unknown: string[];
}

/**
 * Pick the active providers: enabled ones always, disabled ones never, the
 * rest by manifest dependencies when auto-detection is on. Conflicts are
 * rejected earlier, by config validation.
 */
export function selectProviders(
  plugins: DeadwoodConfig["plugins"],
  dependencies: ReadonlySet<string>,
  available: readonly FrameworkPatternProvider[] = BUILTIN_PROVIDERS
): ProviderSelection {
  const known = new Set(available.map((provider) => provider.name));
  const unknown = [...plugins.enabled, ...plugins.disabled].filter((name) => !known.has(name));

  const providers = available.filter((provider) => {
    if (plugins.disabled.includes(provider.name)) return false;
    if (plugins.enabled.includes(provider.name)) return true;
    return plugins.autoDetect && provider.detect(dependencies);
  });
  return { providers, unknown: [...new Set(unknown)].sort() };
}
