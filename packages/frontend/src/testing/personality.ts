/**
 * Runtime personalities for resolver tests. Every directory defaults to
 * absent so tests only see the layout they create.
 */

import type { RuntimePersonality } from "../resolver/runtime-personality.js";

export const testPersonality = (
  overrides: Partial<RuntimePersonality> = {}
): RuntimePersonality => ({
  flavor: "netCoreApp",
  platform: "linux",
  is64BitOperatingSystem: true,
  ...overrides,
});
