/**
 * Per-user cache root
 */

import { homedir } from "node:os";
import { posix, win32 } from "node:path";

export type CacheEnvironment = {
  readonly env: Readonly<Record<string, string | undefined>>;
  readonly platform: NodeJS.Platform;
  readonly homedir: string;
};

export const currentEnvironment = (): CacheEnvironment => ({
  env: process.env,
  platform: process.platform,
  homedir: homedir(),
});

const nonEmpty = (value: string | undefined): string | undefined =>
  value !== undefined && value.length > 0 ? value : undefined;

/**
 * `~/Library/Caches/lexmodel` on macOS, `%LOCALAPPDATA%\lexmodel` on Windows,
 * `$XDG_CACHE_HOME/lexmodel` (default `~/.cache/lexmodel`) elsewhere.
 */
export const getCacheDirectory = (
  environment: CacheEnvironment = currentEnvironment()
): string => {
  const { env, platform, homedir: home } = environment;

  switch (platform) {
    case "darwin":
      return posix.join(home, "Library", "Caches", "lexmodel");
    case "win32":
      return win32.join(
        nonEmpty(env.LOCALAPPDATA) ?? win32.join(home, "AppData", "Local"),
        "lexmodel"
      );
    default:
      return posix.join(
        nonEmpty(env.XDG_CACHE_HOME) ?? posix.join(home, ".cache"),
        "lexmodel"
      );
  }
};
