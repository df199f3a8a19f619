/**
 * lode config - effective configuration summary command
 */
import { resolveConfig } from "@lode/core";

export async function runConfig(opts: { json?: boolean; cwd?: string; homeDir?: string }): Promise<number> {
  const resolved = resolveConfig(opts.cwd, opts.homeDir);
  const limits = resolved.config.limits ?? {};

  if (opts.json) {
    console.log(
      JSON.stringify(
        {
          source: resolved.source,
          path: resolved.path,
          config: { version: resolved.config.version, limits },
        },
        null,
        2
      )
    );
    return 0;
  }

  const show = (value: number | undefined): string => (value === undefined ? "(none)" : String(value));

  console.log("Effective Lode configuration");
  console.log(`  Source:         ${resolved.source}`);
  console.log(`  Path:           ${resolved.path ?? "(none)"}`);
  console.log(`  Max steps:      ${show(limits.maxSteps)}`);
  console.log(`  Time (ms):      ${show(limits.timeMs)}`);
  console.log(`  Max call depth: ${show(limits.maxCallDepth)}`);
  return 0;
}
