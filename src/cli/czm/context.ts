/**
 * Per-invocation setup shared by every subcommand and the menu:
 * config, logger, then one adapter handed to whatever runs next.
 */

import { ChezmoiAdapter, type CommandRunner } from '../../lib/chezmoi/index.js';
import { loadConfig, type ResolvedConfig } from '../../lib/config.js';
import { formatValidationErrors } from '../../lib/config-validation.js';
import { configureLogger, logger } from '../../lib/logger.js';

/**
 * Options every command accepts (declared globally in czm.ts)
 */
export interface GlobalArgs {
  verbose?: boolean;
  quiet?: boolean;
  color?: boolean;
  chezmoi?: string;
}

export interface AppContext {
  config: ResolvedConfig;
  adapter: ChezmoiAdapter;
  /** Config problems, already logged; JSON output carries them as warnings */
  configWarnings: string[];
}

export interface ContextOptions {
  commandName?: string;
  configPath?: string;
  runner?: CommandRunner;
}

export function createAppContext(args: GlobalArgs, options: ContextOptions = {}): AppContext {
  const loaded = loadConfig({ configPath: options.configPath });
  const config = loaded.config;

  if (args.chezmoi) {
    config.executable = args.chezmoi;
  }

  configureLogger({
    verbose: args.verbose,
    quiet: args.quiet,
    noColor: args.color === false,
    configLevel: config.logging.level,
    commandName: options.commandName,
  });

  const configWarnings = formatValidationErrors(loaded.warnings);
  for (const warning of configWarnings) {
    logger.warn(`Config: ${warning}`);
  }
  if (loaded.source) {
    logger.debug(`Loaded config from ${loaded.source}`);
  }

  const adapter = new ChezmoiAdapter(
    {
      executable: config.executable,
      commandTimeoutMs: config.commandTimeoutMs,
      probeTimeoutMs: config.probeTimeoutMs,
      destDir: config.destDir,
    },
    options.runner
  );

  return { config, adapter, configWarnings };
}
