import path from 'path';
import { logger } from '../logger.js';
import { canonicalPath } from '../paths.js';
import {
  DATA_ARGS,
  DOCTOR_ARGS,
  MANAGED_ARGS,
  VERIFY_ARGS,
  VERSION_ARGS,
  buildAddArgs,
  buildApplyArgs,
  buildDiffArgs,
  buildInitArgs,
  buildRemoveArgs,
  buildSourcePathArgs,
  buildStatusArgs,
  buildTargetPathArgs,
  buildUpdateArgs,
} from './args.js';
import { OPERATION_POLICIES, interpretOutcome, toOutcome, type Operation } from './outcome.js';
import { runCommand } from './runner.js';
import type {
  AdapterSettings,
  AddOptions,
  ApplyOptions,
  CommandResult,
  CommandRunner,
  TemplateMapping,
  TemplateValue,
  VerifyResult,
} from './types.js';

function isTemplateValue(value: unknown): value is TemplateValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'number':
    case 'boolean':
      return true;
    case 'object':
      return Array.isArray(value)
        ? value.every(isTemplateValue)
        : Object.values(value).every(isTemplateValue);
    default:
      return false;
  }
}

function isTemplateMapping(value: unknown): value is TemplateMapping {
  return (
    typeof value === 'object' && value !== null && !Array.isArray(value) && isTemplateValue(value)
  );
}

function toArray(targets: string | string[]): string[] {
  return Array.isArray(targets) ? targets : [targets];
}

/**
 * Single entry point for running chezmoi.
 *
 * Created once from the resolved config and handed to every screen and
 * command. The runner is injectable so tests never spawn a process.
 */
export class ChezmoiAdapter {
  readonly settings: AdapterSettings;
  private readonly runner: CommandRunner;

  constructor(settings: AdapterSettings, runner: CommandRunner = runCommand) {
    this.settings = settings;
    this.runner = runner;
  }

  get executable(): string {
    return this.settings.executable;
  }

  /**
   * Human-readable command line, used for previews and error messages
   */
  describe(args: string[]): string {
    return [this.settings.executable, ...args].join(' ');
  }

  private async exec(args: string[], timeoutMs: number): Promise<CommandResult> {
    const command = this.describe(args);
    const started = Date.now();
    logger.debug(command);
    const result = await this.runner(this.settings.executable, args, { timeoutMs });
    logger.debug(`${args[0] ?? command} exited with code ${result.exitCode} in ${Date.now() - started}ms`);
    return result;
  }

  private async invoke(
    operation: Operation,
    args: string[],
    timeoutMs: number = this.settings.commandTimeoutMs
  ): Promise<string> {
    const result = await this.exec(args, timeoutMs);
    return interpretOutcome(toOutcome(result, this.describe(args)), OPERATION_POLICIES[operation]);
  }

  /**
   * True when `chezmoi --version` runs and exits 0. Never throws.
   */
  async checkInstalled(): Promise<boolean> {
    try {
      const result = await this.exec(VERSION_ARGS, this.settings.probeTimeoutMs);
      return result.exitCode === 0;
    } catch (error) {
      logger.debug('chezmoi installation check failed:', error);
      return false;
    }
  }

  async getVersion(): Promise<string> {
    const stdout = await this.invoke('version', VERSION_ARGS, this.settings.probeTimeoutMs);
    return stdout.trim();
  }

  async add(targets: string | string[], options: AddOptions = {}): Promise<string> {
    return this.invoke('add', buildAddArgs(toArray(targets), options));
  }

  async remove(targets: string | string[]): Promise<string> {
    return this.invoke('remove', buildRemoveArgs(toArray(targets)));
  }

  /**
   * Raw unified diff text. A non-zero exit returns whatever was printed.
   */
  async diff(target?: string): Promise<string> {
    return this.invoke('diff', buildDiffArgs(target));
  }

  async apply(options: ApplyOptions = {}): Promise<string> {
    return this.invoke('apply', buildApplyArgs(options));
  }

  /**
   * Managed target paths, trimmed, blank lines dropped, in chezmoi's order
   */
  async listManaged(): Promise<string[]> {
    const stdout = await this.invoke('managed', MANAGED_ARGS);
    return stdout
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
  }

  async getStatus(targets: string[] = []): Promise<string> {
    return this.invoke('status', buildStatusArgs(targets));
  }

  /**
   * Template data as a mapping; `{}` for empty, malformed or non-mapping output
   */
  async getTemplateData(): Promise<TemplateMapping> {
    const stdout = await this.invoke('data', DATA_ARGS);
    if (!stdout.trim()) {
      return {};
    }
    try {
      const parsed: unknown = JSON.parse(stdout);
      return isTemplateMapping(parsed) ? parsed : {};
    } catch (error) {
      logger.debug('chezmoi data returned invalid JSON:', error);
      return {};
    }
  }

  async getSourcePath(target?: string): Promise<string> {
    const stdout = await this.invoke('source-path', buildSourcePathArgs(target));
    return stdout.trim();
  }

  async getTargetPath(sourcePath: string): Promise<string> {
    const stdout = await this.invoke('target-path', buildTargetPathArgs(sourcePath));
    return stdout.trim();
  }

  /**
   * Raw `chezmoi doctor` output. Never throws.
   */
  async runDiagnostics(): Promise<string> {
    try {
      return await this.invoke('doctor', DOCTOR_ARGS);
    } catch (error) {
      logger.warn('chezmoi doctor failed:', error);
      return '';
    }
  }

  async verify(): Promise<VerifyResult> {
    const result = await this.exec(VERIFY_ARGS, this.settings.commandTimeoutMs);
    const ok = result.exitCode === 0;
    return { ok, output: (ok ? result.stdout : result.stderr).trim() };
  }

  async update(apply: boolean = true): Promise<string> {
    return this.invoke('update', buildUpdateArgs(apply));
  }

  async init(repo?: string): Promise<string> {
    return this.invoke('init', buildInitArgs(repo));
  }

  /**
   * Whether a path is managed, comparing canonical absolute paths.
   *
   * The candidate resolves against the working directory, managed entries
   * against the destination directory. Never throws.
   */
  async isManaged(candidate: string): Promise<boolean> {
    try {
      const wanted = canonicalPath(candidate);
      const managed = await this.listManaged();
      return managed.some((entry) => this.resolveManagedEntry(entry) === wanted);
    } catch (error) {
      logger.debug(`Could not determine whether ${candidate} is managed:`, error);
      return false;
    }
  }

  /**
   * Absolute path of a managed entry, or null when it cannot be resolved
   */
  resolveManagedEntry(entry: string): string | null {
    try {
      return canonicalPath(entry, { baseDir: this.settings.destDir });
    } catch (error) {
      logger.debug(`Skipping managed entry ${entry}:`, error);
      return null;
    }
  }

  /**
   * Absolute form of a target path as chezmoi prints it
   */
  toAbsoluteTarget(target: string): string {
    return path.resolve(this.settings.destDir, target);
  }
}
