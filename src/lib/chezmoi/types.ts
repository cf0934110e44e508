/**
 * Types for the chezmoi command adapter
 */

/**
 * Options for `chezmoi add`.
 *
 * Every option except `recursive` emits its flag when true. `recursive`
 * follows chezmoi's own default (true) and only emits `--recursive=false`.
 */
export interface AddOptions {
  template?: boolean;
  encrypt?: boolean;
  exact?: boolean;
  executable?: boolean;
  private?: boolean;
  readonly?: boolean;
  recursive?: boolean;
  autotemplate?: boolean;
  follow?: boolean;
  create?: boolean;
  prompt?: boolean;
}

export interface ApplyOptions {
  targets?: string[];
  dryRun?: boolean;
  verbose?: boolean;
}

/**
 * Captured result of one subprocess invocation
 */
export interface CommandResult {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number;
}

export interface RunOptions {
  timeoutMs: number;
  cwd?: string;
}

/**
 * Runs `executable args...` and resolves with its captured output.
 * Rejects with ChezmoiNotFoundError or ChezmoiTimeoutError only; a
 * non-zero exit is part of the result.
 */
export type CommandRunner = (
  executable: string,
  args: string[],
  options: RunOptions
) => Promise<CommandResult>;

export type TemplateValue =
  | string
  | number
  | boolean
  | null
  | TemplateValue[]
  | TemplateMapping;

export interface TemplateMapping {
  [key: string]: TemplateValue;
}

export interface VerifyResult {
  ok: boolean;
  /** stdout when ok, stderr otherwise, trimmed */
  output: string;
}

export interface AdapterSettings {
  executable: string;
  commandTimeoutMs: number;
  probeTimeoutMs: number;
  /** Destination directory that relative managed paths resolve against */
  destDir: string;
}
