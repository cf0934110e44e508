import { batch, computed, signal } from '@preact/signals-core';
import type { ChezmoiAdapter } from '../chezmoi/index.js';
import { logger } from '../logger.js';
import { SingleFlight } from '../tasks/single-flight.js';
import { exportDiff } from './export.js';
import { isEmptyDiff, parseDiff } from './parse.js';
import type { ApplyResult, DiffStatus, ExportResult } from './types.js';

export type DiffSource = Pick<ChezmoiAdapter, 'diff' | 'apply' | 'toAbsoluteTarget'>;

export interface DiffSessionOptions {
  exportDir: string;
  patchPrefix: string;
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * State of one diff view: the current text, its scope and load status.
 *
 * Every fetch goes through a single-flight slot, so a slow unscoped diff
 * can never overwrite a newer scoped one.
 */
export class DiffSession {
  readonly status$ = signal<DiffStatus>('idle');
  readonly text$ = signal('');
  /** Absolute target the diff is scoped to, or null for all files */
  readonly target$ = signal<string | null>(null);
  readonly error$ = signal<Error | null>(null);

  readonly summary$ = computed(() => parseDiff(this.text$.value));
  readonly canApply$ = computed(
    () => this.status$.value === 'loaded' && !isEmptyDiff(this.text$.value)
  );

  private readonly flight = new SingleFlight();

  constructor(
    private readonly source: DiffSource,
    private readonly options: DiffSessionOptions
  ) {}

  /**
   * Fetch the diff, scoped to one absolute target or unscoped when null.
   * On failure the previous scope and text stay together.
   */
  async load(target: string | null = null): Promise<void> {
    this.status$.value = 'loading';
    this.error$.value = null;

    try {
      const result = await this.flight.run(() => this.source.diff(target ?? undefined));
      if (result.stale) return;
      batch(() => {
        this.target$.value = target;
        this.text$.value = result.value;
        this.status$.value = 'loaded';
      });
    } catch (err) {
      const error = toError(err);
      logger.warn(`Failed to load diff: ${error.message}`);
      this.error$.value = error;
      this.status$.value = 'error';
    }
  }

  /**
   * Re-query the diff for one file as printed in a `diff --git` header
   */
  async selectFile(file: string): Promise<void> {
    await this.load(this.source.toAbsoluteTarget(file));
  }

  async showAll(): Promise<void> {
    await this.load(null);
  }

  async refresh(): Promise<void> {
    await this.load(this.target$.value);
  }

  /**
   * Apply all pending changes. Confirmation is the caller's job.
   *
   * Empty diff text returns `nothing-to-apply` without running chezmoi.
   * On failure the current text stays visible.
   */
  async apply(): Promise<ApplyResult> {
    if (isEmptyDiff(this.text$.value)) {
      return { kind: 'nothing-to-apply' };
    }

    this.status$.value = 'applying';
    this.error$.value = null;
    this.flight.invalidate();

    let output: string;
    try {
      output = await this.source.apply({ verbose: true });
    } catch (err) {
      const error = toError(err);
      logger.error(`Apply failed: ${error.message}`);
      this.error$.value = error;
      this.status$.value = 'error';
      return { kind: 'failed', error };
    }

    logger.info('Applied pending changes');
    await this.load(null);
    return { kind: 'applied', output };
  }

  exportPatch(now?: Date): ExportResult {
    return exportDiff(this.text$.value, {
      directory: this.options.exportDir,
      prefix: this.options.patchPrefix,
      now,
    });
  }
}
