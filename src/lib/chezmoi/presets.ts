import type { AddOptions } from './types.js';

/**
 * Add flags offered in the interactive option picker
 */
export type AddFlag = Exclude<keyof AddOptions, 'recursive' | 'prompt'>;

export const ADD_FLAGS: { flag: AddFlag; label: string; description: string }[] = [
  { flag: 'template', label: 'Template', description: 'Store as a template' },
  { flag: 'encrypt', label: 'Encrypt', description: 'Encrypt in the source state' },
  { flag: 'private', label: 'Private', description: 'Remove group and world permissions' },
  { flag: 'executable', label: 'Executable', description: 'Set the executable bit' },
  { flag: 'readonly', label: 'Readonly', description: 'Remove write permissions' },
  { flag: 'exact', label: 'Exact', description: 'Remove unmanaged entries from directories' },
  { flag: 'autotemplate', label: 'Autotemplate', description: 'Replace known values with template variables' },
  { flag: 'follow', label: 'Follow', description: 'Add the symlink target instead of the symlink' },
  { flag: 'create', label: 'Create', description: 'Add as a file that must exist, whatever its contents' },
];

export type AddPreset = 'private' | 'template' | 'executable' | 'readonly';

/**
 * Each preset turns on exactly one flag
 */
export const ADD_PRESETS: Record<AddPreset, AddOptions> = {
  private: { private: true },
  template: { template: true },
  executable: { executable: true },
  readonly: { readonly: true },
};

export function optionsFromFlags(flags: AddFlag[]): AddOptions {
  const options: AddOptions = {};
  for (const flag of flags) {
    options[flag] = true;
  }
  return options;
}

/**
 * Names of the flags turned on, in picker order
 */
export function enabledFlags(options: AddOptions): AddFlag[] {
  return ADD_FLAGS.map((entry) => entry.flag).filter((flag) => options[flag] === true);
}
