import readline from 'readline';
import inquirer from 'inquirer';
import { cyan, dim, red, yellow } from './colors.js';
import { UserCancelledError } from './errors.js';
import { isJsonMode, print } from './ui/output.js';

export interface PromptOption<T = string> {
  label: string;
  description?: string;
  value: T;
}

export interface CheckboxOption<T = string> extends PromptOption<T> {
  checked?: boolean;
}

type Ask = (question: string) => Promise<string>;

const QUIT_WORDS = new Set(['q', 'quit']);
const YES_WORDS = new Set(['y', 'yes']);
const NO_WORDS = new Set(['n', 'no']);

/**
 * Run `body` against one readline interface, closed afterwards. Ctrl+C
 * while a question is open rejects with UserCancelledError.
 */
async function withReadline<T>(body: (ask: Ask) => Promise<T>): Promise<T> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  const interrupted = new Promise<never>((_, reject) => {
    rl.on('SIGINT', () => reject(new UserCancelledError()));
  });
  const ask: Ask = (question) =>
    Promise.race([new Promise<string>((resolve) => rl.question(question, resolve)), interrupted]);

  try {
    return await body(ask);
  } finally {
    rl.close();
  }
}

/**
 * Numbered menu. Re-asks until the answer is a listed number; `q` cancels.
 */
export async function promptChoice<T>(prompt: string, options: PromptOption<T>[]): Promise<T> {
  print(`\n${yellow(prompt)}\n`);
  options.forEach(({ label, description }, i) => {
    print(`  ${cyan(`${i + 1})`)} ${label}`);
    if (description) print(`     ${dim(description)}`);
  });
  print();

  return withReadline(async (ask) => {
    for (;;) {
      const answer = (await ask(`Enter choice [1-${options.length}]: `)).trim();
      if (answer === '') continue;
      if (QUIT_WORDS.has(answer.toLowerCase())) {
        throw new UserCancelledError();
      }
      const picked = options[Number.parseInt(answer, 10) - 1];
      if (picked !== undefined) {
        return picked.value;
      }
      print(red(`Invalid choice. Please enter a number between 1 and ${options.length}.`));
    }
  });
}

/**
 * y/yes or n/no; anything else takes the default
 */
export async function promptConfirm(prompt: string, defaultValue: boolean = false): Promise<boolean> {
  const hint = dim(defaultValue ? '[Y/n]' : '[y/N]');
  return withReadline(async (ask) => {
    const answer = (await ask(`${prompt} ${hint} `)).trim().toLowerCase();
    if (YES_WORDS.has(answer)) return true;
    if (NO_WORDS.has(answer)) return false;
    return defaultValue;
  });
}

export async function promptInput(prompt: string, defaultValue?: string): Promise<string> {
  const hint = defaultValue ? dim(` [${defaultValue}]`) : '';
  return withReadline(async (ask) => {
    const answer = (await ask(`${prompt}${hint}: `)).trim();
    return answer === '' && defaultValue !== undefined ? defaultValue : answer;
  });
}

// Scrollable inquirer lists, for option sets too long for a numbered menu

const PAGE_SIZE = 15;

function choiceName(option: PromptOption<unknown>, separator: string): string {
  return option.description ? `${option.label} ${dim(`${separator}${option.description}`)}` : option.label;
}

export async function promptSelect<T>(message: string, options: PromptOption<T>[]): Promise<T> {
  const { selected } = await inquirer.prompt<{ selected: T }>([
    {
      type: 'list',
      name: 'selected',
      message,
      pageSize: PAGE_SIZE,
      choices: options.map((option) => ({ name: choiceName(option, ''), value: option.value })),
    },
  ]);
  return selected;
}

export async function promptCheckbox<T>(message: string, options: CheckboxOption<T>[]): Promise<T[]> {
  const { selected } = await inquirer.prompt<{ selected: T[] }>([
    {
      type: 'checkbox',
      name: 'selected',
      message,
      pageSize: PAGE_SIZE,
      choices: options.map((option) => ({
        name: choiceName(option, '- '),
        value: option.value,
        checked: option.checked ?? false,
      })),
    },
  ]);
  return selected;
}

export async function pressEnterToContinue(): Promise<void> {
  await inquirer.prompt([{ type: 'input', name: 'continue', message: dim('Press Enter to continue...') }]);
}

const SPINNER_FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];

/**
 * Animate a spinner on a TTY while `operation` runs; elsewhere print the
 * message once. Silent in JSON mode.
 */
export async function withSpinner<T>(message: string, operation: () => Promise<T>): Promise<T> {
  if (isJsonMode()) {
    return operation();
  }
  if (!process.stdout.isTTY) {
    print(dim(message));
    return operation();
  }

  let frame = 0;
  const timer = setInterval(() => {
    process.stdout.write(`\r${cyan(SPINNER_FRAMES[frame % SPINNER_FRAMES.length])} ${message}`);
    frame++;
  }, 80);

  try {
    return await operation();
  } finally {
    clearInterval(timer);
    process.stdout.write(`\r${' '.repeat(message.length + 2)}\r`);
  }
}
