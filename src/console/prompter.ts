/**
 * Operator prompts
 *
 * Prompter is the single input primitive (one question, one answer). Prompts
 * layers defaults, numbered menus, confirmations and validation on top of it,
 * so tests only need to script answers.
 */

import * as readline from 'readline';
import * as tty from 'tty';
import type { ConsoleOutput } from './console-output';

/**
 * Thrown when the operator presses Ctrl+C at a prompt
 */
export class PromptInterruptedError extends Error {
  constructor() {
    super('Prompt interrupted');
    this.name = 'PromptInterruptedError';
    Object.setPrototypeOf(this, PromptInterruptedError.prototype);
  }
}

export interface Prompter {
  /**
   * Ask one question.
   * @param timeoutMs give up after this long
   * @returns the answer, or undefined on timeout
   */
  question(text: string, timeoutMs?: number): Promise<string | undefined>;
}

/**
 * Reads answers from stdin through one readline interface. Lines that arrive
 * together (pasted or piped input) are queued for the following questions.
 * Between questions the input is paused and raw mode is off, so Ctrl+C
 * reaches the process and interactive probes can read the inherited stdin.
 */
export class ReadlinePrompter implements Prompter {
  private rl: readline.Interface | undefined;
  private readonly queued: string[] = [];
  private waiter: ((answer: string | undefined, error?: Error) => void) | undefined;
  private closed = false;

  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {}

  question(text: string, timeoutMs?: number): Promise<string | undefined> {
    const rl = this.open();
    return new Promise((resolve, reject) => {
      const next = this.queued.shift();
      if (next !== undefined) {
        resolve(next);
        return;
      }
      if (this.closed) {
        reject(new PromptInterruptedError());
        return;
      }

      let timer: NodeJS.Timeout | undefined;
      this.waiter = (answer, error) => {
        this.waiter = undefined;
        if (timer) {
          clearTimeout(timer);
        }
        this.suspend(rl);
        if (error) {
          reject(error);
        } else {
          resolve(answer);
        }
      };

      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          this.output.write('\n');
          this.waiter?.(undefined);
        }, timeoutMs);
      }

      this.activate(rl);
      rl.setPrompt(text);
      rl.prompt();
    });
  }

  private open(): readline.Interface {
    if (this.rl) {
      return this.rl;
    }
    const rl = readline.createInterface({ input: this.input, output: this.output });
    rl.on('line', (line) => {
      if (this.waiter) {
        this.waiter(line);
      } else {
        this.queued.push(line);
      }
    });
    rl.on('SIGINT', () => {
      this.output.write('\n');
      this.waiter?.(undefined, new PromptInterruptedError());
    });
    rl.on('close', () => {
      this.closed = true;
      this.waiter?.(undefined, new PromptInterruptedError());
    });
    this.rl = rl;
    return rl;
  }

  private activate(rl: readline.Interface): void {
    if (rl.terminal && this.input instanceof tty.ReadStream) {
      this.input.setRawMode(true);
    }
    rl.resume();
  }

  private suspend(rl: readline.Interface): void {
    if (this.closed) {
      return;
    }
    rl.pause();
    if (rl.terminal && this.input instanceof tty.ReadStream) {
      this.input.setRawMode(false);
    }
  }
}

export interface MenuOption<T extends string> {
  value: T;
  label: string;
}

/**
 * Higher-level prompts
 */
export class Prompts {
  constructor(
    private readonly prompter: Prompter,
    private readonly output: ConsoleOutput
  ) {}

  /**
   * Free text; the default is shown in brackets and used on empty input
   */
  async ask(question: string, defaultValue?: string): Promise<string> {
    const suffix = defaultValue !== undefined && defaultValue !== '' ? ` [${defaultValue}]` : '';
    const answer = ((await this.prompter.question(`${question}${suffix}: `)) ?? '').trim();
    return answer === '' ? defaultValue ?? '' : answer;
  }

  /**
   * Free text with a deadline; undefined when nothing was entered in time
   */
  async askTimed(question: string, timeoutMs: number): Promise<string | undefined> {
    const answer = await this.prompter.question(`${question}: `, timeoutMs);
    const trimmed = answer?.trim();
    return trimmed ? trimmed : undefined;
  }

  /**
   * Ask until parse() accepts the answer
   */
  async askParsed<T>(
    question: string,
    parse: (input: string) => { value?: T; error?: string },
    defaultValue?: string
  ): Promise<T> {
    for (;;) {
      const parsed = parse(await this.ask(question, defaultValue));
      if (parsed.value !== undefined) {
        return parsed.value;
      }
      this.output.warn(parsed.error ?? 'Invalid value');
    }
  }

  async confirm(question: string, defaultYes: boolean = false): Promise<boolean> {
    for (;;) {
      const answer = (await this.ask(`${question} (${defaultYes ? 'Y/n' : 'y/N'})`)).toLowerCase();
      if (answer === '') {
        return defaultYes;
      }
      if (answer === 'y' || answer === 'yes') {
        return true;
      }
      if (answer === 'n' || answer === 'no') {
        return false;
      }
      this.output.warn('Please answer y or n');
    }
  }

  /**
   * Explicit typed affirmation: only the exact word counts
   */
  async affirm(question: string, word: string = 'yes'): Promise<boolean> {
    return (await this.ask(`${question} (type "${word}" to continue)`)) === word;
  }

  /**
   * Numbered menu; returns the chosen option's value
   */
  async choose<T extends string>(
    title: string,
    options: ReadonlyArray<MenuOption<T>>,
    defaultValue?: T
  ): Promise<T> {
    this.output.line(title);
    options.forEach((option, index) => this.output.line(`  ${index + 1}) ${option.label}`));
    this.output.line();

    const defaultIndex = options.findIndex((option) => option.value === defaultValue);
    for (;;) {
      const answer = await this.ask(
        `Choice [1-${options.length}]`,
        defaultIndex >= 0 ? String(defaultIndex + 1) : undefined
      );
      const index = Number(answer) - 1;
      if (Number.isInteger(index) && index >= 0 && index < options.length) {
        return options[index].value;
      }
      this.output.warn(`Invalid choice "${answer}"`);
    }
  }

  async pause(): Promise<void> {
    await this.prompter.question('Press Enter to continue...');
  }
}
