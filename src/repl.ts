import * as readline from 'readline';
import { AddressBook } from './address-book';
import { CommandContext, handleCommand } from './commands';
import { startReminder } from './scheduler';
import { AppConfig } from './types';

export const PROMPT = 'Enter a command: ';

export interface ReplOptions {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  book: AddressBook;
  config: AppConfig;
  now?: () => Date;
}

/**
 * Reads commands line by line until `close`/`exit` or end of input.
 */
export function startRepl(options: ReplOptions): Promise<void> {
  const { input, output, book, config } = options;
  const ctx: CommandContext = {
    book,
    horizonDays: config.horizonDays,
    now: options.now || (() => new Date()),
  };
  const write = (text: string) => {
    output.write(`${text}\n`);
  };

  return new Promise((resolve) => {
    const rl = readline.createInterface({ input, output });
    const reminder = config.reminderEnabled ? startReminder(book, write, config) : undefined;

    // lines already split from the same chunk still arrive after close()
    let closed = false;

    rl.on('line', (line) => {
      if (closed) return;

      const { reply, exit } = handleCommand(line, ctx);
      write(reply);
      if (exit) {
        closed = true;
        rl.close();
        return;
      }
      rl.prompt();
    });

    rl.on('close', () => {
      closed = true;
      reminder?.stop();
      resolve();
    });

    write('Welcome to your address book! Type "help" for the list of commands.');
    rl.setPrompt(PROMPT);
    rl.prompt();
  });
}
