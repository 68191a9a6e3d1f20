import { describe, it, expect } from 'vitest';
import { PassThrough } from 'stream';
import { AddressBook } from './address-book';
import { makeDate } from './birthday';
import { PROMPT, startRepl } from './repl';
import { AppConfig } from './types';

const config: AppConfig = {
  port: 0,
  horizonDays: 7,
  reminderCron: '0 9 * * *',
  reminderEnabled: false,
};

interface Transcript {
  lines: string[];
  text: string;
}

async function transcript(lines: string[], book = new AddressBook()): Promise<Transcript> {
  const input = new PassThrough();
  const output = new PassThrough();
  let text = '';
  output.on('data', (chunk: Buffer) => {
    text += chunk.toString();
  });

  const done = startRepl({ input, output, book, config, now: () => makeDate(2024, 6, 10) });
  input.end(lines.map((line) => `${line}\n`).join(''));
  await done;
  await new Promise((resolve) => setImmediate(resolve));

  return {
    lines: text
      .split('\n')
      .map((line) => line.split(PROMPT).join(''))
      .filter((line) => line.length > 0),
    text,
  };
}

async function session(lines: string[], book = new AddressBook()): Promise<string[]> {
  return (await transcript(lines, book)).lines;
}

describe('startRepl', () => {
  it('runs commands until exit', async () => {
    const book = new AddressBook();
    const out = await session(
      ['add John 1234567890', 'add-birthday John 12.06.1990', 'birthdays', 'exit'],
      book
    );

    expect(out).toEqual([
      'Welcome to your address book! Type "help" for the list of commands.',
      'Contact added.',
      'Birthday 12.06.1990 has been added to John.',
      "John's birthday on 12.06.2024",
      'Good bye!',
    ]);
    expect(book.findRecord('John')?.phones).toEqual(['1234567890']);
  });

  it('keeps going after bad input', async () => {
    const out = await session(['add John 12', '', 'phone John', 'close']);

    expect(out).toEqual([
      'Welcome to your address book! Type "help" for the list of commands.',
      'Error: Invalid phone number "12". Phone number should be exactly 10 digits.',
      'Enter the command from the list.',
      'Contact not found.',
      'Good bye!',
    ]);
  });

  it('resolves when input ends without exit', async () => {
    const out = await session(['hello']);
    expect(out).toEqual([
      'Welcome to your address book! Type "help" for the list of commands.',
      'How can I help you?',
    ]);
  });

  it('ignores commands that follow exit in the same chunk', async () => {
    const book = new AddressBook();
    const { lines, text } = await transcript(['exit', 'add Bob 1234567890', 'hello'], book);

    expect(lines).toEqual([
      'Welcome to your address book! Type "help" for the list of commands.',
      'Good bye!',
    ]);
    expect(text.endsWith('Good bye!\n')).toBe(true);
    expect(book.findRecord('Bob')).toBeUndefined();
  });
});
