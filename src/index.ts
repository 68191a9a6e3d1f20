#!/usr/bin/env node
import { AddressBook } from './address-book';
import { loadConfig } from './config';
import { startRepl } from './repl';
import { startReminder } from './scheduler';
import { startServer } from './server';

async function main(argv: string[]): Promise<void> {
  const config = loadConfig();
  const book = new AddressBook();

  if (argv[0] === 'serve') {
    startServer(book, config);
    if (config.reminderEnabled) {
      startReminder(book, (message) => console.log(message), config);
    }
    return;
  }

  await startRepl({ input: process.stdin, output: process.stdout, book, config });
}

main(process.argv.slice(2)).catch((err) => {
  const errMsg = err instanceof Error ? err.message : String(err);
  console.error('Startup error:', errMsg);
  process.exit(1);
});
