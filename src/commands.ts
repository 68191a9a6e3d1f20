import { AddressBook } from './address-book';
import { ContactBookError } from './errors';
import { createRecord } from './record';
import { formatUpcoming } from './scheduler';

export interface CommandContext {
  book: AddressBook;
  horizonDays: number;
  now: () => Date;
}

export type CommandHandler = (args: string[], ctx: CommandContext) => string;

export interface ParsedInput {
  command: string;
  args: string[];
}

export interface CommandReply {
  reply: string;
  exit: boolean;
}

export function parseInput(line: string): ParsedInput {
  const [command = '', ...args] = line.trim().split(/\s+/).filter((part) => part.length > 0);
  return { command: command.toLowerCase(), args };
}

function errorText(error: ContactBookError): string {
  return `Error: ${error.message}`;
}

/**
 * Turns anything a handler throws into a reply line instead of letting it
 * reach the read loop.
 */
export function withInputErrors(handler: CommandHandler): CommandHandler {
  return (args, ctx) => {
    try {
      return handler(args, ctx);
    } catch (error) {
      const errMsg = error instanceof Error ? error.message : String(error);
      return `Error: ${errMsg}`;
    }
  };
}

// ─── Handlers ───────────────────────────────────────────────────

const hello: CommandHandler = () => 'How can I help you?';

const addContact: CommandHandler = (args, { book }) => {
  if (args.length < 2) {
    return 'Error: Please provide both name and phone number.';
  }
  const [name, phone] = args;

  const existing = book.findRecord(name);
  if (existing) {
    const added = existing.addPhone(phone);
    return added.success ? 'Contact updated.' : errorText(added.error);
  }

  const created = createRecord(name);
  if (!created.success) return errorText(created.error);

  // the phone is checked before the contact reaches the book
  const added = created.value.addPhone(phone);
  if (!added.success) return errorText(added.error);

  book.addRecord(created.value);
  return 'Contact added.';
};

const changeContact: CommandHandler = (args, { book }) => {
  if (args.length < 3) {
    return 'Error: Please provide contact name, old phone number, and new phone number.';
  }
  const [name, oldPhone, newPhone] = args;

  const record = book.findRecord(name);
  if (!record) return 'Contact not found.';

  const edited = record.editPhone(oldPhone, newPhone);
  if (!edited.success) return errorText(edited.error);
  if (!edited.value) return `No phone number ${oldPhone} found for ${name}.`;

  return `Phone number updated for ${name} from ${oldPhone} to ${newPhone}.`;
};

const showPhone: CommandHandler = (args, { book }) => {
  if (args.length < 1) {
    return 'Error: Please specify the contact name.';
  }
  const [name] = args;

  const record = book.findRecord(name);
  if (!record) return 'Contact not found.';

  const phones = record.phones;
  if (phones.length === 0) return `No phone numbers found for ${name}.`;
  return `${name}'s phone numbers: ${phones.join(', ')}`;
};

const removePhone: CommandHandler = (args, { book }) => {
  if (args.length < 2) {
    return 'Error: Please provide both name and phone number.';
  }
  const [name, phone] = args;

  const record = book.findRecord(name);
  if (!record) return 'Contact not found.';

  if (record.removePhone(phone) === 0) {
    return `No phone number ${phone} found for ${name}.`;
  }
  return `Phone number ${phone} removed from ${name}.`;
};

const deleteContact: CommandHandler = (args, { book }) => {
  if (args.length < 1) {
    return 'Error: Please specify the contact name.';
  }
  const [name] = args;
  return book.delete(name) ? `Contact ${name} deleted.` : 'Contact not found.';
};

const showAll: CommandHandler = (_args, { book }) => {
  if (book.size === 0) return 'The address book is empty.';
  return book
    .records()
    .map((record) => record.toString())
    .join('\n');
};

const addBirthday: CommandHandler = (args, { book }) => {
  if (args.length < 2) {
    return 'Error: Please provide both name and birthday.';
  }
  const [name, birthday] = args;

  const record = book.findRecord(name);
  if (!record) return 'Contact not found.';

  const added = record.addBirthday(birthday);
  if (!added.success) return errorText(added.error);
  return `Birthday ${birthday} has been added to ${name}.`;
};

const showBirthday: CommandHandler = (args, { book }) => {
  if (args.length < 1) {
    return 'Error: Please specify the contact name.';
  }
  const [name] = args;

  const birthday = book.findRecord(name)?.birthdayText();
  if (!birthday) return 'Birthday not found.';
  return `${name}'s birthday is on ${birthday}.`;
};

const birthdays: CommandHandler = (_args, { book, horizonDays, now }) => {
  const upcoming = book.getUpcomingBirthdays(now(), horizonDays);
  if (upcoming.length === 0) return 'No upcoming birthdays.';
  return formatUpcoming(upcoming);
};

export const HELP_TEXT = [
  'Commands:',
  '  hello',
  '  add <name> <phone>',
  '  change <name> <old phone> <new phone>',
  '  phone <name>',
  '  remove-phone <name> <phone>',
  '  delete <name>',
  '  all',
  '  add-birthday <name> <DD.MM.YYYY>',
  '  show-birthday <name>',
  '  birthdays',
  '  help',
  '  close | exit',
].join('\n');

const help: CommandHandler = () => HELP_TEXT;

export const COMMANDS = new Map<string, CommandHandler>([
  ['hello', hello],
  ['add', addContact],
  ['change', changeContact],
  ['phone', showPhone],
  ['remove-phone', removePhone],
  ['delete', deleteContact],
  ['all', showAll],
  ['add-birthday', addBirthday],
  ['show-birthday', showBirthday],
  ['birthdays', birthdays],
  ['help', help],
]);

const EXIT_COMMANDS = new Set(['close', 'exit']);

export function handleCommand(line: string, ctx: CommandContext): CommandReply {
  const { command, args } = parseInput(line);

  if (command === '') {
    return { reply: 'Enter the command from the list.', exit: false };
  }
  if (EXIT_COMMANDS.has(command)) {
    return { reply: 'Good bye!', exit: true };
  }

  const handler = COMMANDS.get(command);
  if (!handler) {
    return { reply: 'Invalid command.', exit: false };
  }

  return { reply: withInputErrors(handler)(args, ctx), exit: false };
}
