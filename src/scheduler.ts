import * as cron from 'node-cron';
import { AddressBook } from './address-book';
import { AppConfig, UpcomingBirthday } from './types';

export type ReminderNotify = (message: string) => void;

export function formatUpcoming(upcoming: UpcomingBirthday[]): string {
  return upcoming.map(({ name, date }) => `${name}'s birthday on ${date}`).join('\n');
}

/**
 * One reminder tick: hands the upcoming birthdays to `notify`, or does
 * nothing when there are none. Returns what was found.
 */
export function runReminder(
  book: AddressBook,
  notify: ReminderNotify,
  horizonDays: number,
  now: Date = new Date()
): UpcomingBirthday[] {
  const upcoming = book.getUpcomingBirthdays(now, horizonDays);
  if (upcoming.length > 0) {
    notify(`Upcoming birthdays:\n${formatUpcoming(upcoming)}`);
  }
  return upcoming;
}

export function startReminder(
  book: AddressBook,
  notify: ReminderNotify,
  config: Pick<AppConfig, 'reminderCron' | 'horizonDays'>
): cron.ScheduledTask {
  const task = cron.schedule(config.reminderCron, () => {
    try {
      runReminder(book, notify, config.horizonDays);
    } catch (err) {
      console.error('Reminder error:', err);
    }
  });

  console.log(`Birthday reminder scheduled (${config.reminderCron}).`);
  return task;
}
