import { formatDate, getNextBirthdayDate, isWithinDays } from './birthday';
import { ContactRecord } from './record';
import { UpcomingBirthday } from './types';

export const DEFAULT_HORIZON_DAYS = 7;

/**
 * In-memory contacts keyed by name. Adding a record under a name that is
 * already present replaces the old record.
 */
export class AddressBook {
  private readonly data = new Map<string, ContactRecord>();

  get size(): number {
    return this.data.size;
  }

  addRecord(record: ContactRecord): void {
    this.data.set(record.name, record);
  }

  findRecord(name: string): ContactRecord | undefined {
    return this.data.get(name);
  }

  delete(name: string): boolean {
    return this.data.delete(name);
  }

  /** Records in insertion order. */
  records(): ContactRecord[] {
    return Array.from(this.data.values());
  }

  /**
   * Birthdays celebrated between `today` and `today + horizonDays`, both
   * days included. A birthday already past this year counts from its
   * next-year date. Results keep insertion order.
   */
  getUpcomingBirthdays(
    today: Date = new Date(),
    horizonDays: number = DEFAULT_HORIZON_DAYS
  ): UpcomingBirthday[] {
    const upcoming: UpcomingBirthday[] = [];

    for (const [name, record] of this.data) {
      const birthday = record.birthday;
      if (!birthday) continue;

      const next = getNextBirthdayDate(birthday, today);
      if (isWithinDays(next, today, horizonDays)) {
        upcoming.push({ name, date: formatDate(next) });
      }
    }

    return upcoming;
  }
}
