import { describe, it, expect, beforeEach } from 'vitest';
import { AddressBook } from './address-book';
import { makeDate } from './birthday';
import { ContactRecord, createRecord } from './record';

function record(name: string, birthday?: string, phones: string[] = []): ContactRecord {
  const result = createRecord(name, birthday);
  if (!result.success) throw result.error;
  for (const phone of phones) {
    const added = result.value.addPhone(phone);
    if (!added.success) throw added.error;
  }
  return result.value;
}

describe('AddressBook', () => {
  let book: AddressBook;

  beforeEach(() => {
    book = new AddressBook();
  });

  it('finds an added record with the same fields', () => {
    book.addRecord(record('John', '12.06.1990', ['1234567890', '5555555555']));

    const found = book.findRecord('John');
    expect(found?.name).toBe('John');
    expect(found?.phones).toEqual(['1234567890', '5555555555']);
    expect(found?.birthdayText()).toBe('12.06.1990');
  });

  it('looks names up exactly', () => {
    book.addRecord(record('John'));
    expect(book.findRecord('john')).toBeUndefined();
    expect(book.findRecord('John ')).toBeUndefined();
  });

  it('replaces a record with the same name instead of merging', () => {
    book.addRecord(record('John', '12.06.1990', ['1234567890']));
    book.addRecord(record('John', undefined, ['5555555555']));

    expect(book.size).toBe(1);
    const found = book.findRecord('John');
    expect(found?.phones).toEqual(['5555555555']);
    expect(found?.birthday).toBeUndefined();
  });

  it('deletes a present name', () => {
    book.addRecord(record('John'));
    book.addRecord(record('Jane'));

    expect(book.delete('John')).toBe(true);
    expect(book.findRecord('John')).toBeUndefined();
    expect(book.records().map((r) => r.name)).toEqual(['Jane']);
  });

  it('returns false and changes nothing for an absent name', () => {
    book.addRecord(record('John'));

    expect(book.delete('Jane')).toBe(false);
    expect(book.size).toBe(1);
    expect(book.records().map((r) => r.name)).toEqual(['John']);
  });
});

describe('AddressBook.getUpcomingBirthdays', () => {
  let book: AddressBook;

  beforeEach(() => {
    book = new AddressBook();
  });

  it('includes a birthday later in the window', () => {
    book.addRecord(record('John', '12.06.1990'));
    expect(book.getUpcomingBirthdays(makeDate(2024, 6, 10))).toEqual([
      { name: 'John', date: '12.06.2024' },
    ]);
  });

  it('excludes a birthday that already passed this year', () => {
    book.addRecord(record('John', '05.06.1990'));
    expect(book.getUpcomingBirthdays(makeDate(2024, 6, 10))).toEqual([]);
  });

  it('rolls a new-year birthday into next year', () => {
    book.addRecord(record('Jane', '01.01.1990'));
    expect(book.getUpcomingBirthdays(makeDate(2024, 12, 28))).toEqual([
      { name: 'Jane', date: '01.01.2025' },
    ]);
  });

  it('includes today and today + 7 but not today + 8', () => {
    book.addRecord(record('Today', '10.06.1990'));
    book.addRecord(record('LastDay', '17.06.1990'));
    book.addRecord(record('TooLate', '18.06.1990'));

    expect(book.getUpcomingBirthdays(makeDate(2024, 6, 10))).toEqual([
      { name: 'Today', date: '10.06.2024' },
      { name: 'LastDay', date: '17.06.2024' },
    ]);
  });

  it('keeps insertion order rather than date order', () => {
    book.addRecord(record('Later', '15.06.1980'));
    book.addRecord(record('Sooner', '11.06.1985'));

    expect(book.getUpcomingBirthdays(makeDate(2024, 6, 10)).map((u) => u.name)).toEqual([
      'Later',
      'Sooner',
    ]);
  });

  it('skips contacts without a birthday', () => {
    book.addRecord(record('NoBirthday', undefined, ['1234567890']));
    expect(book.getUpcomingBirthdays(makeDate(2024, 6, 10))).toEqual([]);
  });

  it('ignores the time of day of today', () => {
    book.addRecord(record('John', '17.06.1990'));
    expect(book.getUpcomingBirthdays(new Date(2024, 5, 10, 18, 30))).toEqual([
      { name: 'John', date: '17.06.2024' },
    ]);
  });

  it('honours a custom horizon', () => {
    book.addRecord(record('John', '12.06.1990'));
    expect(book.getUpcomingBirthdays(makeDate(2024, 6, 10), 1)).toEqual([]);
    expect(book.getUpcomingBirthdays(makeDate(2024, 6, 10), 2)).toEqual([
      { name: 'John', date: '12.06.2024' },
    ]);
  });

  it('observes a leap-day birthday on 1 March in common years', () => {
    book.addRecord(record('Leap', '29.02.2000'));
    expect(book.getUpcomingBirthdays(makeDate(2025, 2, 25))).toEqual([
      { name: 'Leap', date: '01.03.2025' },
    ]);
    expect(book.getUpcomingBirthdays(makeDate(2024, 2, 25))).toEqual([
      { name: 'Leap', date: '29.02.2024' },
    ]);
  });

  it('does not report a leap-day birthday twice across the year end', () => {
    book.addRecord(record('Leap', '29.02.2000'));
    // 01.03.2025 has passed; next celebration is 01.03.2026
    expect(book.getUpcomingBirthdays(makeDate(2025, 3, 2))).toEqual([]);
  });
});
