import { formatDate } from './birthday';
import { InvalidDateFormatError, InvalidPhoneFormatError, ValidationError } from './errors';
import { Name, Phone, createBirthday, createName, createPhone } from './fields';
import { Birthday, ContactJson, Result, ok } from './types';

/**
 * One contact: a name, its phone numbers in the order they were added
 * (duplicates allowed) and an optional birthday.
 *
 * Every mutation validates first and only then touches state, so a failed
 * call leaves the record as it was.
 */
export class ContactRecord {
  readonly name: Name;
  private phoneList: Phone[] = [];
  private birthdayField?: Birthday;

  constructor(name: Name, birthday?: Birthday) {
    this.name = name;
    this.birthdayField = birthday;
  }

  get phones(): Phone[] {
    return [...this.phoneList];
  }

  /** The birthday as a local-midnight Date, or undefined when unknown. */
  get birthday(): Date | undefined {
    return this.birthdayField ? new Date(this.birthdayField.date) : undefined;
  }

  addPhone(value: string): Result<void, InvalidPhoneFormatError> {
    const phone = createPhone(value);
    if (!phone.success) return phone;

    this.phoneList.push(phone.value);
    return ok(undefined);
  }

  /** Removes every phone equal to `value`; returns how many were removed. */
  removePhone(value: string): number {
    const before = this.phoneList.length;
    this.phoneList = this.phoneList.filter((p) => p !== value);
    return before - this.phoneList.length;
  }

  /**
   * Replaces the first phone equal to `oldValue`. Succeeds with `false`
   * when there is no such phone.
   */
  editPhone(oldValue: string, newValue: string): Result<boolean, InvalidPhoneFormatError> {
    const idx = this.phoneList.findIndex((p) => p === oldValue);
    if (idx === -1) return ok(false);

    const phone = createPhone(newValue);
    if (!phone.success) return phone;

    this.phoneList[idx] = phone.value;
    return ok(true);
  }

  findPhone(value: string): Phone | undefined {
    return this.phoneList.find((p) => p === value);
  }

  addBirthday(value: string): Result<void, InvalidDateFormatError> {
    const birthday = createBirthday(value);
    if (!birthday.success) return birthday;

    this.birthdayField = birthday.value;
    return ok(undefined);
  }

  birthdayText(): string | undefined {
    return this.birthdayField ? formatDate(this.birthdayField.date) : undefined;
  }

  toString(): string {
    const birthday = this.birthdayText();
    const birthdayStr = birthday ? `, Birthday: ${birthday}` : '';
    return `Contact name: ${this.name}, phones: ${this.phoneList.join('; ')}${birthdayStr}`;
  }

  toJSON(): ContactJson {
    return {
      name: this.name,
      phones: this.phones,
      birthday: this.birthdayText() ?? null,
    };
  }
}

export function createRecord(
  name: string,
  birthday?: string
): Result<ContactRecord, ValidationError> {
  const validName = createName(name);
  if (!validName.success) return validName;

  if (birthday === undefined) {
    return ok(new ContactRecord(validName.value));
  }

  const validBirthday = createBirthday(birthday);
  if (!validBirthday.success) return validBirthday;

  return ok(new ContactRecord(validName.value, validBirthday.value));
}
