import { z } from 'zod';
import { parseBirthday } from './birthday';
import {
  InvalidDateFormatError,
  InvalidNameError,
  InvalidPhoneFormatError,
} from './errors';
import { Phone, checkPhone } from './phone';
import { Birthday, Result, fail, ok } from './types';

export const NameSchema = z.string().min(1).brand<'Name'>();
export type Name = z.infer<typeof NameSchema>;
export type { Phone };

// The only way to obtain a Name, Phone or Birthday; invalid input never
// produces a value.

export function createName(value: string): Result<Name, InvalidNameError> {
  const parsed = NameSchema.safeParse(value);
  if (!parsed.success) {
    return fail(new InvalidNameError());
  }
  return ok(parsed.data);
}

export function createPhone(value: string): Result<Phone, InvalidPhoneFormatError> {
  const check = checkPhone(value);
  if (!check.valid || !check.phone) {
    return fail(new InvalidPhoneFormatError(value, check.error));
  }
  return ok(check.phone);
}

export function createBirthday(value: string): Result<Birthday, InvalidDateFormatError> {
  const parsed = parseBirthday(value);
  if (!parsed.success) {
    return parsed;
  }
  const birthday: Birthday = { __field: 'Birthday', date: parsed.value };
  return ok(birthday);
}
