import { z } from 'zod';

/**
 * Phone number validation.
 * Numbers are stored exactly as entered: ten ASCII digits, no separators,
 * no country code.
 */

export const PHONE_DIGITS = 10;

export const PhoneSchema = z
  .string()
  .min(1, 'Phone number is empty')
  .regex(/^[0-9]*$/, 'Phone number may only contain digits')
  .length(PHONE_DIGITS, `Phone number should be exactly ${PHONE_DIGITS} digits`)
  .brand<'Phone'>();

export type Phone = z.infer<typeof PhoneSchema>;

export interface PhoneValidationResult {
  valid: boolean;
  phone?: Phone;
  error?: string;
}

export function validatePhone(input: string): boolean {
  return PhoneSchema.safeParse(input).success;
}

export function checkPhone(input: string): PhoneValidationResult {
  const parsed = PhoneSchema.safeParse(input);
  if (parsed.success) {
    return { valid: true, phone: parsed.data };
  }
  // issues come out in check order; the first one is the most specific
  return { valid: false, error: parsed.error.issues[0]?.message };
}
