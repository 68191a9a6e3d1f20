export interface Birthday {
  readonly __field: 'Birthday';
  readonly date: Date; // local midnight
}

export type Result<T, E> =
  | { success: true; value: T }
  | { success: false; error: E };

export function ok<T>(value: T): { success: true; value: T } {
  return { success: true, value };
}

export function fail<E>(error: E): { success: false; error: E } {
  return { success: false, error };
}

export interface UpcomingBirthday {
  name: string;
  date: string; // DD.MM.YYYY
}

export interface ContactJson {
  name: string;
  phones: string[];
  birthday: string | null; // DD.MM.YYYY
}

export interface AppConfig {
  port: number;
  horizonDays: number;
  reminderCron: string;
  reminderEnabled: boolean;
}
