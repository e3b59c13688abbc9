import { MS_PER_DAY } from './constants';

export const fullName = (person: { firstName: string; lastName: string }): string =>
  `${person.firstName} ${person.lastName}`.trim();

/** Whole days from `start` to `end`, rounded down. */
export const daysBetween = (start: Date, end: Date): number =>
  Math.floor((end.getTime() - start.getTime()) / MS_PER_DAY);

export const minutesBefore = (date: Date, minutes: number): Date => new Date(date.getTime() - minutes * 60 * 1000);

export const isEntirelyNumeric = (value: string): boolean => /^\d+$/.test(value);
