import { z } from 'zod';
import { CatalogDepartment, PersonDepartment } from '../types';
import { GENDERS, MAX_SEMESTER, MIN_SEMESTER } from '../utils/constants';
import {
  catalogDepartmentCodes,
  isCatalogDepartment,
  isPersonDepartment,
  personDepartmentCodes,
} from '../utils/departments';

/** Empty strings from forms mean "no value". */
const blankToNull = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? null : value;

const upperCased = (value: unknown): unknown => (typeof value === 'string' ? value.trim().toUpperCase() : value);

export const objectId = z.string().regex(/^[0-9a-f]{24}$/i, 'Invalid id.');

export const personDepartment = z.preprocess(
  upperCased,
  z
    .string()
    .refine((code): code is PersonDepartment => isPersonDepartment(code), {
      message: `Invalid department. Valid choices: ${personDepartmentCodes().join(', ')}`,
    })
);

export const catalogDepartment = z.preprocess(
  upperCased,
  z
    .string()
    .refine((code): code is CatalogDepartment => isCatalogDepartment(code), {
      message: `Invalid department. Valid choices: ${catalogDepartmentCodes().join(', ')}`,
    })
);

export const semester = z.coerce
  .number({ invalid_type_error: 'Semester must be a number.' })
  .int('Semester must be a whole number.')
  .min(MIN_SEMESTER, `Semester must be between ${MIN_SEMESTER} and ${MAX_SEMESTER}.`)
  .max(MAX_SEMESTER, `Semester must be between ${MIN_SEMESTER} and ${MAX_SEMESTER}.`);

export const optionalText = (max?: number) =>
  z.preprocess(blankToNull, (max ? z.string().trim().max(max) : z.string().trim()).nullable().optional());

export const optionalDate = z.preprocess(blankToNull, z.coerce.date().nullable().optional());

export const optionalPersonDepartment = z.preprocess(blankToNull, personDepartment.nullable().optional());

export const optionalGender = z.preprocess(blankToNull, z.enum(GENDERS).nullable().optional());

export const optionalPhone = z.preprocess(
  blankToNull,
  z
    .string()
    .trim()
    .regex(/^\+?1?\d{9,15}$/, "Phone number must be entered in the format: '+999999999'. Up to 15 digits allowed.")
    .nullable()
    .optional()
);

export const httpUrl = z
  .string()
  .trim()
  .url('Enter a valid URL.')
  .refine((value) => /^https?:\/\//i.test(value), 'Only http and https URLs are allowed.');

export const booleanQuery = z.enum(['true', 'false']).transform((value) => value === 'true');
