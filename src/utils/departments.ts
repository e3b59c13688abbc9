import { CatalogDepartment, PersonDepartment } from '../types';
import { CATALOG_DEPARTMENTS, PERSON_DEPARTMENTS } from './constants';

const hasKey = (table: object, key: string): boolean => Object.prototype.hasOwnProperty.call(table, key);

export const isPersonDepartment = (code: string): code is PersonDepartment => hasKey(PERSON_DEPARTMENTS, code);

export const isCatalogDepartment = (code: string): code is CatalogDepartment => hasKey(CATALOG_DEPARTMENTS, code);

export const personDepartmentCodes = (): string[] => Object.keys(PERSON_DEPARTMENTS);

export const catalogDepartmentCodes = (): string[] => Object.keys(CATALOG_DEPARTMENTS);

export const personDepartmentName = (code: PersonDepartment): string => PERSON_DEPARTMENTS[code];

export const catalogDepartmentName = (code: CatalogDepartment): string => CATALOG_DEPARTMENTS[code];
