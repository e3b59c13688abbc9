import { z } from 'zod';
import { booleanQuery, objectId, optionalText, personDepartment } from './common';

export const hodIdSchema = z.object({
  params: z.object({ id: objectId }),
});

export const departmentParamSchema = z.object({
  params: z.object({ department: personDepartment }),
});

export const hodListQuery = z.object({
  department: personDepartment.optional(),
  isActive: booleanQuery.optional(),
});

export const hodListSchema = z.object({
  query: hodListQuery,
});

export const appointHodSchema = z.object({
  body: z.object({
    staff: objectId,
    department: personDepartment,
    startDate: z.coerce.date().optional(),
    notes: optionalText(),
    supersede: z.boolean().optional(),
  }),
});

export const updateHodSchema = z.object({
  params: z.object({ id: objectId }),
  body: z.object({
    department: personDepartment.optional(),
    startDate: z.coerce.date().optional(),
    notes: optionalText(),
    isActive: z.boolean().optional(),
  }),
});

export type AppointHodBody = z.infer<typeof appointHodSchema>['body'];
export type UpdateHodBody = z.infer<typeof updateHodSchema>['body'];
