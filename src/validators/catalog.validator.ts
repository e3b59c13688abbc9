import { z } from 'zod';
import { catalogDepartment, httpUrl, objectId, semester } from './common';

const subjectName = z.string().trim().min(1, 'This field may not be blank.').max(150);

export const idSchema = z.object({
  params: z.object({ id: objectId }),
});

export const catalogListQuery = z.object({
  department: catalogDepartment.optional(),
  semester: semester.optional(),
});

export const catalogListSchema = z.object({
  query: catalogListQuery,
});

export const departmentSubjectsQuery = z.object({
  semester: semester.optional(),
});

export const departmentSubjectsSchema = z.object({
  params: z.object({ department: catalogDepartment }),
  query: departmentSubjectsQuery,
});

export const createSubjectSchema = z.object({
  body: z.object({
    name: subjectName,
    department: catalogDepartment,
    semester,
    pdfUrl: httpUrl.optional(),
  }),
});

export const updateSubjectSchema = z.object({
  params: z.object({ id: objectId }),
  body: z.object({
    name: subjectName.optional(),
    department: catalogDepartment.optional(),
    semester: semester.optional(),
    pdfUrl: httpUrl.optional(),
  }),
});

export const upsertSyllabusSchema = z.object({
  body: z.object({
    subject: objectId,
    pdfUrl: httpUrl,
  }),
});

export const updateSyllabusSchema = z.object({
  params: z.object({ id: objectId }),
  body: z.object({
    pdfUrl: httpUrl,
  }),
});

export type CreateSubjectBody = z.infer<typeof createSubjectSchema>['body'];
export type UpdateSubjectBody = z.infer<typeof updateSubjectSchema>['body'];
export type UpsertSyllabusBody = z.infer<typeof upsertSyllabusSchema>['body'];
