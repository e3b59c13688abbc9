import { z } from 'zod';
import { email, name, password } from './auth.validator';
import {
  optionalDate,
  optionalGender,
  optionalPersonDepartment,
  optionalPhone,
  optionalText,
} from './common';

const profileCode = (label: string) =>
  z
    .string()
    .trim()
    .min(1, `${label} is required.`)
    .max(50)
    .regex(/^[A-Z0-9]+$/, `${label} must contain only uppercase letters and numbers.`);

const studentCode = profileCode('Student ID');
const staffCode = profileCode('Staff ID');

const personalFields = {
  department: optionalPersonDepartment,
  dateOfBirth: optionalDate,
  gender: optionalGender,
  phone: optionalPhone,
  address: optionalText(),
};

const staffFields = {
  designation: optionalText(100),
  qualification: optionalText(200),
  salary: z.preprocess(
    (value) => (value === '' ? null : value),
    z.coerce
      .number()
      .min(0, 'Salary cannot be negative.')
      .multipleOf(0.01, 'Salary has at most 2 decimal places.')
      .nullable()
      .optional()
  ),
};

// Enrollment and joining dates are not in the update shapes, so they are dropped.
// Updates may name the owning user's fields directly or through their user* aliases.
const accountAliases = {
  email: email.optional(),
  firstName: name.optional(),
  lastName: name.optional(),
  userEmail: email.optional(),
  userFirstName: name.optional(),
  userLastName: name.optional(),
};

interface AccountAliasFields {
  email?: string;
  firstName?: string;
  lastName?: string;
  userEmail?: string;
  userFirstName?: string;
  userLastName?: string;
}

function resolveAliases<T extends AccountAliasFields>(body: T) {
  const { userEmail, userFirstName, userLastName, ...rest } = body;
  const account: { email?: string; firstName?: string; lastName?: string } = {};
  const resolvedEmail = body.email ?? userEmail;
  const resolvedFirstName = body.firstName ?? userFirstName;
  const resolvedLastName = body.lastName ?? userLastName;
  if (resolvedEmail !== undefined) account.email = resolvedEmail;
  if (resolvedFirstName !== undefined) account.firstName = resolvedFirstName;
  if (resolvedLastName !== undefined) account.lastName = resolvedLastName;
  return { ...rest, ...account };
}

export const addStudentSchema = z.object({
  body: z.object({
    email,
    password,
    firstName: name,
    lastName: name,
    studentId: studentCode,
    ...personalFields,
  }),
});

export const updateStudentSchema = z.object({
  params: z.object({ studentId: z.string().min(1) }),
  body: z
    .object({
      studentId: studentCode.optional(),
      ...personalFields,
      ...accountAliases,
    })
    .transform(resolveAliases),
});

export const addStaffSchema = z.object({
  body: z.object({
    email,
    password,
    firstName: name,
    lastName: name,
    staffId: staffCode,
    ...personalFields,
    ...staffFields,
  }),
});

export const updateStaffSchema = z.object({
  params: z.object({ staffId: z.string().min(1) }),
  body: z
    .object({
      staffId: staffCode.optional(),
      ...personalFields,
      ...staffFields,
      ...accountAliases,
    })
    .transform(resolveAliases),
});

export type AddStudentBody = z.infer<typeof addStudentSchema>['body'];
export type UpdateStudentBody = z.infer<typeof updateStudentSchema>['body'];
export type AddStaffBody = z.infer<typeof addStaffSchema>['body'];
export type UpdateStaffBody = z.infer<typeof updateStaffSchema>['body'];
