import { z } from 'zod';
import { NOTICE_AUDIENCES, NOTICE_CATEGORIES, NOTICE_PRIORITIES } from '../utils/constants';
import { objectId, optionalDate, optionalText } from './common';

const blankToNull = (value: unknown): unknown => (value === '' ? null : value);

const noticeFields = {
  category: z.enum(NOTICE_CATEGORIES),
  audience: z.preprocess(blankToNull, z.enum(NOTICE_AUDIENCES).nullable().optional()),
  title: optionalText(200),
  content: optionalText(),
  date: optionalDate,
  datetime: optionalDate,
  priority: z.enum(NOTICE_PRIORITIES).optional(),
  expiryDate: optionalDate,
};

export const noticeIdSchema = z.object({
  params: z.object({ id: objectId }),
});

export const createNoticeSchema = z.object({
  body: z.object(noticeFields),
});

export const updateNoticeSchema = z.object({
  params: z.object({ id: objectId }),
  body: z.object(noticeFields).partial(),
});

export type CreateNoticeBody = z.infer<typeof createNoticeSchema>['body'];
export type UpdateNoticeBody = z.infer<typeof updateNoticeSchema>['body'];
