import * as z from 'zod/v4';
import {
  AccessionDetailSchema,
  AccessionPageSchema,
  SubjectPageSchema,
  SubjectSchema,
} from '../models.js';

export const AccessionPageDataSchema = AccessionPageSchema;
export const AccessionDetailDataSchema = AccessionDetailSchema;
export const SubjectPageDataSchema = SubjectPageSchema;
export const CreatedSubjectDataSchema = SubjectSchema;

export const DeletedSubjectDataSchema = z
  .object({
    id: z.string(),
    deleted: z.literal(true),
  })
  .strict();
