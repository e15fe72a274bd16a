import * as z from 'zod/v4';

// Tool inputs have no optional fields. "Not specified" is spelled with a sentinel
// (-1, '' or []) and the normalizer turns it back into an absent value.

export const PAGINATION_SENTINEL = -1;

const PageNumberSchema = z
  .number()
  .int()
  .default(PAGINATION_SENTINEL)
  .describe('Page number (0 or greater). Use -1 to leave it unspecified.');

const PageSizeSchema = z
  .number()
  .int()
  .default(PAGINATION_SENTINEL)
  .describe('Items per page (0 or greater). Use -1 to leave it unspecified.');

const LanguageSchema = z
  .enum(['', 'english', 'arabic'])
  .default('')
  .describe('Metadata language: "english" or "arabic". Use "" to leave it unspecified.');

const VisibilitySchema = z
  .enum(['', 'public', 'private'])
  .default('')
  .describe('Visibility: "public" or "private". Use "" to leave it unspecified.');

const SubjectIdListSchema = z
  .array(z.number().int())
  .default([])
  .describe('Metadata subject IDs. Use [] to leave it unspecified.');

function sentinelText(description: string) {
  return z.string().max(2000).default('').describe(`${description} Use "" to leave it unspecified.`);
}

const IdentifierSchema = z
  .union([z.string().max(200), z.number().int()])
  .describe('Numeric identifier of the record, as returned by the list tools. Digit strings are accepted.');

export const ListAccessionsSchema = z
  .object({
    page: PageNumberSchema,
    per_page: PageSizeSchema,
    lang: LanguageSchema,
    metadata_subjects: SubjectIdListSchema,
    metadata_subjects_inclusive_filter: z
      .boolean()
      .default(false)
      .describe('When true, match accessions tagged with any of metadata_subjects instead of all of them.'),
    query_term: sentinelText('Free-text search term.'),
    url_filter: sentinelText('Only accessions whose seed URL contains this text.'),
    date_from: sentinelText('Earliest metadata date, ISO 8601 (YYYY-MM-DD).'),
    date_to: sentinelText('Latest metadata date, ISO 8601 (YYYY-MM-DD).'),
  })
  .strict();

export const AccessionIdSchema = z
  .object({
    id: IdentifierSchema,
  })
  .strict();

export const UpdateAccessionSchema = z
  .object({
    id: IdentifierSchema,
    metadata_title: sentinelText('New title.'),
    metadata_description: sentinelText('New description.'),
    metadata_time: sentinelText('Time period the accession covers, free text such as "1990s" or "2019-04-11".'),
    metadata_language: LanguageSchema,
    metadata_subjects: SubjectIdListSchema,
    visibility: VisibilitySchema,
  })
  .strict();

export const ListSubjectsSchema = z
  .object({
    page: PageNumberSchema,
    per_page: PageSizeSchema,
  })
  .strict();

export const CreateSubjectSchema = z
  .object({
    label: z.string().max(500).describe('Subject label, for example "Health".'),
    visibility: VisibilitySchema,
    lang: LanguageSchema,
  })
  .strict();

export const DeleteSubjectSchema = z
  .object({
    id: IdentifierSchema,
    lang: LanguageSchema,
  })
  .strict();

export type ListAccessionsArgs = z.infer<typeof ListAccessionsSchema>;
export type AccessionIdArgs = z.infer<typeof AccessionIdSchema>;
export type UpdateAccessionArgs = z.infer<typeof UpdateAccessionSchema>;
export type ListSubjectsArgs = z.infer<typeof ListSubjectsSchema>;
export type CreateSubjectArgs = z.infer<typeof CreateSubjectSchema>;
export type DeleteSubjectArgs = z.infer<typeof DeleteSubjectSchema>;
