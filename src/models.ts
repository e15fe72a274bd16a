import * as z from 'zod/v4';

export const IdentifierValueSchema = z.union([z.number().int(), z.string()]);

export const CrawlStatusSchema = z.enum(['BadCrawl', 'Complete', 'Error', 'Pending']);

const OptionalText = z.string().nullable().optional();
const OptionalTextList = z.array(z.string()).nullable().optional();
const OptionalIdList = z.array(z.number().int()).nullable().optional();

export const AccessionSchema = z
  .object({
    id: IdentifierValueSchema,
    is_private: z.boolean().optional(),
    crawl_status: CrawlStatusSchema.optional(),
    crawl_timestamp: z.string().optional(),
    seed_url: z.string().optional(),
    dublin_metadata_date: z.string().optional(),
    dublin_metadata_format: z.string().optional(),
    has_english_metadata: z.boolean().optional(),
    has_arabic_metadata: z.boolean().optional(),
    title_en: OptionalText,
    title_ar: OptionalText,
    description_en: OptionalText,
    description_ar: OptionalText,
    subjects_en: OptionalTextList,
    subjects_ar: OptionalTextList,
    subjects_en_ids: OptionalIdList,
    subjects_ar_ids: OptionalIdList,
  })
  .passthrough();

export const AccessionDetailSchema = z
  .object({
    accession: AccessionSchema,
    wacz_url: z.string(),
  })
  .passthrough();

export const SubjectSchema = z
  .object({
    id: IdentifierValueSchema,
    subject: z.string().optional(),
    label: z.string().optional(),
    visibility: z.enum(['public', 'private']).optional(),
    lang: z.string().optional(),
  })
  .passthrough();

function pageOf<TItemSchema extends z.ZodTypeAny>(itemSchema: TItemSchema) {
  return z
    .object({
      items: z.array(itemSchema),
      num_pages: z.number().int(),
      page: z.number().int(),
      per_page: z.number().int(),
    })
    .passthrough();
}

export const AccessionPageSchema = pageOf(AccessionSchema);
export const SubjectPageSchema = pageOf(SubjectSchema);

export type Accession = z.infer<typeof AccessionSchema>;
export type AccessionDetail = z.infer<typeof AccessionDetailSchema>;
export type AccessionPage = z.infer<typeof AccessionPageSchema>;
export type Subject = z.infer<typeof SubjectSchema>;
export type SubjectPage = z.infer<typeof SubjectPageSchema>;

export type MetadataLanguage = 'english' | 'arabic';
export type Visibility = 'public' | 'private';

/** Which accession endpoints a call goes through; private ones live under `/accessions/private`. */
export type AccessionScope = Visibility;

// Normalized request values. A field that is absent was not specified by the caller
// and is left out of the outbound request entirely.

export interface PageQuery {
  page?: number;
  per_page?: number;
}

export interface AccessionQuery extends PageQuery {
  lang?: MetadataLanguage;
  metadata_subjects?: number[];
  metadata_subjects_inclusive_filter?: true;
  query_term?: string;
  url_filter?: string;
  date_from?: string;
  date_to?: string;
}

export interface AccessionPatch {
  metadata_title?: string;
  metadata_description?: string;
  metadata_time?: string;
  metadata_language?: MetadataLanguage;
  metadata_subjects?: number[];
  is_private?: boolean;
}

export interface AccessionUpdate {
  id: string;
  patch: AccessionPatch;
}

export interface SubjectInput {
  label: string;
  visibility: Visibility;
  lang?: MetadataLanguage;
}

export interface SubjectDeletion {
  id: string;
  lang?: MetadataLanguage;
}

export interface DeletedSubject {
  id: string;
  deleted: true;
}
