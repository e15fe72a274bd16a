import { ValidationError } from '../errors.js';
import type {
  AccessionPatch,
  AccessionQuery,
  AccessionUpdate,
  MetadataLanguage,
  PageQuery,
  SubjectDeletion,
  SubjectInput,
  Visibility,
} from '../models.js';
import {
  PAGINATION_SENTINEL,
  type AccessionIdArgs,
  type CreateSubjectArgs,
  type DeleteSubjectArgs,
  type ListAccessionsArgs,
  type ListSubjectsArgs,
  type UpdateAccessionArgs,
} from './schemas.js';

const IdentifierPattern = /^\d+$/;
const IsoDatePattern = /^\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/;

export function normalizePageNumber(value: number, field: string): number | undefined {
  if (value === PAGINATION_SENTINEL) {
    return undefined;
  }

  if (!Number.isInteger(value) || value < 0) {
    throw new ValidationError(
      `${field} must be ${PAGINATION_SENTINEL} (unspecified) or a non-negative integer, got ${value}.`,
      field,
    );
  }

  return value;
}

export function normalizeText(value: string): string | undefined {
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function normalizeLanguage(value: '' | MetadataLanguage): MetadataLanguage | undefined {
  return value === '' ? undefined : value;
}

export function normalizeVisibility(value: '' | Visibility): Visibility | undefined {
  return value === '' ? undefined : value;
}

export function normalizeIdentifier(value: string | number, field = 'id'): string {
  const text = typeof value === 'number' ? String(value) : value.trim();
  if (text.length === 0) {
    throw new ValidationError(`${field} must not be empty.`, field);
  }
  if (!IdentifierPattern.test(text)) {
    throw new ValidationError(`${field} must be a non-negative integer ID, got "${text}".`, field);
  }
  return text;
}

function normalizeSubjectIds(values: number[], field: string): number[] | undefined {
  if (values.length === 0) {
    return undefined;
  }

  const invalid = values.find((value) => !Number.isInteger(value) || value < 0);
  if (invalid !== undefined) {
    throw new ValidationError(`${field} must contain non-negative integer IDs, got ${invalid}.`, field);
  }

  return [...values];
}

function normalizeDate(value: string, field: string): string | undefined {
  const text = normalizeText(value);
  if (text === undefined) {
    return undefined;
  }

  if (!IsoDatePattern.test(text) || Number.isNaN(Date.parse(text))) {
    throw new ValidationError(`${field} must be an ISO 8601 date such as 2023-04-15, got "${text}".`, field);
  }

  return text;
}

export function normalizePageQuery(args: ListSubjectsArgs): PageQuery {
  const query: PageQuery = {};
  const page = normalizePageNumber(args.page, 'page');
  const perPage = normalizePageNumber(args.per_page, 'per_page');
  if (page !== undefined) {
    query.page = page;
  }
  if (perPage !== undefined) {
    query.per_page = perPage;
  }
  return query;
}

export function normalizeListAccessionsArgs(args: ListAccessionsArgs): AccessionQuery {
  const query: AccessionQuery = normalizePageQuery(args);

  const lang = normalizeLanguage(args.lang);
  const subjects = normalizeSubjectIds(args.metadata_subjects, 'metadata_subjects');
  const queryTerm = normalizeText(args.query_term);
  const urlFilter = normalizeText(args.url_filter);
  const dateFrom = normalizeDate(args.date_from, 'date_from');
  const dateTo = normalizeDate(args.date_to, 'date_to');

  if (args.metadata_subjects_inclusive_filter && subjects === undefined) {
    throw new ValidationError(
      'metadata_subjects_inclusive_filter requires at least one ID in metadata_subjects.',
      'metadata_subjects_inclusive_filter',
    );
  }

  if (dateFrom !== undefined && dateTo !== undefined && Date.parse(dateFrom) > Date.parse(dateTo)) {
    throw new ValidationError(`date_from (${dateFrom}) must not be later than date_to (${dateTo}).`, 'date_from');
  }

  if (lang !== undefined) {
    query.lang = lang;
  }
  if (subjects !== undefined) {
    query.metadata_subjects = subjects;
  }
  if (args.metadata_subjects_inclusive_filter) {
    query.metadata_subjects_inclusive_filter = true;
  }
  if (queryTerm !== undefined) {
    query.query_term = queryTerm;
  }
  if (urlFilter !== undefined) {
    query.url_filter = urlFilter;
  }
  if (dateFrom !== undefined) {
    query.date_from = dateFrom;
  }
  if (dateTo !== undefined) {
    query.date_to = dateTo;
  }

  return query;
}

export function normalizeAccessionId(args: AccessionIdArgs): string {
  return normalizeIdentifier(args.id);
}

/** Builds a patch holding only the fields the caller set; an empty patch is rejected. */
export function normalizeUpdateAccessionArgs(args: UpdateAccessionArgs): AccessionUpdate {
  const id = normalizeIdentifier(args.id);
  const patch: AccessionPatch = {};

  const title = normalizeText(args.metadata_title);
  const description = normalizeText(args.metadata_description);
  const time = normalizeText(args.metadata_time);
  const language = normalizeLanguage(args.metadata_language);
  const subjects = normalizeSubjectIds(args.metadata_subjects, 'metadata_subjects');
  const visibility = normalizeVisibility(args.visibility);

  if (title !== undefined) {
    patch.metadata_title = title;
  }
  if (description !== undefined) {
    patch.metadata_description = description;
  }
  if (time !== undefined) {
    patch.metadata_time = time;
  }
  if (language !== undefined) {
    patch.metadata_language = language;
  }
  if (subjects !== undefined) {
    patch.metadata_subjects = subjects;
  }
  if (visibility !== undefined) {
    patch.is_private = visibility === 'private';
  }

  if (Object.keys(patch).length === 0) {
    throw new ValidationError('update_accession needs at least one field to change besides id.');
  }

  return { id, patch };
}

export function normalizeCreateSubjectArgs(args: CreateSubjectArgs): SubjectInput {
  const label = normalizeText(args.label);
  if (label === undefined) {
    throw new ValidationError('label must not be empty.', 'label');
  }

  const input: SubjectInput = {
    label,
    visibility: normalizeVisibility(args.visibility) ?? 'public',
  };
  const lang = normalizeLanguage(args.lang);
  if (lang !== undefined) {
    input.lang = lang;
  }
  return input;
}

export function normalizeDeleteSubjectArgs(args: DeleteSubjectArgs): SubjectDeletion {
  const deletion: SubjectDeletion = { id: normalizeIdentifier(args.id) };
  const lang = normalizeLanguage(args.lang);
  if (lang !== undefined) {
    deletion.lang = lang;
  }
  return deletion;
}
