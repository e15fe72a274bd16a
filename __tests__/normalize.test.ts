import { describe, expect, it } from 'vitest';
import { ValidationError } from '../src/errors.js';
import {
  normalizeCreateSubjectArgs,
  normalizeDeleteSubjectArgs,
  normalizeIdentifier,
  normalizeListAccessionsArgs,
  normalizePageNumber,
  normalizePageQuery,
  normalizeUpdateAccessionArgs,
} from '../src/server/normalize.js';
import {
  CreateSubjectSchema,
  DeleteSubjectSchema,
  ListAccessionsSchema,
  ListSubjectsSchema,
  UpdateAccessionSchema,
} from '../src/server/schemas.js';

function captureValidationError(run: () => unknown): ValidationError {
  try {
    run();
  } catch (error) {
    if (error instanceof ValidationError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a ValidationError');
}

describe('pagination sentinels', () => {
  it('maps the sentinel to an absent value and keeps non-negative values', () => {
    expect(normalizePageNumber(-1, 'page')).toBeUndefined();
    expect(normalizePageNumber(0, 'page')).toBe(0);
    expect(normalizePageNumber(25, 'per_page')).toBe(25);
  });

  it('rejects negative values other than the sentinel', () => {
    for (const value of [-2, -5, -100]) {
      const error = captureValidationError(() => normalizePageNumber(value, 'page'));
      expect(error.field).toBe('page');
      expect(error.message).toBe(`page must be -1 (unspecified) or a non-negative integer, got ${value}.`);
    }
  });

  it('omits both pagination fields when both are the sentinel', () => {
    expect(normalizePageQuery(ListSubjectsSchema.parse({ page: -1, per_page: -1 }))).toEqual({});
    expect(normalizePageQuery(ListSubjectsSchema.parse({}))).toEqual({});
  });

  it('keeps only the pagination fields that were specified', () => {
    expect(normalizePageQuery(ListSubjectsSchema.parse({ page: 3, per_page: -1 }))).toEqual({ page: 3 });
  });
});

describe('normalizeListAccessionsArgs', () => {
  it('drops every unspecified filter', () => {
    const query = normalizeListAccessionsArgs(ListAccessionsSchema.parse({}));
    expect(query).toEqual({});
    expect(Object.keys(query)).toHaveLength(0);
  });

  it('keeps specified filters and trims text', () => {
    const query = normalizeListAccessionsArgs(
      ListAccessionsSchema.parse({
        page: 1,
        per_page: 50,
        lang: 'arabic',
        metadata_subjects: [3, 5],
        metadata_subjects_inclusive_filter: true,
        query_term: '  elections ',
        url_filter: 'example.org',
        date_from: '2023-01-01',
        date_to: '2023-12-31',
      }),
    );

    expect(query).toEqual({
      page: 1,
      per_page: 50,
      lang: 'arabic',
      metadata_subjects: [3, 5],
      metadata_subjects_inclusive_filter: true,
      query_term: 'elections',
      url_filter: 'example.org',
      date_from: '2023-01-01',
      date_to: '2023-12-31',
    });
  });

  it('treats whitespace-only text as unspecified', () => {
    expect(normalizeListAccessionsArgs(ListAccessionsSchema.parse({ query_term: '   ' }))).toEqual({});
  });

  it('rejects a date range that runs backwards', () => {
    const error = captureValidationError(() =>
      normalizeListAccessionsArgs(ListAccessionsSchema.parse({ date_from: '2024-05-01', date_to: '2024-01-01' })),
    );
    expect(error.message).toBe('date_from (2024-05-01) must not be later than date_to (2024-01-01).');
    expect(error.field).toBe('date_from');
  });

  it('rejects dates that are not ISO 8601', () => {
    const error = captureValidationError(() =>
      normalizeListAccessionsArgs(ListAccessionsSchema.parse({ date_to: '15/04/2023' })),
    );
    expect(error.message).toBe('date_to must be an ISO 8601 date such as 2023-04-15, got "15/04/2023".');
  });

  it('rejects the inclusive subject filter without subjects', () => {
    const error = captureValidationError(() =>
      normalizeListAccessionsArgs(ListAccessionsSchema.parse({ metadata_subjects_inclusive_filter: true })),
    );
    expect(error.field).toBe('metadata_subjects_inclusive_filter');
  });

  it('rejects negative subject ids', () => {
    const error = captureValidationError(() =>
      normalizeListAccessionsArgs(ListAccessionsSchema.parse({ metadata_subjects: [4, -2] })),
    );
    expect(error.message).toBe('metadata_subjects must contain non-negative integer IDs, got -2.');
  });
});

describe('normalizeIdentifier', () => {
  it('accepts digit strings and integers', () => {
    expect(normalizeIdentifier(' 12 ')).toBe('12');
    expect(normalizeIdentifier(42)).toBe('42');
  });

  it('rejects empty identifiers', () => {
    expect(() => normalizeIdentifier('')).toThrow(ValidationError);
    expect(() => normalizeIdentifier('   ')).toThrow('id must not be empty.');
  });

  it.each(['..', '.', 'private', 'a1', '3/4'])('rejects the non-numeric identifier %s', (value) => {
    const error = captureValidationError(() => normalizeIdentifier(value));
    expect(error.message).toBe(`id must be a non-negative integer ID, got "${value}".`);
    expect(error.field).toBe('id');
  });

  it('rejects negative integers', () => {
    expect(() => normalizeIdentifier(-3)).toThrow('id must be a non-negative integer ID, got "-3".');
  });
});

describe('normalizeUpdateAccessionArgs', () => {
  it('builds a patch with only the fields that were set', () => {
    const update = normalizeUpdateAccessionArgs(
      UpdateAccessionSchema.parse({
        id: 12,
        metadata_title: ' New title ',
        metadata_subjects: [3],
        visibility: 'private',
      }),
    );

    expect(update).toEqual({
      id: '12',
      patch: {
        metadata_title: 'New title',
        metadata_subjects: [3],
        is_private: true,
      },
    });
  });

  it('maps public visibility to is_private=false', () => {
    const update = normalizeUpdateAccessionArgs(UpdateAccessionSchema.parse({ id: '5', visibility: 'public' }));
    expect(update.patch).toEqual({ is_private: false });
  });

  it('keeps metadata_time as free text', () => {
    const update = normalizeUpdateAccessionArgs(UpdateAccessionSchema.parse({ id: 5, metadata_time: ' 1990s ' }));
    expect(update.patch).toEqual({ metadata_time: '1990s' });
  });

  it('rejects an update with nothing to change', () => {
    const error = captureValidationError(() => normalizeUpdateAccessionArgs(UpdateAccessionSchema.parse({ id: 12 })));
    expect(error.message).toBe('update_accession needs at least one field to change besides id.');
  });
});

describe('subject normalizers', () => {
  it('defaults visibility to public and omits an unspecified language', () => {
    expect(normalizeCreateSubjectArgs(CreateSubjectSchema.parse({ label: 'Health' }))).toEqual({
      label: 'Health',
      visibility: 'public',
    });
  });

  it('keeps an explicit language', () => {
    expect(
      normalizeCreateSubjectArgs(CreateSubjectSchema.parse({ label: 'صحة', visibility: 'private', lang: 'arabic' })),
    ).toEqual({ label: 'صحة', visibility: 'private', lang: 'arabic' });
  });

  it('rejects an empty label', () => {
    const error = captureValidationError(() => normalizeCreateSubjectArgs(CreateSubjectSchema.parse({ label: '  ' })));
    expect(error.field).toBe('label');
  });

  it('normalizes delete arguments', () => {
    expect(normalizeDeleteSubjectArgs(DeleteSubjectSchema.parse({ id: 9 }))).toEqual({ id: '9' });
    expect(normalizeDeleteSubjectArgs(DeleteSubjectSchema.parse({ id: '9', lang: 'english' }))).toEqual({
      id: '9',
      lang: 'english',
    });
  });
});
