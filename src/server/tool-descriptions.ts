export const TOOL_NAMES = [
  'list_accessions',
  'list_private_accessions',
  'get_accession',
  'get_private_accession',
  'update_accession',
  'list_subjects',
  'create_subject',
  'delete_subject',
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

const SENTINEL_NOTE =
  'Every argument is required; pass -1 (numbers), "" (text) or [] (lists) to leave a filter unspecified. ' +
  'Unspecified filters are left out of the request.';

export const LIST_ACCESSIONS_DESCRIPTION =
  'Lists public accessions (archived web captures) with their Dublin Core metadata.\n\n' +
  `${SENTINEL_NOTE}\n\n` +
  'Filters:\n' +
  '- page, per_page: pagination\n' +
  '- lang: metadata language ("english" or "arabic")\n' +
  '- metadata_subjects: subject IDs from list_subjects; metadata_subjects_inclusive_filter=true matches any instead of all\n' +
  '- query_term: free-text search\n' +
  '- url_filter: seed URL substring\n' +
  '- date_from, date_to: metadata date range (YYYY-MM-DD)';

export const LIST_PRIVATE_ACCESSIONS_DESCRIPTION =
  'Lists private accessions only. Same filters as list_accessions; visibility is filtered by the archive, ' +
  'so page counts stay exact.\n\n' +
  SENTINEL_NOTE;

export const UPDATE_ACCESSION_DESCRIPTION =
  'Updates the metadata of an existing accession. Only the fields you set are sent; ' +
  'use "" or [] for fields that should stay as they are. visibility="private" hides the accession ' +
  'from public listings, "public" publishes it. At least one field besides id must be set.';

export const CREATE_SUBJECT_DESCRIPTION =
  'Creates a metadata subject (classification tag) that accessions can reference. ' +
  'label must not be empty. visibility defaults to "public" when "". lang is optional ("" to omit).';

export const DELETE_SUBJECT_DESCRIPTION =
  'Deletes a metadata subject by ID. Deleting an unknown ID fails with HTTP 404; it is never reported as success.';
