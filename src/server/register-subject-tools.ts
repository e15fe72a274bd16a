import { ArchiveApiClient } from '../archive-api.js';
import { CreateSubjectSchema, DeleteSubjectSchema, ListSubjectsSchema } from './schemas.js';
import { CreatedSubjectDataSchema, DeletedSubjectDataSchema, SubjectPageDataSchema } from './output-schemas.js';
import { DestructiveAnnotations, MutationAnnotations, ReadOnlyAnnotations, ToolRegistry } from './tool-runtime.js';
import { normalizeCreateSubjectArgs, normalizeDeleteSubjectArgs, normalizePageQuery } from './normalize.js';
import { CREATE_SUBJECT_DESCRIPTION, DELETE_SUBJECT_DESCRIPTION } from './tool-descriptions.js';

export function registerSubjectTools(registry: ToolRegistry, api: ArchiveApiClient): void {
  registry.define(
    'list_subjects',
    {
      title: 'List Subjects',
      description:
        'Lists metadata subjects (classification tags) with their IDs. Pass -1 for page or per_page to leave them unspecified.',
      inputSchema: ListSubjectsSchema,
      outputDataSchema: SubjectPageDataSchema,
      annotations: ReadOnlyAnnotations,
    },
    async (args) => api.listSubjects(normalizePageQuery(args)),
  );

  registry.define(
    'create_subject',
    {
      title: 'Create Subject',
      description: CREATE_SUBJECT_DESCRIPTION,
      inputSchema: CreateSubjectSchema,
      outputDataSchema: CreatedSubjectDataSchema,
      annotations: MutationAnnotations,
    },
    async (args) => api.createSubject(normalizeCreateSubjectArgs(args)),
  );

  registry.define(
    'delete_subject',
    {
      title: 'Delete Subject',
      description: DELETE_SUBJECT_DESCRIPTION,
      inputSchema: DeleteSubjectSchema,
      outputDataSchema: DeletedSubjectDataSchema,
      annotations: DestructiveAnnotations,
    },
    async (args) => {
      const { id, lang } = normalizeDeleteSubjectArgs(args);
      return api.deleteSubject(id, lang);
    },
  );
}
