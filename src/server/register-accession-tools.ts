import { ArchiveApiClient } from '../archive-api.js';
import type { AccessionScope } from '../models.js';
import { AccessionIdSchema, ListAccessionsSchema, UpdateAccessionSchema } from './schemas.js';
import { AccessionDetailDataSchema, AccessionPageDataSchema } from './output-schemas.js';
import { MutationAnnotations, ReadOnlyAnnotations, ToolRegistry } from './tool-runtime.js';
import { normalizeAccessionId, normalizeListAccessionsArgs, normalizeUpdateAccessionArgs } from './normalize.js';
import {
  LIST_ACCESSIONS_DESCRIPTION,
  LIST_PRIVATE_ACCESSIONS_DESCRIPTION,
  UPDATE_ACCESSION_DESCRIPTION,
} from './tool-descriptions.js';

export function registerAccessionTools(registry: ToolRegistry, api: ArchiveApiClient): void {
  const defineListTool = (name: string, scope: AccessionScope, title: string, description: string): void => {
    registry.define(
      name,
      {
        title,
        description,
        inputSchema: ListAccessionsSchema,
        outputDataSchema: AccessionPageDataSchema,
        annotations: ReadOnlyAnnotations,
      },
      async (args) => api.listAccessions(normalizeListAccessionsArgs(args), scope),
    );
  };

  const defineGetTool = (name: string, scope: AccessionScope, title: string, description: string): void => {
    registry.define(
      name,
      {
        title,
        description,
        inputSchema: AccessionIdSchema,
        outputDataSchema: AccessionDetailDataSchema,
        annotations: ReadOnlyAnnotations,
      },
      async (args) => api.getAccession(normalizeAccessionId(args), scope),
    );
  };

  defineListTool('list_accessions', 'public', 'List Accessions', LIST_ACCESSIONS_DESCRIPTION);
  defineListTool('list_private_accessions', 'private', 'List Private Accessions', LIST_PRIVATE_ACCESSIONS_DESCRIPTION);

  defineGetTool(
    'get_accession',
    'public',
    'Get Accession',
    'Returns one public accession with its metadata and the WACZ download URL.',
  );
  defineGetTool(
    'get_private_accession',
    'private',
    'Get Private Accession',
    'Returns one private accession with its metadata and the WACZ download URL.',
  );

  registry.define(
    'update_accession',
    {
      title: 'Update Accession',
      description: UPDATE_ACCESSION_DESCRIPTION,
      inputSchema: UpdateAccessionSchema,
      outputDataSchema: AccessionDetailDataSchema,
      annotations: MutationAnnotations,
    },
    async (args) => {
      const { id, patch } = normalizeUpdateAccessionArgs(args);
      return api.updateAccession(id, patch);
    },
  );
}
