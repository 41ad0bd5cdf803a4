import type { HandlerRegistration } from './types';
import { defineHandler } from './types';
import { DiffSchema, EntitiesSchema } from './schemas/diffSchemas';
import { handleDiff, handleEntities } from './handlers/diffHandlers';

/**
 * Registry of all CLI command handlers, keyed by command name.
 */
export const cliHandlers: Record<string, HandlerRegistration> = {
  'diff': defineHandler(DiffSchema, (input) => handleDiff(input)),
  'entities': defineHandler(EntitiesSchema, (input) => handleEntities(input)),
};
