import type { ValueError } from '@sinclair/typebox/errors';

export type LoadError =
  | { type: 'NotFound'; message: string; path: string }
  | { type: 'ReadError'; message: string; path: string }
  | { type: 'ParseError'; message: string; path: string }
  | { type: 'SchemaValidationError'; message: string; path: string; details: string[] };

export const formatSchemaErrors = (errors: Iterable<ValueError>, pathPrefix = ''): string[] =>
  Array.from(errors).map((error) => `${pathPrefix}${error.path}: ${error.message}`);

/**
 * Render a load error as human-readable lines, schema details indented below the message.
 */
export const formatLoadError = (error: LoadError): string[] => {
  if (error.type === 'SchemaValidationError') {
    return [error.message, ...error.details.map((detail) => `  - ${detail}`)];
  }

  return [error.message];
};
