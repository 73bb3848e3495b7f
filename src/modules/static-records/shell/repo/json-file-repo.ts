import fs from 'node:fs';
import path from 'node:path';

import type { Static, TSchema } from '@sinclair/typebox';
import { TypeCompiler } from '@sinclair/typebox/compiler';
import { err, ok, type Result } from 'neverthrow';

import { formatSchemaErrors, type LoadError } from '../../core/errors.js';

import type { RecordRepo } from '../../core/ports.js';
import type { Logger } from 'pino';

export interface JsonRecordRepoOptions<S extends TSchema> {
  /** Shape of a single record. */
  schema: S;
  /** File name of the resource, relative to `rootDir`. */
  resourceName: string;
  rootDir: string;
  logger?: Logger;
}

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

const isMissingFileError = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

const readResource = (filePath: string): Result<string, LoadError> => {
  try {
    return ok(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    if (isMissingFileError(error)) {
      return err({
        type: 'NotFound',
        message: `Resource file not found at ${filePath}`,
        path: filePath,
      });
    }

    return err({
      type: 'ReadError',
      message: `Failed to read resource file at ${filePath}: ${errorMessage(error)}`,
      path: filePath,
    });
  }
};

const parseJson = (filePath: string, contents: string): Result<unknown, LoadError> => {
  try {
    const parsed: unknown = JSON.parse(contents);
    return ok(parsed);
  } catch (error) {
    return err({
      type: 'ParseError',
      message: `Failed to parse JSON at ${filePath}: ${errorMessage(error)}`,
      path: filePath,
    });
  }
};

const deepFreeze = <T>(value: T): Readonly<T> => {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return Object.freeze(value);
};

/**
 * Load a JSON array of records once, synchronously, and serve it read-only.
 *
 * Every element must match `schema`; keys the schema does not name are kept but
 * not checked. Schema errors from all elements are reported together.
 */
export const createJsonRecordRepo = <S extends TSchema>(
  options: JsonRecordRepoOptions<S>
): Result<RecordRepo<Static<S>>, LoadError> => {
  const resourcePath = path.resolve(options.rootDir, options.resourceName);
  const validator = TypeCompiler.Compile(options.schema);

  const contents = readResource(resourcePath);
  if (contents.isErr()) {
    return err(contents.error);
  }

  const parsed = parseJson(resourcePath, contents.value);
  if (parsed.isErr()) {
    return err(parsed.error);
  }

  const candidate = parsed.value;
  if (!Array.isArray(candidate)) {
    return err({
      type: 'SchemaValidationError',
      message: `Schema validation failed for ${resourcePath}`,
      path: resourcePath,
      details: ['/: Expected an array of records'],
    });
  }

  const records: Readonly<Static<S>>[] = [];
  const details: string[] = [];

  candidate.forEach((item: unknown, index) => {
    if (validator.Check(item)) {
      records.push(deepFreeze(item));
    } else {
      details.push(...formatSchemaErrors(validator.Errors(item), `/${String(index)}`));
    }
  });

  if (details.length > 0) {
    return err({
      type: 'SchemaValidationError',
      message: `Schema validation failed for ${resourcePath}`,
      path: resourcePath,
      details,
    });
  }

  options.logger?.debug({ resourcePath, recordCount: records.length }, 'Loaded static records');

  return ok({
    resourcePath,
    getAll: () => [...records],
    count: () => records.length,
  });
};
