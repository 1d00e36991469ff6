/**
 * Schema loading utility
 */

import { readFileSync } from 'fs';
import { join } from 'path';
import type { SchemaObject } from 'ajv/dist/2020';

const schemaCache = new Map<string, SchemaObject>();

export function schemasDir(projectRoot: string = process.cwd()): string {
  return join(projectRoot, 'schemas');
}

export function loadSchema(schemaName: string, dir: string = schemasDir()): SchemaObject {
  const schemaPath = join(dir, `${schemaName}.schema.json`);
  const cached = schemaCache.get(schemaPath);
  if (cached) {
    return cached;
  }

  const schema: SchemaObject = JSON.parse(readFileSync(schemaPath, 'utf-8'));
  schemaCache.set(schemaPath, schema);
  return schema;
}
