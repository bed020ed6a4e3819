import fs from 'node:fs/promises';
import Ajv from 'ajv/dist/2020';
import type { ErrorObject } from 'ajv';

import type { OntoUmlModel } from './ontoumlModel';
import modelSchema from './schema/ontouml-model-v1.json';

const ajv = new Ajv({ allErrors: true, strict: false });
const validateDocument = ajv.compile(modelSchema);

function isModelDocument(value: unknown): value is OntoUmlModel {
  return validateDocument(value);
}

function formatSchemaErrors(errors: ErrorObject[] | null | undefined): string {
  return (errors ?? [])
    .filter((e) => e.keyword !== 'if')
    .map((e) => `  ${e.instancePath || '/'} ${e.message ?? e.keyword}`)
    .join('\n');
}

/**
 * Check an already-parsed JSON value against the model schema.
 * `origin` names the document in error messages (usually its path).
 */
export function parseModelDocument(value: unknown, origin = '<memory>'): OntoUmlModel {
  if (!isModelDocument(value)) {
    throw new Error(`Invalid OntoUML model document: ${origin}\n${formatSchemaErrors(validateDocument.errors)}`);
  }
  return value;
}

export function parseModelJson(json: string, origin = '<memory>'): OntoUmlModel {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new Error(`Failed to parse model JSON: ${origin}\n${msg}`);
  }
  return parseModelDocument(parsed, origin);
}

/**
 * Read and schema-check a model document from disk.
 */
export async function loadModelFile(filePath: string): Promise<OntoUmlModel> {
  let json: string;
  try {
    json = await fs.readFile(filePath, 'utf8');
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new Error(`Failed to read model: ${filePath}\n${msg}`);
  }
  return parseModelJson(json, filePath);
}
