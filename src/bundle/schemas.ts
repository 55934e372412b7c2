/**
 * JSON schema validation of section payloads.
 *
 * Schemas live in `data/schemas/<section>.schema.json`.
 *
 * @packageDocumentation
 */

import Ajv from 'ajv';
import type { ErrorObject } from 'ajv';
import type { SchemaIssue } from '../errors.js';
import { readDataFile } from '../utils/data-files.js';
import type { SectionName, SectionPayloads } from './types.js';
import { SECTION_ORDER } from './types.js';

interface CompiledSchema {
  (data: unknown): boolean;
  errors?: ErrorObject[] | null;
}

const ajv = new (Ajv as unknown as new (opts: { allErrors: boolean }) => {
  compile: (schema: Record<string, unknown>) => CompiledSchema;
})({
  allErrors: true,
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function loadSchema(section: SectionName): CompiledSchema {
  const schema = readDataFile(`schemas/${section}.schema.json`);
  if (!isRecord(schema)) {
    throw new Error(`data/schemas/${section}.schema.json must hold a JSON object`);
  }
  return ajv.compile(schema);
}

const VALIDATORS: ReadonlyMap<SectionName, CompiledSchema> = new Map(
  SECTION_ORDER.map((section) => [section, loadSchema(section)])
);

/**
 * Result of checking a payload against its section schema.
 */
export type SchemaCheck<K extends SectionName> =
  | { readonly valid: true; readonly payload: SectionPayloads[K] }
  | { readonly valid: false; readonly issues: readonly SchemaIssue[] };

function conforms<K extends SectionName>(
  validate: CompiledSchema,
  payload: unknown
): payload is SectionPayloads[K] {
  return validate(payload);
}

/**
 * Checks a payload against the declared schema of a section.
 *
 * @param section - The target section.
 * @param payload - Candidate payload.
 * @returns The typed payload, or the schema issues found.
 */
export function checkSectionPayload<K extends SectionName>(
  section: K,
  payload: unknown
): SchemaCheck<K> {
  const validate = VALIDATORS.get(section);
  if (validate === undefined) {
    return { valid: false, issues: [{ path: '', message: `no schema for section '${section}'` }] };
  }
  if (conforms<K>(validate, payload)) {
    return { valid: true, payload };
  }
  return {
    valid: false,
    issues: (validate.errors ?? []).map((error) => ({
      path: error.instancePath,
      message: error.message ?? 'Unknown error',
    })),
  };
}
