/**
 * @fileoverview Loads fact definitions from YAML.
 *
 * Accepted shapes: a top-level list of facts, or `{ facts: [...] }`.
 *
 * ```yaml
 * facts:
 *   - key: test-coverage
 *     category: quality
 *     operator: gte
 *     value: 80
 *     rationale: Coverage gate for merges
 * ```
 */

import { readFile } from 'node:fs/promises';
import YAML from 'yaml';
import { z } from 'zod';
import { ConfigurationError } from '../core/errors.js';
import { Err, Ok, type Result } from '../core/result.js';
import { getErrorMessage } from '../utils/errors.js';
import { FactDefinitionSchema, FactRegistry, type FactDefinition } from './fact_registry.js';

const FactFileSchema = z.union([
  z.array(FactDefinitionSchema),
  z.object({ facts: z.array(FactDefinitionSchema) }),
]);

export function loadFactsFromYaml(text: string, source = 'facts'): Result<FactDefinition[], ConfigurationError> {
  let document: unknown;
  try {
    document = YAML.parse(text);
  } catch (error) {
    return Err(new ConfigurationError(`Could not parse ${source} as YAML`, [getErrorMessage(error)]));
  }
  const parsed = FactFileSchema.safeParse(document ?? []);
  if (!parsed.success) {
    return Err(
      new ConfigurationError(
        `Invalid fact definitions in ${source}`,
        parsed.error.errors.map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`),
      ),
    );
  }
  const facts = Array.isArray(parsed.data) ? parsed.data : parsed.data.facts;
  const seen = new Set<string>();
  for (const fact of facts) {
    if (seen.has(fact.key)) {
      return Err(new ConfigurationError(`Duplicate fact key '${fact.key}' in ${source}`));
    }
    seen.add(fact.key);
  }
  return Ok(facts);
}

export async function loadFactsFile(path: string): Promise<Result<FactDefinition[], ConfigurationError>> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    return Err(new ConfigurationError(`Could not read fact file ${path}`, [getErrorMessage(error)]));
  }
  return loadFactsFromYaml(text, path);
}

/** Build a registry from a YAML file; throws ConfigurationError when it cannot. */
export async function createFactRegistryFromFile(path: string): Promise<FactRegistry> {
  const loaded = await loadFactsFile(path);
  if (!loaded.ok) {
    throw loaded.error;
  }
  return new FactRegistry(loaded.value);
}
