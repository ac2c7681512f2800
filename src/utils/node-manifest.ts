/**
 * Node Manifest Reader
 *
 * Loads and validates a repository's declarative node manifest.
 */

import fs from 'fs-extra';
import path from 'path';
import { Ajv } from 'ajv';
import type { NodeManifest } from '../types/node-manifest.js';
import type { NodeDeclaration, Registry } from '../types/node-registry.js';
import { MappingParseError } from '../errors.js';
import manifestSchema from '../schemas/node-manifest.schema.json' with { type: 'json' };

export const DEFAULT_MANIFEST_FILE = 'node-manifest.json';

const ajv = new Ajv({ strict: false, allErrors: true });
const validateManifest = ajv.compile<NodeManifest>(manifestSchema);

/**
 * Check whether a value is a well-formed manifest
 */
export function isNodeManifest(value: unknown): value is NodeManifest {
  return validateManifest(value);
}

/**
 * Read the manifest at `root/manifestFile` into a registry.
 *
 * @throws MappingParseError if the file is not JSON or does not match the schema
 */
export async function readNodeManifest(root: string, manifestFile: string): Promise<Registry> {
  const manifestPath = path.join(root, manifestFile);
  const content = await fs.readFile(manifestPath, 'utf-8');

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new MappingParseError(root, manifestFile, `invalid JSON (${reason})`);
  }

  if (!validateManifest(parsed)) {
    throw new MappingParseError(
      root,
      manifestFile,
      `invalid manifest: ${ajv.errorsText(validateManifest.errors, { dataVar: 'manifest' })}`
    );
  }

  return manifestToRegistry(parsed, manifestFile);
}

/**
 * Convert a validated manifest into a registry
 */
export function manifestToRegistry(manifest: NodeManifest, sourceFile: string): Registry {
  const registry = new Map<string, NodeDeclaration>();

  for (const [identifier, entry] of Object.entries(manifest.nodes)) {
    registry.set(
      identifier,
      Object.freeze({
        identifier,
        returnTypes: Object.freeze([...(entry.returnTypes ?? [])]),
        className: entry.className,
        sourceFile,
      })
    );
  }

  return registry;
}
