/**
 * Node Manifest
 *
 * Declarative alternative to scanning Python sources: a JSON file at the
 * repository root listing every node identifier and its output types.
 */

export interface NodeManifest {
  /** Optional pointer to the JSON Schema, for editor support */
  $schema?: string;

  /** Node identifier to declaration */
  nodes: Record<string, NodeManifestEntry>;
}

export interface NodeManifestEntry {
  /** Output type names in declaration order; omitted means no outputs */
  returnTypes?: string[];

  /** Name of the implementing class, for reporting */
  className?: string;

  description?: string;
}
