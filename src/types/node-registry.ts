/**
 * Node Registry
 *
 * Defines the in-memory shape of the custom nodes declared by one repository
 * snapshot, and the results of comparing two such snapshots.
 */

/**
 * One custom node type, as registered under its identifier.
 */
export interface NodeDeclaration {
  /** Key under which the node class is registered (e.g. "LoadImage") */
  identifier: string;

  /** Output type names in declaration order; empty for a node with no outputs */
  returnTypes: readonly string[];

  /** Class the mapping entry points at (source scan only) */
  className?: string;

  /** File declaring the node, relative to the repository root */
  sourceFile: string;
}

/**
 * All custom nodes discoverable in one repository snapshot, keyed by identifier.
 */
export type Registry = ReadonlyMap<string, NodeDeclaration>;

/**
 * Where a registry was read from.
 */
export type RegistrySource = 'python' | 'manifest';

/**
 * A file or declaration that could not be read. The node it concerns is
 * absent from the registry; loading carries on with the rest.
 */
export interface ParseWarning {
  /** File path relative to the repository root */
  file: string;

  message: string;

  /** 1-based line number, when known */
  line?: number;
}

export interface LoadResult {
  /** Absolute path of the repository root that was loaded */
  root: string;

  source: RegistrySource;

  registry: Registry;

  warnings: ParseWarning[];
}

/**
 * One position at which two return type sequences disagree.
 * A side is undefined when its sequence is too short to reach the position.
 */
export interface ReturnTypeMismatch {
  index: number;
  base?: string;
  candidate?: string;
}

/**
 * Result of comparing one identifier present in both registries.
 */
export interface CompatibilityFinding {
  identifier: string;
  baseReturnTypes: readonly string[];
  candidateReturnTypes: readonly string[];
  isBreaking: boolean;
  mismatches: ReturnTypeMismatch[];
}

/**
 * Rules applied by the differ beyond strict positional equality.
 */
export interface DiffPolicy {
  /** Treat outputs appended after every existing one as compatible */
  allowAppendedReturnTypes?: boolean;

  /** Fail the run when a node present in base is gone from the candidate */
  failOnRemoved?: boolean;
}

/**
 * Complete comparison of a base registry against a candidate registry.
 */
export interface CompatibilityReport {
  /** One finding per shared identifier, ordered by identifier */
  findings: CompatibilityFinding[];

  /** Identifiers only present in the candidate, sorted */
  added: string[];

  /** Identifiers only present in base, sorted */
  removed: string[];

  /** Overall outcome: whether the run should fail */
  breaking: boolean;

  policy: Required<DiffPolicy>;
}
