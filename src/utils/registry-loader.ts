/**
 * Node Registry Loader
 *
 * Builds the registry of custom nodes declared by one repository snapshot.
 * Reads a declarative manifest when the repository ships one, and otherwise
 * reads the package's Python sources statically, starting at the root
 * `__init__.py` and following its imports. Repository code is never run.
 */

import fs from 'fs-extra';
import path from 'path';
import type { RegistrySourceOption } from '../types.js';
import type {
  LoadResult,
  NodeDeclaration,
  ParseWarning,
  Registry,
} from '../types/node-registry.js';
import { DiscoveryError, MappingParseError } from '../errors.js';
import { DEFAULT_MANIFEST_FILE, readNodeManifest } from './node-manifest.js';
import {
  MAPPING_SYMBOL,
  RETURN_TYPES_ATTRIBUTE,
  importedName,
  parsePythonModule,
} from './python-source.js';
import type {
  MappingEntry,
  MappingValue,
  PythonClass,
  PythonImport,
  PythonModule,
  ReturnTypesDeclaration,
} from './python-source.js';

export const ENTRY_POINT = '__init__.py';

export interface LoadOptions {
  /** Where to read declarations from (default: manifest if present, else Python) */
  source?: RegistrySourceOption;
  /** Manifest file name relative to the repository root */
  manifestFile?: string;
}

export const DEFAULT_LOAD_OPTIONS: Required<LoadOptions> = {
  source: 'auto',
  manifestFile: DEFAULT_MANIFEST_FILE,
};

interface LoadedModule {
  /** Posix path relative to the repository root */
  file: string;
  module: PythonModule;
}

interface ClassLocation {
  cls: PythonClass;
  file: string;
}

interface MappedNode {
  entry: MappingEntry;
  /** Module the entry is written in; its imports resolve the target */
  file: string;
}

/** Identifier to class reference, in insertion order like a Python dict */
type NodeMapping = Map<string, MappedNode>;

interface PackageScope {
  root: string;
  /** Every module read, in traversal order */
  modules: Map<string, PythonModule>;
  /** Evaluated mapping per module; undefined when a module never binds it */
  mappings: Map<string, NodeMapping | undefined>;
  /** Modules being evaluated, for import cycles */
  pending: Set<string>;
}

/**
 * Load the registry of a repository checkout.
 *
 * @throws DiscoveryError if no node-class mapping can be located
 * @throws MappingParseError if the top-level mapping cannot be read
 */
export async function loadRegistry(repoPath: string, options: LoadOptions = {}): Promise<LoadResult> {
  const source = options.source ?? DEFAULT_LOAD_OPTIONS.source;
  const manifestFile = options.manifestFile ?? DEFAULT_LOAD_OPTIONS.manifestFile;
  const root = path.resolve(repoPath);

  if (!(await fs.pathExists(root)) || !(await fs.stat(root)).isDirectory()) {
    throw new Error(`Repository path does not exist or is not a directory: ${root}`);
  }

  const hasManifest = await fs.pathExists(path.join(root, manifestFile));

  if (source === 'manifest' || (source === 'auto' && hasManifest)) {
    if (!hasManifest) {
      throw new DiscoveryError(root, `No ${manifestFile} found in ${root}`);
    }
    return {
      root,
      source: 'manifest',
      registry: await readNodeManifest(root, manifestFile),
      warnings: [],
    };
  }

  return scanPythonPackage(root);
}

/**
 * Read the registry from the package's Python sources.
 *
 * The registry is the value `__init__.py` leaves in NODE_CLASS_MAPPINGS,
 * followed through the imports, spreads and updates it is built from.
 * Mappings that nothing exposes to the entry point are not registered.
 */
export async function scanPythonPackage(root: string): Promise<LoadResult> {
  if (!(await fs.pathExists(path.join(root, ENTRY_POINT)))) {
    throw new DiscoveryError(root, `No ${ENTRY_POINT} found in ${root}`);
  }

  const warnings: ParseWarning[] = [];
  const loaded = await readImportGraph(root, warnings);
  const scope: PackageScope = {
    root,
    modules: new Map(loaded.map(({ file, module }): [string, PythonModule] => [file, module])),
    mappings: new Map(),
    pending: new Set(),
  };

  const mapping = evaluateMapping(scope, ENTRY_POINT);
  if (!mapping) {
    throw new DiscoveryError(
      root,
      `${MAPPING_SYMBOL} not found in ${ENTRY_POINT} or the modules it imports (${root})`
    );
  }

  for (const { file, module } of loaded) {
    if (scope.mappings.has(file)) {
      for (const skipped of module.skippedEntries) {
        warnings.push({ file, line: skipped.line, message: skipped.reason });
      }
      continue;
    }

    // Mapping the entry point never exposes
    for (const statement of module.mapping) {
      if (statement.kind !== 'assign' && statement.kind !== 'update') continue;
      if (statement.value.kind === 'unparseable') {
        warnings.push({ file, line: statement.line, message: unparseableMessage(statement.value.expression) });
      }
    }
  }

  const registry = new Map<string, NodeDeclaration>();

  for (const [identifier, { entry, file }] of mapping) {
    const location = resolveClass(scope, file, entry.target);

    if (!location) {
      warnings.push({
        file,
        line: entry.line,
        message: `class ${entry.target} for node "${identifier}" not found`,
      });
      continue;
    }

    const resolved = resolveReturnTypes(scope, location, new Set([location.cls]));

    if (resolved?.declaration.kind === 'invalid') {
      warnings.push({
        file: resolved.file,
        line: resolved.declaration.line,
        message: `${RETURN_TYPES_ATTRIBUTE} of ${location.cls.name} is not a tuple or list literal (${resolved.declaration.expression}); node "${identifier}" skipped`,
      });
      continue;
    }

    registry.set(identifier, {
      identifier,
      returnTypes: Object.freeze(resolved ? [...resolved.declaration.types] : []),
      className: location.cls.name,
      sourceFile: location.file,
    });
  }

  return { root, source: 'python', registry: freezeRegistry(registry), warnings };
}

/**
 * Read the entry point and every module reachable from it through imports
 * that resolve inside the repository, breadth first.
 */
async function readImportGraph(root: string, warnings: ParseWarning[]): Promise<LoadedModule[]> {
  const modules: LoadedModule[] = [];
  const queue = [ENTRY_POINT];
  const seen = new Set(queue);

  while (queue.length > 0) {
    const file = queue.shift() ?? ENTRY_POINT;
    let source: string;

    try {
      source = await fs.readFile(path.join(root, file), 'utf-8');
    } catch (error) {
      if (file === ENTRY_POINT) throw error;
      const reason = error instanceof Error ? error.message : String(error);
      warnings.push({ file, message: `could not read file: ${reason}` });
      continue;
    }

    const module = parsePythonModule(source);
    modules.push({ file, module });

    for (const imp of module.imports) {
      for (const candidate of importCandidates(file, imp)) {
        if (seen.has(candidate)) continue;
        if (await fs.pathExists(path.join(root, candidate))) {
          seen.add(candidate);
          queue.push(candidate);
        }
      }
    }
  }

  return modules;
}

/**
 * Files an import may refer to, relative to the repository root.
 * Absolute imports are looked up from the root, the way the host puts a
 * custom node package on its module path.
 */
export function importCandidates(file: string, imp: PythonImport): string[] {
  const base = modulePath(file, imp.level, imp.module);
  if (base === undefined) return [];

  const modulePaths = imp.module ? [base] : [];
  for (const name of imp.names) {
    if (/^[A-Za-z_]\w*$/.test(name)) {
      modulePaths.push(path.posix.join(base, name));
    }
  }

  return modulePaths.flatMap((p) => [`${p}.py`, path.posix.join(p, ENTRY_POINT)]);
}

/**
 * Path of a module without its extension, or undefined when a relative
 * import climbs above the repository root
 */
function modulePath(file: string, level: number, module: string): string | undefined {
  let base = '.';

  if (level > 0) {
    base = path.posix.dirname(file);
    for (let i = 1; i < level; i++) {
      if (base === '.') return undefined;
      base = path.posix.dirname(base);
    }
  }

  return module ? path.posix.join(base, ...module.split('.')) : base;
}

function moduleFile(scope: PackageScope, modPath: string | undefined): string | undefined {
  if (modPath === undefined) return undefined;
  return [`${modPath}.py`, path.posix.join(modPath, ENTRY_POINT)].find((file) => scope.modules.has(file));
}

/**
 * The last import in a module that binds `local`
 */
function bindingOf(module: PythonModule, local: string): PythonImport | undefined {
  for (let i = module.imports.length - 1; i >= 0; i--) {
    const imp = module.imports[i];
    const binds =
      imp.names.length === 0
        ? Object.hasOwn(imp.aliases, local) ||
          (Object.keys(imp.aliases).length === 0 && imp.module.split('.')[0] === local)
        : importedName(imp, local) !== undefined;
    if (binds) return imp;
  }
  return undefined;
}

/**
 * Module path a dotted name such as `video` or `pkg.sub` refers to in `file`
 */
function boundModulePath(scope: PackageScope, file: string, dotted: string[]): string | undefined {
  const module = scope.modules.get(file);
  const [head, ...rest] = dotted;
  const imp = module && bindingOf(module, head);
  if (!imp) return undefined;

  let base: string | undefined;
  if (imp.names.length === 0) {
    base = modulePath(file, 0, Object.hasOwn(imp.aliases, head) ? imp.aliases[head] : head);
  } else {
    const from = modulePath(file, imp.level, imp.module);
    base = from === undefined ? undefined : path.posix.join(from, importedName(imp, head) ?? head);
  }

  return base === undefined ? undefined : path.posix.join(base, ...rest);
}

/**
 * Value NODE_CLASS_MAPPINGS holds once a module has run, or undefined when
 * the module never binds it
 *
 * @throws MappingParseError if the value is built from something that cannot be read
 * @throws DiscoveryError if it is imported from a module that does not define it
 */
function evaluateMapping(scope: PackageScope, file: string): NodeMapping | undefined {
  if (scope.mappings.has(file)) return scope.mappings.get(file);

  const module = scope.modules.get(file);
  if (!module || scope.pending.has(file)) return undefined;
  scope.pending.add(file);

  let mapping: NodeMapping | undefined;

  for (const statement of module.mapping) {
    switch (statement.kind) {
      case 'import': {
        const imported = importMapping(scope, file, statement.source, statement.line);
        if (imported) mapping = new Map(imported);
        break;
      }
      case 'assign':
        mapping = readMappingValue(scope, file, statement.value, statement.line, mapping);
        break;
      case 'update': {
        const update = readMappingValue(scope, file, statement.value, statement.line, mapping);
        mapping = new Map([...(mapping ?? []), ...update]);
        break;
      }
      case 'item':
        mapping = new Map(mapping ?? []);
        mapping.set(statement.entry.identifier, { entry: statement.entry, file });
        break;
    }
  }

  scope.pending.delete(file);
  scope.mappings.set(file, mapping);
  return mapping;
}

function importMapping(
  scope: PackageScope,
  file: string,
  imp: PythonImport,
  line: number
): NodeMapping | undefined {
  const source = moduleFile(scope, modulePath(file, imp.level, imp.module));
  const mapping = source === undefined ? undefined : evaluateMapping(scope, source);

  // A star import only binds the mapping when the module defines one
  if (mapping || imp.names.includes('*')) return mapping;

  throw new DiscoveryError(
    scope.root,
    `${MAPPING_SYMBOL} imported at ${file}:${line} is not defined by ${'.'.repeat(imp.level)}${imp.module}`
  );
}

function readMappingValue(
  scope: PackageScope,
  file: string,
  value: MappingValue,
  line: number,
  current: NodeMapping | undefined
): NodeMapping {
  switch (value.kind) {
    case 'unparseable':
      throw new MappingParseError(scope.root, `${file}:${line}`, unparseableMessage(value.expression));
    case 'reference': {
      const mapping: NodeMapping = new Map();
      for (const reference of value.references) {
        resolveReference(scope, file, reference, line, current).forEach((node, id) => mapping.set(id, node));
      }
      return mapping;
    }
    case 'dict': {
      const mapping: NodeMapping = new Map();
      for (const item of value.items) {
        if (item.kind === 'entry') {
          mapping.set(item.entry.identifier, { entry: item.entry, file });
        } else {
          resolveReference(scope, file, item.reference, line, current).forEach((node, id) => mapping.set(id, node));
        }
      }
      return mapping;
    }
  }
}

function resolveReference(
  scope: PackageScope,
  file: string,
  reference: string,
  line: number,
  current: NodeMapping | undefined
): NodeMapping {
  const mapping = reference === MAPPING_SYMBOL ? current : referencedMapping(scope, file, reference);
  if (mapping) return mapping;

  throw new MappingParseError(
    scope.root,
    `${file}:${line}`,
    `${reference} does not name a ${MAPPING_SYMBOL} defined in the repository`
  );
}

/**
 * Mapping behind `EXTRA` (imported as `from x import NODE_CLASS_MAPPINGS as EXTRA`)
 * or `mod.NODE_CLASS_MAPPINGS`
 */
function referencedMapping(scope: PackageScope, file: string, reference: string): NodeMapping | undefined {
  const parts = reference.split('.');
  let source: string | undefined;

  if (parts.length === 1) {
    const module = scope.modules.get(file);
    const imp = module && bindingOf(module, reference);
    if (imp && imp.names.length > 0 && importedName(imp, reference) === MAPPING_SYMBOL) {
      source = moduleFile(scope, modulePath(file, imp.level, imp.module));
    }
  } else if (parts[parts.length - 1] === MAPPING_SYMBOL) {
    source = moduleFile(scope, boundModulePath(scope, file, parts.slice(0, -1)));
  }

  return source === undefined ? undefined : evaluateMapping(scope, source);
}

function unparseableMessage(expression: string): string {
  return `${MAPPING_SYMBOL} is not built from a dict literal (${expression})`;
}

/**
 * Find the class a mapping entry or base class refers to from `file`.
 * Qualified names (`video.Loader`) are looked up in the module the
 * qualifier names; simple names in `file` and what it imports, then by
 * name anywhere in the package.
 */
function resolveClass(scope: PackageScope, file: string, target: string): ClassLocation | undefined {
  const parts = target.split('.');
  const name = parts[parts.length - 1];

  if (parts.length > 1) {
    const owner = moduleFile(scope, boundModulePath(scope, file, parts.slice(0, -1)));
    return owner === undefined ? undefined : classIn(scope, owner, name, new Set());
  }

  return classIn(scope, file, name, new Set()) ?? classNamed(scope, name);
}

/**
 * Class bound to `name` in a module: defined there, imported under that
 * name, or brought in by a star import
 */
function classIn(
  scope: PackageScope,
  file: string,
  name: string,
  visited: Set<string>
): ClassLocation | undefined {
  const key = `${file}:${name}`;
  const module = scope.modules.get(file);
  if (!module || visited.has(key)) return undefined;
  visited.add(key);

  const own = module.classes.filter((cls) => cls.name === name).pop();
  if (own) return { cls: own, file };

  const imp = bindingOf(module, name);
  if (imp && imp.names.length > 0) {
    const source = moduleFile(scope, modulePath(file, imp.level, imp.module));
    const exported = importedName(imp, name);
    return source === undefined || exported === undefined
      ? undefined
      : classIn(scope, source, exported, visited);
  }

  for (const star of module.imports.filter((i) => i.names.includes('*'))) {
    const source = moduleFile(scope, modulePath(file, star.level, star.module));
    const found = source === undefined ? undefined : classIn(scope, source, name, visited);
    if (found) return found;
  }

  return undefined;
}

function classNamed(scope: PackageScope, name: string): ClassLocation | undefined {
  for (const [file, module] of scope.modules) {
    const cls = module.classes.find((candidate) => candidate.name === name);
    if (cls) return { cls, file };
  }
  return undefined;
}

/**
 * RETURN_TYPES of a class, or of the nearest base class declaring it
 */
function resolveReturnTypes(
  scope: PackageScope,
  location: ClassLocation,
  visited: Set<PythonClass>
): { declaration: ReturnTypesDeclaration; file: string } | undefined {
  if (location.cls.returnTypes) {
    return { declaration: location.cls.returnTypes, file: location.file };
  }

  for (const base of location.cls.bases) {
    const parent = resolveClass(scope, location.file, base);
    if (!parent || visited.has(parent.cls)) continue;
    visited.add(parent.cls);

    const inherited = resolveReturnTypes(scope, parent, visited);
    if (inherited) return inherited;
  }

  return undefined;
}

function freezeRegistry(registry: Map<string, NodeDeclaration>): Registry {
  for (const declaration of registry.values()) {
    Object.freeze(declaration);
  }
  return registry;
}
