/**
 * Python Source Reader
 *
 * Reads the declarations a custom node package makes in its Python modules
 * without importing or executing them: class definitions with their
 * RETURN_TYPES, module-level string constants, imports, and every statement
 * that builds the NODE_CLASS_MAPPINGS dict.
 */

export const MAPPING_SYMBOL = 'NODE_CLASS_MAPPINGS';
export const RETURN_TYPES_ATTRIBUTE = 'RETURN_TYPES';

const OPENERS = '([{';
const CLOSERS = ')]}';

const DOTTED_NAME = /^[A-Za-z_]\w*(?:\.[A-Za-z_]\w*)*$/;
const ASSIGNMENT = /^([A-Za-z_]\w*)\s*(?::[^=]*)?=(?!=)\s*([\s\S]+)$/;
const CLASS_HEADER = /^class\s+([A-Za-z_]\w*)\s*(?:\(([^)]*)\))?\s*:/;
const BLOCK_HEADER =
  /^(class|def|async\s+def|if|elif|else|try|except|finally|with|for|while|match|case)\b[\s\S]*:$/;
const FROM_IMPORT = /^from\s+(\.*)([\w.]*)\s+import\s+([\s\S]+)$/;
const PLAIN_IMPORT = /^import\s+([\s\S]+)$/;
const MAPPING_UPDATE = new RegExp(`^${MAPPING_SYMBOL}\\.update\\(([\\s\\S]*)\\)$`);
const MAPPING_ITEM = new RegExp(`^${MAPPING_SYMBOL}\\[([\\s\\S]+?)\\]\\s*=(?!=)\\s*([\\s\\S]+)$`);

const ESCAPES: Record<string, string> = {
  n: '\n',
  t: '\t',
  r: '\r',
  '0': '\0',
  '\\': '\\',
  "'": "'",
  '"': '"',
  '\n': '',
};

/**
 * A statement with its continuation lines joined and comments removed.
 */
export interface LogicalLine {
  text: string;
  indent: number;
  /** 1-based line number of the first physical line */
  line: number;
}

export type ReturnTypesDeclaration =
  | { kind: 'sequence'; types: string[]; line: number }
  | { kind: 'invalid'; expression: string; line: number };

export interface PythonClass {
  name: string;
  /** Base classes as written (e.g. "nodes.Base"), in declaration order */
  bases: string[];
  returnTypes?: ReturnTypesDeclaration;
  line: number;
}

export interface PythonImport {
  /** Number of leading dots: 0 for absolute imports */
  level: number;
  /** Dotted module path after the dots; empty for `from . import x` */
  module: string;
  /** Imported names for `from` imports; empty for plain `import` */
  names: string[];
  /** Names bound with `as`, mapped to what they import (a module path for plain imports) */
  aliases: Record<string, string>;
  line: number;
}

export interface MappingEntry {
  identifier: string;
  /** Referenced class, as written (e.g. "nodes.LoadImage") */
  target: string;
  line: number;
}

export type MappingItem =
  | { kind: 'entry'; entry: MappingEntry }
  | { kind: 'spread'; reference: string };

/**
 * Right-hand side of a mapping assignment or update
 */
export type MappingValue =
  | { kind: 'dict'; items: MappingItem[] }
  /** One or more names joined with `|`, e.g. `other.NODE_CLASS_MAPPINGS` */
  | { kind: 'reference'; references: string[] }
  | { kind: 'unparseable'; expression: string };

export type MappingStatement =
  | { kind: 'assign'; value: MappingValue; line: number }
  | { kind: 'update'; value: MappingValue; line: number }
  | { kind: 'item'; entry: MappingEntry; line: number }
  /** `from x import NODE_CLASS_MAPPINGS` or `from x import *` */
  | { kind: 'import'; source: PythonImport; line: number };

export interface PythonModule {
  classes: PythonClass[];
  imports: PythonImport[];
  /** Module-level statements that bind or change the mapping, in source order */
  mapping: MappingStatement[];
  /** Mapping entries skipped because their key or value cannot be read */
  skippedEntries: { line: number; reason: string }[];
}

/**
 * Split source text into logical lines, joining bracketed and
 * backslash-continued lines and dropping comments and blank lines.
 */
export function toLogicalLines(source: string): LogicalLine[] {
  const src = source.replace(/\r\n?/g, '\n');
  const lines: LogicalLine[] = [];

  let text = '';
  let indent = 0;
  let startLine = 1;
  let lineNo = 1;
  let depth = 0;
  let atLineStart = true;
  let i = 0;

  const flush = () => {
    const trimmed = text.trim();
    if (trimmed) {
      lines.push({ text: trimmed, indent, line: startLine });
    }
    text = '';
  };

  while (i < src.length) {
    if (atLineStart) {
      let column = 0;
      while (i < src.length && (src[i] === ' ' || src[i] === '\t')) {
        column = src[i] === '\t' ? column + 8 - (column % 8) : column + 1;
        i++;
      }
      indent = column;
      startLine = lineNo;
      atLineStart = false;
      continue;
    }

    const ch = src[i];

    if (ch === '#') {
      while (i < src.length && src[i] !== '\n') i++;
      continue;
    }

    if (ch === '"' || ch === "'") {
      const end = scanString(src, i);
      const literal = src.slice(i, end);
      lineNo += countNewlines(literal);
      text += literal;
      i = end;
      continue;
    }

    if (ch === '\\' && src[i + 1] === '\n') {
      text += ' ';
      lineNo++;
      i += 2;
      continue;
    }

    if (ch === '\n') {
      lineNo++;
      i++;
      if (depth > 0) {
        text += ' ';
        continue;
      }
      flush();
      atLineStart = true;
      continue;
    }

    if (OPENERS.includes(ch)) depth++;
    else if (CLOSERS.includes(ch)) depth = Math.max(0, depth - 1);

    text += ch;
    i++;
  }

  flush();
  return lines;
}

/**
 * Parse one module's declarations.
 */
export function parsePythonModule(source: string): PythonModule {
  const lines = toLogicalLines(source);
  const module: PythonModule = {
    classes: [],
    imports: [],
    mapping: [],
    skippedEntries: [],
  };

  const constants = new Map<string, string>();
  const rawClasses: { cls: PythonClass; returnTypes?: { expression: string; line: number } }[] = [];
  const blocks: { indent: number; kind: string }[] = [];

  lines.forEach((current, index) => {
    while (blocks.length > 0 && blocks[blocks.length - 1].indent >= current.indent) {
      blocks.pop();
    }
    const insideDefinition = blocks.some((b) => b.kind === 'class' || b.kind === 'def');

    const header = BLOCK_HEADER.exec(current.text);
    if (header) {
      const kind = header[1].startsWith('async') ? 'def' : header[1];
      blocks.push({ indent: current.indent, kind });
    }

    const imported = parseImport(current);
    if (imported) {
      module.imports.push(...imported);
      if (!insideDefinition) {
        imported
          .filter((imp) => imp.names.includes('*') || importedName(imp, MAPPING_SYMBOL) === MAPPING_SYMBOL)
          .forEach((source) => module.mapping.push({ kind: 'import', source, line: current.line }));
      }
      return;
    }

    if (insideDefinition) {
      return;
    }

    const classHeader = CLASS_HEADER.exec(current.text);
    if (classHeader) {
      rawClasses.push(readClass(lines, index, classHeader));
      return;
    }

    const statements = parseMappingStatement(current, module.skippedEntries);
    if (statements) {
      module.mapping.push(...statements);
      return;
    }

    const assignment = ASSIGNMENT.exec(current.text);
    if (assignment) {
      const value = parseStringLiteral(assignment[2].trim());
      if (value !== undefined) {
        constants.set(assignment[1], value);
      }
    }
  });

  for (const { cls, returnTypes } of rawClasses) {
    if (returnTypes) {
      const items = parseSequence(returnTypes.expression);
      cls.returnTypes = items
        ? {
            kind: 'sequence',
            types: items.map((item) => parseStringLiteral(item) ?? constants.get(item) ?? item),
            line: returnTypes.line,
          }
        : { kind: 'invalid', expression: returnTypes.expression, line: returnTypes.line };
    }
    module.classes.push(cls);
  }

  return module;
}

function readClass(
  lines: LogicalLine[],
  index: number,
  header: RegExpExecArray
): { cls: PythonClass; returnTypes?: { expression: string; line: number } } {
  const start = lines[index];
  const cls: PythonClass = {
    name: header[1],
    bases: (header[2] ?? '')
      .split(',')
      .map((base) => base.trim())
      .filter((base) => base !== '' && !base.includes('=')),
    line: start.line,
  };

  let returnTypes: { expression: string; line: number } | undefined;
  const bodyIndent = lines[index + 1]?.indent;

  for (let j = index + 1; j < lines.length && lines[j].indent > start.indent; j++) {
    if (lines[j].indent !== bodyIndent) continue;
    const assignment = ASSIGNMENT.exec(lines[j].text);
    if (assignment && assignment[1] === RETURN_TYPES_ATTRIBUTE) {
      // Later assignments win, as they would at class creation
      returnTypes = { expression: assignment[2].trim(), line: lines[j].line };
    }
  }

  return { cls, returnTypes };
}

/**
 * Name a `from` import binds to `local`, following `as` aliases.
 * Undefined when the import does not bind `local`.
 */
export function importedName(imp: PythonImport, local: string): string | undefined {
  if (Object.hasOwn(imp.aliases, local)) {
    return imp.aliases[local];
  }
  const aliased = Object.values(imp.aliases).filter((name) => name === local).length;
  return imp.names.filter((name) => name === local).length > aliased ? local : undefined;
}

function parseImport(line: LogicalLine): PythonImport[] | undefined {
  const from = FROM_IMPORT.exec(line.text);
  if (from) {
    const names: string[] = [];
    const aliases: Record<string, string> = {};

    for (const item of stripParens(from[3]).split(',')) {
      const [name, alias] = splitAlias(item);
      if (name === '') continue;
      names.push(name);
      if (alias !== undefined && alias !== name) aliases[alias] = name;
    }

    return [{ level: from[1].length, module: from[2], names, aliases, line: line.line }];
  }

  const plain = PLAIN_IMPORT.exec(line.text);
  if (plain) {
    return plain[1]
      .split(',')
      .map(splitAlias)
      .filter(([name]) => DOTTED_NAME.test(name))
      .map(([name, alias]) => ({
        level: 0,
        module: name,
        names: [],
        aliases: alias !== undefined ? { [alias]: name } : {},
        line: line.line,
      }));
  }

  return undefined;
}

function splitAlias(item: string): [string, string | undefined] {
  const parts = item.trim().split(/\s+as\s+/);
  return [parts[0].trim(), parts.length > 1 ? parts[1].trim() : undefined];
}

/**
 * Statements for one line that changes the mapping; empty when the line
 * does but none of its entries can be read. Undefined for other lines.
 */
function parseMappingStatement(
  line: LogicalLine,
  skipped: PythonModule['skippedEntries']
): MappingStatement[] | undefined {
  const item = MAPPING_ITEM.exec(line.text);
  if (item) {
    const entry = readMappingEntry(item[1].trim(), item[2].trim(), line.line, skipped);
    return entry ? [{ kind: 'item', entry, line: line.line }] : [];
  }

  const update = MAPPING_UPDATE.exec(line.text);
  if (update) {
    return [{ kind: 'update', value: readMappingValue(update[1].trim(), line.line, skipped), line: line.line }];
  }

  const assignment = ASSIGNMENT.exec(line.text);
  if (assignment && assignment[1] === MAPPING_SYMBOL) {
    return [{ kind: 'assign', value: readMappingValue(assignment[2].trim(), line.line, skipped), line: line.line }];
  }

  return undefined;
}

function readMappingValue(
  expression: string,
  line: number,
  skipped: PythonModule['skippedEntries']
): MappingValue {
  const references = splitTopLevel(expression, '|');
  if (references.every((reference) => DOTTED_NAME.test(reference))) {
    return { kind: 'reference', references };
  }

  if (!isEnclosed(expression, '{', '}')) {
    return { kind: 'unparseable', expression };
  }

  const parts = splitTopLevel(expression.slice(1, -1), ',').filter((part) => part !== '');
  if (parts.length === 1 && /\sfor\s[\s\S]+\sin\s/.test(parts[0])) {
    return { kind: 'unparseable', expression };
  }

  const items: MappingItem[] = [];
  for (const part of parts) {
    if (part.startsWith('**')) {
      const reference = part.slice(2).trim();
      if (!DOTTED_NAME.test(reference)) {
        return { kind: 'unparseable', expression };
      }
      items.push({ kind: 'spread', reference });
      continue;
    }

    const colon = findTopLevel(part, ':');
    if (colon < 0) {
      return { kind: 'unparseable', expression };
    }
    const entry = readMappingEntry(part.slice(0, colon).trim(), part.slice(colon + 1).trim(), line, skipped);
    if (entry) items.push({ kind: 'entry', entry });
  }

  return { kind: 'dict', items };
}

function readMappingEntry(
  key: string,
  value: string,
  line: number,
  skipped: PythonModule['skippedEntries']
): MappingEntry | undefined {
  const identifier = parseStringLiteral(key);
  if (identifier === undefined) {
    skipped.push({ line, reason: `mapping key ${key} is not a string literal` });
    return undefined;
  }
  if (!DOTTED_NAME.test(value)) {
    skipped.push({ line, reason: `mapping entry "${identifier}" does not reference a class (${value})` });
    return undefined;
  }
  return { identifier, target: value, line };
}

/**
 * Read the elements of a tuple or list literal. Returns undefined when the
 * expression is anything else, including a parenthesized single value.
 */
export function parseSequence(expression: string): string[] | undefined {
  const expr = expression.trim();
  let kind: 'tuple' | 'list' | 'bare' = 'bare';
  let inner = expr;

  if (isEnclosed(expr, '(', ')')) {
    kind = 'tuple';
    inner = expr.slice(1, -1);
  } else if (isEnclosed(expr, '[', ']')) {
    kind = 'list';
    inner = expr.slice(1, -1);
  }

  const items = splitTopLevel(inner, ',');
  const hasComma = items.length > 1;
  if (items[items.length - 1] === '') items.pop();

  if (kind !== 'list' && !hasComma && items.length > 0) return undefined;
  if (kind === 'bare' && items.length === 0) return undefined;
  if (items.some((item) => item === '')) return undefined;
  if (items.some((item) => parseStringLiteral(item) === undefined && /\sfor\s[\s\S]+\sin\s/.test(item))) {
    return undefined;
  }

  return items;
}

/**
 * Value of a plain, raw or byte string literal. Returns undefined for
 * f-strings, concatenations and anything that is not a single literal.
 */
export function parseStringLiteral(expression: string): string | undefined {
  const prefix = /^[rRuUbB]{0,2}/.exec(expression)?.[0] ?? '';
  const quote = expression[prefix.length];
  if (quote !== '"' && quote !== "'") return undefined;
  if (scanString(expression, prefix.length) !== expression.length) return undefined;

  const delimiter = expression.startsWith(quote.repeat(3), prefix.length) ? 3 : 1;
  const body = expression.slice(prefix.length + delimiter, expression.length - delimiter);

  if (/[rR]/.test(prefix)) return body;
  return body.replace(/\\([\s\S])/g, (escape, ch: string) => ESCAPES[ch] ?? escape);
}

/**
 * Index just past the string literal starting at `start`.
 */
function scanString(src: string, start: number): number {
  const quote = src[start];
  const triple = src.startsWith(quote.repeat(3), start);
  let i = start + (triple ? 3 : 1);

  while (i < src.length) {
    const ch = src[i];
    if (ch === '\\') {
      i += 2;
      continue;
    }
    if (triple) {
      if (src.startsWith(quote.repeat(3), i)) return i + 3;
    } else if (ch === quote) {
      return i + 1;
    } else if (ch === '\n') {
      // Unterminated
      return i;
    }
    i++;
  }

  return src.length;
}

function splitTopLevel(expression: string, separator: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let start = 0;
  let i = 0;

  while (i < expression.length) {
    const ch = expression[i];
    if (ch === '"' || ch === "'") {
      i = scanString(expression, i);
      continue;
    }
    if (OPENERS.includes(ch)) depth++;
    else if (CLOSERS.includes(ch)) depth--;
    else if (ch === separator && depth === 0) {
      parts.push(expression.slice(start, i));
      start = i + 1;
    }
    i++;
  }

  parts.push(expression.slice(start));
  return parts.map((part) => part.trim());
}

function findTopLevel(expression: string, target: string): number {
  let depth = 0;
  let i = 0;

  while (i < expression.length) {
    const ch = expression[i];
    if (ch === '"' || ch === "'") {
      i = scanString(expression, i);
      continue;
    }
    if (OPENERS.includes(ch)) depth++;
    else if (CLOSERS.includes(ch)) depth--;
    else if (ch === target && depth === 0) return i;
    i++;
  }

  return -1;
}

function isEnclosed(expression: string, open: string, close: string): boolean {
  if (expression[0] !== open || expression[expression.length - 1] !== close) {
    return false;
  }

  let depth = 0;
  let i = 0;
  while (i < expression.length) {
    const ch = expression[i];
    if (ch === '"' || ch === "'") {
      i = scanString(expression, i);
      continue;
    }
    if (OPENERS.includes(ch)) depth++;
    else if (CLOSERS.includes(ch)) depth--;
    if (depth === 0 && i < expression.length - 1) return false;
    i++;
  }

  return depth === 0;
}

function stripParens(text: string): string {
  const trimmed = text.trim();
  return isEnclosed(trimmed, '(', ')') ? trimmed.slice(1, -1) : trimmed;
}

function countNewlines(text: string): number {
  let count = 0;
  for (const ch of text) {
    if (ch === '\n') count++;
  }
  return count;
}
