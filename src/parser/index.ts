import { readFileSync } from 'fs';
import type Parser from 'tree-sitter';

import { getParser } from './loadParser.js';
import type { ImportParseResult, ImportStatement } from './parserTypes.js';
import { createLogger } from '../dx/logger.js';
import { errorMessage } from '../dx/warnings.js';

const log = createLogger('parser');

type SyntaxNode = Parser.SyntaxNode;

const DOTTED = /^[A-Za-z_][A-Za-z0-9_]*(?:\.[A-Za-z_][A-Za-z0-9_]*)*$/;
const IMPORT_LINE = /^\s*import\s+([^#;]+)/;
const FROM_LINE = /^\s*from\s+([A-Za-z_][A-Za-z0-9_]*(?:\.[A-Za-z_][A-Za-z0-9_]*)*)\s+import\b/;

export function topLevelName(module: string): string {
  return module.split('.')[0];
}

function dottedText(node: SyntaxNode): string {
  return node.text.replace(/\s+/g, '');
}

function collectImports(root: SyntaxNode): ImportStatement[] {
  const imports: ImportStatement[] = [];

  function visit(node: SyntaxNode) {
    const line = node.startPosition.row + 1;

    if (node.type === 'import_statement') {
      for (const child of node.namedChildren) {
        const nameNode =
          child.type === 'aliased_import' ? child.childForFieldName('name') : child;
        if (nameNode?.type === 'dotted_name') {
          imports.push({ kind: 'import', module: dottedText(nameNode), line });
        }
      }
      return;
    }

    if (node.type === 'import_from_statement') {
      // `from . import x` / `from .pkg import y` name files next to the
      // script (relative_import); those are walked as files instead.
      const mod = node.childForFieldName('module_name');
      if (mod?.type === 'dotted_name') {
        imports.push({ kind: 'from', module: dottedText(mod), line });
      }
      return;
    }

    // `from __future__ import ...` is a compiler directive, not a module.
    if (node.type === 'future_import_statement') return;

    for (const child of node.children) visit(child);
  }

  visit(root);
  return imports;
}

/**
 * Line-oriented fallback for sources the grammar rejects (templated or
 * half-edited files). Only statements that start a line are seen.
 */
export function scanImportLines(source: string): ImportStatement[] {
  const imports: ImportStatement[] = [];
  const lines = source.split(/\r?\n/);

  for (let i = 0; i < lines.length; i++) {
    const text = lines[i];

    const from = FROM_LINE.exec(text);
    if (from) {
      if (from[1] !== '__future__') {
        imports.push({ kind: 'from', module: from[1], line: i + 1 });
      }
      continue;
    }

    const imp = IMPORT_LINE.exec(text);
    if (!imp) continue;
    for (const part of imp[1].split(',')) {
      const name = part.trim().split(/\s+as\s+/)[0].trim();
      if (DOTTED.test(name)) imports.push({ kind: 'import', module: name, line: i + 1 });
    }
  }

  return imports;
}

export function parsePythonImports(source: string): ImportParseResult {
  try {
    // The default 32 KiB input buffer rejects larger files.
    const bufferSize = Math.max(32 * 1024, Buffer.byteLength(source, 'utf8') * 2);
    const tree = getParser().parse(source, undefined, { bufferSize });
    // hasError covers ERROR nodes and the MISSING tokens inserted by recovery.
    if (!tree.rootNode.hasError) {
      return { imports: collectImports(tree.rootNode), method: 'syntax-tree' };
    }
    log.debug('syntax errors, falling back to line patterns');
  } catch (e) {
    log.debug('parser failed, falling back to line patterns', errorMessage(e));
  }
  return { imports: scanImportLines(source), method: 'line-patterns' };
}

/** Throws if the file can't be read; parse problems never throw. */
export function parsePythonFile(filePath: string): ImportParseResult {
  const source = readFileSync(filePath, 'utf8');
  return parsePythonImports(source);
}
