import Parser from 'tree-sitter';

import Python from 'tree-sitter-python';

let shared: Parser | null = null;

export function createParser(): Parser {
  const parser = new Parser();
  parser.setLanguage(Python);
  return parser;
}

/** One parser per process; tree-sitter parsers are reusable across inputs. */
export function getParser(): Parser {
  if (!shared) shared = createParser();
  return shared;
}
