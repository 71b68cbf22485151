export type ImportKind = 'import' | 'from';

export type ImportStatement = {
  kind: ImportKind;
  /** Full dotted module path as written, e.g. `os.path`. */
  module: string;
  /** 1-based source line. */
  line: number;
};

export type ParseMethod = 'syntax-tree' | 'line-patterns';

export type ImportParseResult = {
  imports: ImportStatement[];
  method: ParseMethod;
};
