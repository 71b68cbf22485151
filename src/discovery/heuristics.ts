import { topLevelName } from '../parser/index.js';

function qtBindings(pkg: string): string[] {
  return [`${pkg}.QtCore`, `${pkg}.QtGui`, `${pkg}.QtWidgets`];
}

/**
 * Submodules that packaging tools routinely fail to pick up on their own,
 * keyed by the top-level module whose presence triggers them.
 */
export const KNOWN_SUBMODULES: Readonly<Record<string, readonly string[]>> = {
  tkinter: ['tkinter.ttk', 'tkinter.messagebox', 'tkinter.filedialog'],
  PyQt5: qtBindings('PyQt5'),
  PyQt6: qtBindings('PyQt6'),
  PySide2: qtBindings('PySide2'),
  PySide6: qtBindings('PySide6'),
  matplotlib: ['matplotlib.backends', 'matplotlib.backends.backend_tkagg'],
  numpy: ['numpy.core', 'numpy.lib'],
  pandas: ['pandas.io', 'pandas.plotting'],
};

/**
 * Returns the extra submodules implied by the discovered names.
 * `extra` rows are merged with (not replacing) the built-in table.
 */
export function expandKnownSubmodules(
  discovered: Iterable<string>,
  extra: Readonly<Record<string, readonly string[]>> = {},
): string[] {
  const added = new Set<string>();
  const tops = new Set<string>();
  for (const name of discovered) tops.add(topLevelName(name));

  for (const top of tops) {
    for (const sub of KNOWN_SUBMODULES[top] ?? []) added.add(sub);
    for (const sub of extra[top] ?? []) added.add(sub);
  }
  return [...added];
}
