/**
 * Block boundary matching
 *
 * Patterns containing `*`, `?` or `[` are shell-style globs where `*` also
 * crosses `/`. Anything else names a file or a directory prefix.
 */

import type { TimeBlock } from '../contracts/schemas';
import type { BoundaryAction } from './types';

const GLOB_CHARS = /[*?[]/;

/**
 * Use forward slashes and drop leading `./` and `/`.
 */
export function normalizePath(path: string): string {
  let p = path.replace(/\\/g, '/');
  while (p.startsWith('./') || p.startsWith('/')) {
    p = p.startsWith('./') ? p.slice(2) : p.slice(1);
  }
  return p;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Translate a shell-style glob into an anchored regular expression.
 */
export function globToRegExp(pattern: string): RegExp {
  let source = '';
  let i = 0;
  while (i < pattern.length) {
    const ch = pattern[i];
    if (ch === '*') {
      source += '.*';
    } else if (ch === '?') {
      source += '.';
    } else if (ch === '[') {
      const close = pattern.indexOf(']', i + 2);
      if (close === -1) {
        source += '\\[';
      } else {
        let body = pattern.slice(i + 1, close);
        const negate = body.startsWith('!');
        if (negate) {
          body = body.slice(1);
        }
        body = body.replace(/\\/g, '\\\\').replace(/^[\]^]/, '\\$&');
        source += `[${negate ? '^' : ''}${body}]`;
        i = close;
      }
    } else {
      source += escapeRegExp(ch);
    }
    i++;
  }
  return new RegExp(`^${source}$`);
}

/**
 * Whether `path` falls under one of the patterns.
 */
export function matchesAnyPath(path: string, patterns: readonly string[]): boolean {
  const p = normalizePath(path);
  return patterns.some(pattern => {
    const normalized = normalizePath(pattern);
    if (GLOB_CHARS.test(normalized)) {
      return globToRegExp(normalized).test(p);
    }
    const dir = normalized.replace(/\/+$/, '');
    return p === dir || p.startsWith(dir + '/');
  });
}

/**
 * Whether a move name matches one of the declared illegal moves.
 */
export function matchesIllegalMove(move: string, illegalMoves: readonly string[]): string | undefined {
  return illegalMoves.find(declared =>
    GLOB_CHARS.test(declared) ? globToRegExp(declared).test(move) : declared === move
  );
}

/**
 * Why an action breaks a block's declared boundary, or undefined when it does not.
 * An empty `allowed_paths` places no restriction on paths.
 */
export function boundaryViolation(block: TimeBlock, action: BoundaryAction): string | undefined {
  const illegal = matchesIllegalMove(action.move, block.declared_illegal_moves);
  if (illegal !== undefined) {
    return `move "${action.move}" is declared illegal (${illegal})`;
  }
  if (
    action.path !== undefined &&
    block.allowed_paths.length > 0 &&
    !matchesAnyPath(action.path, block.allowed_paths)
  ) {
    return `path "${normalizePath(action.path)}" is outside allowed_paths`;
  }
  return undefined;
}
