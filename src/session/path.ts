/**
 * Paths, path expressions and selectors
 *
 * - Path: `/demo/example/sensor`
 * - PathExpr: chunks may hold `*` (within one chunk) or be `**` (any number of chunks)
 * - Selector: `<pathExpr>[?<predicate>][(<properties>)][#<fragment>]`
 *
 * @module session/path
 */

import { ErrorCodes, PathError } from '../errors.js';
import { Properties } from './properties.js';

const FORBIDDEN_IN_PATH = /[*?#()[\]]/;
const FORBIDDEN_IN_EXPR = /[?#()[\]]/;
const MULTI_WILDCARD = '**';

function splitChunks(input: string, label: string): string[] {
  if (!input.startsWith('/')) {
    throw new PathError(`${label} must be absolute: "${input}"`, {
      code: label === 'Path' ? ErrorCodes.PATH_INVALID : ErrorCodes.PATH_EXPR_INVALID,
      input,
    });
  }
  const trimmed = input.length > 1 && input.endsWith('/') ? input.slice(0, -1) : input;
  const chunks = trimmed.slice(1).split('/');
  if (chunks.some((c) => c === '')) {
    throw new PathError(`${label} contains an empty chunk: "${input}"`, {
      code: label === 'Path' ? ErrorCodes.PATH_INVALID : ErrorCodes.PATH_EXPR_INVALID,
      input,
    });
  }
  return chunks;
}

/**
 * Join a possibly relative path onto a prefix
 */
export function resolvePath(input: string, prefix?: Path): string {
  if (input.startsWith('/') || !prefix) {
    return input;
  }
  return `${prefix.toString()}/${input}`;
}

// ============================================================================
// Path
// ============================================================================

export class Path {
  readonly chunks: readonly string[];

  private constructor(chunks: string[]) {
    this.chunks = chunks;
  }

  static parse(input: string): Path {
    if (FORBIDDEN_IN_PATH.test(input)) {
      throw new PathError(`Path may not contain wildcards or selector syntax: "${input}"`, {
        code: ErrorCodes.PATH_INVALID,
        input,
      });
    }
    return new Path(splitChunks(input, 'Path'));
  }

  static isValid(input: string): boolean {
    try {
      Path.parse(input);
      return true;
    } catch {
      return false;
    }
  }

  toPathExpr(): PathExpr {
    return PathExpr.parse(this.toString());
  }

  equals(other: Path): boolean {
    return this.toString() === other.toString();
  }

  toString(): string {
    return `/${this.chunks.join('/')}`;
  }
}

// ============================================================================
// Path expression matching
// ============================================================================

/**
 * Glob intersection over two token sequences where `isStar` tokens match
 * any run of tokens (including none) and `same` decides whether two plain
 * tokens can denote the same thing.
 */
function globIntersects<T>(
  a: readonly T[],
  b: readonly T[],
  isStar: (t: T) => boolean,
  same: (x: T, y: T) => boolean
): boolean {
  const memo = new Map<number, boolean>();
  const width = b.length + 1;

  const visit = (i: number, j: number): boolean => {
    const key = i * width + j;
    const cached = memo.get(key);
    if (cached !== undefined) {
      return cached;
    }
    let result: boolean;
    if (i === a.length && j === b.length) {
      result = true;
    } else if (i < a.length && isStar(a[i])) {
      result = visit(i + 1, j) || (j < b.length && visit(i, j + 1));
    } else if (j < b.length && isStar(b[j])) {
      result = visit(i, j + 1) || (i < a.length && visit(i + 1, j));
    } else if (i < a.length && j < b.length) {
      result = same(a[i], b[j]) && visit(i + 1, j + 1);
    } else {
      result = false;
    }
    memo.set(key, result);
    return result;
  };

  return visit(0, 0);
}

function chunkIntersects(a: string, b: string): boolean {
  if (!a.includes('*') && !b.includes('*')) {
    return a === b;
  }
  return globIntersects(
    Array.from(a),
    Array.from(b),
    (c) => c === '*',
    (x, y) => x === y
  );
}

// ============================================================================
// PathExpr
// ============================================================================

export class PathExpr {
  readonly chunks: readonly string[];

  private constructor(chunks: string[]) {
    this.chunks = chunks;
  }

  static parse(input: string): PathExpr {
    if (FORBIDDEN_IN_EXPR.test(input)) {
      throw new PathError(`Path expression may not contain selector syntax: "${input}"`, {
        code: ErrorCodes.PATH_EXPR_INVALID,
        input,
      });
    }
    const chunks = splitChunks(input, 'Path expression');
    for (const chunk of chunks) {
      if (chunk.includes(MULTI_WILDCARD) && chunk !== MULTI_WILDCARD) {
        throw new PathError(`"**" must be a whole chunk: "${input}"`, {
          code: ErrorCodes.PATH_EXPR_INVALID,
          input,
        });
      }
    }
    return new PathExpr(chunks);
  }

  /** True when the expression contains no wildcard */
  get isPath(): boolean {
    return this.chunks.every((c) => !c.includes('*'));
  }

  /**
   * Whether a concrete path is selected by this expression
   */
  matches(path: Path | string): boolean {
    const target = typeof path === 'string' ? Path.parse(path) : path;
    return this.intersectsChunks(target.chunks);
  }

  /**
   * Whether some path is selected by both expressions
   */
  intersects(other: PathExpr): boolean {
    return this.intersectsChunks(other.chunks);
  }

  private intersectsChunks(other: readonly string[]): boolean {
    return globIntersects(
      this.chunks,
      other,
      (c) => c === MULTI_WILDCARD,
      chunkIntersects
    );
  }

  toString(): string {
    return `/${this.chunks.join('/')}`;
  }
}

// ============================================================================
// Selector
// ============================================================================

const SELECTOR_PATTERN = /^([^?#(]+)(?:\?([^(#]*))?(?:\(([^)]*)\))?(?:#(.*))?$/;

export class Selector {
  readonly pathExpr: PathExpr;
  readonly predicate: string;
  readonly properties: Properties;
  readonly fragment?: string;

  private constructor(
    pathExpr: PathExpr,
    predicate: string,
    properties: Properties,
    fragment?: string
  ) {
    this.pathExpr = pathExpr;
    this.predicate = predicate;
    this.properties = properties;
    this.fragment = fragment;
  }

  /**
   * Parse a selector, resolving a relative path expression against `prefix`
   */
  static parse(input: string, prefix?: Path): Selector {
    const match = SELECTOR_PATTERN.exec(resolvePath(input, prefix));
    if (!match) {
      throw new PathError(`Invalid selector: "${input}"`, {
        code: ErrorCodes.SELECTOR_INVALID,
        input,
        suggestion: 'Selectors look like /demo/example/**?(name=Bob)',
      });
    }

    const [, expr, predicate, props, fragment] = match;
    let pathExpr: PathExpr;
    try {
      pathExpr = PathExpr.parse(expr);
    } catch (error) {
      throw new PathError(`Invalid selector: "${input}"`, {
        code: ErrorCodes.SELECTOR_INVALID,
        input,
        cause: error instanceof Error ? error : undefined,
      });
    }

    return new Selector(
      pathExpr,
      predicate ?? '',
      props !== undefined ? Properties.parse(props) : new Properties(),
      fragment
    );
  }

  static fromPath(path: Path): Selector {
    return Selector.parse(path.toString());
  }

  toString(): string {
    let out = this.pathExpr.toString();
    if (this.predicate !== '' || this.properties.size > 0) {
      out += `?${this.predicate}`;
    }
    if (this.properties.size > 0) {
      out += `(${this.properties.toString()})`;
    }
    if (this.fragment !== undefined) {
      out += `#${this.fragment}`;
    }
    return out;
  }
}
