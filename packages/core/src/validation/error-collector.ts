import type { FieldValidationError } from '../errors/docket-error.js';

/**
 * A single validation failure
 */
export interface ValidationEntry {
  /** Dot-separated field path; empty for errors on the whole document */
  readonly path: string;
  readonly message: string;
}

/**
 * Field path given either as `'address.city'` or as `['address', 'city']`
 */
export type FieldPath = string | readonly string[];

/**
 * Options for rendering full messages
 */
export interface FullMessageOptions {
  /** Text between the field path and its message (default: a space) */
  separator?: string;
  /** Upper-case the first character of each rendered message */
  capitalize?: boolean;
}

function normalizePath(path: FieldPath): string {
  return typeof path === 'string' ? path : path.join('.');
}

/**
 * Ordered collection of validation failures for one validation pass.
 *
 * Entries keep insertion order, so the messages come out in the order the
 * checks ran. An empty collector means the document is valid.
 *
 * @example
 * ```typescript
 * const errors = new ErrorCollector();
 * errors.add('name', "can't be empty");
 * errors.add(['address', 'zip'], 'must be 5 digits');
 *
 * errors.fullMessages();
 * // ["name can't be empty", 'address.zip must be 5 digits']
 * ```
 */
export class ErrorCollector implements Iterable<ValidationEntry> {
  private readonly items: ValidationEntry[] = [];

  /**
   * Record a failure against a field. Use an empty path for errors that
   * concern the document as a whole.
   */
  add(path: FieldPath, message: string): this {
    this.items.push({ path: normalizePath(path), message });
    return this;
  }

  /**
   * Record a failure that belongs to no particular field
   */
  addToBase(message: string): this {
    return this.add('', message);
  }

  get entries(): readonly ValidationEntry[] {
    return this.items;
  }

  get size(): number {
    return this.items.length;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  /**
   * Messages recorded for one field, in insertion order
   */
  on(path: FieldPath): string[] {
    const normalized = normalizePath(path);
    return this.items.filter((e) => e.path === normalized).map((e) => e.message);
  }

  /**
   * Human-readable messages: each field path followed by its message.
   * Base errors render as the bare message.
   */
  fullMessages(options: FullMessageOptions = {}): string[] {
    const separator = options.separator ?? ' ';

    return this.items.map((entry) => {
      const text = entry.path ? `${entry.path}${separator}${entry.message}` : entry.message;
      return options.capitalize ? text.charAt(0).toUpperCase() + text.slice(1) : text;
    });
  }

  clear(): void {
    this.items.length = 0;
  }

  toFieldErrors(): FieldValidationError[] {
    return this.items.map((e) => ({ path: e.path, message: e.message }));
  }

  [Symbol.iterator](): Iterator<ValidationEntry> {
    return this.items[Symbol.iterator]();
  }
}
