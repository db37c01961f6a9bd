/**
 * OpeningLine Domain Types
 *
 * An OpeningLine is a named sequence of moves the user wants to memorize.
 * Move tokens are opaque strings (SAN by convention) in play order; this
 * module never checks them for legality.
 */

/**
 * A stored opening line.
 *
 * Lines are created by the add/import operations and are never mutated by
 * the study core afterwards.
 */
export interface OpeningLine {
  /** Unique identifier, prefixed (e.g. 'op_1f0c...') */
  id: string;

  /** Unique display name (e.g. "Scotch Game - Main Line") */
  name: string;

  /** Move tokens in play order. Never empty. */
  tokens: string[];

  /** The stored move text, tokens joined by single spaces */
  movesSan: string;

  /** When the line was added */
  createdAt: Date;
}

/**
 * The minimal shape the tree builder and quiz checker need from a line.
 */
export interface NamedLine {
  name: string;
  tokens: string[];
}
