/**
 * Parsed configuration document: the section tree plus the environment tag
 * it was initialized with.
 */

import type { Section } from './ast.js';
import { ConfParseError, ConfQueryError } from './errors.js';
import { parse, type ParseOptions } from './parser.js';

export type EnvironmentTag = string | number;

export interface InitializeOptions extends ParseOptions {
  /** Deployment environment identifier, e.g. a member of an `Env` enum. */
  environment?: EnvironmentTag;
}

export class ConfDocument {
  #sections: readonly Section[] | null;
  readonly environment: EnvironmentTag | undefined;

  constructor(sections: readonly Section[], environment?: EnvironmentTag) {
    this.#sections = sections;
    this.environment = environment;
  }

  /** Top-level sections in source order. */
  get sections(): readonly Section[] {
    if (this.#sections === null) {
      throw new ConfQueryError('DocumentReleased', 'Document has been torn down');
    }
    return this.#sections;
  }

  get released(): boolean {
    return this.#sections === null;
  }

  release(): void {
    this.#sections = null;
  }
}

function decodeSource(source: string | Uint8Array): string {
  if (typeof source === 'string') return source;
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(source);
  } catch (err) {
    throw new ConfParseError('InvalidToken', 'Source is not valid UTF-8', {
      position: { line: 1, column: 1, offset: 0 },
      cause: err,
    });
  }
}

/**
 * Parse configuration source into a document. Throws `ConfParseError` on any
 * syntax error; no partial document is produced.
 */
export function initialize(
  source: string | Uint8Array,
  options: InitializeOptions = {}
): ConfDocument {
  const sections = parse(decodeSource(source), { maxDepth: options.maxDepth });
  return new ConfDocument(sections, options.environment);
}

/** Drops the tree. Later queries on the document throw `DocumentReleased`. */
export function teardown(doc: ConfDocument): void {
  doc.release();
}

/**
 * Look up the stored environment among the members of an enum-like object.
 * Returns `undefined` when the document was initialized without one.
 */
export function getEnvironmentTag<T extends EnvironmentTag>(
  doc: ConfDocument,
  tags: Record<string, T>
): T | undefined {
  const env = doc.environment;
  if (env === undefined) return undefined;
  for (const key of Object.keys(tags)) {
    const member = tags[key];
    // Skip the reverse mappings of numeric enums (`Env[0] === 'Dev'`).
    if (typeof member === 'string' && typeof tags[member] === 'number') continue;
    if (member === env) return member;
  }
  throw new ConfQueryError(
    'UnexpectedDataType',
    `Environment ${JSON.stringify(env)} is not a member of the given tags`
  );
}
