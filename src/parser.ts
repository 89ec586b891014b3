/**
 * Section/property parser. Builds the section tree in one pass over the
 * source, with an explicit depth limit.
 *
 * ```
 * document := comment* section* EOF
 * section  := comment* keyword ( '{' block | '=' value )
 * block    := ( section* | property* ) '}'
 * property := keyword '=' value
 * ```
 *
 * A keyword is a section name when followed by `{` and a property name when
 * followed by `=`. The first child of a block decides whether the block holds
 * properties or sections; a child of the other kind is an error.
 */

import { isIdentifier, type Item, type Section } from './ast.js';
import { Scanner, skipTrivia } from './scanner.js';
import { parseValue } from './values.js';

export interface ParseOptions {
  /** Max section nesting depth (default 256). Top-level sections are depth 1. */
  maxDepth?: number;
}

export const DEFAULT_MAX_DEPTH = 256;

interface Keyword {
  kind: 'section' | 'property';
  name: string;
  offset: number;
}

export function parse(text: string, options: ParseOptions = {}): readonly Section[] {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  const p = new Parser(new Scanner(text), maxDepth);
  return p.parseDocument();
}

class Parser {
  constructor(
    private readonly scanner: Scanner,
    private readonly maxDepth: number
  ) {}

  parseDocument(): readonly Section[] {
    const sections: Section[] = [];
    skipTrivia(this.scanner);
    while (this.scanner.peek() !== undefined) {
      const keyword = this.keyword();
      if (keyword.kind === 'property') {
        this.scanner.fail(
          'InvalidFormat',
          `Property "${keyword.name}" must be inside a section`,
          keyword.offset
        );
      }
      sections.push(this.parseSection(keyword, 1));
      skipTrivia(this.scanner);
    }
    return Object.freeze(sections);
  }

  /** Reads a keyword and the `{` or `=` that follows it. */
  private keyword(): Keyword {
    const s = this.scanner;
    const begin = s.cursor();
    for (;;) {
      const c = s.peek();
      if (c === undefined) {
        s.fail('UnexpectedEndOfInput', 'Expected "{" or "=" after keyword', begin);
      }
      if (c === '=' || c === '{') break;
      if (c === '}') s.fail('InvalidToken', 'Unexpected "}"');
      s.next();
    }
    const raw = s.slice(begin, s.cursor());
    const delimiter = s.next();
    const name = raw.trim();
    if (name === '') s.fail('InvalidKeyword', `Missing name before "${delimiter}"`, begin);
    if (/\s/.test(name)) {
      s.fail('InvalidToken', `Whitespace inside keyword "${name}"`, begin);
    }
    if (!isIdentifier(name)) s.fail('InvalidKeyword', `Invalid keyword "${name}"`, begin);
    return { kind: delimiter === '=' ? 'property' : 'section', name, offset: begin };
  }

  /** Parses a section body; the scanner sits just past `{`. */
  private parseSection(keyword: Keyword, depth: number): Section {
    if (depth > this.maxDepth) {
      this.scanner.fail(
        'MaxDepthExceeded',
        `Maximum nesting depth exceeded (${this.maxDepth})`,
        keyword.offset
      );
    }

    const items: Item[] = [];
    const sections: Section[] = [];
    for (;;) {
      skipTrivia(this.scanner);
      if (this.scanner.eat('}')) break;
      if (this.scanner.peek() === undefined) {
        this.scanner.fail(
          'UnexpectedEndOfInput',
          `Section "${keyword.name}" is not closed`,
          keyword.offset
        );
      }
      const child = this.keyword();
      if (child.kind === 'property') {
        if (sections.length > 0) this.mixed(keyword, child);
        items.push(this.parseItem(child.name));
      } else {
        if (items.length > 0) this.mixed(keyword, child);
        sections.push(this.parseSection(child, depth + 1));
      }
    }

    // An empty block is a nested section without children.
    const body =
      items.length > 0
        ? Object.freeze({ kind: 'flat' as const, items: Object.freeze(items) })
        : Object.freeze({ kind: 'nested' as const, sections: Object.freeze(sections) });
    return Object.freeze({ name: keyword.name, body });
  }

  private parseItem(name: string): Item {
    const parsed = parseValue(this.scanner);
    if (parsed.kind === 'list') {
      return Object.freeze({ kind: 'list' as const, name, values: Object.freeze(parsed.values) });
    }
    return Object.freeze({ kind: 'pair' as const, name, value: parsed.value });
  }

  private mixed(parent: Keyword, child: Keyword): never {
    this.scanner.fail(
      'InvalidFormat',
      `Section "${parent.name}" mixes properties and sections at "${child.name}"`,
      child.offset
    );
  }
}
