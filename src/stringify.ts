/**
 * Document to canonical text. One item or section header per line,
 * comments and original layout are not kept.
 */

import { isIdentifier, type ConfValue, type Item, type Section } from './ast.js';
import { ConfDocument } from './document.js';
import { ConfEncodeError } from './errors.js';
import { fitsWidth } from './integers.js';

export interface StringifyOptions {
  /** Indent string per nesting level (default two spaces) */
  indent?: string;
  /** Newline (default "\n") */
  newline?: string;
}

function writeName(name: string): string {
  if (!isIdentifier(name)) {
    throw new ConfEncodeError(`Name cannot be written as a keyword: ${JSON.stringify(name)}`);
  }
  return name;
}

function writeValue(value: ConfValue): string {
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (typeof value === 'bigint') {
    if (!fitsWidth(value, 'i64')) {
      throw new ConfEncodeError(`Integer does not fit i64: ${value}`);
    }
    return String(value);
  }
  if (value.includes('"')) {
    throw new ConfEncodeError(`Strings cannot contain '"': ${JSON.stringify(value)}`);
  }
  return `"${value}"`;
}

function writeItem(item: Item): string {
  const name = writeName(item.name);
  if (item.kind === 'pair') return `${name} = ${writeValue(item.value)}`;
  return `${name} = [${item.values.map(writeValue).join(', ')}]`;
}

function writeSection(
  section: Section,
  indent: string,
  level: number,
  out: string[]
): void {
  const prefix = indent.repeat(level);
  const name = writeName(section.name);
  const children =
    section.body.kind === 'flat' ? section.body.items.length : section.body.sections.length;
  if (children === 0) {
    out.push(`${prefix}${name} {}`);
    return;
  }
  out.push(`${prefix}${name} {`);
  if (section.body.kind === 'flat') {
    const inner = indent.repeat(level + 1);
    for (const item of section.body.items) out.push(inner + writeItem(item));
  } else {
    for (const child of section.body.sections) {
      writeSection(child, indent, level + 1, out);
    }
  }
  out.push(`${prefix}}`);
}

/**
 * Serialize a document (or a list of sections) to text that parses back to
 * the same tree.
 */
export function stringify(
  source: ConfDocument | readonly Section[],
  options: StringifyOptions = {}
): string {
  const indent = options.indent ?? '  ';
  const newline = options.newline ?? '\n';
  const sections = source instanceof ConfDocument ? source.sections : source;
  const out: string[] = [];
  for (const section of sections) writeSection(section, indent, 0, out);
  return out.length === 0 ? '' : out.join(newline) + newline;
}
