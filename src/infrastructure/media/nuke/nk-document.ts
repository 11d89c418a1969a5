/**
 * Minimal model of a node-graph script: top-level statements are kept as raw
 * text, node blocks (`Class {` … `}`) are split into ordered knob entries.
 * Connections are implicit in statement order, so the order is preserved.
 */

export interface NkKnob {
  readonly name: string;
  /** Value exactly as written in the script (quotes and braces included). */
  value: string;
}

export interface NkNode {
  readonly kind: 'node';
  readonly className: string;
  readonly knobs: NkKnob[];
}

export interface NkRaw {
  readonly kind: 'raw';
  readonly text: string;
}

export type NkStatement = NkNode | NkRaw;

export class NkSyntaxError extends Error {
  public constructor(
    message: string,
    public readonly offset: number,
  ) {
    super(message);
    this.name = 'NkSyntaxError';
  }
}

const NODE_HEADER = /^([A-Za-z_][\w.]*)[ \t]+\{[ \t]*$/;
const BARE_VALUE = /^[^\s{}"\\[\]$;]+$/;

/** Quotes a value when it would not survive as a bare word. */
export function nkValue(value: string | number | boolean): string {
  if (typeof value !== 'string') {
    return String(value);
  }

  if (BARE_VALUE.test(value)) {
    return value;
  }

  return `"${value.replace(/[\\"$[\]]/g, (char) => `\\${char}`)}"`;
}

export function unquoteNkValue(value: string): string {
  const trimmed = value.trim();
  if (trimmed.length >= 2 && trimmed.startsWith('"') && trimmed.endsWith('"')) {
    return trimmed.slice(1, -1).replace(/\\(.)/g, '$1');
  }
  if (trimmed.length >= 2 && trimmed.startsWith('{') && trimmed.endsWith('}')) {
    return trimmed.slice(1, -1).trim();
  }
  return trimmed;
}

/** Index of the first newline after `start` that sits outside quotes and braces. */
function scanStatement(source: string, start: number): number {
  let depth = 0;
  let quoted = false;

  for (let index = start; index < source.length; index += 1) {
    const char = source[index];

    if (char === '\\') {
      index += 1;
      continue;
    }

    if (quoted) {
      if (char === '"') quoted = false;
      continue;
    }

    if (char === '"') {
      quoted = true;
    } else if (char === '{') {
      depth += 1;
    } else if (char === '}') {
      depth -= 1;
      if (depth < 0) {
        throw new NkSyntaxError('Unbalanced closing brace', index);
      }
    } else if (char === '\n' && depth === 0) {
      return index;
    }
  }

  if (depth !== 0 || quoted) {
    throw new NkSyntaxError('Unterminated brace or quote', start);
  }

  return source.length;
}

function parseKnobs(body: string, bodyOffset: number): NkKnob[] {
  const knobs: NkKnob[] = [];
  let index = 0;

  while (index < body.length) {
    while (index < body.length && /\s/.test(body[index] ?? '')) index += 1;
    if (index >= body.length) break;

    let end: number;
    try {
      end = scanStatement(body, index);
    } catch (error) {
      if (error instanceof NkSyntaxError) {
        throw new NkSyntaxError(error.message, bodyOffset + error.offset);
      }
      throw error;
    }

    const statement = body.slice(index, end).trim();
    const match = /^(\S+)(?:[ \t]+([\s\S]*))?$/.exec(statement);
    if (match?.[1]) {
      knobs.push({ name: match[1], value: (match[2] ?? '').trim() });
    }
    index = end + 1;
  }

  return knobs;
}

/** Finds the brace closing a node block whose body starts at `start`. */
function findBlockEnd(source: string, start: number): number {
  let depth = 1;
  let quoted = false;

  for (let index = start; index < source.length; index += 1) {
    const char = source[index];

    if (char === '\\') {
      index += 1;
      continue;
    }

    if (quoted) {
      if (char === '"') quoted = false;
      continue;
    }

    if (char === '"') {
      quoted = true;
    } else if (char === '{') {
      depth += 1;
    } else if (char === '}') {
      depth -= 1;
      if (depth === 0) {
        return index;
      }
    }
  }

  throw new NkSyntaxError('Node block is never closed', start);
}

export class NkDocument {
  private constructor(public readonly statements: NkStatement[]) {}

  public static empty(): NkDocument {
    return new NkDocument([]);
  }

  public static parse(source: string): NkDocument {
    const statements: NkStatement[] = [];
    let index = 0;

    while (index < source.length) {
      while (index < source.length && /\s/.test(source[index] ?? '')) index += 1;
      if (index >= source.length) break;

      const lineEnd = source.indexOf('\n', index);
      const line = source.slice(index, lineEnd === -1 ? source.length : lineEnd).trimEnd();
      const header = NODE_HEADER.exec(line);

      if (header?.[1] && lineEnd !== -1) {
        const bodyStart = lineEnd + 1;
        const bodyEnd = findBlockEnd(source, bodyStart);
        statements.push({
          kind: 'node',
          className: header[1],
          knobs: parseKnobs(source.slice(bodyStart, bodyEnd), bodyStart),
        });
        index = bodyEnd + 1;
        continue;
      }

      if (line.startsWith('#')) {
        statements.push({ kind: 'raw', text: line });
        index = lineEnd === -1 ? source.length : lineEnd + 1;
        continue;
      }

      const end = scanStatement(source, index);
      statements.push({ kind: 'raw', text: source.slice(index, end).trimEnd() });
      index = end + 1;
    }

    return new NkDocument(statements);
  }

  public get nodes(): NkNode[] {
    return this.statements.filter((statement): statement is NkNode => statement.kind === 'node');
  }

  public findNode(name: string): NkNode | undefined {
    return this.nodes.find((node) => {
      const knob = node.knobs.find((candidate) => candidate.name === 'name');
      return knob !== undefined && unquoteNkValue(knob.value) === name;
    });
  }

  public addNode(className: string, knobs: ReadonlyArray<readonly [string, string | number | boolean]>): NkNode {
    const node: NkNode = {
      kind: 'node',
      className,
      knobs: knobs.map(([name, value]) => ({ name, value: nkValue(value) })),
    };
    this.statements.push(node);
    return node;
  }

  public serialize(): string {
    return this.statements
      .map((statement) =>
        statement.kind === 'raw'
          ? `${statement.text}\n`
          : `${statement.className} {\n${statement.knobs.map((knob) => ` ${knob.name} ${knob.value}\n`).join('')}}\n`,
      )
      .join('');
  }
}

export function getKnob(node: NkNode, name: string): string | undefined {
  const knob = node.knobs.find((candidate) => candidate.name === name);
  return knob ? unquoteNkValue(knob.value) : undefined;
}

/** Replaces the knob in place, or inserts it before `name` so the label stays last. */
export function setKnob(node: NkNode, name: string, value: string | number | boolean): void {
  const encoded = nkValue(value);
  const existing = node.knobs.find((knob) => knob.name === name);
  if (existing) {
    existing.value = encoded;
    return;
  }

  const nameIndex = node.knobs.findIndex((knob) => knob.name === 'name');
  const entry = { name, value: encoded };
  if (nameIndex === -1) {
    node.knobs.push(entry);
  } else {
    node.knobs.splice(nameIndex, 0, entry);
  }
}
