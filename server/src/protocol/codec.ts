/**
 * Line codec for the lobby protocol.
 *
 * A message is a flat object of quoted string keys to quoted string values,
 * where a value may also be one nested object of string pairs:
 *
 *   {"type":"MOVE","gameId":"g1","data":{"x":"0","y":"2"}}
 *
 * There is no escape syntax. Keys and values cannot contain `"` or line
 * breaks; `encode` refuses them instead of writing a line that would decode
 * to something else.
 */

export type FieldMap = Record<string, string>;
export type MessageValue = string | FieldMap;
export type Message = Record<string, MessageValue>;

export type DecodeResult = { ok: true; message: Message } | { ok: false; error: string };

export class CodecError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CodecError';
  }
}

class Scanner {
  private pos = 0;

  constructor(private readonly src: string) {}

  skipSpace() {
    while (this.pos < this.src.length && /\s/.test(this.src[this.pos])) this.pos++;
  }

  peek(): string | undefined {
    this.skipSpace();
    return this.src[this.pos];
  }

  atEnd(): boolean {
    return this.peek() === undefined;
  }

  expect(ch: string) {
    const got = this.peek();
    if (got !== ch) {
      throw new CodecError(got === undefined ? `expected '${ch}' at end of input` : `expected '${ch}' at ${this.pos}`);
    }
    this.pos++;
  }

  string(): string {
    this.expect('"');
    const end = this.src.indexOf('"', this.pos);
    if (end === -1) throw new CodecError('unterminated string');
    const value = this.src.slice(this.pos, end);
    this.pos = end + 1;
    return value;
  }

  /** Parses `{ "k": <value>, ... }`; `value` reads whatever follows each colon. */
  object<V>(value: () => V): Record<string, V> {
    const out: Record<string, V> = {};
    this.expect('{');
    if (this.peek() === '}') {
      this.pos++;
      return out;
    }
    for (;;) {
      const key = this.string();
      // Assigning this key would replace the prototype instead of adding a field.
      if (key === '__proto__') throw new CodecError(`reserved key "${key}"`);
      if (Object.prototype.hasOwnProperty.call(out, key)) throw new CodecError(`duplicate key "${key}"`);
      this.expect(':');
      out[key] = value();
      const next = this.peek();
      if (next === ',') {
        this.pos++;
        continue;
      }
      this.expect('}');
      return out;
    }
  }
}

export function decode(raw: string): DecodeResult {
  const scanner = new Scanner(raw);
  try {
    const message = scanner.object<MessageValue>(() =>
      scanner.peek() === '{' ? scanner.object(() => scanner.string()) : scanner.string()
    );
    if (!scanner.atEnd()) throw new CodecError('trailing characters after message');
    return { ok: true, message };
  } catch (err) {
    if (err instanceof CodecError) return { ok: false, error: err.message };
    throw err;
  }
}

function quote(text: string): string {
  if (/["\r\n]/.test(text)) throw new CodecError(`cannot encode ${JSON.stringify(text)}`);
  return `"${text}"`;
}

function encodeFields(fields: FieldMap): string {
  return `{${Object.entries(fields)
    .map(([k, v]) => `${quote(k)}:${quote(v)}`)
    .join(',')}}`;
}

export function encode(message: Message): string {
  return `{${Object.entries(message)
    .map(([k, v]) => `${quote(k)}:${typeof v === 'string' ? quote(v) : encodeFields(v)}`)
    .join(',')}}`;
}
