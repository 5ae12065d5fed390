import type { ContentValue, Token, TokenCursor } from '../types.js';
import { MalformedValueError } from '../errors.js';

export type TokenEvent =
  | { token: 'START_OBJECT' | 'END_OBJECT' | 'START_ARRAY' | 'END_ARRAY' | 'VALUE_NULL' }
  | { token: 'FIELD_NAME'; name: string }
  | { token: 'VALUE_STRING'; value: string }
  | { token: 'VALUE_NUMBER'; value: number }
  | { token: 'VALUE_BOOLEAN'; value: boolean };

function collectEvents(value: ContentValue, out: TokenEvent[]): void {
  if (value === null) {
    out.push({ token: 'VALUE_NULL' });
  } else if (typeof value === 'string') {
    out.push({ token: 'VALUE_STRING', value });
  } else if (typeof value === 'number') {
    out.push({ token: 'VALUE_NUMBER', value });
  } else if (typeof value === 'boolean') {
    out.push({ token: 'VALUE_BOOLEAN', value });
  } else if (Array.isArray(value)) {
    out.push({ token: 'START_ARRAY' });
    for (const element of value) collectEvents(element, out);
    out.push({ token: 'END_ARRAY' });
  } else {
    out.push({ token: 'START_OBJECT' });
    for (const [name, child] of Object.entries(value)) {
      out.push({ token: 'FIELD_NAME', name });
      collectEvents(child, out);
    }
    out.push({ token: 'END_OBJECT' });
  }
}

const NUMERIC_TEXT = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * TokenCursor over a fully buffered list of token events.
 *
 * Numeric readers accept numeric strings and boolean readers accept
 * "true"/"false", so documents that quote their scalars still parse.
 */
export class ContentTokenCursor implements TokenCursor {
  private index = -1;
  private current: TokenEvent | null = null;
  private fieldName: string | null = null;
  private readonly containerNames: (string | null)[] = [];

  private constructor(private readonly events: readonly TokenEvent[]) {}

  static fromEvents(events: readonly TokenEvent[]): ContentTokenCursor {
    return new ContentTokenCursor([...events]);
  }

  static fromContent(value: ContentValue): ContentTokenCursor {
    const events: TokenEvent[] = [];
    collectEvents(value, events);
    return new ContentTokenCursor(events);
  }

  static fromJson(text: string): ContentTokenCursor {
    let value: ContentValue;
    try {
      value = JSON.parse(text);
    } catch (err) {
      throw new MalformedValueError(null, null, `failed to read query document: ${String(err)}`);
    }
    return ContentTokenCursor.fromContent(value);
  }

  nextToken(): Token | null {
    this.index += 1;
    const event = this.events[this.index];
    if (event === undefined) {
      this.index = this.events.length;
      this.current = null;
      return null;
    }
    switch (event.token) {
      case 'START_OBJECT':
      case 'START_ARRAY':
        this.containerNames.push(this.fieldName);
        this.fieldName = null;
        break;
      case 'END_OBJECT':
      case 'END_ARRAY':
        this.fieldName = this.containerNames.pop() ?? null;
        break;
      case 'FIELD_NAME':
        this.fieldName = event.name;
        break;
      default:
        break;
    }
    this.current = event;
    return event.token;
  }

  currentToken(): Token | null {
    return this.current === null ? null : this.current.token;
  }

  currentName(): string | null {
    const token = this.currentToken();
    if (token === 'START_OBJECT' || token === 'START_ARRAY') {
      return this.containerNames[this.containerNames.length - 1] ?? null;
    }
    return this.fieldName;
  }

  text(): string {
    const event = this.current;
    if (event !== null) {
      switch (event.token) {
        case 'VALUE_STRING':
          return event.value;
        case 'VALUE_NUMBER':
        case 'VALUE_BOOLEAN':
          return String(event.value);
        default:
          break;
      }
    }
    throw this.unexpected('a value');
  }

  textOrNull(): string | null {
    return this.currentToken() === 'VALUE_NULL' ? null : this.text();
  }

  numberValue(): number {
    const event = this.current;
    if (event !== null && event.token === 'VALUE_NUMBER') {
      return event.value;
    }
    if (event !== null && event.token === 'VALUE_STRING') {
      const trimmed = event.value.trim();
      if (NUMERIC_TEXT.test(trimmed)) {
        return Number(trimmed);
      }
    }
    throw this.unexpected('a number');
  }

  floatValue(): number {
    return this.numberValue();
  }

  intValue(): number {
    const value = this.numberValue();
    if (!Number.isInteger(value)) {
      throw this.unexpected('an integer');
    }
    return value;
  }

  booleanValue(): boolean {
    const event = this.current;
    if (event !== null && event.token === 'VALUE_BOOLEAN') {
      return event.value;
    }
    if (event !== null && event.token === 'VALUE_STRING') {
      if (event.value === 'true') return true;
      if (event.value === 'false') return false;
    }
    throw this.unexpected('a boolean');
  }

  skipChildren(): void {
    const token = this.currentToken();
    if (token !== 'START_OBJECT' && token !== 'START_ARRAY') {
      return;
    }
    let depth = 1;
    while (depth > 0) {
      const next = this.nextToken();
      if (next === null) {
        throw new MalformedValueError(null, this.fieldName, 'unexpected end of content');
      }
      if (next === 'START_OBJECT' || next === 'START_ARRAY') depth += 1;
      if (next === 'END_OBJECT' || next === 'END_ARRAY') depth -= 1;
    }
  }

  private unexpected(expected: string): MalformedValueError {
    const field = this.currentName();
    const found = this.currentToken() ?? 'end of content';
    const where = field === null ? '' : ` for [${field}]`;
    return new MalformedValueError(null, field, `expected ${expected}${where} but found [${found}]`);
  }
}
