import { UriSyntaxError } from './errors'
import { type Result, err } from '../utils/result'

/**
 * Position of a rule within its input. Rules advance `pos` past what they consume.
 */
export class ParseCursor {
  constructor(
    readonly input: string,
    public pos: number = 0,
    readonly end: number = input.length,
  ) {}

  get atEnd(): boolean {
    return this.pos >= this.end
  }

  /** Char code at `pos + offset`, or -1 past the end */
  peek(offset: number = 0): number {
    const i = this.pos + offset
    return i < this.end ? this.input.charCodeAt(i) : -1
  }
}

/**
 * A grammar rule consumes a prefix of the cursor's input and produces a value.
 * After a failure the cursor position is unspecified.
 */
export interface GrammarRule<T, E extends Error = UriSyntaxError> {
  parse(cursor: ParseCursor): Result<T, E>
}

/**
 * Run `rule` over the whole of `input`. Input left over after the rule
 * succeeds is a syntax error.
 */
export function parseWith<T, E extends Error>(
  input: string,
  rule: GrammarRule<T, E>,
): Result<T, E | UriSyntaxError> {
  const cursor = new ParseCursor(input)
  const result = rule.parse(cursor)
  if (!result.ok) return result
  if (!cursor.atEnd) {
    return err(new UriSyntaxError('leftover', cursor.pos, JSON.stringify(input.slice(cursor.pos, cursor.pos + 16))))
  }
  return result
}
