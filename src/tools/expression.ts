/**
 * @fileoverview Arithmetic expression evaluator used by the calculator tool.
 *
 * Grammar, lowest precedence first:
 * ```
 * expression := term (('+' | '-') term)*
 * term       := unary (('*' | '/' | '%') unary)*
 * unary      := ('-' | '+') unary | power
 * power      := primary ('**' unary)?
 * primary    := number | constant | function '(' expression ')' | '(' expression ')'
 * ```
 * `**` is right-associative and binds tighter than unary minus, so
 * `-2 ** 2` is `-4`.
 *
 * @module agent-loop-engine/tools/expression
 */

export class ExpressionError extends Error {
  override readonly name = 'ExpressionError';

  /** Offset in the source where evaluation failed */
  readonly position: number;

  constructor(message: string, position: number) {
    super(message);
    this.position = position;
  }
}

type Token =
  | { readonly type: 'number'; readonly value: number; readonly position: number }
  | { readonly type: 'identifier'; readonly name: string; readonly position: number }
  | { readonly type: 'operator'; readonly op: Operator; readonly position: number }
  | { readonly type: 'end'; readonly position: number };

type Operator = '+' | '-' | '*' | '/' | '%' | '**' | '(' | ')';

const FUNCTIONS: ReadonlyMap<string, (x: number) => number> = new Map([
  ['sqrt', Math.sqrt],
  ['sin', Math.sin],
  ['cos', Math.cos],
  ['tan', Math.tan],
  ['log', Math.log],
  ['abs', Math.abs],
  ['floor', Math.floor],
  ['ceil', Math.ceil],
  ['round', Math.round],
]);

const CONSTANTS: ReadonlyMap<string, number> = new Map([
  ['pi', Math.PI],
  ['e', Math.E],
]);

function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < source.length) {
    const char = source[i];

    if (/\s/.test(char)) {
      i++;
      continue;
    }

    if (/[\d.]/.test(char)) {
      const match = /^(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/.exec(source.slice(i));
      if (match === null) {
        throw new ExpressionError(`Malformed number at position ${i}`, i);
      }
      tokens.push({ type: 'number', value: Number(match[0]), position: i });
      i += match[0].length;
      continue;
    }

    if (/[a-zA-Z_]/.test(char)) {
      const match = /^[a-zA-Z_]\w*/.exec(source.slice(i));
      const name = match === null ? char : match[0];
      tokens.push({ type: 'identifier', name: name.toLowerCase(), position: i });
      i += name.length;
      continue;
    }

    if (source.startsWith('**', i)) {
      tokens.push({ type: 'operator', op: '**', position: i });
      i += 2;
      continue;
    }

    if (char === '+' || char === '-' || char === '*' || char === '/' || char === '%' || char === '(' || char === ')') {
      tokens.push({ type: 'operator', op: char, position: i });
      i++;
      continue;
    }

    throw new ExpressionError(`Unexpected character '${char}' at position ${i}`, i);
  }

  tokens.push({ type: 'end', position: source.length });
  return tokens;
}

class Parser {
  private readonly tokens: Token[];
  private index = 0;

  constructor(tokens: Token[]) {
    this.tokens = tokens;
  }

  parse(): number {
    const value = this.expression();
    const token = this.peek();
    if (token.type !== 'end') {
      throw new ExpressionError(`Unexpected token at position ${token.position}`, token.position);
    }
    return value;
  }

  private expression(): number {
    let value = this.term();
    for (;;) {
      if (this.matchOperator('+')) {
        value += this.term();
      } else if (this.matchOperator('-')) {
        value -= this.term();
      } else {
        return value;
      }
    }
  }

  private term(): number {
    let value = this.unary();
    for (;;) {
      const token = this.peek();
      if (this.matchOperator('*')) {
        value *= this.unary();
      } else if (this.matchOperator('/')) {
        const divisor = this.unary();
        if (divisor === 0) {
          throw new ExpressionError('Division by zero', token.position);
        }
        value /= divisor;
      } else if (this.matchOperator('%')) {
        const divisor = this.unary();
        if (divisor === 0) {
          throw new ExpressionError('Division by zero', token.position);
        }
        value %= divisor;
      } else {
        return value;
      }
    }
  }

  private unary(): number {
    if (this.matchOperator('-')) {
      return -this.unary();
    }
    if (this.matchOperator('+')) {
      return this.unary();
    }
    return this.power();
  }

  private power(): number {
    const base = this.primary();
    if (this.matchOperator('**')) {
      return Math.pow(base, this.unary());
    }
    return base;
  }

  private primary(): number {
    const token = this.advance();

    switch (token.type) {
      case 'number':
        return token.value;

      case 'identifier': {
        const fn = FUNCTIONS.get(token.name);
        if (fn !== undefined) {
          this.expectOperator('(');
          const argument = this.expression();
          this.expectOperator(')');
          return fn(argument);
        }
        const constant = CONSTANTS.get(token.name);
        if (constant !== undefined) {
          return constant;
        }
        throw new ExpressionError(`Unknown identifier '${token.name}'`, token.position);
      }

      case 'operator':
        if (token.op === '(') {
          const value = this.expression();
          this.expectOperator(')');
          return value;
        }
        throw new ExpressionError(`Unexpected '${token.op}' at position ${token.position}`, token.position);

      case 'end':
        throw new ExpressionError('Unexpected end of expression', token.position);
    }
  }

  // ============ Token helpers ============

  private peek(): Token {
    return this.tokens[Math.min(this.index, this.tokens.length - 1)];
  }

  private advance(): Token {
    const token = this.peek();
    if (token.type !== 'end') {
      this.index++;
    }
    return token;
  }

  private matchOperator(op: Operator): boolean {
    const token = this.peek();
    if (token.type === 'operator' && token.op === op) {
      this.index++;
      return true;
    }
    return false;
  }

  private expectOperator(op: Operator): void {
    if (!this.matchOperator(op)) {
      const token = this.peek();
      throw new ExpressionError(`Expected '${op}' at position ${token.position}`, token.position);
    }
  }
}

/**
 * Evaluates an arithmetic expression.
 *
 * @throws ExpressionError on syntax errors, unknown identifiers and division by zero
 */
export function evaluateExpression(source: string): number {
  return new Parser(tokenize(source)).parse();
}
