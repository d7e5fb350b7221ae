/**
 * Arithmetic evaluator for the calculation intent.
 *
 * Grammar (recursive descent, `^` is right-associative and binds tighter than unary minus):
 *   expr    := term (('+' | '-') term)*
 *   term    := unary (('*' | '/' | '%') unary)*
 *   unary   := ('-' | '+') unary | power
 *   power   := primary ('^' unary)?
 *   primary := number | '(' expr ')'
 */

export class CalculationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CalculationError';
  }
}

type Token = { kind: 'number'; value: number } | { kind: 'op'; value: string };

const EXPRESSION_CHARS = /[\d.()+\-*/%^\s]+/g;

function tokenize(expression: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < expression.length) {
    const char = expression.charAt(i);

    if (/\s/.test(char)) {
      i++;
      continue;
    }

    if (/[\d.]/.test(char)) {
      const match = /^\d*\.?\d+|^\d+\.?/.exec(expression.slice(i));
      if (!match) {
        throw new CalculationError(`Unexpected character '${char}'`);
      }
      tokens.push({ kind: 'number', value: Number(match[0]) });
      i += match[0].length;
      continue;
    }

    if ('+-*/%^()'.includes(char)) {
      tokens.push({ kind: 'op', value: char });
      i++;
      continue;
    }

    throw new CalculationError(`Unexpected character '${char}'`);
  }

  return tokens;
}

class Parser {
  private position = 0;

  constructor(private readonly tokens: Token[]) {}

  parse(): number {
    if (this.tokens.length === 0) {
      throw new CalculationError('Empty expression');
    }
    const value = this.expr();
    if (this.position < this.tokens.length) {
      throw new CalculationError('Unexpected trailing input');
    }
    return value;
  }

  private peekOp(): string | undefined {
    const token = this.tokens[this.position];
    return token?.kind === 'op' ? token.value : undefined;
  }

  private expr(): number {
    let value = this.term();
    for (let op = this.peekOp(); op === '+' || op === '-'; op = this.peekOp()) {
      this.position++;
      const right = this.term();
      value = op === '+' ? value + right : value - right;
    }
    return value;
  }

  private term(): number {
    let value = this.unary();
    for (let op = this.peekOp(); op === '*' || op === '/' || op === '%'; op = this.peekOp()) {
      this.position++;
      const right = this.unary();
      if ((op === '/' || op === '%') && right === 0) {
        throw new CalculationError('Division by zero');
      }
      value = op === '*' ? value * right : op === '/' ? value / right : value % right;
    }
    return value;
  }

  private unary(): number {
    const op = this.peekOp();
    if (op === '-' || op === '+') {
      this.position++;
      const value = this.unary();
      return op === '-' ? -value : value;
    }
    return this.power();
  }

  private power(): number {
    const base = this.primary();
    if (this.peekOp() === '^') {
      this.position++;
      return base ** this.unary();
    }
    return base;
  }

  private primary(): number {
    const token = this.tokens[this.position];
    if (!token) {
      throw new CalculationError('Unexpected end of expression');
    }

    if (token.kind === 'number') {
      this.position++;
      return token.value;
    }

    if (token.value === '(') {
      this.position++;
      const value = this.expr();
      if (this.peekOp() !== ')') {
        throw new CalculationError('Missing closing parenthesis');
      }
      this.position++;
      return value;
    }

    throw new CalculationError(`Unexpected operator '${token.value}'`);
  }
}

export function evaluateExpression(expression: string): number {
  const result = new Parser(tokenize(expression)).parse();
  if (!Number.isFinite(result)) {
    throw new CalculationError('Result is not a finite number');
  }
  return result;
}

/**
 * Longest run of arithmetic characters in the query that contains a digit,
 * e.g. `"What is 2+2?"` → `"2+2"`
 */
export function extractExpression(query: string): string | undefined {
  const candidates = (query.match(EXPRESSION_CHARS) ?? [])
    .map(candidate => candidate.trim())
    .filter(candidate => /\d/.test(candidate));

  return candidates.reduce<string | undefined>(
    (longest, candidate) => (!longest || candidate.length > longest.length ? candidate : longest),
    undefined,
  );
}

export function formatNumber(value: number): string {
  if (Number.isInteger(value)) {
    return String(value);
  }
  return String(Number(value.toFixed(10)));
}

/**
 * Evaluate the arithmetic in a natural-language query. Returns `undefined` when
 * no expression is found or it cannot be evaluated.
 */
export function calculate(query: string): { expression: string; result: number } | undefined {
  const expression = extractExpression(query);
  if (!expression) {
    return undefined;
  }
  try {
    return { expression, result: evaluateExpression(expression) };
  } catch (error) {
    if (error instanceof CalculationError) {
      return undefined;
    }
    throw error;
  }
}
