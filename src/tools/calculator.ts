/**
 * Arithmetic evaluation for calculate steps
 *
 * Expressions are parsed, never executed as code. Supported: numbers,
 * variables, + - * / % ^ (or **), parentheses, unary minus, the functions
 * below and the constants pi and e.
 */

import type { CalculateParameters, Scratchpad, StructuredFacts } from '../schemas';
import { ToolError } from '../types/errors';
import { Result, ok, err } from '../types/result';

type Token =
  | { kind: 'number'; value: number }
  | { kind: 'name'; value: string }
  | { kind: 'op'; value: '+' | '-' | '*' | '/' | '%' | '^' }
  | { kind: 'lparen' }
  | { kind: 'rparen' }
  | { kind: 'comma' };

interface FunctionSpec {
  minArgs: number;
  maxArgs: number;
  apply: (args: number[]) => number;
}

const unary = (fn: (x: number) => number): FunctionSpec => ({ minArgs: 1, maxArgs: 1, apply: (args) => fn(args[0]) });

const FUNCTIONS: Record<string, FunctionSpec> = {
  sqrt: unary(Math.sqrt),
  abs: unary(Math.abs),
  floor: unary(Math.floor),
  ceil: unary(Math.ceil),
  round: unary(Math.round),
  sin: unary(Math.sin),
  cos: unary(Math.cos),
  tan: unary(Math.tan),
  exp: unary(Math.exp),
  log: unary(Math.log),
  log10: unary(Math.log10),
  pow: { minArgs: 2, maxArgs: 2, apply: (args) => Math.pow(args[0], args[1]) },
  min: { minArgs: 1, maxArgs: Infinity, apply: (args) => Math.min(...args) },
  max: { minArgs: 1, maxArgs: Infinity, apply: (args) => Math.max(...args) },
};

const CONSTANTS: Record<string, number> = {
  pi: Math.PI,
  e: Math.E,
};

class ExpressionError extends Error {}

export function tokenizeExpression(expression: string): Token[] {
  const tokens: Token[] = [];
  const pattern = /\s*(?:(\d+(?:\.\d*)?(?:[eE][+-]?\d+)?|\.\d+(?:[eE][+-]?\d+)?)|([A-Za-z_]\w*)|(\*\*|[-+*/%^(),]))/y;
  let position = 0;
  while (position < expression.length) {
    if (/^\s*$/.test(expression.slice(position))) {
      break;
    }
    pattern.lastIndex = position;
    const match = pattern.exec(expression);
    if (!match) {
      throw new ExpressionError(`Unexpected character at position ${position + 1}: "${expression.slice(position).trim()[0]}"`);
    }
    position = pattern.lastIndex;
    const [, number, name, symbol] = match;
    if (number !== undefined) {
      tokens.push({ kind: 'number', value: Number(number) });
    } else if (name !== undefined) {
      tokens.push({ kind: 'name', value: name });
    } else if (symbol === '(') {
      tokens.push({ kind: 'lparen' });
    } else if (symbol === ')') {
      tokens.push({ kind: 'rparen' });
    } else if (symbol === ',') {
      tokens.push({ kind: 'comma' });
    } else if (symbol === '**' || symbol === '^') {
      tokens.push({ kind: 'op', value: '^' });
    } else if (symbol === '+' || symbol === '-' || symbol === '*' || symbol === '/' || symbol === '%') {
      tokens.push({ kind: 'op', value: symbol });
    }
  }
  return tokens;
}

class Parser {
  private position = 0;

  constructor(
    private readonly tokens: Token[],
    private readonly variables: Record<string, number>
  ) {}

  parse(): number {
    if (this.tokens.length === 0) {
      throw new ExpressionError('Expression is empty');
    }
    const value = this.expression();
    if (this.position < this.tokens.length) {
      throw new ExpressionError(`Unexpected ${describe(this.tokens[this.position])}`);
    }
    return value;
  }

  // expression := term (('+' | '-') term)*
  private expression(): number {
    let value = this.term();
    for (;;) {
      const token = this.peek();
      if (token?.kind === 'op' && (token.value === '+' || token.value === '-')) {
        this.position++;
        const right = this.term();
        value = token.value === '+' ? value + right : value - right;
      } else {
        return value;
      }
    }
  }

  // term := unary (('*' | '/' | '%') unary)*
  private term(): number {
    let value = this.unary();
    for (;;) {
      const token = this.peek();
      if (token?.kind !== 'op' || (token.value !== '*' && token.value !== '/' && token.value !== '%')) {
        return value;
      }
      this.position++;
      const right = this.unary();
      if (token.value === '*') {
        value *= right;
      } else if (right === 0) {
        throw new ExpressionError(token.value === '/' ? 'Division by zero' : 'Modulo by zero');
      } else {
        value = token.value === '/' ? value / right : value % right;
      }
    }
  }

  // unary := ('-' | '+') unary | power
  private unary(): number {
    const token = this.peek();
    if (token?.kind === 'op' && (token.value === '-' || token.value === '+')) {
      this.position++;
      const value = this.unary();
      return token.value === '-' ? -value : value;
    }
    return this.power();
  }

  // power := primary ('^' unary)?  (right associative)
  private power(): number {
    const base = this.primary();
    const token = this.peek();
    if (token?.kind === 'op' && token.value === '^') {
      this.position++;
      return Math.pow(base, this.unary());
    }
    return base;
  }

  private primary(): number {
    const token = this.next();
    switch (token.kind) {
      case 'number':
        return token.value;
      case 'lparen': {
        const value = this.expression();
        this.expect('rparen');
        return value;
      }
      case 'name':
        if (this.peek()?.kind === 'lparen') {
          this.position++;
          return this.call(token.value);
        }
        return this.resolve(token.value);
      default:
        throw new ExpressionError(`Unexpected ${describe(token)}`);
    }
  }

  private call(name: string): number {
    const fn = FUNCTIONS[name];
    if (!fn) {
      throw new ExpressionError(`Unknown function: ${name}`);
    }
    const args: number[] = [];
    if (this.peek()?.kind !== 'rparen') {
      args.push(this.expression());
      while (this.peek()?.kind === 'comma') {
        this.position++;
        args.push(this.expression());
      }
    }
    this.expect('rparen');
    if (args.length < fn.minArgs || args.length > fn.maxArgs) {
      throw new ExpressionError(`${name} takes ${fn.minArgs === fn.maxArgs ? fn.minArgs : `at least ${fn.minArgs}`} argument(s), got ${args.length}`);
    }
    return fn.apply(args);
  }

  private resolve(name: string): number {
    if (Object.prototype.hasOwnProperty.call(this.variables, name)) {
      return this.variables[name];
    }
    if (Object.prototype.hasOwnProperty.call(CONSTANTS, name)) {
      return CONSTANTS[name];
    }
    throw new ExpressionError(`Unknown variable: ${name}`);
  }

  private peek(): Token | undefined {
    return this.tokens[this.position];
  }

  private next(): Token {
    const token = this.tokens[this.position];
    if (!token) {
      throw new ExpressionError('Unexpected end of expression');
    }
    this.position++;
    return token;
  }

  private expect(kind: 'rparen'): void {
    const token = this.peek();
    if (token?.kind !== kind) {
      throw new ExpressionError(token ? `Expected ")" but found ${describe(token)}` : 'Missing ")"');
    }
    this.position++;
  }
}

function describe(token: Token): string {
  switch (token.kind) {
    case 'number':
      return `number ${token.value}`;
    case 'name':
      return `name "${token.value}"`;
    case 'op':
      return `operator "${token.value}"`;
    case 'lparen':
      return '"("';
    case 'rparen':
      return '")"';
    case 'comma':
      return '","';
  }
}

/**
 * Evaluate an expression; failures are returned, not thrown
 */
export function evaluateExpression(expression: string, variables: Record<string, number> = {}): Result<number, string> {
  try {
    const value = new Parser(tokenizeExpression(expression), variables).parse();
    if (!Number.isFinite(value)) {
      return err('Result is not a finite number');
    }
    return ok(value);
  } catch (error) {
    if (error instanceof ExpressionError) {
      return err(error.message);
    }
    throw error;
  }
}

/**
 * Variable names an expression reads, in order of first use, without
 * functions and constants
 */
export function expressionVariables(expression: string): Result<string[], string> {
  let tokens: Token[];
  try {
    tokens = tokenizeExpression(expression);
  } catch (error) {
    if (error instanceof ExpressionError) {
      return err(error.message);
    }
    throw error;
  }
  const names: string[] = [];
  for (const token of tokens) {
    if (
      token.kind === 'name' &&
      !Object.prototype.hasOwnProperty.call(FUNCTIONS, token.value) &&
      !Object.prototype.hasOwnProperty.call(CONSTANTS, token.value) &&
      !names.includes(token.value)
    ) {
      names.push(token.value);
    }
  }
  return ok(names);
}

/**
 * Bind a step's variables to numbers: literals as given, strings as
 * scratchpad keys (or numeric text)
 * @throws ToolError INVALID_PARAMETERS when a variable cannot be bound
 */
export function resolveVariables(
  variables: CalculateParameters['variables'],
  scratchpad: Scratchpad
): Record<string, number> {
  const bound: Record<string, number> = {};
  for (const [name, reference] of Object.entries(variables)) {
    if (typeof reference === 'number') {
      bound[name] = reference;
      continue;
    }
    const value = scratchpad[reference];
    if (value === undefined) {
      const literal = Number(reference);
      if (reference.trim().length > 0 && Number.isFinite(literal)) {
        bound[name] = literal;
        continue;
      }
      throw new ToolError('INVALID_PARAMETERS', `Variable ${name} refers to unknown fact "${reference}"`);
    }
    const numeric = typeof value === 'number' ? value : typeof value === 'string' ? Number(value) : NaN;
    if (!Number.isFinite(numeric) || (typeof value === 'string' && value.trim().length === 0)) {
      throw new ToolError('INVALID_PARAMETERS', `Variable ${name} refers to "${reference}", which is not a number`);
    }
    bound[name] = numeric;
  }
  return bound;
}

/**
 * Run a calculate step against the scratchpad
 * @throws ToolError when a variable is unbound or the expression fails
 */
export function runCalculation(parameters: CalculateParameters, scratchpad: Scratchpad): StructuredFacts {
  const variables = resolveVariables(parameters.variables, scratchpad);
  const value = evaluateExpression(parameters.formula, variables);
  if (!value.ok) {
    throw new ToolError('CALCULATION_FAILED', `${parameters.formula}: ${value.error}`);
  }
  return { [parameters.outputVariable]: value.value };
}
