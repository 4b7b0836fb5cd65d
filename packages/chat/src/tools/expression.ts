import { ToolInputError } from '../types/index.js';

const MAX_EXPRESSION_LENGTH = 500;

/** Integer literals stay exact as bigint; anything with a fraction or exponent is a float. */
type Value = number | bigint;

// Caps integer powers; 2 ** 4096 has 1234 digits.
const MAX_INTEGER_BITS = 4096n;

type Token =
  | { readonly kind: 'number'; readonly value: Value; readonly position: number }
  | { readonly kind: 'name'; readonly name: string; readonly position: number }
  | { readonly kind: 'symbol'; readonly symbol: string; readonly position: number };

type MathFunction = {
  readonly minArgs: number;
  readonly maxArgs: number;
  readonly apply: (args: ReadonlyArray<Value>) => Value;
};

function floatFn(fn: (x: number) => number): MathFunction {
  return { minArgs: 1, maxArgs: 1, apply: (args) => fn(toFloat(args[0] ?? Number.NaN)) };
}

function integerFn(fn: (x: number) => number): MathFunction {
  return {
    minArgs: 1,
    maxArgs: 1,
    apply: ([x = Number.NaN]) => (typeof x === 'bigint' ? x : toInteger(fn(x))),
  };
}

function pick(args: ReadonlyArray<Value>, better: (candidate: Value, current: Value) => boolean): Value {
  let result = args[0] ?? Number.NaN;
  for (const arg of args.slice(1)) {
    if (better(arg, result)) {
      result = arg;
    }
  }
  return result;
}

const FUNCTIONS = new Map<string, MathFunction>([
  ['sqrt', floatFn(Math.sqrt)],
  [
    'abs',
    { minArgs: 1, maxArgs: 1, apply: ([x = Number.NaN]) => (typeof x === 'bigint' ? (x < 0n ? -x : x) : Math.abs(x)) },
  ],
  ['round', integerFn(roundHalfEven)],
  ['floor', integerFn(Math.floor)],
  ['ceil', integerFn(Math.ceil)],
  ['exp', floatFn(Math.exp)],
  ['log10', floatFn(Math.log10)],
  ['sin', floatFn(Math.sin)],
  ['cos', floatFn(Math.cos)],
  ['tan', floatFn(Math.tan)],
  ['min', { minArgs: 1, maxArgs: Infinity, apply: (args) => pick(args, (candidate, current) => candidate < current) }],
  ['max', { minArgs: 1, maxArgs: Infinity, apply: (args) => pick(args, (candidate, current) => candidate > current) }],
  ['pow', { minArgs: 2, maxArgs: 2, apply: ([base = Number.NaN, exponent = Number.NaN]) => power(base, exponent) }],
  [
    'log',
    {
      minArgs: 1,
      maxArgs: 2,
      apply: ([x = Number.NaN, base]) =>
        base === undefined ? Math.log(toFloat(x)) : Math.log(toFloat(x)) / Math.log(toFloat(base)),
    },
  ],
]);

const CONSTANTS = new Map<string, number>([
  ['pi', Math.PI],
  ['e', Math.E],
]);

const NUMBER_PATTERN = /^(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/;
const NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*/;
const TWO_CHAR_SYMBOLS = ['**', '//'];
const ONE_CHAR_SYMBOLS = '+-*/%^(),';

function invalid(message: string): ToolInputError {
  return new ToolInputError('InvalidExpression', `Invalid expression: ${message}`, 'expression');
}

function tokenize(source: string): ReadonlyArray<Token> {
  const tokens: Token[] = [];
  let position = 0;

  while (position < source.length) {
    const rest = source.slice(position);
    const char = rest.charAt(0);

    if (/\s/.test(char)) {
      position++;
      continue;
    }

    const numberMatch = NUMBER_PATTERN.exec(rest);
    if (numberMatch) {
      tokens.push({ kind: 'number', value: parseLiteral(numberMatch[0]), position });
      position += numberMatch[0].length;
      continue;
    }

    const nameMatch = NAME_PATTERN.exec(rest);
    if (nameMatch) {
      tokens.push({ kind: 'name', name: nameMatch[0], position });
      position += nameMatch[0].length;
      continue;
    }

    const twoChar = rest.slice(0, 2);
    if (TWO_CHAR_SYMBOLS.includes(twoChar)) {
      tokens.push({ kind: 'symbol', symbol: twoChar, position });
      position += 2;
      continue;
    }

    if (ONE_CHAR_SYMBOLS.includes(char)) {
      tokens.push({ kind: 'symbol', symbol: char, position });
      position++;
      continue;
    }

    throw invalid(`unexpected character '${char}' at position ${position}`);
  }

  return tokens;
}

function parseLiteral(text: string): Value {
  return /^\d+$/.test(text) ? BigInt(text) : Number(text);
}

function toFloat(value: Value): number {
  return typeof value === 'bigint' ? Number(value) : value;
}

function toInteger(value: number): bigint {
  if (!Number.isFinite(value)) {
    throw invalid('result is not a finite number');
  }
  return BigInt(value);
}

/** Halves go to the even neighbour: round(2.5) is 2, round(3.5) is 4. */
function roundHalfEven(x: number): number {
  const floor = Math.floor(x);
  const fraction = x - floor;
  if (fraction > 0.5) {
    return floor + 1;
  }
  if (fraction < 0.5) {
    return floor;
  }
  return floor % 2 === 0 ? floor : floor + 1;
}

function add(left: Value, right: Value): Value {
  return typeof left === 'bigint' && typeof right === 'bigint' ? left + right : toFloat(left) + toFloat(right);
}

function subtract(left: Value, right: Value): Value {
  return typeof left === 'bigint' && typeof right === 'bigint' ? left - right : toFloat(left) - toFloat(right);
}

function multiply(left: Value, right: Value): Value {
  return typeof left === 'bigint' && typeof right === 'bigint' ? left * right : toFloat(left) * toFloat(right);
}

function isZero(value: Value): boolean {
  return typeof value === 'bigint' ? value === 0n : value === 0;
}

function divide(dividend: Value, divisor: Value): number {
  if (isZero(divisor)) {
    throw invalid('division by zero');
  }
  return toFloat(dividend) / toFloat(divisor);
}

// Floor division and modulo round toward negative infinity: -7 // 2 is -4, -7 % 3 is 2.
function floorDivide(dividend: Value, divisor: Value): Value {
  if (typeof dividend === 'bigint' && typeof divisor === 'bigint') {
    if (divisor === 0n) {
      throw invalid('division by zero');
    }
    const quotient = dividend / divisor;
    return dividend % divisor !== 0n && dividend < 0n !== divisor < 0n ? quotient - 1n : quotient;
  }
  return Math.floor(divide(dividend, divisor));
}

function modulo(dividend: Value, divisor: Value): Value {
  if (isZero(divisor)) {
    throw invalid('modulo by zero');
  }
  if (typeof dividend === 'bigint' && typeof divisor === 'bigint') {
    const remainder = dividend % divisor;
    return remainder !== 0n && remainder < 0n !== divisor < 0n ? remainder + divisor : remainder;
  }
  const left = toFloat(dividend);
  const right = toFloat(divisor);
  return left - right * Math.floor(left / right);
}

function power(base: Value, exponent: Value): Value {
  if (typeof base !== 'bigint' || typeof exponent !== 'bigint') {
    return toFloat(base) ** toFloat(exponent);
  }
  if (exponent < 0n) {
    if (base === 0n) {
      throw invalid('division by zero');
    }
    return Number(base) ** Number(exponent);
  }
  if (base === 0n || base === 1n) {
    return exponent === 0n ? 1n : base;
  }
  if (base === -1n) {
    return exponent % 2n === 0n ? 1n : -1n;
  }
  const magnitude = base < 0n ? -base : base;
  // |base| >= 2 ** (bits - 1), so the result has at least (bits - 1) * exponent bits.
  const bits = BigInt(magnitude.toString(2).length);
  if ((bits - 1n) * exponent > MAX_INTEGER_BITS) {
    throw invalid('result is too large');
  }
  return base ** exponent;
}

/**
 * Recursive-descent evaluator, lowest precedence first:
 *   additive       := multiplicative (("+" | "-") multiplicative)*
 *   multiplicative := unary (("*" | "/" | "//" | "%") unary)*
 *   unary          := ("+" | "-") unary | power
 *   power          := primary (("**" | "^") unary)?
 *   primary        := number | constant | name "(" args ")" | "(" additive ")"
 */
class Parser {
  private index = 0;

  constructor(private readonly tokens: ReadonlyArray<Token>) {}

  parse(): Value {
    if (this.tokens.length === 0) {
      throw invalid('expression is empty');
    }

    const value = this.additive();
    const trailing = this.tokens[this.index];
    if (trailing) {
      throw invalid(`unexpected ${describe(trailing)} at position ${trailing.position}`);
    }
    return value;
  }

  private accept(symbol: string): boolean {
    const token = this.tokens[this.index];
    if (token?.kind === 'symbol' && token.symbol === symbol) {
      this.index++;
      return true;
    }
    return false;
  }

  private expect(symbol: string): void {
    if (!this.accept(symbol)) {
      const token = this.tokens[this.index];
      throw invalid(token ? `expected '${symbol}' but found ${describe(token)}` : `expected '${symbol}' at end of input`);
    }
  }

  private additive(): Value {
    let value = this.multiplicative();
    for (;;) {
      if (this.accept('+')) {
        value = add(value, this.multiplicative());
      } else if (this.accept('-')) {
        value = subtract(value, this.multiplicative());
      } else {
        return value;
      }
    }
  }

  private multiplicative(): Value {
    let value = this.unary();
    for (;;) {
      if (this.accept('*')) {
        value = multiply(value, this.unary());
      } else if (this.accept('//')) {
        value = floorDivide(value, this.unary());
      } else if (this.accept('/')) {
        value = divide(value, this.unary());
      } else if (this.accept('%')) {
        value = modulo(value, this.unary());
      } else {
        return value;
      }
    }
  }

  private unary(): Value {
    if (this.accept('-')) {
      return -this.unary();
    }
    if (this.accept('+')) {
      return this.unary();
    }
    return this.power();
  }

  private power(): Value {
    const base = this.primary();
    if (this.accept('**') || this.accept('^')) {
      return power(base, this.unary());
    }
    return base;
  }

  private primary(): Value {
    const token = this.tokens[this.index];
    if (!token) {
      throw invalid('unexpected end of input');
    }
    this.index++;

    switch (token.kind) {
      case 'number':
        return token.value;
      case 'name':
        return this.accept('(') ? this.call(token.name) : constant(token.name);
      case 'symbol':
        if (token.symbol === '(') {
          const value = this.additive();
          this.expect(')');
          return value;
        }
        throw invalid(`unexpected ${describe(token)} at position ${token.position}`);
    }
  }

  private call(name: string): Value {
    const fn = FUNCTIONS.get(name);
    if (!fn) {
      throw invalid(`unknown function '${name}'`);
    }

    const args: Value[] = [];
    if (!this.accept(')')) {
      do {
        args.push(this.additive());
      } while (this.accept(','));
      this.expect(')');
    }

    if (args.length < fn.minArgs || args.length > fn.maxArgs) {
      throw invalid(`wrong number of arguments to ${name}()`);
    }
    return fn.apply(args);
  }
}

function constant(name: string): number {
  const value = CONSTANTS.get(name);
  if (value === undefined) {
    throw invalid(`unknown name '${name}'`);
  }
  return value;
}

function describe(token: Token): string {
  switch (token.kind) {
    case 'number':
      return `number ${token.value}`;
    case 'name':
      return `name '${token.name}'`;
    case 'symbol':
      return `'${token.symbol}'`;
  }
}

/**
 * Evaluates an arithmetic expression without handing it to a JavaScript evaluator
 * and returns the result as text. Integer arithmetic is exact at any size, so
 * 2 ** 53 + 1 prints as 9007199254740993. Throws ToolInputError
 * (InvalidExpression) for anything it cannot evaluate.
 */
export function evaluateExpression(source: string): string {
  if (source.length > MAX_EXPRESSION_LENGTH) {
    throw invalid(`expression is longer than ${MAX_EXPRESSION_LENGTH} characters`);
  }

  const value = new Parser(tokenize(source)).parse();
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (!Number.isFinite(value)) {
    throw invalid('result is not a finite number');
  }
  return formatNumber(value);
}

export function formatNumber(value: number): string {
  return Object.is(value, -0) ? '0' : String(value);
}
