import type { ArithmeticOperator, ComparisonOperator, Expression } from './ast.js';
import { CesqlSyntaxError } from './errors.js';
import { FUNCTIONS } from './functions.js';
import { type Token, TokenType, tokenize } from './lexer.js';

const COMPARISON_OPERATORS: ReadonlySet<string> = new Set(['=', '!=', '<>', '<', '<=', '>', '>=']);

/**
 * Recursive-descent parser for the CloudEvents SQL subset.
 *
 * Precedence, lowest first:
 *   OR, XOR, AND, NOT, comparison / LIKE / IN, + -, * / %, unary minus
 */
export class Parser {
  private readonly tokens: Token[];
  private readonly source: string;
  private current = 0;

  constructor(source: string) {
    this.source = source;
    this.tokens = tokenize(source);
  }

  parse(): Expression {
    if (this.peek().type === TokenType.EOF) {
      throw this.error('Empty expression', this.peek());
    }
    const expression = this.parseOr();
    const trailing = this.peek();
    if (trailing.type !== TokenType.EOF) {
      throw this.error(`Unexpected token '${trailing.value}'`, trailing);
    }
    return expression;
  }

  private parseOr(): Expression {
    let left = this.parseXor();
    while (this.matchKeyword('OR')) {
      left = { type: 'Logical', operator: 'OR', left, right: this.parseXor() };
    }
    return left;
  }

  private parseXor(): Expression {
    let left = this.parseAnd();
    while (this.matchKeyword('XOR')) {
      left = { type: 'Logical', operator: 'XOR', left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): Expression {
    let left = this.parseNot();
    while (this.matchKeyword('AND')) {
      left = { type: 'Logical', operator: 'AND', left, right: this.parseNot() };
    }
    return left;
  }

  private parseNot(): Expression {
    if (this.matchKeyword('NOT')) {
      return { type: 'Not', operand: this.parseNot() };
    }
    return this.parsePredicate();
  }

  private parsePredicate(): Expression {
    const left = this.parseAdditive();
    const token = this.peek();

    if (token.type === TokenType.OPERATOR && COMPARISON_OPERATORS.has(token.value)) {
      this.advance();
      return { type: 'Comparison', operator: toComparison(token.value), left, right: this.parseAdditive() };
    }

    const negated = this.matchKeyword('NOT');

    if (this.matchKeyword('LIKE')) {
      const pattern = this.advance();
      if (pattern.type !== TokenType.STRING) {
        throw this.error('LIKE expects a string literal pattern', pattern);
      }
      return { type: 'Like', negated, operand: left, pattern: pattern.value };
    }

    if (this.matchKeyword('IN')) {
      return { type: 'In', negated, operand: left, items: this.parseSet() };
    }

    if (negated) {
      throw this.error("Expected LIKE or IN after 'NOT'", this.peek());
    }
    return left;
  }

  private parseSet(): Expression[] {
    this.expect(TokenType.LPAREN, "Expected '(' to open IN set");
    const items: Expression[] = [this.parseAdditive()];
    while (this.peek().type === TokenType.COMMA) {
      this.advance();
      items.push(this.parseAdditive());
    }
    this.expect(TokenType.RPAREN, "Expected ')' to close IN set");
    return items;
  }

  private parseAdditive(): Expression {
    let left = this.parseMultiplicative();
    for (;;) {
      const token = this.peek();
      if (token.type !== TokenType.OPERATOR) return left;
      const operator = toAdditive(token.value);
      if (operator === null) return left;
      this.advance();
      left = { type: 'Arithmetic', operator, left, right: this.parseMultiplicative() };
    }
  }

  private parseMultiplicative(): Expression {
    let left = this.parseUnary();
    for (;;) {
      const token = this.peek();
      if (token.type !== TokenType.OPERATOR) return left;
      const operator = toMultiplicative(token.value);
      if (operator === null) return left;
      this.advance();
      left = { type: 'Arithmetic', operator, left, right: this.parseUnary() };
    }
  }

  private parseUnary(): Expression {
    const token = this.peek();
    if (token.type === TokenType.OPERATOR && token.value === '-') {
      this.advance();
      return { type: 'Negate', operand: this.parseUnary() };
    }
    return this.parsePrimary();
  }

  private parsePrimary(): Expression {
    const token = this.advance();

    switch (token.type) {
      case TokenType.STRING:
        return { type: 'Literal', value: token.value };

      case TokenType.INTEGER:
        return { type: 'Literal', value: Number.parseInt(token.value, 10) };

      case TokenType.KEYWORD:
        if (token.value === 'TRUE') return { type: 'Literal', value: true };
        if (token.value === 'FALSE') return { type: 'Literal', value: false };
        if (token.value === 'EXISTS') {
          const name = this.advance();
          if (name.type !== TokenType.IDENTIFIER) {
            throw this.error('EXISTS expects an attribute name', name);
          }
          return { type: 'Exists', name: name.value };
        }
        throw this.error(`Unexpected keyword '${token.value}'`, token);

      case TokenType.IDENTIFIER:
        if (this.peek().type === TokenType.LPAREN) {
          return this.parseCall(token);
        }
        return { type: 'Attribute', name: token.value };

      case TokenType.LPAREN: {
        const inner = this.parseOr();
        this.expect(TokenType.RPAREN, "Expected ')'");
        return inner;
      }

      case TokenType.EOF:
        throw this.error('Unexpected end of expression', token);

      default:
        throw this.error(`Unexpected token '${token.value}'`, token);
    }
  }

  private parseCall(nameToken: Token): Expression {
    const name = nameToken.value.toUpperCase();
    const fn = FUNCTIONS.get(name);
    if (fn === undefined) {
      throw this.error(`Unknown function '${nameToken.value}'`, nameToken);
    }

    this.expect(TokenType.LPAREN, "Expected '('");
    const args: Expression[] = [];
    if (this.peek().type !== TokenType.RPAREN) {
      args.push(this.parseOr());
      while (this.peek().type === TokenType.COMMA) {
        this.advance();
        args.push(this.parseOr());
      }
    }
    this.expect(TokenType.RPAREN, "Expected ')' to close function call");

    if (args.length < fn.minArgs || args.length > fn.maxArgs) {
      throw this.error(`Function ${name} does not take ${args.length} argument(s)`, nameToken);
    }
    return { type: 'Call', name, args };
  }

  private peek(): Token {
    const token = this.tokens[this.current];
    if (token === undefined) {
      throw new CesqlSyntaxError('Unexpected end of expression', this.source, this.source.length);
    }
    return token;
  }

  private advance(): Token {
    const token = this.peek();
    if (token.type !== TokenType.EOF) this.current++;
    return token;
  }

  private matchKeyword(keyword: string): boolean {
    const token = this.peek();
    if (token.type === TokenType.KEYWORD && token.value === keyword) {
      this.current++;
      return true;
    }
    return false;
  }

  private expect(type: TokenType, message: string): Token {
    const token = this.peek();
    if (token.type !== type) throw this.error(message, token);
    this.current++;
    return token;
  }

  private error(message: string, token: Token): CesqlSyntaxError {
    return new CesqlSyntaxError(message, this.source, token.offset);
  }
}

function toComparison(value: string): ComparisonOperator {
  switch (value) {
    case '=':
    case '!=':
    case '<>':
    case '<':
    case '<=':
    case '>':
    case '>=':
      return value;
    default:
      throw new Error(`Not a comparison operator: ${value}`);
  }
}

function toAdditive(value: string): ArithmeticOperator | null {
  return value === '+' || value === '-' ? value : null;
}

function toMultiplicative(value: string): ArithmeticOperator | null {
  switch (value) {
    case '*':
    case '/':
    case '%':
      return value;
    default:
      return null;
  }
}

export function parse(source: string): Expression {
  return new Parser(source).parse();
}
