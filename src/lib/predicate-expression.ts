import { ExpressionSyntaxError } from './errors.js';
import { SqlId } from './sql-identifiers.js';
import { isEntity } from './type-classifier.js';

export type LiteralValue = string | number | boolean | null;

export type ComparisonSymbol = '==' | '!=' | '<' | '<=' | '>' | '>=';

export type ExpressionNode =
  | { type: 'member'; name: string; position: number }
  | { type: 'literal'; value: LiteralValue; position: number }
  | { type: 'placeholder'; index: number; position: number }
  | {
      type: 'comparison';
      operator: ComparisonSymbol;
      left: ExpressionNode;
      right: ExpressionNode;
      position: number;
    }
  | {
      type: 'logical';
      operator: '&&' | '||';
      left: ExpressionNode;
      right: ExpressionNode;
      position: number;
    }
  | { type: 'not'; operand: ExpressionNode; position: number };

type TokenType = 'identifier' | 'string' | 'number' | 'placeholder' | 'operator' | 'end';

interface Token {
  type: TokenType;
  text: string;
  position: number;
}

const OPERATORS = ['===', '!==', '=>', '==', '!=', '<=', '>=', '&&', '||', '<', '>', '!', '(', ')', '.', '-'];

const IDENTIFIER_START = /[A-Za-z_$]/;
const IDENTIFIER_PART = /[A-Za-z0-9_$]/;
const DIGIT = /[0-9]/;

function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let index = 0;

  while (index < source.length) {
    const char = source.charAt(index);

    if (/\s/.test(char)) {
      index += 1;
      continue;
    }

    if (char === '"' || char === "'") {
      const start = index;
      let value = '';
      index += 1;
      let closed = false;
      while (index < source.length) {
        const current = source.charAt(index);
        if (current === '\\' && index + 1 < source.length) {
          value += source.charAt(index + 1);
          index += 2;
          continue;
        }
        if (current === char) {
          closed = true;
          index += 1;
          break;
        }
        value += current;
        index += 1;
      }
      if (!closed) {
        throw new ExpressionSyntaxError('Unterminated string literal', start);
      }
      tokens.push({ type: 'string', text: value, position: start });
      continue;
    }

    if (DIGIT.test(char)) {
      const start = index;
      while (index < source.length && DIGIT.test(source.charAt(index))) index += 1;
      if (source.charAt(index) === '.' && DIGIT.test(source.charAt(index + 1))) {
        index += 1;
        while (index < source.length && DIGIT.test(source.charAt(index))) index += 1;
      }
      tokens.push({ type: 'number', text: source.slice(start, index), position: start });
      continue;
    }

    if (char === '{') {
      const match = /^\{(\d+)\}/.exec(source.slice(index));
      if (!match?.[1]) {
        throw new ExpressionSyntaxError("Expected a placeholder such as '{0}'", index);
      }
      tokens.push({ type: 'placeholder', text: match[1], position: index });
      index += match[0].length;
      continue;
    }

    if (IDENTIFIER_START.test(char)) {
      const start = index;
      while (index < source.length && IDENTIFIER_PART.test(source.charAt(index))) index += 1;
      tokens.push({ type: 'identifier', text: source.slice(start, index), position: start });
      continue;
    }

    const operator = OPERATORS.find(candidate => source.startsWith(candidate, index));
    if (!operator) {
      throw new ExpressionSyntaxError(`Unexpected character '${char}'`, index);
    }
    const normalized = operator === '===' ? '==' : operator === '!==' ? '!=' : operator;
    tokens.push({ type: 'operator', text: normalized, position: index });
    index += operator.length;
  }

  tokens.push({ type: 'end', text: '', position: source.length });
  return tokens;
}

const COMPARISONS: readonly string[] = ['==', '!=', '<', '<=', '>', '>='];

const isComparisonSymbol = (text: string): text is ComparisonSymbol => COMPARISONS.includes(text);

// Entities bind by primary key.
const boundValue = (value: unknown): unknown => (isEntity(value) ? value.id : value);

const isValueNode = (node: ExpressionNode): boolean =>
  node.type === 'member' || node.type === 'literal' || node.type === 'placeholder';

class Parser {
  private readonly tokens: Token[];
  private index = 0;
  private parameter: string | null = null;

  constructor(source: string) {
    this.tokens = tokenize(source);
  }

  parse(): ExpressionNode {
    const [first, second] = this.tokens;
    if (first?.type === 'identifier' && second?.type === 'operator' && second.text === '=>') {
      this.parameter = first.text;
      this.index = 2;
    } else if (
      first?.type === 'operator' &&
      first.text === '(' &&
      this.tokens[1]?.type === 'identifier' &&
      this.tokens[2]?.text === ')' &&
      this.tokens[3]?.text === '=>'
    ) {
      this.parameter = this.tokens[1].text;
      this.index = 4;
    }

    const node = this.parseOr();
    const rest = this.peek();
    if (rest.type !== 'end') {
      throw new ExpressionSyntaxError(`Unexpected '${rest.text}'`, rest.position);
    }
    return node;
  }

  private peek(): Token {
    return this.tokens[this.index] ?? { type: 'end', text: '', position: 0 };
  }

  private next(): Token {
    const token = this.peek();
    this.index += 1;
    return token;
  }

  private isOperator(text: string): boolean {
    const token = this.peek();
    return token.type === 'operator' && token.text === text;
  }

  private expect(text: string): Token {
    const token = this.next();
    if (token.type !== 'operator' || token.text !== text) {
      throw new ExpressionSyntaxError(
        `Expected '${text}' but found '${token.text || 'end of input'}'`,
        token.position
      );
    }
    return token;
  }

  private parseOr(): ExpressionNode {
    let left = this.parseAnd();
    while (this.isOperator('||')) {
      const { position } = this.next();
      left = { type: 'logical', operator: '||', left, right: this.parseAnd(), position };
    }
    return left;
  }

  private parseAnd(): ExpressionNode {
    let left = this.parseUnary();
    while (this.isOperator('&&')) {
      const { position } = this.next();
      left = { type: 'logical', operator: '&&', left, right: this.parseUnary(), position };
    }
    return left;
  }

  private parseUnary(): ExpressionNode {
    if (this.isOperator('!')) {
      const { position } = this.next();
      return { type: 'not', operand: this.parseUnary(), position };
    }
    return this.parseComparison();
  }

  private parseComparison(): ExpressionNode {
    const left = this.parseOperand();
    const token = this.peek();
    if (token.type !== 'operator' || !isComparisonSymbol(token.text)) {
      return left;
    }
    const operator = token.text;
    this.next();
    const right = this.parseOperand();
    if (!isValueNode(left) || !isValueNode(right)) {
      throw new ExpressionSyntaxError('Only values can be compared', token.position);
    }
    return { type: 'comparison', operator, left, right, position: token.position };
  }

  private parseOperand(): ExpressionNode {
    const token = this.next();

    switch (token.type) {
      case 'string':
        return { type: 'literal', value: token.text, position: token.position };
      case 'number':
        return { type: 'literal', value: Number(token.text), position: token.position };
      case 'placeholder':
        return { type: 'placeholder', index: Number(token.text), position: token.position };
      case 'identifier':
        return this.parseIdentifier(token);
      case 'operator':
        if (token.text === '(') {
          const inner = this.parseOr();
          this.expect(')');
          return inner;
        }
        if (token.text === '-') {
          const number = this.next();
          if (number.type !== 'number') {
            throw new ExpressionSyntaxError("Expected a number after '-'", number.position);
          }
          return { type: 'literal', value: -Number(number.text), position: token.position };
        }
        break;
      case 'end':
        throw new ExpressionSyntaxError('Unexpected end of expression', token.position);
    }
    throw new ExpressionSyntaxError(`Unexpected '${token.text}'`, token.position);
  }

  private parseIdentifier(token: Token): ExpressionNode {
    if (token.text === 'true' || token.text === 'false') {
      return { type: 'literal', value: token.text === 'true', position: token.position };
    }
    if (token.text === 'null') {
      return { type: 'literal', value: null, position: token.position };
    }

    if (this.parameter !== null) {
      if (token.text !== this.parameter) {
        throw new ExpressionSyntaxError(
          `Unknown identifier '${token.text}', members must be accessed through '${this.parameter}'`,
          token.position
        );
      }
      this.expect('.');
      const member = this.next();
      if (member.type !== 'identifier') {
        throw new ExpressionSyntaxError('Expected a property name', member.position);
      }
      return { type: 'member', name: member.text, position: member.position };
    }

    if (this.isOperator('.')) {
      this.next();
      const member = this.next();
      if (member.type !== 'identifier') {
        throw new ExpressionSyntaxError('Expected a property name', member.position);
      }
      return { type: 'member', name: member.text, position: member.position };
    }

    return { type: 'member', name: token.text, position: token.position };
  }
}

/**
 * Parse a predicate such as `u => u.name == {0} && !u.active`.
 */
export function parseExpression(source: string): ExpressionNode {
  if (typeof source !== 'string' || source.trim() === '') {
    throw new ExpressionSyntaxError('Expression is empty', 0);
  }
  return new Parser(source).parse();
}

export type CompileMode = 'where' | 'like';

export interface CompileOptions {
  /** Map a property name to its column, or null when unknown. */
  resolveColumn: (property: string) => string | null;
  params?: readonly unknown[];
  mode?: CompileMode;
}

/**
 * A builder fragment: `{n}` placeholders plus their arguments.
 */
export interface CompiledFragment {
  format: string;
  args: unknown[];
}

class FragmentCompiler {
  private readonly args: unknown[] = [];
  private readonly options: CompileOptions;

  constructor(options: CompileOptions) {
    this.options = options;
  }

  compile(node: ExpressionNode): CompiledFragment {
    const format = this.condition(node, false);
    return { format, args: this.args };
  }

  private arg(value: unknown): string {
    this.args.push(value);
    return `{${this.args.length - 1}}`;
  }

  private column(node: { name: string; position: number }): SqlId {
    const column = this.options.resolveColumn(node.name);
    if (!column) {
      throw new ExpressionSyntaxError(`Unknown property '${node.name}'`, node.position);
    }
    return new SqlId(column);
  }

  private placeholderValue(node: { index: number; position: number }): unknown {
    const params = this.options.params ?? [];
    if (node.index >= params.length) {
      throw new ExpressionSyntaxError(`No value supplied for {${node.index}}`, node.position);
    }
    return boundValue(params[node.index]);
  }

  private isNullValue(node: ExpressionNode): boolean {
    if (node.type === 'literal') return node.value === null;
    if (node.type === 'placeholder') {
      const value = this.placeholderValue(node);
      return value === null || value === undefined;
    }
    return false;
  }

  private value(node: ExpressionNode): string {
    switch (node.type) {
      case 'member':
        return this.arg(this.column(node));
      case 'literal':
        return this.arg(node.value);
      case 'placeholder':
        return this.arg(this.placeholderValue(node));
      default:
        throw new ExpressionSyntaxError('Expected a value', node.position);
    }
  }

  private condition(node: ExpressionNode, nested: boolean): string {
    switch (node.type) {
      case 'logical': {
        const keyword = node.operator === '&&' ? 'AND' : 'OR';
        const sql = `${this.condition(node.left, true)} ${keyword} ${this.condition(node.right, true)}`;
        return nested ? `(${sql})` : sql;
      }
      case 'not':
        return `NOT (${this.condition(node.operand, false)})`;
      case 'comparison':
        return this.comparison(node);
      case 'member':
        return `${this.arg(this.column(node))} = TRUE`;
      case 'literal':
        if (typeof node.value === 'boolean') {
          return node.value ? 'TRUE' : 'FALSE';
        }
        throw new ExpressionSyntaxError('A literal cannot be used as a condition', node.position);
      case 'placeholder':
        return `${this.arg(this.placeholderValue(node))} = TRUE`;
    }
  }

  private comparison(node: Extract<ExpressionNode, { type: 'comparison' }>): string {
    const { operator, left, right } = node;
    const leftNull = this.isNullValue(left);
    const rightNull = this.isNullValue(right);

    if (leftNull || rightNull) {
      if (operator !== '==' && operator !== '!=') {
        throw new ExpressionSyntaxError(`Cannot apply '${operator}' to null`, node.position);
      }
      const suffix = operator === '==' ? 'IS NULL' : 'IS NOT NULL';
      if (leftNull && rightNull) {
        return operator === '==' ? 'TRUE' : 'FALSE';
      }
      return `${this.value(leftNull ? right : left)} ${suffix}`;
    }

    const like = this.options.mode === 'like';
    let sqlOperator: string;
    switch (operator) {
      case '==':
        sqlOperator = like ? 'LIKE' : '=';
        break;
      case '!=':
        sqlOperator = like ? 'NOT LIKE' : '<>';
        break;
      default:
        sqlOperator = operator;
    }
    return `${this.value(left)} ${sqlOperator} ${this.value(right)}`;
  }
}

/**
 * Compile a parsed predicate into a WHERE fragment.
 */
export function compilePredicate(node: ExpressionNode, options: CompileOptions): CompiledFragment {
  return new FragmentCompiler(options).compile(node);
}

function collectAssignments(
  node: ExpressionNode,
  options: CompileOptions,
  into: Record<string, unknown>
): void {
  if (node.type === 'logical' && node.operator === '&&') {
    collectAssignments(node.left, options, into);
    collectAssignments(node.right, options, into);
    return;
  }

  if (node.type !== 'comparison' || node.operator !== '==') {
    throw new ExpressionSyntaxError(
      "Assignments must be 'member == value' terms joined by '&&'",
      node.position
    );
  }

  const { left, right } = node;
  const [member, value] =
    left.type === 'member' ? [left, right] : right.type === 'member' ? [right, left] : [null, null];
  if (!member || !value || value.type === 'member') {
    throw new ExpressionSyntaxError(
      'Each assignment needs exactly one property and one value',
      node.position
    );
  }

  const column = options.resolveColumn(member.name);
  if (!column) {
    throw new ExpressionSyntaxError(`Unknown property '${member.name}'`, member.position);
  }

  if (value.type === 'literal') {
    into[column] = value.value;
  } else if (value.type === 'placeholder') {
    const params = options.params ?? [];
    if (value.index >= params.length) {
      throw new ExpressionSyntaxError(`No value supplied for {${value.index}}`, value.position);
    }
    into[column] = boundValue(params[value.index]);
  } else {
    throw new ExpressionSyntaxError('Expected a value', value.position);
  }
}

/**
 * Compile `e => e.a == 1 && e.b == {0}` into column assignments for SET.
 */
export function compileAssignments(
  node: ExpressionNode,
  options: CompileOptions
): Record<string, unknown> {
  const assignments: Record<string, unknown> = {};
  collectAssignments(node, options, assignments);
  return assignments;
}
