import type {
  AssignmentExpression,
  BinaryExpression,
  BlockStatement,
  CallExpression,
  Expression,
  ExpressionStatement,
  ForStatement,
  FunctionExpression,
  Identifier,
  IfStatement,
  LogicalExpression,
  MemberExpression,
  Pattern,
  ReturnStatement,
  SimpleLiteral,
  Statement,
  UnaryExpression,
  UpdateExpression,
  VariableDeclaration
} from 'estree';

import { escapeScriptStringLiteral } from './script-literal';

/**
 * Minimal ESTree node factories for the control fragment.
 *
 * Nodes are plain objects checked with `satisfies`, so the printer receives
 * exactly the shape written here. String literals always carry a `raw` form
 * produced by {@link escapeScriptStringLiteral}; the printer emits `raw`
 * verbatim instead of re-quoting `value`.
 */

export function identifier(name: string): Identifier {
  return { type: 'Identifier', name } satisfies Identifier;
}

export function stringLiteral(value: string): SimpleLiteral {
  return {
    type: 'Literal',
    value,
    raw: escapeScriptStringLiteral(value, '"')
  } satisfies SimpleLiteral;
}

export function numberLiteral(value: number): SimpleLiteral {
  return { type: 'Literal', value, raw: String(value) } satisfies SimpleLiteral;
}

export function nullLiteral(): SimpleLiteral {
  return { type: 'Literal', value: null, raw: 'null' } satisfies SimpleLiteral;
}

/**
 * `object.name`
 */
export function dot(object: Expression, name: string): MemberExpression {
  return {
    type: 'MemberExpression',
    object,
    property: identifier(name),
    computed: false,
    optional: false
  } satisfies MemberExpression;
}

/**
 * `object[property]`
 */
export function index(
  object: Expression,
  property: Expression
): MemberExpression {
  return {
    type: 'MemberExpression',
    object,
    property,
    computed: true,
    optional: false
  } satisfies MemberExpression;
}

export function call(callee: Expression, args: Expression[]): CallExpression {
  return {
    type: 'CallExpression',
    callee,
    arguments: args,
    optional: false
  } satisfies CallExpression;
}

export function assign(
  left: Pattern | MemberExpression,
  right: Expression
): AssignmentExpression {
  return {
    type: 'AssignmentExpression',
    operator: '=',
    left,
    right
  } satisfies AssignmentExpression;
}

export function binary(
  operator: BinaryExpression['operator'],
  left: Expression,
  right: Expression
): BinaryExpression {
  return { type: 'BinaryExpression', operator, left, right } satisfies BinaryExpression;
}

export function logical(
  operator: LogicalExpression['operator'],
  left: Expression,
  right: Expression
): LogicalExpression {
  return { type: 'LogicalExpression', operator, left, right } satisfies LogicalExpression;
}

export function typeOf(argument: Expression): UnaryExpression {
  return {
    type: 'UnaryExpression',
    operator: 'typeof',
    prefix: true,
    argument
  } satisfies UnaryExpression;
}

export function increment(argument: Identifier): UpdateExpression {
  return {
    type: 'UpdateExpression',
    operator: '++',
    prefix: false,
    argument
  } satisfies UpdateExpression;
}

export function varDeclaration(
  name: string,
  init: Expression
): VariableDeclaration {
  return {
    type: 'VariableDeclaration',
    kind: 'var',
    declarations: [
      { type: 'VariableDeclarator', id: identifier(name), init }
    ]
  } satisfies VariableDeclaration;
}

export function expressionStatement(
  expression: Expression
): ExpressionStatement {
  return { type: 'ExpressionStatement', expression } satisfies ExpressionStatement;
}

export function block(body: Statement[]): BlockStatement {
  return { type: 'BlockStatement', body } satisfies BlockStatement;
}

export function ifStatement(
  test: Expression,
  consequent: Statement[]
): IfStatement {
  return {
    type: 'IfStatement',
    test,
    consequent: block(consequent),
    alternate: null
  } satisfies IfStatement;
}

export function forStatement(
  init: VariableDeclaration,
  test: Expression,
  update: Expression,
  body: Statement[]
): ForStatement {
  return {
    type: 'ForStatement',
    init,
    test,
    update,
    body: block(body)
  } satisfies ForStatement;
}

export function returnStatement(argument: Expression): ReturnStatement {
  return { type: 'ReturnStatement', argument } satisfies ReturnStatement;
}

export function functionExpression(
  params: string[],
  body: Statement[]
): FunctionExpression {
  return {
    type: 'FunctionExpression',
    id: null,
    params: params.map(identifier),
    body: block(body),
    generator: false,
    async: false
  } satisfies FunctionExpression;
}
