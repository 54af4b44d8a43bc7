/**
 * Interpreter: postfix arithmetic parsed into a tagged expression tree and evaluated.
 */
import type { ExampleDescription, PatternExample } from '../../core/contract/types.js';
import { requireSetup } from '../shared.js';

type Expr =
  | { kind: 'num'; value: number }
  | { kind: 'var'; name: string }
  | { kind: 'add'; left: Expr; right: Expr }
  | { kind: 'mul'; left: Expr; right: Expr };

function parsePostfix(source: string): Expr {
  const stack: Expr[] = [];
  for (const token of source.trim().split(/\s+/)) {
    if (token === '+' || token === '*') {
      const right = stack.pop();
      const left = stack.pop();
      if (!left || !right) {
        throw new Error(`Operator "${token}" is missing an operand in "${source}"`);
      }
      stack.push(token === '+' ? { kind: 'add', left, right } : { kind: 'mul', left, right });
    } else if (/^\d+$/.test(token)) {
      stack.push({ kind: 'num', value: Number(token) });
    } else {
      stack.push({ kind: 'var', name: token });
    }
  }
  const [expr, ...rest] = stack;
  if (!expr || rest.length > 0) {
    throw new Error(`"${source}" does not reduce to one expression`);
  }
  return expr;
}

function evaluate(expr: Expr, variables: ReadonlyMap<string, number>): number {
  switch (expr.kind) {
    case 'num':
      return expr.value;
    case 'var': {
      const value = variables.get(expr.name);
      if (value === undefined) {
        throw new Error(`Unbound variable "${expr.name}"`);
      }
      return value;
    }
    case 'add':
      return evaluate(expr.left, variables) + evaluate(expr.right, variables);
    case 'mul':
      return evaluate(expr.left, variables) * evaluate(expr.right, variables);
  }
}

function show(expr: Expr): string {
  switch (expr.kind) {
    case 'num':
      return String(expr.value);
    case 'var':
      return expr.name;
    case 'add':
      return `(${show(expr.left)} + ${show(expr.right)})`;
    case 'mul':
      return `(${show(expr.left)} * ${show(expr.right)})`;
  }
}

export const INTERPRETER_OUTCOME = ['((x * 2) + y) = 10', '(2 * (3 + 4)) = 14'];

export class InterpreterExample implements PatternExample {
  private programs?: Expr[];
  private readonly variables = new Map([
    ['x', 3],
    ['y', 4],
  ]);

  setup(): void {
    this.programs ??= ['x 2 * y +', '2 3 4 + *'].map(parsePostfix);
  }

  run(): readonly string[] {
    return requireSetup(this.programs, 'Interpreter').map(
      (expr) => `${show(expr)} = ${evaluate(expr, this.variables)}`
    );
  }

  describe(): ExampleDescription {
    return {
      name: 'Interpreter',
      intent: 'Represent a grammar and interpret sentences in that language',
    };
  }
}
