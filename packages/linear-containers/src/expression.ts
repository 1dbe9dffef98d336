import { ArrayStack } from './array-stack.js';
import { ExpressionError } from './errors.js';
import type { Operator } from './types.js';

// Precedência maior liga mais forte; '^' é o único associativo à direita
const PRECEDENCE: Record<Operator, number> = { '+': 1, '-': 1, '*': 2, '/': 2, '^': 3 };

function isOperator(char: string): char is Operator {
  return Object.prototype.hasOwnProperty.call(PRECEDENCE, char);
}

function isOperand(char: string): boolean {
  return /^[A-Za-z0-9]$/.test(char);
}

function isDigit(char: string): boolean {
  return char >= '0' && char <= '9';
}

/** Inverte a expressão trocando '(' por ')' e vice-versa */
function mirror(expression: string): string {
  let out = '';
  for (let i = expression.length - 1; i >= 0; i--) {
    const char = expression[i];
    out += char === '(' ? ')' : char === ')' ? '(' : char;
  }
  return out;
}

/**
 * Shunting-yard. `mirrored` indica que a entrada já foi espelhada para gerar
 * prefixa: nesse caso a regra de associatividade se inverte.
 */
function toPostfix(expression: string, mirrored: boolean): string {
  const operators = new ArrayStack<string>();
  let output = '';

  // Índice e parêntese como aparecem na entrada original
  const at = (i: number): number => (mirrored ? expression.length - 1 - i : i);
  const open = mirrored ? ')' : '(';
  const close = mirrored ? '(' : ')';

  for (let i = 0; i < expression.length; i++) {
    const char = expression[i];
    if (char === ' ') continue;

    if (isOperand(char)) {
      output += char;
    } else if (char === '(') {
      operators.push(char);
    } else if (char === ')') {
      while (!operators.isEmpty() && operators.top() !== '(') {
        output += operators.pop();
      }
      if (operators.isEmpty()) {
        throw new ExpressionError(`Unbalanced '${close}' at index ${at(i)}`, at(i));
      }
      operators.pop();
    } else if (isOperator(char)) {
      const rightAssoc = char === '^';
      // Sem espelhar, '^' não desempilha o igual; espelhado, só ele desempilha
      const popOnEqual = mirrored ? rightAssoc : !rightAssoc;
      while (!operators.isEmpty()) {
        const top = operators.top();
        if (!isOperator(top)) break;
        const diff = PRECEDENCE[top] - PRECEDENCE[char];
        if (diff > 0 || (diff === 0 && popOnEqual)) {
          output += operators.pop();
        } else {
          break;
        }
      }
      operators.push(char);
    } else {
      throw new ExpressionError(`Unexpected character '${char}' at index ${at(i)}`, at(i));
    }
  }

  while (!operators.isEmpty()) {
    const top = operators.pop();
    if (top === '(') {
      throw new ExpressionError(`Unbalanced '${open}'`);
    }
    output += top;
  }
  return output;
}

function apply(operator: Operator, left: number, right: number): number {
  switch (operator) {
    case '+':
      return left + right;
    case '-':
      return left - right;
    case '*':
      return left * right;
    case '/':
      return left / right;
    case '^':
      return left ** right;
  }
}

/** Lê os tokens na ordem dada; `prefix` troca a ordem dos operandos desempilhados */
function evaluate(tokens: string, prefix: boolean): number {
  const stack = new ArrayStack<number>();

  for (const char of tokens) {
    if (char === ' ') continue;
    if (isDigit(char)) {
      stack.push(Number(char));
    } else if (isOperator(char)) {
      if (stack.size < 2) {
        throw new ExpressionError(`Operator '${char}' is missing an operand`);
      }
      const a = stack.pop();
      const b = stack.pop();
      stack.push(prefix ? apply(char, a, b) : apply(char, b, a));
    } else {
      throw new ExpressionError(`Cannot evaluate token '${char}'`);
    }
  }

  if (stack.size !== 1) {
    throw new ExpressionError(
      stack.isEmpty() ? 'Empty expression' : `Expression leaves ${stack.size} operands`,
    );
  }
  return stack.pop();
}

// ─── Public API ──────────────────────────────────────────────

/**
 * Converts an infix expression to postfix, e.g. `a+b*(c-d)` to `abcd-*+`.
 * Operands are single letters or digits; spaces are ignored.
 */
export function infixToPostfix(expression: string): string {
  return toPostfix(expression, false);
}

/** Converts an infix expression to prefix, e.g. `a+b*(c-d)` to `+a*b-cd`. */
export function infixToPrefix(expression: string): string {
  const reversedPostfix = toPostfix(mirror(expression), true);
  return [...reversedPostfix].reverse().join('');
}

/** Evaluates a postfix expression of single-digit operands, e.g. `23*4+` is 10. */
export function evaluatePostfix(expression: string): number {
  return evaluate(expression, false);
}

/** Evaluates a prefix expression of single-digit operands, e.g. `+*234` is 10. */
export function evaluatePrefix(expression: string): number {
  return evaluate(mirror(expression), true);
}
