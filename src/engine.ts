// src/engine.ts - Expression engine facade: lex -> postfix -> evaluate
import { Result, Token } from './types';
import { lex } from './lexer';
import { toPostfix } from './parser';
import { evalPostfix } from './evaluator';
import { EvaluationContext, lookupVariable } from './context';
import { describeError, fail, ok } from './errors';

/**
 * Lexes and converts `text` to postfix order without evaluating it.
 */
export function compile(text: string, context: EvaluationContext): Result<Token[]> {
  const { maxInputLength, maxTokens } = context.limits;
  if (text.length > maxInputLength) {
    return fail('ExpressionTooLong', `${maxInputLength} characters`);
  }
  const tokens = lex(text, maxTokens);
  if (!tokens.ok) return tokens;
  return toPostfix(tokens.value);
}

/**
 * Evaluates `text` in `context`. Leaves `context.lastResult` untouched.
 */
export function evaluate(text: string, context: EvaluationContext): Result<number> {
  const postfix = compile(text, context);
  if (!postfix.ok) return postfix;
  const result = evalPostfix(postfix.value, (name) => lookupVariable(context, name), {
    angleMode: context.angleMode,
    maxStack: context.limits.maxStack,
  });
  if (!result.ok) return result;
  if (!Number.isFinite(result.value)) return fail('NonFiniteResult');
  return ok(result.value);
}

/**
 * Evaluates a user-entered expression; on success the value becomes `ans`.
 */
export function evaluateTopLevel(text: string, context: EvaluationContext): Result<number> {
  const result = evaluate(text, context);
  if (result.ok) {
    context.lastResult = result.value;
    context.logger.debug(`evaluate "${text}" = ${result.value}`);
  } else {
    context.logger.debug(`evaluate "${text}" failed: ${describeError(result.error)}`);
  }
  return result;
}

/**
 * Evaluates `text` with `name` bound to `value`, then restores the store
 * to exactly its previous state, whatever the outcome.
 */
export function evaluateWith(
  text: string,
  context: EvaluationContext,
  name: string,
  value: number
): Result<number> {
  // Identifiers lex in lower case, so bind the name the same way
  const key = name.toLowerCase();
  if (key === 'ans') {
    return fail('InvalidArgument', "'ans' cannot be used as the bound variable");
  }
  const { store } = context;
  const previous = store.get(key);
  if (!store.set(key, value)) {
    return fail('VariableStoreFull', key);
  }
  try {
    return evaluate(text, context);
  } finally {
    if (previous === undefined) store.delete(key);
    else store.set(key, previous);
  }
}
