// src/commands.ts - Slash-command handlers
import { Result } from './types';
import { EvaluationContext } from './context';
import { History } from './history';
import { compile, evaluate } from './engine';
import { formatPostfix } from './parser';
import { derivative, solveNewton, integrateSimpson, DEFAULT_DIFF_STEP } from './numeric';
import { samplePlot, renderPlot } from './plot';
import { calcError, describeError, fail, ok } from './errors';
import { formatExponential, formatNumber, toBinary, toHex } from './format';
import { lookupFunction } from './functions';
import { MAX_IDENTIFIER_LENGTH } from './lexer';

/**
 * Session Reply: What a line of input produced.
 */
export interface SessionReply {
  message: string; // One-line status
  output: string[]; // Extra lines (listings, plots)
  quit: boolean;
  failed: boolean; // Drives the one-shot exit code
}

/**
 * Command Target: Session state the commands read and change.
 */
export interface CommandTarget {
  context: EvaluationContext;
  history: History;
  memory: number;
}

export type CommandHandler = (
  args: string,
  target: CommandTarget
) => SessionReply | Promise<SessionReply>;

export const commandRegistry = new Map<string, CommandHandler>();

export function registerCommand(name: string, handler: CommandHandler): void {
  commandRegistry.set(name, handler);
}

export function reply(message: string, output: string[] = []): SessionReply {
  return { message, output, quit: false, failed: false };
}

export function failure(message: string): SessionReply {
  return { message, output: [], quit: false, failed: true };
}

export const HELP_TEXT =
  'Commands: /deg /rad /mc /mr /m+ [v] /m- [v] /history /save f /let x=expr /vars /del x ' +
  '/diff e v x0 [h] /solve e v x0 [maxit tol] /integ e v a b [n] /plot e v xmin xmax [w h] ' +
  '/hex n /bin n /rpn e /quit';

function words(args: string): string[] {
  return args.split(/\s+/).filter((w) => w.length > 0);
}

/**
 * Checks a user-supplied variable name and folds it to lower case,
 * the form the lexer produces for identifiers.
 */
export function validateName(raw: string): Result<string> {
  if (!/^[A-Za-z_]+$/.test(raw)) {
    return fail('InvalidArgument', `Invalid variable name '${raw}' (letters and _ only)`);
  }
  if (raw.length > MAX_IDENTIFIER_LENGTH) {
    return fail('IdentifierTooLong', raw);
  }
  const name = raw.toLowerCase();
  if (lookupFunction(name)) {
    return fail('InvalidArgument', `'${name}' is a function name`);
  }
  return ok(name);
}

// Numeric arguments are expressions themselves, so `-pi` or `2^10` work
function numberArg(text: string, label: string, context: EvaluationContext): Result<number> {
  const value = evaluate(text, context);
  if (!value.ok) {
    return fail('InvalidArgument', `Invalid ${label} '${text}': ${value.error.message}`);
  }
  return value;
}

function integerArg(text: string, label: string, context: EvaluationContext): Result<number> {
  const value = numberArg(text, label, context);
  return value.ok ? ok(Math.trunc(value.value)) : value;
}

function usage(text: string): SessionReply {
  return failure(`Usage: ${text}`);
}

interface MethodArgs {
  expr: string;
  name: string;
  numbers: number[];
}

interface ArgSpec {
  label: string;
  integer?: boolean;
}

/**
 * Splits `<expr> <var> <n1> ... [optional...]` and evaluates the numeric arguments.
 */
function methodArgs(
  args: string,
  specs: ArgSpec[],
  required: number,
  context: EvaluationContext
): Result<MethodArgs> {
  const [expr, rawName, ...rest] = words(args);
  if (!expr) return fail('InvalidArgument', 'Missing arguments');
  if (!rawName) return fail('InvalidArgument', 'Missing <var>');
  const name = validateName(rawName);
  if (!name.ok) return name;
  if (rest.length < required) {
    return fail('InvalidArgument', `Missing <${specs[rest.length].label}>`);
  }
  if (rest.length > specs.length) {
    return fail('InvalidArgument', `Unexpected argument '${rest[specs.length]}'`);
  }
  const numbers: number[] = [];
  for (let i = 0; i < rest.length; i++) {
    const { label, integer } = specs[i];
    const value = integer ? integerArg(rest[i], label, context) : numberArg(rest[i], label, context);
    if (!value.ok) return value;
    numbers.push(value.value);
  }
  return ok({ expr, name: name.value, numbers });
}

registerCommand('/help', () => reply(HELP_TEXT));

registerCommand('/deg', (_args, { context }) => {
  context.angleMode = 'deg';
  context.logger.info('angle mode set to deg');
  return reply('Angle mode: DEG');
});

registerCommand('/rad', (_args, { context }) => {
  context.angleMode = 'rad';
  context.logger.info('angle mode set to rad');
  return reply('Angle mode: RAD');
});

registerCommand('/mc', (_args, target) => {
  target.memory = 0;
  return reply('Memory cleared');
});

registerCommand('/mr', (_args, target) => {
  target.context.lastResult = target.memory;
  return reply(`MR = ${formatNumber(target.memory)}`);
});

function memoryUpdate(sign: 1 | -1): CommandHandler {
  return (args, target) => {
    let value = target.context.lastResult;
    if (args.trim()) {
      const parsed = numberArg(args.trim(), 'value', target.context);
      if (!parsed.ok) return failure(parsed.error.message);
      value = parsed.value;
    }
    target.memory += sign * value;
    const op = sign > 0 ? '+=' : '-=';
    return reply(`M ${op} ${formatNumber(value)} -> ${formatNumber(target.memory)}`);
  };
}

registerCommand('/m+', memoryUpdate(1));
registerCommand('/m-', memoryUpdate(-1));

registerCommand('/history', (_args, { history }) => reply('', history.format()));

registerCommand('/save', async (args, { history, context }) => {
  const file = args.trim();
  if (!file) return usage('/save <file>');
  try {
    await history.save(file);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    context.logger.error(`history save to ${file} failed: ${reason}`);
    return failure(`Save failed: ${reason}`);
  }
  context.logger.info(`history saved to ${file}`);
  return reply(`History saved: ${file}`);
});

registerCommand('/vars', (_args, { context }) => {
  const entries = context.store.entries();
  const lines = ['Variables:'];
  if (entries.length === 0) lines.push('  (none)');
  for (const [name, value] of entries) {
    lines.push(`  ${name.padEnd(8)} = ${formatNumber(value)}`);
  }
  lines.push(`  ${'ans'.padEnd(8)} = ${formatNumber(context.lastResult)}`);
  return reply('', lines);
});

registerCommand('/del', (args, { context }) => {
  const raw = args.trim();
  if (!raw) return usage('/del <name>');
  const name = raw.toLowerCase();
  if (context.store.delete(name)) {
    context.logger.info(`deleted variable ${name}`);
    return reply(`Deleted variable: ${name}`);
  }
  return failure(`No such variable: ${name}`);
});

// Accepts "/let x=expr" and "/let x expr"
registerCommand('/let', (args, { context }) => {
  const text = args.trim();
  if (!text) return usage('/let <name>=<expr> or /let <name> <expr>');
  let rawName: string;
  let rhs: string;
  const eq = text.indexOf('=');
  if (eq >= 0) {
    rawName = text.slice(0, eq).trim();
    rhs = text.slice(eq + 1).trim();
  } else {
    const space = text.search(/\s/);
    if (space < 0) return usage('/let <name> <expr>');
    rawName = text.slice(0, space);
    rhs = text.slice(space + 1).trim();
  }
  const name = validateName(rawName);
  if (!name.ok) return failure(`Assignment failed: ${name.error.message}`);
  const value = evaluate(rhs, context);
  if (!value.ok) return failure(`Assignment failed: ${describeError(value.error)}`);
  if (name.value === 'ans') {
    context.lastResult = value.value;
  } else if (!context.store.set(name.value, value.value)) {
    return failure(`Assignment failed: ${calcError('VariableStoreFull', name.value).message}`);
  }
  context.logger.info(`set ${name.value} = ${value.value}`);
  return reply(`${name.value} = ${formatNumber(value.value)}`);
});

registerCommand('/diff', (args, { context }) => {
  if (!args.trim()) return usage('/diff <expr> <var> <x0> [h]');
  const parsed = methodArgs(args, [{ label: 'x0' }, { label: 'h' }], 1, context);
  if (!parsed.ok) return failure(`/diff failed: ${parsed.error.message}`);
  const { expr, name, numbers } = parsed.value;
  const [x0, h = DEFAULT_DIFF_STEP] = numbers;
  const d = derivative(expr, context, name, x0, h);
  if (!d.ok) return failure(`/diff failed: ${describeError(d.error)}`);
  if (!Number.isFinite(d.value)) return failure('/diff failed: derivative is not finite');
  return reply(
    `d/d${name} ${expr} | ${name}=${formatNumber(x0, 6)} ≈ ${formatNumber(d.value)} (h=${formatExponential(h)})`
  );
});

registerCommand('/solve', (args, { context }) => {
  if (!args.trim()) return usage('/solve <expr> <var> <x0> [maxit tol]');
  const parsed = methodArgs(
    args,
    [{ label: 'x0' }, { label: 'maxit', integer: true }, { label: 'tol' }],
    1,
    context
  );
  if (!parsed.ok) return failure(`/solve failed: ${parsed.error.message}`);
  const { expr, name, numbers } = parsed.value;
  const [x0, maxIterations, tolerance] = numbers;
  const root = solveNewton(expr, context, name, x0, { maxIterations, tolerance });
  if (!root.ok) return failure(`/solve failed: ${describeError(root.error)}`);
  return reply(`root ≈ ${formatNumber(root.value.root)}`);
});

registerCommand('/integ', (args, { context }) => {
  if (!args.trim()) return usage('/integ <expr> <var> <a> <b> [n]');
  const parsed = methodArgs(
    args,
    [{ label: 'a' }, { label: 'b' }, { label: 'n', integer: true }],
    2,
    context
  );
  if (!parsed.ok) return failure(`/integ failed: ${parsed.error.message}`);
  const { expr, name, numbers } = parsed.value;
  const [a, b, n] = numbers;
  const result = integrateSimpson(expr, context, name, a, b, n);
  if (!result.ok) return failure(`/integ failed: ${describeError(result.error)}`);
  const { value, segments } = result.value;
  return reply(
    `∫[${formatNumber(a, 6)},${formatNumber(b, 6)}] ${expr} d${name} ≈ ${formatNumber(value)} (n=${segments})`
  );
});

registerCommand('/plot', (args, { context }) => {
  if (!args.trim()) return usage('/plot <expr> <var> <xmin> <xmax> [w h]');
  const parsed = methodArgs(
    args,
    [{ label: 'xmin' }, { label: 'xmax' }, { label: 'w', integer: true }, { label: 'h', integer: true }],
    2,
    context
  );
  if (!parsed.ok) return failure(`/plot failed: ${parsed.error.message}`);
  const { expr, name, numbers } = parsed.value;
  const [xmin, xmax, width, height] = numbers;
  const grid = samplePlot(expr, context, name, xmin, xmax, width, height);
  if (!grid.ok) return failure(`/plot failed: ${describeError(grid.error)}`);
  const { width: W, height: H, skipped } = grid.value;
  const suffix = skipped > 0 ? ` (${skipped} points skipped)` : '';
  return reply(
    `Plotted ${expr}, ${name}∈[${formatNumber(xmin, 6)},${formatNumber(xmax, 6)}], ${W}x${H}${suffix}`,
    renderPlot(grid.value)
  );
});

function radix(render: (value: number) => string): CommandHandler {
  return (args, { context }) => {
    const text = args.trim() || '0';
    const value = evaluate(text, context);
    if (!value.ok) return failure(`Error: ${describeError(value.error)}`);
    if (!Number.isSafeInteger(value.value) || value.value < 0) {
      return failure(`Expected a non-negative integer, got ${formatNumber(value.value)}`);
    }
    return reply('', [render(value.value)]);
  };
}

registerCommand('/hex', radix(toHex));
registerCommand('/bin', radix(toBinary));

registerCommand('/rpn', (args, { context }) => {
  const text = args.trim();
  if (!text) return usage('/rpn <expr>');
  const postfix = compile(text, context);
  if (!postfix.ok) return failure(`Error: ${describeError(postfix.error)}`);
  return reply(`Postfix: ${formatPostfix(postfix.value)}`);
});

registerCommand('/quit', () => ({ message: 'Bye', output: [], quit: true, failed: false }));
