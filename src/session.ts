// src/session.ts - Interactive session state and line dispatch
import { EvaluationContext, createContext } from './context';
import { History } from './history';
import { evaluateTopLevel } from './engine';
import { describeError } from './errors';
import { formatNumber } from './format';
import { CalcConfig, defaultConfig } from './config';
import { Logger } from './logger';
import { CommandTarget, SessionReply, commandRegistry, failure, reply } from './commands';

export interface SessionOptions {
  config?: CalcConfig;
  logger?: Logger;
}

export class Session implements CommandTarget {
  readonly context: EvaluationContext;
  readonly history: History;
  memory = 0;
  private lastExpression: string | undefined;

  constructor(options: SessionOptions = {}) {
    const config = options.config ?? defaultConfig;
    this.context = createContext({
      angleMode: config.angleMode,
      maxVariables: config.maxVariables,
      limits: config.limits,
      logger: options.logger,
    });
    this.history = new History(config.historySize);
  }

  async handle(input: string): Promise<SessionReply> {
    let line = input.replace(/[\r\n]+$/, '');
    if (line.trim() === '') return reply('');
    if (line.trim() === '=') {
      if (this.lastExpression === undefined) {
        return failure('No previous expression to repeat');
      }
      line = this.lastExpression;
    }
    if (line.trimStart().startsWith('/')) {
      return this.runCommand(line.trim());
    }
    const result = evaluateTopLevel(line, this.context);
    if (!result.ok) {
      const message = describeError(result.error);
      this.history.addFailure(line, message);
      return failure(`Error: ${message}`);
    }
    this.history.addSuccess(line, result.value);
    this.lastExpression = line;
    return reply(`Result = ${formatNumber(result.value)}`);
  }

  private async runCommand(line: string): Promise<SessionReply> {
    const space = line.search(/\s/);
    const name = space < 0 ? line : line.slice(0, space);
    const args = space < 0 ? '' : line.slice(space + 1);
    const handler = commandRegistry.get(name);
    if (!handler) {
      return failure(`Unknown command: ${name} (see /help)`);
    }
    return handler(args, this);
  }
}
