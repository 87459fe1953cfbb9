#!/usr/bin/env node
// src/cli.ts - Command-line entry point
import { Command } from 'commander';
import { ConfigError, configureLogger, loadConfig, loadDotenv } from './config';
import { logger } from './logger';
import { Session } from './session';
import { runRepl, writeReply } from './repl';
import { runSelfTest } from './selftest';

interface CliOptions {
  deg?: boolean;
  rad?: boolean;
  selftest?: boolean;
  verbose?: boolean;
}

export function buildProgram(): Command {
  const program = new Command();
  program
    .name('termcalc')
    .description('Expression calculator with numeric differentiation, root finding, integration and ASCII plots')
    .version('1.0.0')
    .argument('[expression...]', 'expression or /command to run once; starts the REPL when omitted')
    .option('--deg', 'start in degree mode')
    .option('--rad', 'start in radian mode')
    .option('--selftest', 'run the built-in self-test and exit')
    .option('-v, --verbose', 'log debug output to stderr')
    .action(async (expression: string[], options: CliOptions) => {
      process.exitCode = await run(expression, options);
    });
  return program;
}

export async function run(expression: string[], options: CliOptions): Promise<number> {
  loadDotenv();
  const config = loadConfig();
  if (options.verbose) config.logLevel = 'debug';
  if (options.deg) config.angleMode = 'deg';
  if (options.rad) config.angleMode = 'rad';
  configureLogger(logger, config);
  logger.debug(`config: ${JSON.stringify(config)}`);

  const session = new Session({ config });
  if (options.selftest) {
    const report = runSelfTest(session.context);
    for (const failure of report.failures) console.error(`  FAIL ${failure}`);
    console.log(report.summary);
    return report.passed === report.total ? 0 : 1;
  }
  if (expression.length > 0) {
    const reply = await session.handle(expression.join(' '));
    writeReply(process.stdout, reply);
    return reply.failed ? 1 : 0;
  }
  await runRepl(session);
  return 0;
}

if (require.main === module) {
  buildProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      if (error instanceof ConfigError) {
        console.error(error.message);
      } else {
        console.error('Unexpected error:', error);
      }
      process.exitCode = 1;
    });
}
