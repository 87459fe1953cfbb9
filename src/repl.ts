// src/repl.ts - Line-oriented interactive loop
import { createInterface } from 'node:readline';
import { Readable, Writable } from 'node:stream';
import { Session } from './session';
import { SessionReply } from './commands';
import { formatNumber } from './format';

export const BANNER = [
  'termcalc - type an expression, or /help for commands',
  "Examples: sin(30)+cos(60) [/deg] | pow(2,10) | 5!+20% | /let x=1.2 | /plot sin(x) x -3.14 3.14 70 20",
];

export function statusLine(session: Session): string {
  const { angleMode, lastResult } = session.context;
  return `Angle: ${angleMode.toUpperCase()} | Memory: ${formatNumber(session.memory, 6)} | ans: ${formatNumber(lastResult, 8)}`;
}

export function writeReply(output: Writable, reply: SessionReply): void {
  for (const line of reply.output) output.write(`${line}\n`);
  if (reply.message) output.write(`${reply.message}\n`);
}

/**
 * Reads lines from `input` until it ends or /quit is entered.
 */
export async function runRepl(
  session: Session,
  input: Readable = process.stdin,
  output: Writable = process.stdout
): Promise<void> {
  for (const line of BANNER) output.write(`${line}\n`);
  output.write(`${statusLine(session)}\n> `);
  const lines = createInterface({ input, terminal: false });
  try {
    for await (const line of lines) {
      const reply = await session.handle(line);
      writeReply(output, reply);
      if (reply.quit) break;
      output.write(`${statusLine(session)}\n> `);
    }
  } finally {
    lines.close();
  }
}
