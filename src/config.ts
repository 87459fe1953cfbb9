// src/config.ts - Environment configuration
import { config as loadDotenvFile } from 'dotenv';
import { z } from 'zod';
import { AngleMode, EngineLimits } from './types';
import { LogThreshold, Logger } from './logger';

const EnvSchema = z.object({
  TERMCALC_ANGLE_MODE: z.enum(['rad', 'deg']).default('rad'),
  TERMCALC_LOG_LEVEL: z
    .enum(['debug', 'info', 'warn', 'error', 'silent'])
    .default('error'),
  TERMCALC_LOG_FILE: z.string().min(1).optional(),
  TERMCALC_HISTORY_SIZE: z.coerce.number().int().min(1).max(1000).default(50),
  TERMCALC_MAX_VARIABLES: z.coerce.number().int().min(1).max(10000).default(64),
  TERMCALC_MAX_INPUT: z.coerce.number().int().min(1).max(100000).default(512),
  TERMCALC_MAX_TOKENS: z.coerce.number().int().min(1).max(100000).default(1024),
  TERMCALC_MAX_STACK: z.coerce.number().int().min(1).max(100000).default(1024),
  TERMCALC_MAX_SEGMENTS: z.coerce.number().int().min(2).max(10000000).default(100000),
});

export interface CalcConfig {
  angleMode: AngleMode;
  logLevel: LogThreshold;
  logFile?: string;
  historySize: number;
  maxVariables: number;
  limits: EngineLimits;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export const defaultLimits: EngineLimits = {
  maxInputLength: 512,
  maxTokens: 1024,
  maxStack: 1024,
  maxSegments: 100000,
};

export const defaultConfig: CalcConfig = {
  angleMode: 'rad',
  logLevel: 'error',
  historySize: 50,
  maxVariables: 64,
  limits: defaultLimits,
};

/**
 * Loads a `.env` file into process.env without overriding variables already set.
 */
export function loadDotenv(path?: string): void {
  const result = loadDotenvFile(path ? { path } : {});
  // A missing .env is normal; anything else is worth reporting
  if (result.error && 'code' in result.error && result.error.code !== 'ENOENT') {
    throw new ConfigError(`Cannot read ${path ?? '.env'}: ${result.error.message}`);
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CalcConfig {
  // Empty strings count as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }
  const values = parsed.data;
  return {
    angleMode: values.TERMCALC_ANGLE_MODE,
    logLevel: values.TERMCALC_LOG_LEVEL,
    logFile: values.TERMCALC_LOG_FILE,
    historySize: values.TERMCALC_HISTORY_SIZE,
    maxVariables: values.TERMCALC_MAX_VARIABLES,
    limits: {
      maxInputLength: values.TERMCALC_MAX_INPUT,
      maxTokens: values.TERMCALC_MAX_TOKENS,
      maxStack: values.TERMCALC_MAX_STACK,
      maxSegments: values.TERMCALC_MAX_SEGMENTS,
    },
  };
}

export function configureLogger(target: Logger, config: CalcConfig): void {
  target.configure({ level: config.logLevel, file: config.logFile });
}
