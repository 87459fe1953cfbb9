// src/context.ts - Evaluation context passed explicitly to the engine
import { AngleMode, EngineLimits } from './types';
import { VariableStore, createDefaultStore } from './store';
import { Logger, logger as defaultLogger } from './logger';
import { defaultLimits } from './config';

/**
 * Evaluation Context: Everything an evaluation reads or writes besides its text.
 */
export interface EvaluationContext {
  angleMode: AngleMode;
  store: VariableStore;
  lastResult: number; // Read as `ans`
  limits: EngineLimits;
  logger: Logger;
}

export interface ContextOptions {
  angleMode?: AngleMode;
  store?: VariableStore;
  maxVariables?: number;
  limits?: Partial<EngineLimits>;
  logger?: Logger;
}

export function createContext(options: ContextOptions = {}): EvaluationContext {
  return {
    angleMode: options.angleMode ?? 'rad',
    store: options.store ?? createDefaultStore(options.maxVariables),
    lastResult: 0,
    limits: { ...defaultLimits, ...options.limits },
    logger: options.logger ?? defaultLogger,
  };
}

/**
 * Resolves a name the way expressions see it: `ans` first, then the store.
 */
export function lookupVariable(context: EvaluationContext, name: string): number | undefined {
  if (name === 'ans') return context.lastResult;
  return context.store.get(name);
}
