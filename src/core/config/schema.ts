/**
 * Configuration file schema.
 */
import { z } from 'zod';
import { LOG_LEVEL_NAMES } from '../../utils/logger.js';

/** How files with Python syntax errors are treated. */
export const SyntaxErrorPolicySchema = z.enum(['skip', 'recover']);

export const LogLevelSchema = z.enum(LOG_LEVEL_NAMES);

export const ConfigSchema = z.object({
  /** Roots used when none are given on the command line */
  roots: z.array(z.string()).default([]),
  /** fast-glob ignore patterns, relative to each root */
  exclude: z.array(z.string()).default([]),
  /** Map pkg/__init__.py to `pkg` instead of `pkg.__init__` */
  collapse_init: z.boolean().default(false),
  /** Resolve the names of `from . import x` against discovered files */
  probe_relative_names: z.boolean().default(true),
  syntax_errors: SyntaxErrorPolicySchema.default('skip'),
  /** Files parsed in parallel (default: 75% of CPUs, min 4, max 32) */
  concurrency: z.number().int().min(1).max(64).optional(),
  log_level: LogLevelSchema.default('warn'),
});

export type Config = z.infer<typeof ConfigSchema>;
export type SyntaxErrorPolicy = z.infer<typeof SyntaxErrorPolicySchema>;
