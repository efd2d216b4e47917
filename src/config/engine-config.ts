/**
 * @fileoverview Engine configuration from environment variables.
 *
 * | Variable                          | Default   |
 * | --------------------------------- | --------- |
 * | `AGENT_MAX_STEPS`                 | 10        |
 * | `AGENT_AUTO_EXECUTE_TOOLS`        | true      |
 * | `AGENT_MAX_DUPLICATE_TOOL_CALLS`  | 2         |
 * | `AGENT_MAX_TOOL_CALLS_PER_TOOL`   | 5 (`none` disables) |
 * | `AGENT_RETRY_POLICY`              | default   |
 * | `AGENT_LOG_LEVEL`                 | info      |
 *
 * @module agent-loop-engine/config
 * @version 0.1.0
 */

import { z } from 'zod';
import type { AgentConfiguration } from '../types/core.types.js';
import { Severity, createAgentConfiguration } from '../types/core.types.js';
import { RetryPresetNameSchema, type RetryConfiguration } from '../retry/retry-policy.js';
import { parseSeverity } from '../observability/logger.js';

export type Environment = Readonly<Record<string, string | undefined>>;

export interface EngineConfig {
  readonly configuration: AgentConfiguration;
  readonly retry: RetryConfiguration;
  readonly logLevel: Severity;
}

export class ConfigError extends Error {
  override readonly name = 'ConfigError';
  readonly issues: ReadonlyArray<string>;

  constructor(issues: ReadonlyArray<string>) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

function wholeNumber(min: number) {
  return z.string().transform((value, ctx) => {
    const parsed = /^\d+$/.test(value) ? Number(value) : Number.NaN;
    if (!Number.isSafeInteger(parsed) || parsed < min) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected a whole number >= ${min}, got '${value}'` });
      return z.NEVER;
    }
    return parsed;
  });
}

const TRUE_VALUES = new Set(['true', '1', 'yes', 'on']);
const FALSE_VALUES = new Set(['false', '0', 'no', 'off']);

const flag = z.string().transform((value, ctx) => {
  const normalized = value.toLowerCase();
  if (TRUE_VALUES.has(normalized)) {
    return true;
  }
  if (FALSE_VALUES.has(normalized)) {
    return false;
  }
  ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected true or false, got '${value}'` });
  return z.NEVER;
});

const EnvironmentSchema = z.object({
  AGENT_MAX_STEPS: wholeNumber(1).optional(),
  AGENT_AUTO_EXECUTE_TOOLS: flag.optional(),
  AGENT_MAX_DUPLICATE_TOOL_CALLS: wholeNumber(1).optional(),
  AGENT_MAX_TOOL_CALLS_PER_TOOL: z
    .string()
    .transform(value => (value.toLowerCase() === 'none' ? null : value))
    .pipe(wholeNumber(1).nullable())
    .optional(),
  AGENT_RETRY_POLICY: z.string().toLowerCase().pipe(RetryPresetNameSchema).optional(),
  AGENT_LOG_LEVEL: z
    .string()
    .transform((value, ctx) => {
      const level = parseSeverity(value);
      if (level === null) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown log level '${value}'` });
        return z.NEVER;
      }
      return level;
    })
    .optional(),
});

/**
 * Reads the engine configuration from `env`. Blank variables count as unset.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadEngineConfig(env: Environment = process.env): EngineConfig {
  const present: Record<string, string> = {};
  for (const key of Object.keys(EnvironmentSchema.shape)) {
    const value = env[key]?.trim();
    if (value !== undefined && value !== '') {
      present[key] = value;
    }
  }

  const parsed = EnvironmentSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const vars = parsed.data;
  const overrides: { -readonly [K in keyof AgentConfiguration]?: AgentConfiguration[K] } = {};
  if (vars.AGENT_MAX_STEPS !== undefined) {
    overrides.maxSteps = vars.AGENT_MAX_STEPS;
  }
  if (vars.AGENT_AUTO_EXECUTE_TOOLS !== undefined) {
    overrides.autoExecuteTools = vars.AGENT_AUTO_EXECUTE_TOOLS;
  }
  if (vars.AGENT_MAX_DUPLICATE_TOOL_CALLS !== undefined) {
    overrides.maxDuplicateToolCalls = vars.AGENT_MAX_DUPLICATE_TOOL_CALLS;
  }
  if (vars.AGENT_MAX_TOOL_CALLS_PER_TOOL !== undefined) {
    overrides.maxToolCallsPerTool = vars.AGENT_MAX_TOOL_CALLS_PER_TOOL;
  }

  return {
    configuration: createAgentConfiguration(overrides),
    retry: { policy: vars.AGENT_RETRY_POLICY ?? 'default' },
    logLevel: vars.AGENT_LOG_LEVEL ?? Severity.INFO,
  };
}
