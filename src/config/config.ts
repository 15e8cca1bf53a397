import { z } from 'zod';

// Tolerance band around 100% of the requested amount, per resource dimension
export interface Allocations {
  underPerc: number;
  overPerc: number;
}

export interface SanitizerConfig {
  cpu: Allocations;
  memory: Allocations;
  restartsLimit: number;
  podCPULimit: number;
  podMEMLimit: number;
}

export interface AppConfig {
  namespace?: string | undefined;
  sanitizer: SanitizerConfig;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const percent = (defaultValue: number) => z.coerce.number().min(0).default(defaultValue);

const envSchema = z.object({
  SANITIZER_NAMESPACE: z.string().min(1).optional(),
  SANITIZER_CPU_UNDER_PERC: percent(200),
  SANITIZER_CPU_OVER_PERC: percent(50),
  SANITIZER_MEM_UNDER_PERC: percent(200),
  SANITIZER_MEM_OVER_PERC: percent(50),
  SANITIZER_RESTARTS_LIMIT: z.coerce.number().int().min(0).default(3),
  SANITIZER_POD_CPU_LIMIT: percent(80),
  SANITIZER_POD_MEM_LIMIT: percent(80),
  // Consumed by the logger, not part of AppConfig
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info')
});

// Empty variables behave as unset
function definedOnly(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== '') result[key] = value;
  }
  return result;
}

export function getConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(definedOnly(env));
  if (!parsed.success) {
    const details = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }
  const vars = parsed.data;

  return {
    namespace: vars.SANITIZER_NAMESPACE,
    sanitizer: {
      cpu: { underPerc: vars.SANITIZER_CPU_UNDER_PERC, overPerc: vars.SANITIZER_CPU_OVER_PERC },
      memory: { underPerc: vars.SANITIZER_MEM_UNDER_PERC, overPerc: vars.SANITIZER_MEM_OVER_PERC },
      restartsLimit: vars.SANITIZER_RESTARTS_LIMIT,
      podCPULimit: vars.SANITIZER_POD_CPU_LIMIT,
      podMEMLimit: vars.SANITIZER_POD_MEM_LIMIT
    }
  };
}
