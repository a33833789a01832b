import { z } from 'zod';
import { ConfigurationError } from './errors';
import { InstallPolicyRegistry } from './install-policies';

export const EngineConfigSchema = z.object({
  dependencyWhitelist: z.array(z.string().min(1)).default(['*']),
  cachedDependencies: z.array(z.string().min(1)).default([]),
  installPolicy: z
    .string()
    .default('uv')
    .refine(name => InstallPolicyRegistry.names().includes(name), {
      message: 'Unknown install policy'
    }),
  defaultTimeoutMs: z.number().int().positive().default(20_000),
  installTimeoutMs: z.number().int().positive().default(120_000),
  commandTimeoutMs: z.number().int().positive().default(30_000),
  interpreter: z.string().min(1).default('python'),
  baseDir: z.string().startsWith('/').optional(),
  verbosity: z.enum(['silent', 'info', 'debug']).default('info')
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

export const DockerHostConfigSchema = z
  .object({
    image: z.string().min(1).optional(),
    containerName: z.string().min(1).optional(),
    user: z.string().min(1).optional(),
    cpuQuota: z.number().int().positive().default(50_000),
    memoryLimit: z.string().regex(/^\d+[kmg]?$/i).default('100m'),
    memorySwapLimit: z.string().regex(/^\d+[kmg]?$/i).default('512m'),
    networkMode: z.string().default('bridge')
  })
  .refine(cfg => Boolean(cfg.image) !== Boolean(cfg.containerName), {
    message: 'Specify exactly one of image or containerName'
  });

export type DockerHostConfig = z.infer<typeof DockerHostConfigSchema>;
export type DockerHostConfigInput = z.input<typeof DockerHostConfigSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

export function parseEngineConfig(input: unknown): EngineConfig {
  const parsed = EngineConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid engine configuration: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function parseDockerHostConfig(input: unknown): DockerHostConfig {
  const parsed = DockerHostConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid docker host configuration: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

function list(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  return value
    .split(',')
    .map(item => item.trim())
    .filter(Boolean);
}

function integer(value: string | undefined): number | undefined {
  return value === undefined || value.trim() === '' ? undefined : Number(value);
}

/** Reads `SANDBOX_*` variables; anything unset falls back to the schema defaults. */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  return parseEngineConfig({
    dependencyWhitelist: list(env.SANDBOX_DEPENDENCY_WHITELIST),
    cachedDependencies: list(env.SANDBOX_CACHED_DEPENDENCIES),
    installPolicy: env.SANDBOX_INSTALL_POLICY,
    defaultTimeoutMs: integer(env.SANDBOX_DEFAULT_TIMEOUT_MS),
    installTimeoutMs: integer(env.SANDBOX_INSTALL_TIMEOUT_MS),
    commandTimeoutMs: integer(env.SANDBOX_COMMAND_TIMEOUT_MS),
    interpreter: env.SANDBOX_INTERPRETER,
    baseDir: env.SANDBOX_BASE_DIR,
    verbosity: env.SANDBOX_VERBOSITY
  });
}

export function loadDockerHostConfigFromEnv(env: NodeJS.ProcessEnv = process.env): DockerHostConfig {
  return parseDockerHostConfig({
    image: env.SANDBOX_DOCKER_IMAGE,
    containerName: env.SANDBOX_DOCKER_CONTAINER,
    user: env.SANDBOX_DOCKER_USER,
    cpuQuota: integer(env.SANDBOX_DOCKER_CPU_QUOTA),
    memoryLimit: env.SANDBOX_DOCKER_MEMORY,
    memorySwapLimit: env.SANDBOX_DOCKER_MEMORY_SWAP,
    networkMode: env.SANDBOX_DOCKER_NETWORK
  });
}
