import { z } from 'zod'

import { defaultArtifactDir } from './artifacts.js'
import { HarnessError } from './errors.js'

export const DEFAULT_TEST_ID_ATTRIBUTE = 'data-testid'

export const sessionConfigSchema = z.object({
  /** Address the application server binds to. */
  host: z.string().min(1).default('127.0.0.1'),
  /** Port of the application server; 0 lets the OS pick a free one. */
  port: z.number().int().min(0).max(65_535).default(8081),
  /** How long the page may take to report readiness. */
  readyTimeoutMs: z.number().int().positive().default(30_000),
  pollIntervalMs: z.number().int().positive().default(20),
  /** Timeout of the health probe issued before every navigation. */
  probeTimeoutMs: z.number().int().positive().default(3_000),
  testIdAttribute: z
    .string()
    .regex(/^[a-z][a-z0-9_-]*$/, 'must be a lowercase attribute name')
    .default(DEFAULT_TEST_ID_ATTRIBUTE),
  artifactDir: z.string().min(1).default(defaultArtifactDir),
  /** Document title of served pages. */
  title: z.string().default('Test session'),
})

export type SessionConfig = z.infer<typeof sessionConfigSchema>

export type SessionConfigInput = z.input<typeof sessionConfigSchema>

const envSchema = z.object({
  HARNESS_HOST: z.string().min(1).optional(),
  HARNESS_PORT: z.coerce.number().optional(),
  HARNESS_READY_TIMEOUT_MS: z.coerce.number().optional(),
  HARNESS_ARTIFACT_DIR: z.string().min(1).optional(),
})

const invalid = (error: z.ZodError, source: string) =>
  new HarnessError('E_CONFIG', `Invalid session configuration (${source})`, {
    issues: error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
  })

/**
 * Resolves session configuration: explicit input, then environment overrides, then defaults.
 */
export const resolveSessionConfig = (
  input: SessionConfigInput = {},
  env: NodeJS.ProcessEnv = process.env,
): SessionConfig => {
  const parsedEnv = envSchema.safeParse(env)
  if (!parsedEnv.success) throw invalid(parsedEnv.error, 'environment')

  const parsed = sessionConfigSchema.safeParse({
    ...input,
    host: input.host ?? parsedEnv.data.HARNESS_HOST,
    port: input.port ?? parsedEnv.data.HARNESS_PORT,
    readyTimeoutMs: input.readyTimeoutMs ?? parsedEnv.data.HARNESS_READY_TIMEOUT_MS,
    artifactDir: input.artifactDir ?? parsedEnv.data.HARNESS_ARTIFACT_DIR,
  })
  if (!parsed.success) throw invalid(parsed.error, 'options')
  return parsed.data
}
