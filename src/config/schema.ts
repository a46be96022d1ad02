import { z } from 'zod';

const BackendNameSchema = z
  .string()
  .min(1)
  .regex(/^[A-Za-z0-9_.-]+$/, 'backend names use letters, digits, _ . and - only');

export const DiskBackendConfigSchema = z.object({
  name: BackendNameSchema,
  type: z.literal('disk'),
  /** Root directory of the content-addressed store */
  root: z.string().min(1),
});

export const GitBackendConfigSchema = z.object({
  name: BackendNameSchema,
  type: z.literal('git'),
  /** Worktree that holds the version branches (created if missing) */
  repoPath: z.string().min(1),
  branchPrefix: z.string().min(1).default('asset_versions'),
  /** Author/committer for version commits; git's own config when absent */
  identity: z
    .object({
      name: z.string().min(1),
      email: z.string().min(1),
    })
    .optional(),
});

export const PerforceBackendConfigSchema = z.object({
  name: BackendNameSchema,
  type: z.literal('perforce'),
  /** Local root of the client workspace */
  workspaceRoot: z.string().min(1),
  /** Depot path that maps to workspaceRoot */
  depotRoot: z
    .string()
    .regex(/^\/\/\S+$/, 'depotRoot must be a depot path like //depot/assets')
    .default('//depot'),
  port: z.string().optional(),
  user: z.string().optional(),
  client: z.string().optional(),
  password: z.string().optional(),
  charset: z.string().optional(),
});

export const BackendConfigSchema = z.discriminatedUnion('type', [
  DiskBackendConfigSchema,
  GitBackendConfigSchema,
  PerforceBackendConfigSchema,
]);

export const ConfigSchema = z.object({
  logging: z
    .object({
      level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
      pretty: z.boolean().default(false),
    })
    .default(() => ({ level: 'info' as const, pretty: false })),

  // Optional Sentry integration
  sentry: z
    .object({
      dsn: z.string().url(),
      environment: z.string().default('development'),
      tracesSampleRate: z.number().min(0).max(1).default(0.1),
    })
    .optional(),

  // Environment mode
  env: z.enum(['development', 'production', 'test']).default('development'),

  // Deadline for every git / p4 invocation
  commands: z
    .object({
      timeoutMs: z.number().int().min(1000).default(60000),
    })
    .default(() => ({ timeoutMs: 60000 })),

  // Storage backends, in the order createVersion writes to them
  backends: z
    .array(BackendConfigSchema)
    .min(1, 'at least one storage backend is required')
    .superRefine((backends, ctx) => {
      const seen = new Set<string>();
      backends.forEach((backend, index) => {
        if (seen.has(backend.name)) {
          ctx.addIssue({
            code: 'custom',
            message: `duplicate backend name "${backend.name}"`,
            path: [index, 'name'],
          });
        }
        seen.add(backend.name);
      });
    }),

  // Optional version repository (SQLite via sql.js)
  repository: z
    .object({
      /** Database file; in-memory only when omitted */
      path: z.string().min(1).optional(),
    })
    .optional(),
});

export type Config = z.infer<typeof ConfigSchema>;
export type BackendConfig = z.infer<typeof BackendConfigSchema>;
export type DiskBackendConfig = z.infer<typeof DiskBackendConfigSchema>;
export type GitBackendConfig = z.infer<typeof GitBackendConfigSchema>;
export type PerforceBackendConfig = z.infer<typeof PerforceBackendConfigSchema>;
