import { z } from 'zod';

const envSchema = z.object({
  PORT: z.string().optional(),

  PUBLIC_BASE_URL: z.string().url().optional(),

  // Asana
  ASANA_PAT: z.string().optional(),
  ASANA_PROJECT_GID: z.string().min(1),
  ASANA_SUBTASKS_PROJECT_GID: z.string().optional(),

  // SMTP
  SMTP_HOST: z.string().default('smtp.gmail.com'),
  SMTP_PORT: z.coerce.number().int().positive().default(587),
  SMTP_USER: z.string().optional(),
  SMTP_PASSWORD: z.string().optional(),
  EMAIL_FROM: z.string().optional(),
  EMAIL_DISTRIBUTION_LIST: z.string().default('maintenance@example.com'),

  // Ops
  METRICS_TOKEN: z.string().optional(),
});

export type Env = z.infer<typeof envSchema>;

export function getEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    // Avoid dumping process.env; just show validation errors.
    throw new Error(`Invalid environment: ${parsed.error.message}`);
  }
  return parsed.data;
}

export type AppConfig = {
  port: number;
  publicBaseUrl: string | null;
  asanaPat: string | null;
  projectGid: string;
  subtasksProjectGid: string;
  smtp: {
    host: string;
    port: number;
    user: string | null;
    password: string | null;
  };
  emailFrom: string;
  distributionList: string[];
  metricsToken: string | undefined;
};

export function toAppConfig(env: Env): AppConfig {
  const distributionList = env.EMAIL_DISTRIBUTION_LIST.split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);

  return {
    port: Number(env.PORT ?? 3000),
    publicBaseUrl: env.PUBLIC_BASE_URL ?? null,
    asanaPat: env.ASANA_PAT ?? null,
    projectGid: env.ASANA_PROJECT_GID,
    subtasksProjectGid: env.ASANA_SUBTASKS_PROJECT_GID ?? env.ASANA_PROJECT_GID,
    smtp: {
      host: env.SMTP_HOST,
      port: env.SMTP_PORT,
      user: env.SMTP_USER ?? null,
      password: env.SMTP_PASSWORD ?? null,
    },
    emailFrom: env.EMAIL_FROM ?? env.SMTP_USER ?? 'repairs@localhost',
    distributionList,
    metricsToken: env.METRICS_TOKEN,
  };
}
