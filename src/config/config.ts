import * as dotenv from 'dotenv';
import * as z from 'zod';

dotenv.config();

// Comma-separated env values (subnets, security groups) become string arrays
const csv = z
  .string()
  .default('')
  .transform((value) => value.split(',').map((item) => item.trim()).filter((item) => item.length > 0));

const configSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(8000),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  // DB_TYPE only applicable in non-prod (dev/test): 'postgres' | 'sqlite' | 'sqlite:memory'
  // In prod, always forced to postgres.
  DB_TYPE: z.enum(['postgres', 'sqlite', 'sqlite:memory']).default('sqlite'),
  DB_HOST: z.string().default('localhost'),
  DB_PORT: z.coerce.number().int().positive().default(5432),
  DB_USER: z.string().default(''),
  DB_PASSWORD: z.string().default(''),
  DB_DATABASE: z.string().default(''),

  // Public origin GitHub delivers webhooks to (`${BACKEND_ORIGIN}/webhooks/github`)
  BACKEND_ORIGIN: z.string().url().default('http://localhost:8000'),

  GITHUB_API_URL: z.string().url().default('https://api.github.com'),
  GITHUB_APP_ID: z.string().default(''),
  GITHUB_APP_PRIVATE_KEY: z.string().default(''),
  GITHUB_APP_PRIVATE_KEY_PATH: z.string().default(''),
  GITHUB_FALLBACK_TOKEN: z.string().default(''),
  GITHUB_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  GITHUB_RETRY_COUNT: z.coerce.number().int().min(0).default(0),

  AWS_REGION: z.string().default('ap-south-1'),
  ECS_CLUSTER: z.string().default('ci-runners'),
  ECS_TASK_DEFINITION: z.string().default('github-runner-task'),
  ECS_CONTAINER_NAME: z.string().default('github-runner'),
  ECS_SUBNET_IDS: csv,
  ECS_SECURITY_GROUP_IDS: csv,
  ECS_ASSIGN_PUBLIC_IP: z.enum(['ENABLED', 'DISABLED']).default('ENABLED'),
  ECS_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  RUNNER_LABELS: z.string().default('self-hosted'),

  ADMISSION_COOLDOWN_SECONDS: z.coerce.number().positive().default(15),
  ADMISSION_LEDGER_HORIZON_SECONDS: z.coerce.number().positive().default(60),
  ADMISSION_MAX_OCCUPANCY: z.coerce.number().int().positive().default(2),

  // Value the x-account-type header must carry on service-authenticated routes
  SERVICE_AUTH_ACCOUNT_TYPE: z.string().min(1).default('service'),
}).refine((cfg) => cfg.ADMISSION_COOLDOWN_SECONDS <= cfg.ADMISSION_LEDGER_HORIZON_SECONDS, {
  // the ledger forgets entries past the horizon, which would cut a longer cooldown short
  message: 'ADMISSION_COOLDOWN_SECONDS must not exceed ADMISSION_LEDGER_HORIZON_SECONDS',
  path: ['ADMISSION_COOLDOWN_SECONDS'],
});

export type Config = z.infer<typeof configSchema>;

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): Config => configSchema.parse(env);

export const config: Config = loadConfig();

// In production, only postgres is allowed. DB_TYPE from .env is ignored.
export const isProd = (): boolean => config.NODE_ENV === 'production';

export const resolveDbType = (): Config['DB_TYPE'] => (isProd() ? 'postgres' : config.DB_TYPE);
