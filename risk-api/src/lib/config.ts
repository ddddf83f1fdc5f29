import { z } from 'zod';

const BooleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .default('false')
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const EnvSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3001),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CORS_ORIGIN: z.string().default(''),
  SLOW_REQUEST_MS: z.coerce.number().int().min(0).default(500),
  DATASET_PATH: z.string().min(1).default('data/student-mat.csv'),
  MODEL_STORE: z.enum(['file', 'postgres']).default('file'),
  MODEL_PATH: z.string().min(1).default('models/trained_model.json'),
  MODEL_NAME: z.string().min(1).default('default'),
  DATABASE_URL: z.string().optional(),
  TRAIN_NEW_MODEL: BooleanFlag,
  RESULTS_PATH: z.string().min(1).default('hybrid_risk_results.csv'),
}).superRefine((env, ctx) => {
  if (env.MODEL_STORE === 'postgres' && !env.DATABASE_URL) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['DATABASE_URL'],
      message: 'DATABASE_URL is required when MODEL_STORE=postgres',
    });
  }
});

export type AppConfig = {
  nodeEnv: string;
  port: number;
  host: string;
  logLevel: z.infer<typeof EnvSchema>['LOG_LEVEL'];
  corsOrigins: string[];
  slowRequestMs: number;
  datasetPath: string;
  modelStore: 'file' | 'postgres';
  modelPath: string;
  modelName: string;
  databaseUrl: string | null;
  trainNewModel: boolean;
  resultsPath: string;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${issues.join('; ')}`);
  }

  const values = parsed.data;
  return {
    nodeEnv: values.NODE_ENV,
    port: values.PORT,
    host: values.HOST,
    logLevel: values.LOG_LEVEL,
    corsOrigins: values.CORS_ORIGIN
      .split(',')
      .map((s) => s.trim())
      .filter(Boolean),
    slowRequestMs: values.SLOW_REQUEST_MS,
    datasetPath: values.DATASET_PATH,
    modelStore: values.MODEL_STORE,
    modelPath: values.MODEL_PATH,
    modelName: values.MODEL_NAME,
    databaseUrl: values.DATABASE_URL ?? null,
    trainNewModel: values.TRAIN_NEW_MODEL,
    resultsPath: values.RESULTS_PATH,
  };
}
