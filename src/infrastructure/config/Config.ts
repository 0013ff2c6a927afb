import { z } from 'zod';

export interface AppConfig {
  server: {
    port: number;
  };
  data: {
    csvPath: string;
  };
  app: {
    environment: 'dev' | 'prod';
    title: string;
    version: string;
  };
}

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  CSV_PATH: z.string().min(1).default('data/cards_data.csv'),
  APP_ENV: z.enum(['dev', 'prod']).default('dev'),
  API_TITLE: z.string().min(1).default('Banking Transactions API'),
  API_VERSION: z.string().min(1).default('1.0.0'),
});

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join(', ');
    throw new Error(`Invalid configuration: ${details}`);
  }

  return {
    server: {
      port: parsed.data.PORT,
    },
    data: {
      csvPath: parsed.data.CSV_PATH,
    },
    app: {
      environment: parsed.data.APP_ENV,
      title: parsed.data.API_TITLE,
      version: parsed.data.API_VERSION,
    },
  };
};
