import { z } from 'zod';

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  APP_BASE_CURRENCY: z.string().length(3).default('USD'),
  CATALOG_DIR: optionalString,
  CONTENT_GENERATOR: z.enum(['template', 'llm']).default('template'),
  OPENROUTER_API_KEY: optionalString,
  OPENROUTER_MODEL: z.string().default('openai/gpt-4o-mini'),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  DEMO_SEED: z
    .enum(['true', 'false'])
    .default('false')
    .transform((value) => value === 'true'),
});

export interface AppConfig {
  app: {
    port: number;
    baseCurrency: string;
    requestTimeoutMs: number;
    demoSeed: boolean;
  };
  catalog: {
    directory?: string;
  };
  generator: {
    mode: 'template' | 'llm';
    openRouter: {
      apiKey?: string;
      model: string;
    };
  };
}

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    throw new Error(`Invalid configuration: ${parsed.error.issues.map((issue) => `${issue.path.join('.')} ${issue.message}`).join('; ')}`);
  }

  const values = parsed.data;

  return {
    app: {
      port: values.PORT,
      baseCurrency: values.APP_BASE_CURRENCY.toUpperCase(),
      requestTimeoutMs: values.REQUEST_TIMEOUT_MS,
      demoSeed: values.DEMO_SEED,
    },
    catalog: {
      directory: values.CATALOG_DIR,
    },
    generator: {
      mode: values.CONTENT_GENERATOR,
      openRouter: {
        apiKey: values.OPENROUTER_API_KEY,
        model: values.OPENROUTER_MODEL,
      },
    },
  };
};
