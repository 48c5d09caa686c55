import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const optionalString = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().min(1).optional()
);

const envSchema = z.object({
  PORT: z.string().default('3000'),
  NODE_ENV: z.enum(['development', 'test', 'staging', 'production']).default('development'),
  DATABASE_URL: z.string().min(1),
  REDIS_URL: z.string().min(1),
  API_KEYS: optionalString,

  LLM_PROVIDER: z.enum(['openai', 'anthropic']).default('openai'),
  OPENAI_API_KEY: optionalString,
  ANTHROPIC_API_KEY: optionalString,
  MAIN_MODEL: optionalString,
  CLASSIFIER_MODEL: optionalString,
  RECENT_TRANSCRIPT_TURNS: z.coerce.number().int().min(6).max(12).default(6),
  ESCALATION_POLICY: z.enum(['after_reply', 'before_reply']).default('after_reply'),
  KNOWLEDGE_BASE_PATH: z.string().default('data/onboarding-knowledge.txt'),

  WHATSAPP_PROVIDER: z.enum(['meta', 'twilio']).default('meta'),
  WHATSAPP_VERIFY_TOKEN: optionalString,
  WHATSAPP_ACCESS_TOKEN: optionalString,
  WHATSAPP_PHONE_NUMBER_ID: optionalString,
  WHATSAPP_APP_SECRET: optionalString,
  WHATSAPP_API_VERSION: z.string().default('v19.0'),
  WHATSAPP_TEMPLATE_NAME: z.string().default('onboarding_v3'),
  WHATSAPP_TEMPLATE_LANGUAGE: z.string().default('it'),
  WHATSAPP_TEMPLATE_DOCUMENT_URL: optionalString,
  WHATSAPP_TEMPLATE_DOCUMENT_FILENAME: z.string().default('Privacy_Notice.pdf'),

  TWILIO_ACCOUNT_SID: optionalString,
  TWILIO_AUTH_TOKEN: optionalString,
  TWILIO_WHATSAPP_NUMBER: optionalString,
  TWILIO_TEMPLATE_SID: optionalString,

  SENDGRID_API_KEY: optionalString,
  SENDGRID_FROM_EMAIL: optionalString,
  ADMIN_ALERT_EMAIL: optionalString,

  SENTRY_DSN: z.string().optional(),
  WEBHOOK_BASE_URL: z.string().default('http://localhost:3000'),
});

export type Env = z.infer<typeof envSchema>;

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('❌ Invalid environment variables:', parsed.error.flatten().fieldErrors);
  process.exit(1);
}

export const env: Env = parsed.data;
