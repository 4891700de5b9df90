import { z } from 'zod'

const optionalUrl = z
  .string()
  .trim()
  .url('SUPABASE_URL must be a valid URL')
  .optional()

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback)

const envSchema = z.object({
  SUPABASE_URL: optionalUrl,
  SUPABASE_SERVICE_ROLE_KEY: z.string().trim().min(1).optional(),
  CAMPUS_EMAIL_DOMAIN: z
    .string()
    .trim()
    .min(3)
    .regex(/^[a-z0-9.-]+\.[a-z]{2,}$/i, 'CAMPUS_EMAIL_DOMAIN must be a domain name')
    .default('campus.example.edu'),
  REPORTS_DIR: z.string().trim().min(1).default('reports'),
  REPORT_CONCURRENCY: positiveInt(4),
  STORE_TRANSACTION_RETRIES: positiveInt(3),
})

export type AppConfig = z.infer<typeof envSchema>

export function loadConfig(source: Record<string, string | undefined> = process.env): AppConfig {
  const result = envSchema.safeParse(source)

  if (!result.success) {
    const details = Object.entries(result.error.flatten().fieldErrors)
      .map(([key, messages]) => `${key}: ${(messages ?? []).join(', ')}`)
      .join('; ')
    console.error('[config] invalid environment', result.error.flatten().fieldErrors)
    throw new Error(`Invalid configuration: ${details}`)
  }

  return result.data
}

let cachedConfig: AppConfig | null = null

export function getConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig()
  }
  return cachedConfig
}
