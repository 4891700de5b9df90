import { createClient, type SupabaseClient } from '@supabase/supabase-js'

import { getConfig, type AppConfig } from '@/lib/env'

export function createAdminClient(config: AppConfig = getConfig()): SupabaseClient {
  const { SUPABASE_URL: url, SUPABASE_SERVICE_ROLE_KEY: serviceRoleKey } = config

  if (!url || !serviceRoleKey) {
    throw new Error('SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY are required for the Postgres store.')
  }

  return createClient(url, serviceRoleKey, {
    auth: {
      persistSession: false,
      autoRefreshToken: false,
    },
  })
}
