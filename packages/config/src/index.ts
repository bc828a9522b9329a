import { z } from 'zod'
import { PATHS } from './paths.js'

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  // BacDive API credentials; only checked when the client logs in
  BACDIVE_USERNAME: z.string().default(''),
  BACDIVE_PASSWORD: z.string().default(''),
  BACDIVE_API_URL: z.string().url().default('https://api.bacdive.dsmz.de'),
  BACDIVE_TOKEN_URL: z
    .string()
    .url()
    .default('https://sso.dsmz.de/auth/realms/dsmz/protocol/openid-connect/token'),
  // Pause between BacDive requests
  BACDIVE_SLEEP_MS: z.coerce.number().int().nonnegative().default(100),
  TRAITS_INPUT: z.string().default(PATHS.abundanceTable),
  TRAITS_OUTPUT: z.string().default(PATHS.traitTable),
  TRAITS_REPORT: z.string().default(PATHS.runReport),
})

export type Env = z.infer<typeof envSchema>

export const parseEnv = (source: Record<string, string | undefined>): Env => envSchema.parse(source)

export const env = parseEnv(process.env)

export { PATHS, resolvePath, findWorkspaceRoot } from './paths.js'
