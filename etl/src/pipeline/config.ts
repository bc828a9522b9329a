import { env, resolvePath } from '@bactraits/config'
import type { PipelineConfig } from './types.js'

export const pipelineConfig: PipelineConfig = {
  inputs: {
    abundanceTable: resolvePath(env.TRAITS_INPUT)
  },
  outputs: {
    traitTable: resolvePath(env.TRAITS_OUTPUT),
    runReport: resolvePath(env.TRAITS_REPORT)
  },
  bacdive: {
    username: env.BACDIVE_USERNAME,
    password: env.BACDIVE_PASSWORD,
    apiUrl: env.BACDIVE_API_URL,
    tokenUrl: env.BACDIVE_TOKEN_URL,
    sleepMs: env.BACDIVE_SLEEP_MS
  }
}
