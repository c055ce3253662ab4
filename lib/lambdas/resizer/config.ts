import { z } from "zod"
import { ConfigurationError } from "./errors"

export const batchPolicies = ["halt-on-first-failure", "continue"] as const

export type BatchPolicy = typeof batchPolicies[number]

const ConfigSchema = z.object({
  REGION: z.string().min(1),
  TABLE_NAME: z.string().min(1),
  DEST_BUCKET_NAME: z.string().min(1),
  SCRATCH_DIR: z.string().min(1).default("/tmp"),
  RESIZED_KEY_PREFIX: z.string().default("resized-"),
  BATCH_POLICY: z.enum(batchPolicies).default("halt-on-first-failure"),
})

export interface ResizerConfig {
  region: string
  tableName: string
  destinationBucket: string
  scratchDir: string
  resizedKeyPrefix: string
  batchPolicy: BatchPolicy
}

export function loadConfig(env: NodeJS.ProcessEnv): ResizerConfig {
  const parsed = ConfigSchema.safeParse(env)
  if (!parsed.success) {
    const variables = parsed.error.issues.map(issue => issue.path.join("."))
    throw new ConfigurationError(variables, parsed.error.issues.map(issue => issue.message).join("; "))
  }

  const { data } = parsed
  return {
    region: data.REGION,
    tableName: data.TABLE_NAME,
    destinationBucket: data.DEST_BUCKET_NAME,
    scratchDir: data.SCRATCH_DIR,
    resizedKeyPrefix: data.RESIZED_KEY_PREFIX,
    batchPolicy: data.BATCH_POLICY,
  }
}
