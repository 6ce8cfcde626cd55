import * as path from "node:path"
import { z } from "zod"

const configSchema = z.object({
  voicesDir: z.string().min(1),
  storeFileName: z.string().min(1),
  defaultModel: z.string().min(1),

  targetSampleRate: z.number().int().positive(),
  minDurationSeconds: z.number().positive(),
  maxDurationSeconds: z.number().positive(),
  minPeakAmplitude: z.number().positive(),

  trimFrameLength: z.number().int().positive(),
  trimHopLength: z.number().int().positive(),
  trimThresholdRatio: z.number().positive().max(1),

  turnSilenceSeconds: z.number().nonnegative(),
  placeholderSeconds: z.number().nonnegative(),
})
  .refine(cfg => cfg.minDurationSeconds < cfg.maxDurationSeconds, {
    message: "minDurationSeconds must be less than maxDurationSeconds"
  })
  .refine(cfg => cfg.trimHopLength <= cfg.trimFrameLength, {
    message: "trimHopLength must not exceed trimFrameLength"
  })

export type Config = z.infer<typeof configSchema>

const defaults: Config = {
  voicesDir: path.resolve("voices"),
  storeFileName: "voices_info.json",
  defaultModel: "qwen2.5:32b",

  targetSampleRate: 24000,
  minDurationSeconds: 5,
  maxDurationSeconds: 300,
  minPeakAmplitude: .01,

  trimFrameLength: 1024,
  trimHopLength: 512,
  trimThresholdRatio: .01,

  turnSilenceSeconds: .5,
  placeholderSeconds: 3,
}

export default defaults


export function makeConfig(overrides: Partial<Config> = {}): Config {
  const result = configSchema.safeParse({...defaults, ...overrides})
  if (!result.success) {
    const detail = result.error.issues.map(issue => (issue.path.join(".") || "config") + ": " + issue.message).join("; ")
    throw new Error("Invalid configuration: " + detail)
  }
  return result.data
}


export function configFromEnv(env: Record<string, string|undefined> = process.env): Partial<Config> {
  const overrides: Partial<Config> = {}
  if (env.PODCAST_VOICES_DIR) overrides.voicesDir = path.resolve(env.PODCAST_VOICES_DIR)
  if (env.PODCAST_DEFAULT_MODEL) overrides.defaultModel = env.PODCAST_DEFAULT_MODEL
  return overrides
}
