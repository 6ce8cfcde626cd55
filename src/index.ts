import { configFromEnv, makeConfig } from "./config"
import type { Config } from "./config"
import { makeIngestion } from "./ingestion"
import { makeVoiceRegistry } from "./registry"
import { makeRenderer } from "./speech"
import { makeStore } from "./storage"
import type { ScriptGenerator, Synthesizer } from "./synthesizer"
import { makeWav } from "./wav"

export { configFromEnv, makeConfig } from "./config"
export type { Config } from "./config"
export { normalize } from "./audio"
export type { NormalizedVoice } from "./audio"
export { DEFAULT_VOICE_ID } from "./registry"
export type { VoiceRegistry } from "./registry"
export type { Ingestion, IngestResult, IngestProgress } from "./ingestion"
export { parseTurns } from "./speech"
export type { RenderResult } from "./speech"
export { makeSynthesizer } from "./synthesizer"
export type { RawSynthesis, ScriptGenerator, Synthesizer } from "./synthesizer"
export { decodeWav, encodeWav, makeWav, WavFormatError } from "./wav"
export { decodeAudio, sniffContainer } from "./decode"
export type { AudioContainer } from "./decode"
export * from "./types"


/**
 * Wires the voice registry, ingestion and rendering from explicit configuration.
 * Call `load()` once before anything else.
 */
export function makePodcastStudio(
  config: Config,
  collaborators: {
    synthesizer: Synthesizer
    scriptGenerator: ScriptGenerator
  }
) {
  const store = makeStore(config.voicesDir, config.storeFileName)
  const registry = makeVoiceRegistry(store)
  const ingestion = makeIngestion(registry, store, config)
  const renderer = makeRenderer(collaborators.synthesizer, registry, {
    turnSilenceSeconds: config.turnSilenceSeconds,
    placeholderSeconds: config.placeholderSeconds,
    placeholderSampleRate: config.targetSampleRate,
  })

  return {
    config,
    registry,
    ingestion,
    load: () => registry.load(),
    generateScript(topic: string, hostA: string, hostB: string, modelId = config.defaultModel) {
      return collaborators.scriptGenerator.generate(topic, modelId, hostA, hostB)
    },
    render: renderer.render,
    toWav: makeWav,
  }
}

export type PodcastStudio = ReturnType<typeof makePodcastStudio>


export function makePodcastStudioFromEnv(
  collaborators: Parameters<typeof makePodcastStudio>[1],
  env: Record<string, string|undefined> = process.env
) {
  return makePodcastStudio(makeConfig(configFromEnv(env)), collaborators)
}
