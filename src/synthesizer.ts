import type { PcmData } from "./types"

/**
 * The TTS engine. Given no reference audio it must fall back to its built-in voice.
 */
export interface Synthesizer {
  synthesize(text: string, referenceAudioPath?: string): Promise<PcmData>
}

/**
 * Drafts a dialogue script whose turns are `<|host|>: utterance`, separated by blank lines,
 * using exactly the two host names given.
 */
export interface ScriptGenerator {
  generate(topic: string, modelId: string, hostA: string, hostB: string): Promise<string>
}

export interface RawSynthesis {
  readonly sampleRate: number
  readonly samples: ArrayLike<number>
}


/**
 * Adapts an engine that returns a bare (sampleRate, samples) pair into a mono Synthesizer.
 */
export function makeSynthesizer(
  engine: (text: string, referenceAudioPath: string|undefined) => Promise<RawSynthesis>
): Synthesizer {
  return {
    async synthesize(text, referenceAudioPath) {
      const trimmed = text.trim()
      if (!trimmed) throw new Error("Empty text provided")
      const start = Date.now()
      try {
        const {sampleRate, samples} = await engine(trimmed, referenceAudioPath)
        return {
          samples: samples instanceof Float32Array ? samples : Float32Array.from(samples),
          sampleRate,
          numChannels: 1
        }
      }
      finally {
        console.debug("Synthesized", Date.now() - start, trimmed)
      }
    }
  }
}
