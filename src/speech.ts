import { makeSilence, mixdown, resample } from "./audio"
import type { Synthesizer } from "./synthesizer"
import type { Outcome, PcmData, RenderError, Turn } from "./types"
import { errorMessage } from "./utils"

export interface RenderOptions {
  readonly turnSilenceSeconds: number
  readonly placeholderSeconds: number
  readonly placeholderSampleRate: number
}

export type RenderResult = {
  ok: true
  audio: PcmData
  log: string
} | {
  ok: false
  error: RenderError
  audio: PcmData
  log: string
  unknownSpeakers?: string[]
}

interface VoiceLookup {
  getPath(voiceId: string): string|undefined
}


export function parseTurns(script: string): Outcome<Turn[], "NoTurnsFound"> {
  const turns = [...script.trim().matchAll(/<\|(.*?)\|>: (.*?)(?:\n\n|$)/g)]
    .map<Turn>(([, speaker, text]) => ({speaker, text}))
  if (turns.length == 0)
    return {ok: false, error: "NoTurnsFound", message: "No valid dialogue turns found in the script"}
  return {ok: true, value: turns}
}


export function makeRenderer(synth: Synthesizer, voices: VoiceLookup, opts: RenderOptions) {
  const placeholder = (): PcmData => ({
    samples: makeSilence(opts.placeholderSeconds, opts.placeholderSampleRate),
    sampleRate: opts.placeholderSampleRate,
    numChannels: 1
  })

  const failed = (error: RenderError, message: string, unknownSpeakers?: string[]): RenderResult => {
    const log = "Error generating podcast audio: " + message
    console.error(log)
    return {ok: false, error, audio: placeholder(), log, ...(unknownSpeakers && {unknownSpeakers})}
  }

  return {
    /**
     * Synthesizes every turn in order with the voice mapped to its speaker, each followed by a pause.
     * Never throws; any failure yields a short silent placeholder and the error message.
     */
    async render(script: string, speakerToVoice: Readonly<Record<string, string>>): Promise<RenderResult> {
      try {
        const parsed = parseTurns(script)
        if (!parsed.ok) return failed(parsed.error, parsed.message)
        const turns = parsed.value

        const unknown = [...new Set(turns.map(turn => turn.speaker).filter(speaker => !Object.hasOwn(speakerToVoice, speaker)))]
        if (unknown.length)
          return failed("UnknownSpeaker", "Invalid speaker(s): " + unknown.join(", "), unknown)

        console.info("Processing", turns.length, "dialogue turns")
        const segments: Float32Array[] = []
        let sampleRate = 0
        for (const [index, {speaker, text}] of turns.entries()) {
          console.debug(`Processing turn ${index + 1}/${turns.length} for ${speaker}`)
          const referenceAudioPath = voices.getPath(speakerToVoice[speaker])
          const pcmData = await synth.synthesize(text, referenceAudioPath)
          if (!sampleRate) sampleRate = pcmData.sampleRate
          segments.push(conform(pcmData, sampleRate))
          segments.push(makeSilence(opts.turnSilenceSeconds, sampleRate))
        }

        return {
          ok: true,
          audio: {samples: concat(segments), sampleRate, numChannels: 1},
          log: turns.map(({speaker, text}) => `${text}\n${speaker}`).join("\n\n")
        }
      }
      catch (err) {
        return failed("SynthesisFailed", errorMessage(err))
      }
    }
  }
}

export type Renderer = ReturnType<typeof makeRenderer>


function conform(pcmData: PcmData, sampleRate: number): Float32Array {
  return resample(mixdown(pcmData), pcmData.sampleRate, sampleRate)
}

function concat(segments: readonly Float32Array[]): Float32Array {
  const output = new Float32Array(segments.reduce((sum, segment) => sum + segment.length, 0))
  let offset = 0
  for (const segment of segments) {
    output.set(segment, offset)
    offset += segment.length
  }
  return output
}
