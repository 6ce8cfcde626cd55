import { FLACDecoder } from "@wasm-audio-decoders/flac"
import { OggVorbisDecoder } from "@wasm-audio-decoders/ogg-vorbis"
import { MPEGDecoder } from "mpg123-decoder"
import type { PcmData } from "./types"
import { decodeWav } from "./wav"

export type AudioContainer = "wav" | "flac" | "ogg" | "mp3"

interface DecodedAudio {
  channelData: Float32Array[]
  samplesDecoded: number
  sampleRate: number
  errors: Array<{message: string}>
}

interface WasmDecoder {
  ready: Promise<void>
  free(): void
}


export function sniffContainer(bytes: Uint8Array): AudioContainer|undefined {
  const tag = (offset: number) => String.fromCharCode(...bytes.subarray(offset, offset + 4))
  if (tag(0) == "RIFF" && tag(8) == "WAVE") return "wav"
  if (tag(0) == "fLaC") return "flac"
  if (tag(0) == "OggS") return "ogg"
  if (tag(0).startsWith("ID3")) return "mp3"
  //bare MPEG frame sync
  if (bytes.length >= 2 && bytes[0] == 0xFF && (bytes[1] & 0xE0) == 0xE0) return "mp3"
  return undefined
}


/**
 * Decodes a WAV, FLAC, Ogg Vorbis or MP3 file into interleaved float samples.
 */
export async function decodeAudio(bytes: Uint8Array): Promise<PcmData> {
  const container = sniffContainer(bytes)
  switch (container) {
    case "wav": return decodeWav(bytes)
    case "flac": return decodeWith(new FLACDecoder(), decoder => decoder.decodeFile(bytes))
    case "ogg": return decodeWith(new OggVorbisDecoder(), decoder => decoder.decodeFile(bytes))
    case "mp3": return decodeWith(new MPEGDecoder(), decoder => decoder.decode(bytes))
    case undefined: throw new Error("Unsupported audio format")
  }
}


async function decodeWith<D extends WasmDecoder>(
  decoder: D,
  decode: (decoder: D) => DecodedAudio|Promise<DecodedAudio>
): Promise<PcmData> {
  await decoder.ready
  try {
    const {channelData, samplesDecoded, sampleRate, errors} = await decode(decoder)
    if (samplesDecoded == 0 || channelData.length == 0)
      throw new Error("No audio decoded" + (errors.length ? ": " + errors[0].message : ""))
    if (errors.length)
      console.warn("Skipped", errors.length, "undecodable frames:", errors[0].message)
    return {
      samples: interleave(channelData, samplesDecoded),
      sampleRate,
      numChannels: channelData.length
    }
  }
  finally {
    decoder.free()
  }
}


function interleave(channelData: readonly Float32Array[], numFrames: number): Float32Array {
  const numChannels = channelData.length
  if (numChannels == 1) return channelData[0].slice(0, numFrames)
  const samples = new Float32Array(numFrames * numChannels)
  for (let channel = 0; channel < numChannels; channel++) {
    const data = channelData[channel]
    for (let i = 0; i < numFrames; i++)
      samples[i * numChannels + channel] = data[i]
  }
  return samples
}
