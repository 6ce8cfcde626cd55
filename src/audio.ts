import defaults from "./config"
import type { Config } from "./config"
import type { AudioStats, NormalizationError, Outcome, PcmData, ProgressNote } from "./types"
import { immediate } from "./utils"

export type AudioPolicy = Pick<Config,
  "targetSampleRate" | "minDurationSeconds" | "maxDurationSeconds" | "minPeakAmplitude" |
  "trimFrameLength" | "trimHopLength" | "trimThresholdRatio">

export interface NormalizedVoice {
  readonly audio: PcmData
  //of what was stored, after trimming
  readonly stats: AudioStats
  readonly sourceDurationSeconds: number
}

export type NormalizeResult = Outcome<NormalizedVoice, NormalizationError> & {
  trace: ProgressNote[]
}


/**
 * Validates an arbitrary decoded waveform and turns it into a voice reference:
 * mono, resampled to the target rate, peak-normalized to 1.0, with leading and
 * trailing silence removed. Rejections carry the notes collected up to that point.
 */
export function normalize(raw: PcmData, policy: AudioPolicy = defaults): NormalizeResult {
  const trace: ProgressNote[] = []
  const fail = (error: NormalizationError, message: string): NormalizeResult => ({ok: false, error, message, trace})

  trace.push({step: "validate", percent: 5, message: "Validating audio..."})
  if (raw.samples.length == 0 || raw.numChannels < 1 || raw.sampleRate <= 0)
    return fail("CorruptAudio", "Audio file is empty")
  for (const s of raw.samples)
    if (!Number.isFinite(s)) return fail("CorruptAudio", "Audio file contains invalid values")

  const duration = raw.samples.length / raw.numChannels / raw.sampleRate
  if (duration < policy.minDurationSeconds)
    return fail("TooShort", `Audio too short (${duration.toFixed(1)}s). Please provide at least ${policy.minDurationSeconds} seconds of audio.`)
  if (duration > policy.maxDurationSeconds)
    return fail("TooLong", `Audio too long (${duration.toFixed(1)}s). Please provide at most ${policy.maxDurationSeconds} seconds of audio.`)
  trace.push({step: "load", percent: 10, message: `Loaded ${duration.toFixed(1)} seconds of audio`})
  trace.push({step: "load", percent: 15, message: `Sample rate: ${raw.sampleRate}Hz, Channels: ${raw.numChannels}`})

  let samples = raw.samples
  if (raw.numChannels > 1) {
    trace.push({step: "mixdown", percent: 20, message: `Converting ${raw.numChannels} channels to mono...`})
    samples = mixdown(raw)
    trace.push({step: "mixdown", percent: 25, message: "Converted to mono successfully"})
  }

  const inputPeak = peakOf(samples)
  if (inputPeak < policy.minPeakAmplitude)
    return fail("TooQuiet", "Audio level too low. Please provide louder audio.")
  if (inputPeak > 1)
    trace.push({step: "levels", percent: 30, message: "Audio levels high, will normalize..."})

  if (raw.sampleRate != policy.targetSampleRate) {
    trace.push({step: "resample", percent: 35, message: `Resampling from ${raw.sampleRate}Hz to ${policy.targetSampleRate}Hz...`})
    samples = resample(samples, raw.sampleRate, policy.targetSampleRate)
    trace.push({step: "resample", percent: 40, message: "Resampling completed successfully"})
  }

  trace.push({step: "normalize", percent: 50, message: "Normalizing audio..."})
  samples = peakNormalize(samples)

  trace.push({step: "trim", percent: 60, message: "Trimming silence..."})
  const total = samples.length
  const trimmed = trimSilence(samples, policy)
  samples = trimmed.samples
  if (trimmed.span) {
    trace.push({step: "trim", percent: 65, message: `Trimmed ${percentOf(trimmed.span.start, total)} from start, ${percentOf(total - trimmed.span.end, total)} from end`})
  }
  else {
    trace.push({step: "trim", percent: 65, message: "No non-silent parts found, using full audio"})
  }

  const audio: PcmData = {samples, sampleRate: policy.targetSampleRate, numChannels: 1}
  return {ok: true, value: {audio, stats: statsOf(audio), sourceDurationSeconds: duration}, trace}
}


export function mixdown({samples, numChannels}: PcmData): Float32Array {
  if (numChannels == 1) return samples
  const numFrames = Math.floor(samples.length / numChannels)
  const mono = new Float32Array(numFrames)
  for (let i = 0; i < numFrames; i++) {
    let sum = 0
    for (let channel = 0; channel < numChannels; channel++)
      sum += samples[i * numChannels + channel]   //interleaved
    mono[i] = sum / numChannels
  }
  return mono
}


export function peakOf(samples: Float32Array): number {
  let peak = 0
  for (const s of samples) {
    if (s > peak) peak = s
    else if (-s > peak) peak = -s
  }
  return peak
}


export function rmsOf(samples: Float32Array): number {
  if (samples.length == 0) return 0
  let sumSq = 0
  for (const s of samples) sumSq += s * s
  return Math.sqrt(sumSq / samples.length)
}


export function peakNormalize(samples: Float32Array): Float32Array {
  const peak = peakOf(samples)
  if (peak == 0) return samples
  return samples.map(s => s / peak)
}


export function statsOf({samples, sampleRate, numChannels}: PcmData): AudioStats {
  return {
    duration_seconds: samples.length / numChannels / sampleRate,
    sample_rate: sampleRate,
    channels: numChannels,
    peak_amplitude: peakOf(samples),
    rms_level: rmsOf(samples),
  }
}


/**
 * Frames overlap: frame i covers [i*hop, i*hop + frameLength), the last one
 * truncated at the end of the signal. Returns the sample range spanning the
 * first to the last frame whose RMS exceeds `thresholdRatio` of the loudest
 * frame, or undefined when no frame does.
 */
export function findVoicedSpan(samples: Float32Array, frameLength: number, hop: number, thresholdRatio: number) {
  const n = samples.length
  const numFrames = n <= frameLength ? 1 : 1 + Math.ceil((n - frameLength) / hop)

  const rms = new Float64Array(numFrames)
  let maxRms = 0
  for (let i = 0; i < numFrames; i++) {
    rms[i] = rmsOf(samples.subarray(i * hop, Math.min(i * hop + frameLength, n)))
    if (rms[i] > maxRms) maxRms = rms[i]
  }

  const threshold = thresholdRatio * maxRms
  let first = -1
  let last = -1
  for (let i = 0; i < numFrames; i++) {
    if (rms[i] > threshold) {
      if (first < 0) first = i
      last = i
    }
  }
  if (first < 0) return undefined

  return {
    start: first * hop,
    end: Math.min(last * hop + frameLength, n)
  }
}


/**
 * Cuts leading and trailing silence; a clip with no frame above the threshold comes back as is.
 */
export function trimSilence(samples: Float32Array, policy: Pick<AudioPolicy, "trimFrameLength" | "trimHopLength" | "trimThresholdRatio">) {
  const span = findVoicedSpan(samples, policy.trimFrameLength, policy.trimHopLength, policy.trimThresholdRatio)
  return {
    samples: span ? samples.slice(span.start, span.end) : samples,
    span
  }
}


const SINC_ZERO_CROSSINGS = 16
const SINC_RESOLUTION = 512

const sincTable = immediate(() => {
  const size = SINC_ZERO_CROSSINGS * SINC_RESOLUTION + 1
  const table = new Float64Array(size + 1)
  for (let k = 0; k < size; k++) {
    const x = k / SINC_RESOLUTION
    const u = x / SINC_ZERO_CROSSINGS
    const blackman = .42 + .5 * Math.cos(Math.PI * u) + .08 * Math.cos(2 * Math.PI * u)
    table[k] = (x == 0 ? 1 : Math.sin(Math.PI * x) / (Math.PI * x)) * blackman
  }
  return table
})

function sincAt(x: number) {
  const pos = Math.abs(x) * SINC_RESOLUTION
  const index = Math.floor(pos)
  if (index >= SINC_ZERO_CROSSINGS * SINC_RESOLUTION) return 0
  const frac = pos - index
  return sincTable[index] + (sincTable[index + 1] - sincTable[index]) * frac
}


/**
 * Band-limited resampling with a Blackman-windowed sinc kernel; the cutoff sits
 * at the lower of the two Nyquist frequencies.
 */
export function resample(samples: Float32Array, fromRate: number, toRate: number): Float32Array {
  if (fromRate == toRate) return samples
  const n = samples.length
  const step = fromRate / toRate
  const cutoff = Math.min(1, toRate / fromRate)
  const halfWidth = SINC_ZERO_CROSSINGS / cutoff
  const output = new Float32Array(Math.ceil(n * toRate / fromRate))

  for (let j = 0; j < output.length; j++) {
    const center = j * step
    const lo = Math.max(0, Math.ceil(center - halfWidth))
    const hi = Math.min(n - 1, Math.floor(center + halfWidth))
    let acc = 0
    let weightSum = 0
    for (let i = lo; i <= hi; i++) {
      const weight = sincAt((i - center) * cutoff)
      acc += samples[i] * weight
      weightSum += weight
    }
    output[j] = weightSum != 0 ? acc / weightSum : 0
  }
  return output
}


export function makeSilence(seconds: number, sampleRate: number): Float32Array {
  return new Float32Array(Math.floor(seconds * sampleRate))
}


function percentOf(part: number, total: number) {
  return (part / total * 100).toFixed(1) + "%"
}
