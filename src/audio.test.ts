import assert from "node:assert/strict"
import test from "node:test"
import { findVoicedSpan, mixdown, normalize, resample, rmsOf, statsOf, trimSilence } from "./audio"
import defaults from "./config"
import { padded, tone } from "./testUtils"

function assertRejected(result: ReturnType<typeof normalize>, error: string) {
  assert.equal(result.ok, false)
  if (!result.ok) assert.equal(result.error, error)
}

test("rejects empty audio as corrupt", () => {
  assertRejected(normalize({samples: new Float32Array(0), sampleRate: 24000, numChannels: 1}), "CorruptAudio")
})

test("rejects non-finite samples as corrupt", () => {
  const audio = tone(6, 24000)
  audio.samples[1000] = NaN
  assertRejected(normalize(audio), "CorruptAudio")
  audio.samples[1000] = Infinity
  assertRejected(normalize(audio), "CorruptAudio")
})

test("enforces a five second minimum", () => {
  assertRejected(normalize(tone(4.9, 24000)), "TooShort")
  const result = normalize(tone(5, 24000))
  assert.equal(result.ok, true)
})

test("enforces a five minute maximum", () => {
  assertRejected(normalize(tone(301, 8000)), "TooLong")
})

test("rejects quiet audio", () => {
  const result = normalize(tone(6, 24000, {amplitude: .005}))
  assertRejected(result, "TooQuiet")
  assert.deepEqual(result.trace.map(note => note.step), ["validate", "load", "load"])
})

test("flags but accepts audio louder than full scale", () => {
  const result = normalize(tone(6, 24000, {amplitude: 2}))
  assert.ok(result.ok)
  assert.ok(result.trace.some(note => note.step == "levels"))
  assert.equal(result.value.stats.peak_amplitude, 1)
})

test("produces mono 24kHz peak-normalized audio from stereo 48kHz", () => {
  const result = normalize(tone(6, 48000, {numChannels: 2, amplitude: .3}))
  assert.ok(result.ok)
  const {audio, stats} = result.value
  assert.equal(audio.numChannels, 1)
  assert.equal(audio.sampleRate, 24000)
  assert.equal(audio.samples.length, 144000)
  assert.equal(stats.peak_amplitude, 1)
  assert.equal(stats.channels, 1)
  assert.equal(stats.sample_rate, 24000)
  assert.equal(stats.duration_seconds, 6)
  assert.ok(Math.abs(stats.rms_level - Math.SQRT1_2) < .01)
  assert.deepEqual(result.trace.map(note => note.step),
    ["validate", "load", "load", "mixdown", "mixdown", "resample", "resample", "normalize", "trim", "trim"])
})

test("trims leading and trailing silence on overlapping frame boundaries", () => {
  const result = normalize(padded(tone(5, 24000), 1, 1))
  assert.ok(result.ok)
  //first voiced frame starts at 45*512, last voiced frame 281 ends at 281*512+1024
  assert.equal(result.value.audio.samples.length, 144896 - 23040)
  assert.equal(result.value.stats.duration_seconds, 121856 / 24000)
  assert.equal(result.trace[result.trace.length - 1].message, "Trimmed 13.7% from start, 13.8% from end")
})

test("findVoicedSpan spans from the first to the last frame above threshold", () => {
  const samples = new Float32Array(4096)
  samples.fill(.5, 1500, 2600)
  assert.deepEqual(findVoicedSpan(samples, 1024, 512, .01), {start: 512, end: 3584})
})

test("findVoicedSpan treats a clip shorter than one frame as a single frame", () => {
  const samples = new Float32Array(300).fill(.2)
  assert.deepEqual(findVoicedSpan(samples, 1024, 512, .01), {start: 0, end: 300})
})

test("an all-silent clip is returned unmodified", () => {
  const samples = new Float32Array(5000)
  const trimmed = trimSilence(samples, defaults)
  assert.equal(trimmed.span, undefined)
  assert.equal(trimmed.samples, samples)
  assert.equal(trimmed.samples.length, 5000)
})

test("mixdown averages interleaved channels", () => {
  const mono = mixdown({samples: Float32Array.from([1, 0, .5, .5, -1, 0]), sampleRate: 8000, numChannels: 2})
  assert.deepEqual([...mono], [.5, .5, -.5])
})

test("resample preserves a constant signal", () => {
  const output = resample(new Float32Array(1600).fill(.5), 16000, 24000)
  assert.equal(output.length, 2400)
  assert.ok(output.every(s => Math.abs(s - .5) < 1e-5))
})

test("resample passes in-band tones and removes content above the new Nyquist", () => {
  const interior = (samples: Float32Array) => samples.subarray(100, samples.length - 100)

  const inBand = resample(tone(.2, 48000, {freq: 6000, amplitude: 1}).samples, 48000, 24000)
  assert.equal(inBand.length, 4800)
  assert.ok(Math.abs(rmsOf(interior(inBand)) - Math.SQRT1_2) < .02)

  const outOfBand = resample(tone(.2, 48000, {freq: 15000, amplitude: 1}).samples, 48000, 24000)
  assert.ok(rmsOf(interior(outOfBand)) < .01)
})

test("resample returns the input when rates match", () => {
  const samples = Float32Array.from([.1, .2])
  assert.equal(resample(samples, 24000, 24000), samples)
})

test("statsOf reports duration, peak and RMS", () => {
  const stats = statsOf({samples: Float32Array.from([.5, -.5, .5, -.5]), sampleRate: 4, numChannels: 1})
  assert.deepEqual(stats, {duration_seconds: 1, sample_rate: 4, channels: 1, peak_amplitude: .5, rms_level: .5})
})
