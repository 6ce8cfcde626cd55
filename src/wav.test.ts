import assert from "node:assert/strict"
import test from "node:test"
import { decodeWav, encodeWav, makeWav, WavFormatError } from "./wav"

function wavBytes(opts: {format: number, numChannels: number, sampleRate: number, bitsPerSample: number, data: number[], extraChunk?: boolean}) {
  const {format, numChannels, sampleRate, bitsPerSample, data, extraChunk} = opts
  const blockAlign = numChannels * bitsPerSample / 8
  const chunks: number[] = []
  const u16 = (v: number) => [v & 0xff, v >> 8 & 0xff]
  const u32 = (v: number) => [v & 0xff, v >> 8 & 0xff, v >> 16 & 0xff, v >>> 24 & 0xff]
  const str = (s: string) => [...s].map(c => c.charCodeAt(0))
  chunks.push(...str("RIFF"), ...u32(0), ...str("WAVE"))
  if (extraChunk) chunks.push(...str("LIST"), ...u32(3), 1, 2, 3, 0)
  chunks.push(...str("fmt "), ...u32(16), ...u16(format), ...u16(numChannels), ...u32(sampleRate),
    ...u32(sampleRate * blockAlign), ...u16(blockAlign), ...u16(bitsPerSample))
  chunks.push(...str("data"), ...u32(data.length), ...data)
  return Uint8Array.from(chunks)
}

test("float32 encoding is read back sample for sample", () => {
  const samples = Float32Array.from([0, .25, -.75, 1, -1, .125])
  const decoded = decodeWav(encodeWav({samples, sampleRate: 24000, numChannels: 2}, "float32"))
  assert.equal(decoded.sampleRate, 24000)
  assert.equal(decoded.numChannels, 2)
  assert.deepEqual([...decoded.samples], [...samples])
})

test("16-bit encoding clamps and scales asymmetrically", () => {
  const bytes = encodeWav({samples: Float32Array.from([.5, -1, 2]), sampleRate: 8000, numChannels: 1}, "pcm16")
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
  assert.equal(bytes.byteLength, 44 + 6)
  assert.equal(view.getUint16(20, true), 1)
  assert.equal(view.getUint16(34, true), 16)
  assert.equal(view.getInt16(44, true), 16383)
  assert.equal(view.getInt16(46, true), -32768)
  assert.equal(view.getInt16(48, true), 32767)

  const decoded = decodeWav(bytes)
  assert.deepEqual([...decoded.samples], [16383 / 32768, -1, 32767 / 32768])
})

test("decodes 24-bit PCM with sign extension", () => {
  const decoded = decodeWav(wavBytes({
    format: 1, numChannels: 1, sampleRate: 16000, bitsPerSample: 24,
    data: [0x00, 0x00, 0x80, 0xff, 0xff, 0x7f, 0x00, 0x00, 0x40]
  }))
  assert.equal(decoded.sampleRate, 16000)
  assert.deepEqual([...decoded.samples], [-1, 8388607 / 8388608, .5])
})

test("decodes 8-bit unsigned PCM", () => {
  const decoded = decodeWav(wavBytes({format: 1, numChannels: 1, sampleRate: 8000, bitsPerSample: 8, data: [0, 128, 192]}))
  assert.deepEqual([...decoded.samples], [-1, 0, .5])
})

test("skips unknown chunks with odd sizes before fmt", () => {
  const decoded = decodeWav(wavBytes({
    format: 1, numChannels: 2, sampleRate: 44100, bitsPerSample: 16,
    data: [0x00, 0x40, 0x00, 0xc0], extraChunk: true
  }))
  assert.equal(decoded.numChannels, 2)
  assert.deepEqual([...decoded.samples], [.5, -.5])
})

test("ignores a trailing partial frame", () => {
  const decoded = decodeWav(wavBytes({format: 1, numChannels: 2, sampleRate: 8000, bitsPerSample: 16, data: [0, 0x40, 0, 0x40, 0, 0x40]}))
  assert.equal(decoded.samples.length, 2)
})

test("rejects input that is not RIFF/WAVE", () => {
  assert.throws(() => decodeWav(new TextEncoder().encode("definitely not audio")), WavFormatError)
})

test("rejects a file without a data chunk", () => {
  const bytes = wavBytes({format: 1, numChannels: 1, sampleRate: 8000, bitsPerSample: 16, data: []})
  assert.throws(() => decodeWav(bytes.subarray(0, bytes.length - 8)), /Missing data chunk/)
})

test("rejects unsupported encodings", () => {
  assert.throws(() => decodeWav(wavBytes({format: 2, numChannels: 1, sampleRate: 8000, bitsPerSample: 4, data: [0]})), /Unsupported encoding/)
})

test("makeWav scales the loudest sample to full scale", () => {
  const bytes = makeWav({samples: Float32Array.from([.25, -.5]), sampleRate: 24000, numChannels: 1})
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
  assert.equal(view.getInt16(44, true), 16383)
  assert.equal(view.getInt16(46, true), -32768)
})
