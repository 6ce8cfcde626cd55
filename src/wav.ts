import { peakOf } from "./audio"
import type { PcmData } from "./types"

export type WavEncoding = "float32" | "pcm16"

const FORMAT_PCM = 1
const FORMAT_FLOAT = 3
const FORMAT_EXTENSIBLE = 0xFFFE

export class WavFormatError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "WavFormatError"
  }
}


export function decodeWav(bytes: Uint8Array): PcmData {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
  if (bytes.byteLength < 12 || readString(view, 0) != "RIFF" || readString(view, 8) != "WAVE")
    throw new WavFormatError("Not a RIFF/WAVE file")

  let format: {code: number, numChannels: number, sampleRate: number, blockAlign: number, bitsPerSample: number}|undefined
  let data: {offset: number, size: number}|undefined

  let offset = 12
  while (offset + 8 <= view.byteLength) {
    const id = readString(view, offset)
    const size = view.getUint32(offset + 4, true)
    const body = offset + 8
    if (id == "fmt ") {
      if (size < 16 || body + size > view.byteLength) throw new WavFormatError("Truncated fmt chunk")
      let code = view.getUint16(body, true)
      if (code == FORMAT_EXTENSIBLE) {
        if (size < 40) throw new WavFormatError("Truncated extensible fmt chunk")
        code = view.getUint16(body + 24, true)
      }
      format = {
        code,
        numChannels: view.getUint16(body + 2, true),
        sampleRate: view.getUint32(body + 4, true),
        blockAlign: view.getUint16(body + 12, true),
        bitsPerSample: view.getUint16(body + 14, true),
      }
    }
    else if (id == "data") {
      //streaming writers leave the size unset, take whatever is there
      data = {offset: body, size: Math.min(size, view.byteLength - body)}
      break
    }
    offset = body + size + (size & 1)
  }

  if (!format) throw new WavFormatError("Missing fmt chunk")
  if (!data) throw new WavFormatError("Missing data chunk")
  if (format.numChannels < 1) throw new WavFormatError("Invalid channel count " + format.numChannels)
  if (format.sampleRate < 1) throw new WavFormatError("Invalid sample rate " + format.sampleRate)

  const readSample = sampleReader(view, format.code, format.bitsPerSample)
  const bytesPerSample = format.bitsPerSample / 8
  if (format.blockAlign != bytesPerSample * format.numChannels)
    throw new WavFormatError("Block align " + format.blockAlign + " does not match " + format.numChannels + "x" + format.bitsPerSample + " bits")

  const numFrames = Math.floor(data.size / format.blockAlign)
  const samples = new Float32Array(numFrames * format.numChannels)
  for (let i = 0, pos = data.offset; i < samples.length; i++, pos += bytesPerSample)
    samples[i] = readSample(pos)

  return {
    samples,
    sampleRate: format.sampleRate,
    numChannels: format.numChannels
  }
}


function sampleReader(view: DataView, code: number, bitsPerSample: number): (pos: number) => number {
  if (code == FORMAT_PCM) {
    switch (bitsPerSample) {
      case 8: return pos => (view.getUint8(pos) - 128) / 128
      case 16: return pos => view.getInt16(pos, true) / 32768
      case 24: return pos => ((view.getUint8(pos + 2) << 24 | view.getUint8(pos + 1) << 16 | view.getUint8(pos) << 8) >> 8) / 8388608
      case 32: return pos => view.getInt32(pos, true) / 2147483648
    }
  }
  else if (code == FORMAT_FLOAT) {
    switch (bitsPerSample) {
      case 32: return pos => view.getFloat32(pos, true)
      case 64: return pos => view.getFloat64(pos, true)
    }
  }
  throw new WavFormatError("Unsupported encoding: format " + code + ", " + bitsPerSample + " bits")
}


export function encodeWav({samples, sampleRate, numChannels}: PcmData, encoding: WavEncoding): Buffer {
  const bytesPerSample = encoding == "float32" ? 4 : 2
  const blockAlign = numChannels * bytesPerSample
  const byteRate = sampleRate * blockAlign
  const dataSize = samples.length * bytesPerSample

  const buffer = Buffer.alloc(44 + dataSize)
  const view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength)

  function writeString(offset: number, string: string) {
    for (let i = 0; i < string.length; i++)
      view.setUint8(offset + i, string.charCodeAt(i))
  }

  //WAV header
  writeString(0, 'RIFF')
  view.setUint32(4, dataSize + 36, true)
  writeString(8, 'WAVE')
  writeString(12, 'fmt ')
  view.setUint32(16, 16, true)
  view.setUint16(20, encoding == "float32" ? FORMAT_FLOAT : FORMAT_PCM, true)
  view.setUint16(22, numChannels, true)
  view.setUint32(24, sampleRate, true)
  view.setUint32(28, byteRate, true)
  view.setUint16(32, blockAlign, true)
  view.setUint16(34, bytesPerSample * 8, true)
  writeString(36, 'data')
  view.setUint32(40, dataSize, true)

  let offset = 44
  if (encoding == "float32") {
    for (const s of samples) {
      view.setFloat32(offset, s, true)
      offset += 4
    }
  }
  else {
    for (const s of samples) {
      const clamped = Math.max(-1, Math.min(1, s))
      view.setInt16(offset, clamped * (clamped < 0 ? 32768 : 32767), true)
      offset += 2
    }
  }
  return buffer
}


/**
 * 16-bit WAV of an episode for download, scaled so its loudest sample sits at full scale.
 */
export function makeWav(pcmData: PcmData): Buffer {
  const factor = 1 / Math.max(.01, peakOf(pcmData.samples))
  return encodeWav({...pcmData, samples: pcmData.samples.map(s => s * factor)}, "pcm16")
}


function readString(view: DataView, offset: number) {
  let result = ""
  for (let i = 0; i < 4; i++) result += String.fromCharCode(view.getUint8(offset + i))
  return result
}
