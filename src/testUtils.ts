import * as fs from "node:fs/promises"
import * as os from "node:os"
import * as path from "node:path"
import type { PcmData } from "./types"

export function tone(seconds: number, sampleRate: number, opts: {freq?: number, amplitude?: number, numChannels?: number} = {}): PcmData {
  const {freq = 440, amplitude = .5, numChannels = 1} = opts
  const numFrames = Math.round(seconds * sampleRate)
  const samples = new Float32Array(numFrames * numChannels)
  for (let i = 0; i < numFrames; i++) {
    const s = amplitude * Math.sin(2 * Math.PI * freq * i / sampleRate)
    for (let channel = 0; channel < numChannels; channel++)
      samples[i * numChannels + channel] = s
  }
  return {samples, sampleRate, numChannels}
}

export function padded(pcmData: PcmData, leadSeconds: number, tailSeconds: number): PcmData {
  const {samples, sampleRate, numChannels} = pcmData
  const lead = Math.round(leadSeconds * sampleRate) * numChannels
  const tail = Math.round(tailSeconds * sampleRate) * numChannels
  const output = new Float32Array(lead + samples.length + tail)
  output.set(samples, lead)
  return {samples: output, sampleRate, numChannels}
}

export function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "podcast-voices-"))
}

export async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath)
    return true
  }
  catch {
    return false
  }
}


const FLAC_SAMPLE_RATE_CODES: Record<number, number> = {
  8000: 0b0100, 16000: 0b0101, 22050: 0b0110, 24000: 0b0111, 32000: 0b1000, 44100: 0b1001, 48000: 0b1010
}

/**
 * Minimal 16-bit FLAC writer using verbatim subframes, one channel per subframe.
 */
export function flac({samples, sampleRate, numChannels}: PcmData, blockSize = 4096): Uint8Array {
  const numFrames = samples.length / numChannels
  const bytes: number[] = [0x66, 0x4C, 0x61, 0x43]   //fLaC

  //STREAMINFO, last metadata block
  const info = bitWriter()
  info.write(blockSize, 16)
  info.write(blockSize, 16)
  info.write(0, 24)
  info.write(0, 24)
  info.write(sampleRate, 20)
  info.write(numChannels - 1, 3)
  info.write(15, 5)
  info.write(Math.floor(numFrames / 2 ** 32), 4)
  info.write(numFrames % 2 ** 32, 32)
  for (let i = 0; i < 4; i++) info.write(0, 32)
  bytes.push(0x80, 0, 0, 34, ...info.bytes)

  const rateCode = FLAC_SAMPLE_RATE_CODES[sampleRate] ?? 0b1101
  for (let frame = 0, start = 0; start < numFrames; frame++, start += blockSize) {
    const length = Math.min(blockSize, numFrames - start)
    const header = [0xFF, 0xF8, 0b0111 << 4 | rateCode, (numChannels - 1) << 4 | 0b100 << 1]
    header.push(...(frame < 0x80 ? [frame] : [0xC0 | frame >> 6, 0x80 | frame & 0x3F]))
    header.push(length - 1 >> 8, length - 1 & 0xFF)
    if (rateCode == 0b1101) header.push(sampleRate >> 8, sampleRate & 0xFF)
    header.push(crc8(header))

    const body = [...header]
    for (let channel = 0; channel < numChannels; channel++) {
      body.push(0b00000010)   //verbatim, no wasted bits
      for (let i = start; i < start + length; i++) {
        const value = Math.round(Math.max(-1, Math.min(1, samples[i * numChannels + channel])) * 32767)
        body.push(value >> 8 & 0xFF, value & 0xFF)
      }
    }
    const crc = crc16(body)
    bytes.push(...body, crc >> 8, crc & 0xFF)
  }
  return Uint8Array.from(bytes)
}

function bitWriter() {
  const bits: number[] = []
  return {
    write(value: number, width: number) {
      for (let i = width - 1; i >= 0; i--) bits.push(Math.floor(value / 2 ** i) % 2)
    },
    get bytes() {
      const result: number[] = []
      for (let i = 0; i < bits.length; i += 8)
        result.push(bits.slice(i, i + 8).reduce((byte, bit) => byte << 1 | bit, 0))
      return result
    }
  }
}

function crc8(data: readonly number[]) {
  let crc = 0
  for (const byte of data) {
    crc ^= byte
    for (let i = 0; i < 8; i++) crc = crc & 0x80 ? (crc << 1 ^ 0x07) & 0xFF : crc << 1 & 0xFF
  }
  return crc
}

function crc16(data: readonly number[]) {
  let crc = 0
  for (const byte of data) {
    crc ^= byte << 8
    for (let i = 0; i < 8; i++) crc = crc & 0x8000 ? (crc << 1 ^ 0x8005) & 0xFFFF : crc << 1 & 0xFFFF
  }
  return crc
}
