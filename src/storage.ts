import * as fs from "node:fs/promises"
import * as path from "node:path"
import { z } from "zod"
import { decodeAudio } from "./decode"
import { encodeWav } from "./wav"
import type { PcmData, VoiceRecord } from "./types"

export const VOICE_ID_PATTERN = /^[A-Za-z0-9_-]+$/

const statsSchema = z.object({
  duration_seconds: z.number(),
  sample_rate: z.number().int().positive(),
  channels: z.number().int().positive(),
  peak_amplitude: z.number(),
  rms_level: z.number(),
})

const storedVoiceSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("default"),
    name: z.string(),
    description: z.string().default("Default TTS voice"),
  }),
  z.object({
    type: z.literal("cloned"),
    name: z.string(),
    description: z.string().default(""),
    path: z.string().min(1),
    stats: statsSchema,
    created: z.string(),
    source_file: z.string(),
  }),
])

const storeSchema = z.object({
  voices: z.record(z.string().regex(VOICE_ID_PATTERN), storedVoiceSchema)
})

export type StoreDocument = z.input<typeof storeSchema>


export function makeStore(voicesDir: string, storeFileName: string) {
  const storePath = path.join(voicesDir, storeFileName)

  return {
    storePath,

    /**
     * Returns the records in document order, or undefined when no store has been written yet.
     */
    async read(): Promise<VoiceRecord[]|undefined> {
      let text: string
      try {
        text = await fs.readFile(storePath, "utf8")
      }
      catch (err) {
        if (isErrnoException(err) && err.code == "ENOENT") return undefined
        throw err
      }
      const result = storeSchema.safeParse(JSON.parse(text))
      if (!result.success)
        throw new Error("Invalid voice store " + storePath + ": " + result.error.issues.map(issue => issue.path.join(".") + " " + issue.message).join("; "))
      return Object.entries(result.data.voices)
        .map(([id, voice]) => ({id, ...voice}))
    },

    async write(records: readonly VoiceRecord[]): Promise<void> {
      const doc: StoreDocument = {voices: {}}
      for (const {id, ...voice} of records) doc.voices[id] = voice
      await fs.mkdir(voicesDir, {recursive: true})
      //write-then-rename so readers never see a half-written document
      const tempPath = storePath + "." + process.pid + ".tmp"
      await fs.writeFile(tempPath, JSON.stringify(doc, null, 2))
      try {
        await fs.rename(tempPath, storePath)
      }
      catch (err) {
        await fs.rm(tempPath, {force: true})
        throw err
      }
    },

    audioPath(id: string) {
      return path.join(voicesDir, id + ".wav")
    },

    //where a new voice's audio waits until its record is registered
    stagingPath(id: string) {
      return path.join(voicesDir, id + "." + process.pid + ".partial.wav")
    },

    async writeAudio(filePath: string, pcmData: PcmData): Promise<void> {
      await fs.mkdir(path.dirname(filePath), {recursive: true})
      await fs.writeFile(filePath, encodeWav(pcmData, "float32"))
    },

    async moveAudio(fromPath: string, toPath: string): Promise<void> {
      await fs.rename(fromPath, toPath)
    },
  }
}

export type Store = ReturnType<typeof makeStore>


export async function readAudio(filePath: string): Promise<PcmData> {
  return decodeAudio(await fs.readFile(filePath))
}


export async function fileExists(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile()
  }
  catch {
    return false
  }
}


/**
 * Best-effort removal; failures are logged and never rethrown.
 */
export async function deleteFile(filePath: string): Promise<boolean> {
  try {
    await fs.rm(filePath, {force: true})
    return true
  }
  catch (err) {
    console.warn("Failed to delete", filePath, err)
    return false
  }
}


function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err
}
