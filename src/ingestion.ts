import * as path from "node:path"
import * as rxjs from "rxjs"
import { normalize } from "./audio"
import type { AudioPolicy } from "./audio"
import type { VoiceRegistry } from "./registry"
import { deleteFile, fileExists, readAudio, VOICE_ID_PATTERN } from "./storage"
import type { Store } from "./storage"
import type { ClonedVoiceRecord, IngestError, PcmData, ProgressNote, RegistryError } from "./types"
import { errorMessage, makeSerialExecutor, toDecibels } from "./utils"

export type IngestResult = {
  ok: true
  message: string
  trace: ProgressNote[]
  record: ClonedVoiceRecord
} | {
  ok: false
  error: IngestError
  message: string
  trace: ProgressNote[]
}

export interface IngestProgress extends ProgressNote {
  readonly voiceName: string
}


export function makeIngestion(
  registry: VoiceRegistry,
  store: Store,
  policy: AudioPolicy,
  clock: () => Date = () => new Date()
) {
  const progress$ = new rxjs.Subject<IngestProgress>()
  const executor = makeSerialExecutor()

  async function run(rawFilePath: string, requestedName: string, trace: ProgressNote[]): Promise<IngestResult> {
    const voiceName = requestedName.trim()
    const note = (item: ProgressNote) => {
      trace.push(item)
      progress$.next({...item, voiceName})
    }
    const fail = (error: IngestError, message: string): IngestResult => {
      note({step: "error", percent: 0, message})
      return {ok: false, error, message, trace}
    }

    if (!rawFilePath || !await fileExists(rawFilePath))
      return fail("FileNotFound", "Audio file not found")
    if (!voiceName)
      return fail("InvalidName", "Voice name cannot be empty")
    if (!VOICE_ID_PATTERN.test(voiceName))
      return fail("InvalidName", "Voice name can only contain letters, numbers, underscores, and hyphens")
    if (registry.has(voiceName))
      return fail("DuplicateId", "Voice name already exists")

    let raw: PcmData
    try {
      raw = await readAudio(rawFilePath)
    }
    catch (err) {
      return fail("UnreadableFile", "Failed to load audio file: " + errorMessage(err))
    }

    const normalized = normalize(raw, policy)
    for (const item of normalized.trace) note(item)
    if (!normalized.ok)
      return fail(normalized.error, normalized.message)
    const {audio, stats, sourceDurationSeconds} = normalized.value

    //the final path is only written once the record is registered, so a concurrent
    //registration of the same id never has its audio overwritten or deleted
    const stagingPath = store.stagingPath(voiceName)
    const voicePath = store.audioPath(voiceName)
    note({step: "save", percent: 80, message: "Saving processed audio..."})
    try {
      await store.writeAudio(stagingPath, audio)
    }
    catch (err) {
      await deleteFile(stagingPath)
      return fail("WriteFailed", "Failed to save audio file: " + errorMessage(err))
    }
    note({step: "save", percent: 85, message: "Processed audio written"})

    try {
      const written = await readAudio(stagingPath)
      if (written.sampleRate != audio.sampleRate || written.numChannels != audio.numChannels || written.samples.length != audio.samples.length)
        throw new Error(`expected ${audio.samples.length} samples at ${audio.sampleRate}Hz, found ${written.samples.length} at ${written.sampleRate}Hz`)
      note({step: "verify", percent: 87, message: "Verified saved audio file"})
    }
    catch (err) {
      await deleteFile(stagingPath)
      return fail("VerificationFailed", "Audio file verification failed: " + errorMessage(err))
    }

    note({step: "register", percent: 90, message: "Updating voice database..."})
    const sourceFile = path.basename(rawFilePath)
    const record: ClonedVoiceRecord = {
      id: voiceName,
      name: voiceName,
      description: `Cloned voice from ${sourceFile}`,
      type: "cloned",
      path: voicePath,
      stats,
      created: clock().toISOString(),
      source_file: sourceFile,
    }
    const added = await registry.add(record)
    if (!added.ok) {
      await deleteFile(stagingPath)
      return fail(ingestErrorOf(added.error), added.message)
    }

    try {
      await store.moveAudio(stagingPath, voicePath)
    }
    catch (err) {
      await deleteFile(stagingPath)
      const removed = await registry.remove(voiceName)
      if (!removed.ok) console.error("Failed to unregister", voiceName, removed.message)
      return fail("WriteFailed", "Failed to save audio file: " + errorMessage(err))
    }
    note({step: "register", percent: 95, message: `Voice database updated, audio saved to ${path.basename(voicePath)}`})

    const message = [
      `Voice '${voiceName}' created successfully!`,
      `Duration: ${stats.duration_seconds.toFixed(1)}s (trimmed from ${sourceDurationSeconds.toFixed(1)}s)`,
      `Sample Rate: ${stats.sample_rate / 1000}kHz`,
      `Channels: ${stats.channels}`,
      `Peak Level: ${toDecibels(stats.peak_amplitude)}`,
      `RMS Level: ${toDecibels(stats.rms_level)}`,
    ].join("\n")
    note({step: "complete", percent: 100, message: "Voice processing complete!"})
    return {ok: true, message, trace, record}
  }

  return {
    progress$: progress$.asObservable(),

    /**
     * Turns an uploaded audio file into a registered cloned voice. Never throws;
     * a failed run leaves none of its audio behind and never touches an existing voice file.
     */
    ingest(rawFilePath: string, requestedName: string): Promise<IngestResult> {
      return executor.run<IngestResult>(async () => {
        const trace: ProgressNote[] = []
        try {
          return await run(rawFilePath, requestedName, trace)
        }
        catch (err) {
          console.error("Ingestion failed", rawFilePath, err)
          const voiceName = requestedName.trim()
          if (VOICE_ID_PATTERN.test(voiceName))
            await deleteFile(store.stagingPath(voiceName))
          const message = "Unexpected error: " + errorMessage(err)
          trace.push({step: "error", percent: 0, message})
          return {ok: false, error: "Unexpected", message, trace}
        }
      })
    },
  }
}

export type Ingestion = ReturnType<typeof makeIngestion>


function ingestErrorOf(error: RegistryError): IngestError {
  switch (error) {
    case "DuplicateId":
    case "InvalidName":
    case "RegistryWriteFailed":
      return error
    default:
      return "Unexpected"
  }
}
