import { deleteFile, VOICE_ID_PATTERN } from "./storage"
import type { Store } from "./storage"
import type { DefaultVoiceRecord, Outcome, RegistryError, VoiceRecord, VoiceSummary } from "./types"
import { errorMessage, makeSerialExecutor } from "./utils"

export const DEFAULT_VOICE_ID = "default"

export const defaultVoice: DefaultVoiceRecord = {
  id: DEFAULT_VOICE_ID,
  name: "Default Voice",
  description: "Default TTS voice",
  type: "default"
}


export function makeVoiceRegistry(store: Store) {
  //insertion-ordered; the default voice is always listed first regardless
  const voices = new Map<string, VoiceRecord>([[DEFAULT_VOICE_ID, defaultVoice]])
  const executor = makeSerialExecutor()
  let loaded = false

  async function persist(): Promise<Outcome<void, "RegistryWriteFailed">> {
    try {
      await store.write([...voices.values()])
      return {ok: true, value: undefined}
    }
    catch (err) {
      console.error("Failed to write voice store", store.storePath, err)
      return {ok: false, error: "RegistryWriteFailed", message: "Failed to update voice database: " + errorMessage(err)}
    }
  }

  async function loadStore() {
    const records = await store.read()
    voices.clear()
    voices.set(DEFAULT_VOICE_ID, defaultVoice)
    for (const record of records ?? []) {
      if (record.id == DEFAULT_VOICE_ID && record.type != "default") {
        console.warn("Ignoring non-default record stored under the default id")
        continue
      }
      voices.set(record.id, record)
    }
    if (!records || !records.some(record => record.id == DEFAULT_VOICE_ID)) {
      await store.write([...voices.values()])
    }
    loaded = true
    console.info("Loaded", voices.size, "voices from", store.storePath)
  }

  return {
    /**
     * Reads the store, creating it with just the default voice if absent.
     * A store missing the default voice gets it back. Mutations load first if this was never called.
     */
    load(): Promise<void> {
      return executor.run(loadStore)
    },

    list(): VoiceSummary[] {
      const ordered = [...voices.values()].sort((a, b) => Number(b.type == "default") - Number(a.type == "default"))
      return ordered.map(({id, name, type}) => ({id, name, type, label: `${name} (${type})`}))
    },

    has(id: string): boolean {
      return voices.has(id)
    },

    get(id: string): VoiceRecord|undefined {
      return voices.get(id)
    },

    getPath(id: string): string|undefined {
      const voice = voices.get(id)
      return voice?.type == "cloned" ? voice.path : undefined
    },

    add(record: VoiceRecord): Promise<Outcome<VoiceRecord, RegistryError>> {
      return executor.run<Outcome<VoiceRecord, RegistryError>>(async () => {
        if (!loaded) await loadStore()
        if (!VOICE_ID_PATTERN.test(record.id))
          return {ok: false, error: "InvalidName", message: "Voice name can only contain letters, numbers, underscores, and hyphens"}
        if (record.type != "cloned")
          return {ok: false, error: "InvalidRecord", message: "Only cloned voices can be added"}
        if (voices.has(record.id))
          return {ok: false, error: "DuplicateId", message: "Voice name already exists"}
        voices.set(record.id, record)
        const saved = await persist()
        if (!saved.ok) {
          voices.delete(record.id)
          return saved
        }
        return {ok: true, value: record}
      })
    },

    remove(id: string): Promise<Outcome<VoiceRecord, RegistryError>> {
      return executor.run<Outcome<VoiceRecord, RegistryError>>(async () => {
        if (!loaded) await loadStore()
        const voice = voices.get(id)
        if (!voice)
          return {ok: false, error: "NotFound", message: "Voice not found"}
        if (voice.type == "default")
          return {ok: false, error: "ProtectedRecord", message: "Cannot delete default voice"}

        const snapshot = [...voices.entries()]
        voices.delete(id)
        const saved = await persist()
        if (!saved.ok) {
          voices.clear()
          for (const [key, value] of snapshot) voices.set(key, value)
          return saved
        }
        await deleteFile(voice.path)
        return {ok: true, value: voice}
      })
    },
  }
}

export type VoiceRegistry = ReturnType<typeof makeVoiceRegistry>
