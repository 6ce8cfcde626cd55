
export interface PcmData {
  readonly samples: Float32Array
  readonly sampleRate: number
  readonly numChannels: number
}

export type VoiceType = "default" | "cloned"

export interface AudioStats {
  readonly duration_seconds: number
  readonly sample_rate: number
  readonly channels: number
  readonly peak_amplitude: number
  readonly rms_level: number
}

export interface DefaultVoiceRecord {
  readonly id: string
  readonly name: string
  readonly description: string
  readonly type: "default"
}

export interface ClonedVoiceRecord {
  readonly id: string
  readonly name: string
  readonly description: string
  readonly type: "cloned"
  readonly path: string
  readonly stats: AudioStats
  readonly created: string
  readonly source_file: string
}

export type VoiceRecord = DefaultVoiceRecord | ClonedVoiceRecord

export interface VoiceSummary {
  readonly id: string
  readonly name: string
  readonly type: VoiceType
  readonly label: string
}

export type ProgressStep =
  "validate" | "load" | "mixdown" | "levels" | "resample" | "normalize" | "trim" |
  "save" | "verify" | "register" | "complete" | "error"

export interface ProgressNote {
  readonly step: ProgressStep
  readonly percent: number
  readonly message: string
}

export type NormalizationError = "CorruptAudio" | "TooShort" | "TooLong" | "TooQuiet"

export type RegistryError =
  "InvalidName" | "InvalidRecord" | "DuplicateId" | "NotFound" | "ProtectedRecord" | "RegistryWriteFailed"

export type IngestError =
  NormalizationError | "FileNotFound" | "InvalidName" | "DuplicateId" | "UnreadableFile" |
  "WriteFailed" | "VerificationFailed" | "RegistryWriteFailed" | "Unexpected"

export type RenderError = "NoTurnsFound" | "UnknownSpeaker" | "SynthesisFailed"

export type Outcome<T, E extends string> = {
  ok: true
  value: T
} | {
  ok: false
  error: E
  message: string
}

export interface Turn {
  readonly speaker: string
  readonly text: string
}
