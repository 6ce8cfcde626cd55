import assert from "node:assert/strict"
import test from "node:test"
import { makeSynthesizer } from "./synthesizer"

test("engine output becomes mono float samples", async () => {
  const calls: [string, string|undefined][] = []
  const synth = makeSynthesizer(async (text, referenceAudioPath) => {
    calls.push([text, referenceAudioPath])
    return {sampleRate: 22050, samples: [0, .5, -.5]}
  })

  const pcmData = await synth.synthesize("  Welcome back. ", "/voices/alice.wav")
  assert.deepEqual(calls, [["Welcome back.", "/voices/alice.wav"]])
  assert.ok(pcmData.samples instanceof Float32Array)
  assert.deepEqual([...pcmData.samples], [0, .5, -.5])
  assert.equal(pcmData.sampleRate, 22050)
  assert.equal(pcmData.numChannels, 1)
})

test("float arrays from the engine are passed through", async () => {
  const samples = new Float32Array([.25, -.25])
  const synth = makeSynthesizer(async () => ({sampleRate: 24000, samples}))
  assert.equal((await synth.synthesize("hi")).samples, samples)
})

test("blank text is rejected before reaching the engine", async () => {
  let called = false
  const synth = makeSynthesizer(async () => {
    called = true
    return {sampleRate: 24000, samples: []}
  })
  await assert.rejects(synth.synthesize(" \n "), {message: "Empty text provided"})
  assert.equal(called, false)
})
