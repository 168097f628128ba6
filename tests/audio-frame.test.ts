import test from 'node:test';
import assert from 'node:assert/strict';
import { AudioFrame, combineAudioFrames } from '../src/audio/audio-frame';

test('audio frame decodes little-endian 16-bit samples', () => {
  const frame = AudioFrame.fromPcm(Uint8Array.from([0x01, 0x00, 0xff, 0xff, 0x00, 0x80]), 24000, 1);
  assert.deepEqual(Array.from(frame.data), [1, -1, -32768]);
  assert.equal(frame.samplesPerChannel, 3);
  assert.equal(frame.byteLength, 6);
});

test('audio frame encodes back to the same bytes', () => {
  const bytes = Uint8Array.from([0x34, 0x12, 0xcd, 0xab]);
  const frame = AudioFrame.fromPcm(bytes, 24000, 1);
  assert.deepEqual(frame.toBuffer(), Buffer.from(bytes));
});

test('audio frame rejects partial samples', () => {
  assert.throws(() => AudioFrame.fromPcm(Uint8Array.from([1, 2, 3]), 24000, 1), /whole number of samples/);
});

test('audio frame duration follows sample count', () => {
  const frame = new AudioFrame(new Int16Array(2400), 24000, 1, 2400);
  assert.equal(frame.durationMs, 100);
});

test('combineAudioFrames concatenates samples in order', () => {
  const a = new AudioFrame(Int16Array.from([1, 2]), 24000, 1, 2);
  const b = new AudioFrame(Int16Array.from([3]), 24000, 1, 1);
  const merged = combineAudioFrames([a, b], 24000, 1);
  assert.deepEqual(Array.from(merged.data), [1, 2, 3]);
  assert.equal(merged.samplesPerChannel, 3);
});

test('combineAudioFrames refuses mismatched formats', () => {
  const a = new AudioFrame(Int16Array.from([1]), 16000, 1, 1);
  assert.throws(() => combineAudioFrames([a], 24000, 1), /cannot combine/);
});

test('combineAudioFrames of nothing is an empty frame', () => {
  const merged = combineAudioFrames([], 24000, 1);
  assert.equal(merged.samplesPerChannel, 0);
  assert.equal(merged.durationMs, 0);
});
