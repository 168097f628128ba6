import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { AudioFrame } from '../src/audio/audio-frame';
import { WavWriter, wavHeader } from '../src/audio/wav-writer';

test('wav header describes 16-bit pcm', () => {
  const header = wavHeader(24000, 1, 100);
  assert.equal(header.length, 44);
  assert.equal(header.toString('ascii', 0, 4), 'RIFF');
  assert.equal(header.readUInt32LE(4), 136);
  assert.equal(header.toString('ascii', 8, 12), 'WAVE');
  assert.equal(header.readUInt16LE(20), 1);
  assert.equal(header.readUInt16LE(22), 1);
  assert.equal(header.readUInt32LE(24), 24000);
  assert.equal(header.readUInt32LE(28), 48000);
  assert.equal(header.readUInt16LE(32), 2);
  assert.equal(header.readUInt16LE(34), 16);
  assert.equal(header.readUInt32LE(40), 100);
});

test('wav writer patches sizes on close', async () => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'kokoro-wav-'));
  try {
    const file = path.join(dir, 'nested', 'out.wav');
    const writer = new WavWriter(file, 24000, 1);
    await writer.open();
    await writer.write(new AudioFrame(Int16Array.from([1, -1]), 24000, 1, 2));
    await writer.write(new AudioFrame(Int16Array.from([300]), 24000, 1, 1));
    await writer.close();

    const buf = await fs.readFile(file);
    assert.equal(buf.length, 50);
    assert.equal(buf.readUInt32LE(4), 42);
    assert.equal(buf.readUInt32LE(40), 6);
    assert.deepEqual(Array.from(buf.subarray(44)), [0x01, 0x00, 0xff, 0xff, 0x2c, 0x01]);
    assert.equal(writer.bytesWritten, 6);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
});

test('wav writer rejects frames in another format', async () => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'kokoro-wav-'));
  try {
    const writer = new WavWriter(path.join(dir, 'out.wav'), 24000, 1);
    await writer.open();
    await assert.rejects(writer.write(new AudioFrame(Int16Array.from([1]), 16000, 1, 1)), /16000Hz/);
    await writer.close();
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
});

test('wav writer refuses writes before open', async () => {
  const writer = new WavWriter(path.join(os.tmpdir(), 'never-opened.wav'), 24000, 1);
  await assert.rejects(writer.write(new AudioFrame(Int16Array.from([1]), 24000, 1, 1)), /is not open/);
});
