import path from 'node:path';
import { WavWriter } from '../src/audio/wav-writer';
import { ApiStatusError } from '../src/core/errors';
import { KokoroTts } from '../src/tts/kokoro-tts';

function getFlag(name: string): string | undefined {
  const prefix = `--${name}=`;
  const hit = process.argv.find((arg) => arg.startsWith(prefix));
  return hit ? hit.slice(prefix.length) : undefined;
}

function getNumberFlag(name: string): number | undefined {
  const raw = getFlag(name);
  if (raw === undefined) return undefined;
  const v = Number(raw);
  if (!Number.isFinite(v)) throw new Error(`--${name} must be a number, got "${raw}"`);
  return v;
}

async function main() {
  const text = getFlag('text') ?? process.argv.slice(2).find((arg) => !arg.startsWith('--'));
  if (!text) {
    throw new Error(
      'Usage: npm run tts:diag -- --text="Hello there" [--out=out/tts.wav] [--voice=af_heart] [--speed=1.0] [--model=tts-1]'
    );
  }

  const tts = new KokoroTts({
    voice: getFlag('voice'),
    model: getFlag('model'),
    speed: getNumberFlag('speed'),
    baseURL: getFlag('base-url')
  });
  const outPath = path.resolve(getFlag('out') ?? 'out/tts.wav');
  const writer = new WavWriter(outPath, tts.sampleRate, tts.numChannels);
  await writer.open();

  const stream = tts.synthesize(text);
  const started = Date.now();
  let frames = 0;
  try {
    for await (const audio of stream) {
      if (frames === 0) {
        console.log(`[tts] first frame after ${Date.now() - started}ms (request ${audio.requestId})`);
      }
      frames += 1;
      await writer.write(audio.frame);
    }
  } finally {
    await writer.close();
    await tts.close();
  }

  const audioMs = (writer.bytesWritten / 2 / tts.numChannels / tts.sampleRate) * 1000;
  console.log(
    `[tts] ${frames} frames, ${audioMs.toFixed(0)}ms of audio in ${Date.now() - started}ms -> ${writer.getPath()}`
  );
}

main().catch((err) => {
  if (err instanceof ApiStatusError) {
    console.error(`Kokoro returned ${err.statusCode}:`, JSON.stringify(err.body));
  } else {
    console.error(err instanceof Error ? err.message : String(err));
  }
  process.exit(1);
});
