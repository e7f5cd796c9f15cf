import {
  CharacterDetector,
  FileBookStateStore,
  OllamaClient,
  SynthesisPipeline,
  createBackend,
  ensureOutputDir,
  loadConfig,
  parseInput,
  saveWavFile
} from '../src/index';

async function example() {
  const config = loadConfig();
  const outputDir = await ensureOutputDir('./output');

  const result = await parseInput('./book.txt');
  console.log(`Parsed ${result.chapters.length} chapters from ${result.source}`);

  const pipeline = new SynthesisPipeline({
    backend: createBackend(config),
    store: new FileBookStateStore(`${outputDir}/.storyvoice`),
    detector: new CharacterDetector({
      extractor: new OllamaClient({ baseUrl: config.llm.baseUrl, model: config.llm.model, timeoutMs: config.llm.timeoutMs })
    })
  });

  pipeline.onStateChange((key, state) => console.log(`${key}: ${state.status}`));

  for (let i = 0; i < result.chapters.length; i++) {
    const chapter = result.chapters[i];
    if (!chapter) continue;

    const generated = await pipeline.generate({ bookId: 'book', chapterId: chapter.id, text: chapter.content });
    console.log(`Chapter ${i + 1}: ${generated.segments.length} segments, ${generated.audio.durationSeconds.toFixed(1)}s`);

    const filePath = await saveWavFile(generated.audio, i, result.chapters.length, outputDir);
    console.log(`Saved: ${filePath}`);
  }
}

example().catch(console.error);
