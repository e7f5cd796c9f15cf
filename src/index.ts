export * from './types';
export * from './errors';
export { loadConfig, parseBackendKind, type AppConfig } from './config';
export { segmentText, SegmentSequence, findAttribution, SPEECH_VERBS, type SegmenterOptions } from './segmenter';
export { canonicalKey, NARRATOR_KEY } from './characters/canonical';
export { CharacterDetector, type CharacterDetectorOptions } from './characters/detector';
export { OllamaClient, parseCharacterList, type CharacterExtractor, type LlmCharacter } from './services/llm-client';
export { VoiceAssigner, createBookState, speakerKeyFor } from './voices/voice-assigner';
export { createBackend, ElevenLabsBackend, KokoroBackend, MacSpeechBackend } from './backends';
export type { RenderOptions, TTSBackend } from './backends';
export { concatenateClips, chapterAudioToWav } from './audio/concatenator';
export { decodeWav, encodeWav } from './audio/wav';
export { FileBookStateStore, MemoryBookStateStore, type BookStateStore } from './services/book-state-store';
export { SynthesisPipeline, chapterKeyFor, type RunOptions, type SynthesisPipelineOptions } from './pipeline/synthesis-pipeline';
export { parseInput } from './parsers/parser';
export { saveWavFile, generateFileName, ensureOutputDir } from './generator';
