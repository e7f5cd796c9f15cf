export interface Chapter {
  id: string;
  title: string;
  content: string;
}

export interface ParserResult {
  chapters: Chapter[];
  source: string;
  type: 'text' | 'html';
}

export type SegmentKind = 'narration' | 'dialogue';

export interface CharacterRef {
  key: string;
  displayName: string;
}

export interface Attribution {
  /** Name as written in the text, or the named speaker a pronoun resolved to. */
  name: string;
  verb: string;
  via: 'name' | 'pronoun';
}

export interface Segment {
  index: number;
  /** Offset of the first source character covered by this segment. */
  start: number;
  /** Offset one past the last covered character; dialogue spans include their quote marks. */
  end: number;
  text: string;
  kind: SegmentKind;
  speaker: CharacterRef | null;
  attribution: Attribution | null;
}

export type Gender = 'female' | 'male' | 'unknown';

export type BackendKind = 'mac' | 'kokoro' | 'elevenlabs';

export interface VoiceProfile {
  voiceId: string;
  backend: BackendKind;
  backendVoiceName: string;
  language: string;
}

export interface VoiceOption {
  id: string;
  /** Name the engine itself knows the voice by. */
  name: string;
  gender: Gender;
  language: string;
}

export interface VoiceCatalog {
  backend: BackendKind;
  voices: readonly VoiceOption[];
  narratorVoiceId: string;
}

export interface CharacterRecord {
  key: string;
  displayName: string;
  voice: VoiceProfile;
  gender?: Gender;
}

export type DetectionSource = 'heuristic' | 'llm';

export interface DetectedCharacter {
  key: string;
  displayName: string;
  sources: DetectionSource[];
  gender?: Gender;
}

export interface DetectionResult {
  characters: DetectedCharacter[];
  tier: 'llm+heuristic' | 'heuristic';
  llmError?: string;
}

export interface CachedDetection {
  textHash: string;
  tier: DetectionResult['tier'];
  characters: DetectedCharacter[];
  detectedAt: string;
}

export interface BookVoiceState {
  bookId: string;
  characters: Record<string, CharacterRecord>;
  detections: Record<string, CachedDetection>;
  updatedAt: string;
}

export type VoiceMap = Map<string, VoiceProfile>;

export interface AudioFormat {
  sampleRate: number;
  channelCount: number;
  bitDepth: number;
}

export interface AudioClip extends AudioFormat {
  /** Interleaved little-endian PCM; 8-bit samples are unsigned as in WAV. */
  pcm: Uint8Array;
}

export interface ChapterAudio {
  chapterKey: string;
  clip: AudioClip;
  durationSeconds: number;
  segmentCount: number;
}

export interface ChapterRequest {
  bookId: string;
  chapterId: string;
  text: string;
}

export type FailureCode =
  | 'SYNTHESIS_ERROR'
  | 'FORMAT_ERROR'
  | 'CONFIGURATION_ERROR'
  | 'CANCELLED'
  | 'INTERNAL_ERROR';

export interface FailureReason {
  code: FailureCode;
  message: string;
  segmentIndex?: number;
}

export type PipelineState =
  | { status: 'pending' }
  | { status: 'segmenting' }
  | { status: 'detecting' }
  | { status: 'assigning' }
  | { status: 'synthesizing'; completed: number; total: number }
  | { status: 'concatenating' }
  | { status: 'ready' }
  | { status: 'failed'; reason: FailureReason };

export type PipelineStatus = PipelineState['status'];

export interface ResolvedSegment extends Segment {
  speaker: CharacterRef;
  voice: VoiceProfile;
}

export interface ChapterGenerationResult {
  audio: ChapterAudio;
  segments: ResolvedSegment[];
  characters: CharacterRecord[];
  detection: DetectionResult & { cached: boolean };
}

export interface GenerateCommandOptions {
  output: string;
  backend?: string;
  bookId?: string;
  llm?: boolean;
  resetVoices?: boolean;
  cast?: string[];
  dryRun?: boolean;
  format?: 'text' | 'json';
  segmentConcurrency?: string;
}

export interface VoicesCommandOptions {
  backend?: string;
  format?: 'text' | 'json';
}

export interface GenerationSummary {
  success: boolean;
  bookId: string;
  backend: BackendKind;
  chapters: {
    index: number;
    title: string;
    segments: number;
    durationSeconds?: number;
    filePath?: string;
    error?: string;
    code?: FailureCode;
  }[];
  characters: { key: string; displayName: string; voiceId?: string }[];
  totalChapters: number;
  outputDir: string;
  source: string;
}
