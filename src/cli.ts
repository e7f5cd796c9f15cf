#!/usr/bin/env tsx
import { Command } from 'commander';
import { config } from 'dotenv';
import type { GenerateCommandOptions, VoicesCommandOptions } from './types';
import { generateCommand } from './commands/generate';
import { voicesCommand } from './commands/voices';

config();

const collect = (value: string, previous: string[]): string[] => [...previous, value];

const program = new Command();

program
  .name('storyvoice')
  .description('Turn book text into audiobooks with a distinct voice for every character')
  .version('0.1.0');

program
  .command('generate')
  .description('Generate chapter audio for a book')
  .argument('<input>', 'Text, Markdown or HTML file')
  .option('-o, --output <dir>', 'Output directory', './output')
  .option('-b, --backend <name>', 'TTS backend: mac, kokoro or elevenlabs')
  .option('--book-id <id>', 'Book identifier that keys the voice table (default: file name)')
  .option('--no-llm', 'Detect characters with heuristics only')
  .option('--reset-voices', 'Forget every voice assigned to this book before generating')
  .option('-c, --cast <name=voice>', 'Bind a character to a voice id (repeatable)', collect, [])
  .option('--segment-concurrency <number>', 'Segments rendered in parallel')
  .option('-f, --format <format>', 'Output format: text or json', 'text')
  .option('--dry-run', 'Preview chapters and speakers without generating audio')
  .action((input: string, options: GenerateCommandOptions) => generateCommand(input, options));

program
  .command('voices')
  .description('List the voices a backend offers')
  .option('-b, --backend <name>', 'TTS backend: mac, kokoro or elevenlabs')
  .option('-f, --format <format>', 'Output format: text or json', 'text')
  .action((options: VoicesCommandOptions) => voicesCommand(options));

await program.parseAsync();
