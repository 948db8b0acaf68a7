#!/usr/bin/env node

/**
 * Command-line spelling corrector
 *
 *   corrector "tengo un probelma"          → tengo un probelma |problema|
 *   corrector -i carta.txt -o carta.out
 *   echo "dímelo" | corrector --infinitive → dímelo	decir
 */

import fs from 'fs';
import { Command } from 'commander';
import { config } from 'dotenv';
import { printPerfCountersAndReset, setDebug, setProfiling, tokenize } from '@corrector/core';
import { Corrector, configFromEnv, parsePositiveInteger, type CorrectorConfig } from '@corrector/data';

// Parse environment variables
config();

export interface RunCliOptions {
  lang?: string;
  separator?: string;
  customDict?: string;
  dataDir?: string;
  maxDistance?: number;
  maxSuggestions?: number;
  /** Print each word with its infinitive instead of correcting. */
  infinitive?: boolean;
  /** Append a word to the custom dictionary and do nothing else. */
  addWord?: string;
  /** Reuse an already loaded session instead of reading the data directory. */
  session?: Corrector;
}

export function sessionConfig(options: RunCliOptions): CorrectorConfig {
  return configFromEnv(process.env, {
    language: options.lang,
    dataDir: options.dataDir,
    customDict: options.customDict,
    spellingSeparator: options.separator,
    maxDistance: options.maxDistance,
    maxSuggestions: options.maxSuggestions,
  });
}

function infinitiveReport(session: Corrector, input: string): string {
  const lines: string[] = [];
  for (const token of tokenize(input, { wordInternalChars: session.language.wordInternalChars })) {
    if (token.kind !== 'word') continue;
    lines.push(`${token.text}\t${session.getInfinitive(token.text) ?? '-'}`);
  }
  return lines.join('\n');
}

/**
 * Programmatic interface for CLI operations
 * Returns the output string that would be printed to stdout
 */
export async function runCli(input: string, options: RunCliOptions = {}): Promise<string> {
  const session = options.session ?? Corrector.load(sessionConfig(options));

  if (options.addWord !== undefined) {
    session.addCustomWord(options.addWord);
    return `Word '${options.addWord.trim()}' added to the custom dictionary.`;
  }

  if (options.infinitive) {
    return infinitiveReport(session, input);
  }

  return session.correct(input);
}

async function readStdin(): Promise<string> {
  process.stdin.setEncoding('utf-8');
  let text = '';
  for await (const chunk of process.stdin) {
    text += String(chunk);
  }
  return text;
}

interface CliFlags {
  lang?: string;
  separator?: string;
  input?: string;
  output?: string;
  customDict?: string;
  addWord?: string;
  dataDir?: string;
  maxDistance?: number;
  maxSuggestions?: number;
  infinitive?: boolean;
  debug?: boolean;
  profile?: boolean;
}

async function readInput(flags: CliFlags, args: string[]): Promise<string | undefined> {
  if (flags.input !== undefined) return fs.readFileSync(flags.input, 'utf-8');
  if (args.length > 0) return args.join(' ');
  if (!process.stdin.isTTY) return readStdin();
  return undefined;
}

async function main(): Promise<void> {
  const program: Command = new Command();

  program
    .name('corrector')
    .description('Spanish and Catalan spelling corrector')
    .usage('[options] [text...]')
    .version('0.1.0')
    .argument('[text...]', 'text to correct (read from --input or stdin when omitted)')
    .option('-l, --lang <code>', 'language (es, ca)')
    .option('-s, --separator <char>', 'character placed around suggestions')
    .option('-i, --input <file>', 'read text from a file')
    .option('-o, --output <file>', 'write the result to a file')
    .option('-d, --custom-dict <file>', 'extra dictionary file')
    .option('-a, --add-word <word>', 'add a word to the custom dictionary')
    .option('--data-dir <dir>', 'data directory')
    .option('--max-distance <n>', 'maximum edit distance for suggestions', value =>
      parsePositiveInteger(value, '--max-distance'))
    .option('--max-suggestions <n>', 'maximum number of suggestions per word', value =>
      parsePositiveInteger(value, '--max-suggestions'))
    .option('--infinitive', 'print the infinitive of each word instead of correcting')
    .option('--debug', 'print debug output')
    .option('--profile', 'print performance counters');

  program.parse(process.argv);
  const flags = program.opts<CliFlags>();

  if (flags.debug) setDebug(true);
  if (flags.profile) setProfiling(true);

  try {
    const options: RunCliOptions = {
      lang: flags.lang,
      separator: flags.separator,
      customDict: flags.customDict,
      dataDir: flags.dataDir,
      maxDistance: flags.maxDistance,
      maxSuggestions: flags.maxSuggestions,
      infinitive: flags.infinitive,
      addWord: flags.addWord,
    };

    const input = flags.addWord === undefined ? await readInput(flags, program.args) : '';
    if (input === undefined) {
      console.error('Error: no text to correct');
      program.help({ error: true });
    }

    const output = await runCli(input, options);
    if (flags.output !== undefined) {
      fs.writeFileSync(flags.output, output, 'utf-8');
    } else {
      process.stdout.write(output.endsWith('\n') ? output : `${output}\n`);
    }

    if (flags.profile) printPerfCountersAndReset();
  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

// Run main if this is the entry point
if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error) => {
    console.error(`FATAL: ${error}`);
    process.exit(2);
  });
}
