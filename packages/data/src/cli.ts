#!/usr/bin/env node
/**
 * CLI for dictionary maintenance
 */

import { Command } from 'commander';
import { config } from 'dotenv';
import { configFromEnv } from './dictionary/config.js';
import { Corrector } from './session.js';

config();

interface DataCommandOptions {
  lang?: string;
  dataDir?: string;
}

function loadSession(options: DataCommandOptions): Corrector {
  return Corrector.load(configFromEnv(process.env, {
    language: options.lang,
    dataDir: options.dataDir,
  }));
}

const program = new Command();

program
  .name('corrector-data')
  .description('Dictionary statistics and custom word management')
  .version('0.1.0');

program
  .command('stats')
  .description('Show dictionary and verb table counts for a language')
  .option('-l, --lang <code>', 'Language code (es, ca)')
  .option('--data-dir <dir>', 'Data directory')
  .action(async (options: DataCommandOptions) => {
    try {
      const stats = loadSession(options).stats();
      console.log(`Language:          ${stats.language}`);
      console.log(`Words:             ${stats.words}`);
      console.log(`Infinitives:       ${stats.infinitives}`);
      console.log(`Pronominal verbs:  ${stats.pronominalVerbs}`);
      console.log(`Irregular forms:   ${stats.irregularForms}`);
      console.log(`Proper names:      ${stats.properNames}`);
      process.exit(0);
    } catch (error) {
      console.error('Error:', error);
      process.exit(1);
    }
  });

program
  .command('add-word <word>')
  .description('Append a word to the custom dictionary of a language')
  .option('-l, --lang <code>', 'Language code (es, ca)')
  .option('--data-dir <dir>', 'Data directory')
  .action(async (word: string, options: DataCommandOptions) => {
    try {
      const session = loadSession(options);
      session.addCustomWord(word);
      console.log(`✓ Added '${word.trim()}' to ${session.customDictionaryPath}`);
      process.exit(0);
    } catch (error) {
      console.error('Error:', error);
      process.exit(1);
    }
  });

program.parse();
