#!/usr/bin/env node
/**
 * CLI - fix SRT subtitle files
 */

import { Command } from 'commander';
import { config as dotenvConfig } from 'dotenv';
import { existsSync, readFileSync, writeFileSync } from 'fs';
import { join, resolve } from 'path';
import { getShortMergeLimits, loadConfig, validateConfig } from '../utils/config.js';
import { createFixerService } from '../services/fixer-service.js';
import { setGlobalDebug, setupLogger, initFileLogging } from '../utils/logger.js';
import { SUPPORTED_LANGUAGES, getLanguageName } from '../utils/language.js';
import { extractErrorMessage } from '../utils/error-handler.js';
import { FixShort, createDefaultRegistry } from '../mods/index.js';

// load .env at the CLI entry
const envPaths = [
  join(process.cwd(), '.env'),
  join(process.cwd(), '..', '.env'),
];
for (const envPath of envPaths) {
  if (existsSync(envPath)) {
    dotenvConfig({ path: envPath });
    break;
  }
}

const logger = setupLogger('cli');

interface FixCommandOptions {
  input: string;
  output?: string;
  mods?: string;
  language?: string;
  debug?: boolean;
  log?: boolean;
}

const program = new Command();

program
  .name('subfix')
  .description('Normalize subtitle text: punctuation, whitespace, casing and broken entries')
  .version('1.0.0');

program
  .command('fix')
  .description('Fix an SRT subtitle file')
  .requiredOption('-i, --input <file>', 'input SRT file')
  .option('-o, --output <file>', 'output file (default: <input>.fixed.srt)')
  .option('-m, --mods <ids>', 'comma-separated modification identifiers')
  .option('-l, --language <tag>', 'subtitle language (en, he, ar, fa, ...)')
  .option('-d, --debug', 'debug output')
  .option('--log', 'also write log/subfix.log')
  .action((options: FixCommandOptions) => {
    try {
      if (options.log) {
        initFileLogging(join(process.cwd(), 'log'));
      }

      const config = loadConfig();
      if (options.debug || config.debug) {
        setGlobalDebug(true);
        logger.info('🔍 Debug mode enabled');
      }

      const errors = validateConfig(config);
      if (errors.length > 0) {
        for (const error of errors) {
          logger.error(error);
        }
        process.exit(1);
      }

      if (options.language) {
        config.language = options.language;
      }
      if (options.mods) {
        config.modifications = options.mods.split(',').map(id => id.trim()).filter(Boolean);
      }

      logger.info(`📝 Input file: ${options.input}`);
      if (!existsSync(options.input)) {
        logger.error(`File not found: ${options.input}`);
        process.exit(1);
      }

      const content = readFileSync(options.input, 'utf-8');
      const service = createFixerService(config);
      const result = service.fixSrt(content, config.modifications);

      if (result.entries.length === 0) {
        logger.warn('No subtitle entries found');
      }

      const outputPath = options.output || resolve(options.input).replace(/\.[^/.]+$/, '') + '.fixed.srt';
      writeFileSync(outputPath, result.content, 'utf-8');

      logger.info(`🔧 Applied: ${result.applied.join(', ') || 'none'}`);
      if (result.diagnostics.length > 0) {
        logger.warn(`${result.diagnostics.length} diagnostics, see log above`);
      }
      logger.info(`✅ Written: ${outputPath}`);
    } catch (error) {
      logger.error(`Fix failed: ${extractErrorMessage(error)}`);
      process.exit(1);
    }
  });

program
  .command('list')
  .description('List available modifications')
  .action(() => {
    const config = loadConfig();
    const registry = createDefaultRegistry(getShortMergeLimits(config));

    logger.info('📋 Modifications (run order):');
    for (const mod of registry.list()) {
      const flags = [
        mod.kind,
        `order ${mod.order}`,
        mod.exclusive ? 'exclusive' : '',
        mod.onlyUppercase ? 'uppercase only' : '',
        mod.applyLast ? 'applied last' : '',
        mod.languages.length ? `languages: ${mod.languages.join(', ')}` : '',
      ].filter(Boolean).join(', ');
      logger.info(`   ${mod.identifier} - ${mod.description} (${flags})`);
      if (mod instanceof FixShort) {
        const limits = mod.getLimits();
        logger.info(`      merge below ${limits.maxDuration}ms, ` +
          `lines up to ${limits.maxLineLength} chars, at most ${limits.maxLines} lines`);
      }
    }
  });

program
  .command('languages')
  .description('List known language codes')
  .action(() => {
    logger.info('📋 Languages:');
    for (const code of SUPPORTED_LANGUAGES) {
      logger.info(`   ${code} -> ${getLanguageName(code)}`);
    }
  });

program.parse();
