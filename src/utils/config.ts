/**
 * Configuration - defaults plus environment overrides
 * dotenv is loaded by the CLI entry point, not here
 */

import type { FixerConfig, ShortMergeLimits } from '../types/index.js';

// Defaults
const DEFAULT_CONFIG: FixerConfig = {
  language: '',
  modifications: ['common'],
  debug: false,
  maxMergeDuration: 500,
  maxMergedLineLength: 200,
  maxMergedLines: 3,
};

type Env = Record<string, string | undefined>;

function parseList(value: string | undefined, fallback: string[]): string[] {
  if (value === undefined) return [...fallback];
  return value
    .split(',')
    .map(item => item.trim())
    .filter(Boolean);
}

function parseNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : Number.NaN;
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  return ['1', 'true', 'yes', 'on'].includes(value.toLowerCase().trim());
}

/**
 * Load configuration from environment variables
 * Unparseable numbers come back as NaN so validateConfig can report them
 */
export function loadConfig(env: Env = process.env): FixerConfig {
  return {
    language: env.SUBFIX_LANGUAGE?.trim() || DEFAULT_CONFIG.language,
    modifications: parseList(env.SUBFIX_MODS, DEFAULT_CONFIG.modifications),
    debug: parseBoolean(env.SUBFIX_DEBUG, DEFAULT_CONFIG.debug),
    maxMergeDuration: parseNumber(env.SUBFIX_MAX_MERGE_DURATION, DEFAULT_CONFIG.maxMergeDuration),
    maxMergedLineLength: parseNumber(env.SUBFIX_MAX_LINE_LENGTH, DEFAULT_CONFIG.maxMergedLineLength),
    maxMergedLines: parseNumber(env.SUBFIX_MAX_LINES, DEFAULT_CONFIG.maxMergedLines),
  };
}

/**
 * Default configuration
 */
export function getDefaultConfig(): FixerConfig {
  return { ...DEFAULT_CONFIG, modifications: [...DEFAULT_CONFIG.modifications] };
}

/**
 * Validate configuration
 */
export function validateConfig(config: FixerConfig): string[] {
  const errors: string[] = [];

  if (!Number.isInteger(config.maxMergeDuration) || config.maxMergeDuration <= 0) {
    errors.push('Max merge duration must be a positive integer (milliseconds)');
  }

  if (!Number.isInteger(config.maxMergedLineLength) || config.maxMergedLineLength <= 0) {
    errors.push('Max merged line length must be a positive integer');
  }

  if (!Number.isInteger(config.maxMergedLines) || config.maxMergedLines < 1 || config.maxMergedLines > 10) {
    errors.push('Max merged lines must be between 1 and 10');
  }

  return errors;
}

/**
 * Short-entry merge limits from configuration
 */
export function getShortMergeLimits(config: FixerConfig): ShortMergeLimits {
  return {
    maxDuration: config.maxMergeDuration,
    maxLineLength: config.maxMergedLineLength,
    maxLines: config.maxMergedLines,
  };
}
