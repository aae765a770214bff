/**
 * Command line parsing
 */

import type { PipelineOptions } from './pipeline.js';

export type CliMode = 'run' | 'service' | 'stats' | 'dedup';

export interface CliArgs {
  mode: CliMode;
  options: PipelineOptions;
}

const MODE_FLAGS: Record<string, CliMode> = {
  '--run': 'run',
  '--service': 'service',
  '--stats': 'stats',
  '--dedup': 'dedup',
};

/**
 * Read the mode and pipeline options from argv. Service mode is the
 * default; conflicting mode flags are rejected.
 */
export function parseCliArgs(args: string[]): CliArgs {
  const modes = new Set<CliMode>();
  for (const arg of args) {
    const mode = MODE_FLAGS[arg];
    if (mode) modes.add(mode);
  }
  if (modes.size > 1) {
    throw new Error(`Choose one of ${Object.keys(MODE_FLAGS).join(', ')}`);
  }
  const [mode = 'service'] = modes;

  const options: PipelineOptions = {
    dryRun: args.includes('--dry-run'),
    skipFetch: args.includes('--skip-fetch'),
    skipDedup: args.includes('--skip-dedup'),
    skipAi: args.includes('--skip-ai'),
    skipAutomation: args.includes('--skip-automation'),
  };

  // Parse --max-articles=N
  const maxArg = args.find((a) => a.startsWith('--max-articles='));
  if (maxArg) {
    const value = parseInt(maxArg.split('=')[1] ?? '', 10);
    if (isNaN(value) || value <= 0) {
      throw new Error(`Invalid --max-articles value: ${maxArg}`);
    }
    options.maxArticles = value;
  }

  return { mode, options };
}
