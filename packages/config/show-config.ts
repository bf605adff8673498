import fs from 'fs';
import { z } from 'zod';
import { ConfigError } from '@tube-to-pod/errors';
import type { ShowConfig } from '@tube-to-pod/types';
import { formatZodIssues } from './pipeline-config.js';

const ShowConfigSchema = z.object({
  title: z.string().trim().min(1),
  description: z.string().trim().min(1),
  author: z.string().trim().min(1),
  email: z.string().trim().email().optional(),
  website: z.string().url(),
  imageUrl: z.string().url().optional(),
  language: z.string().trim().min(2).default('en'),
  category: z.string().trim().min(1).default('Government'),
  explicit: z.boolean().default(false),
  feedUrl: z.string().url().optional(),
  referencePattern: z
    .string()
    .optional()
    .refine(pattern => pattern === undefined || isValidRegex(pattern), {
      message: 'referencePattern must be a valid regular expression',
    }),
});

function isValidRegex(pattern: string): boolean {
  try {
    new RegExp(pattern);
    return true;
  } catch {
    return false;
  }
}

export function parseShowConfig(raw: unknown, source = 'show config'): ShowConfig {
  const parsed = ShowConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(formatZodIssues(parsed.error).map(problem => `${source}: ${problem}`));
  }
  return parsed.data;
}

/**
 * Load podcast metadata from a JSON file such as `show.config.json`
 */
export function loadShowConfig(configPath: string): ShowConfig {
  if (!fs.existsSync(configPath)) {
    throw new ConfigError([`Show config not found at ${configPath}`]);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf8'));
  } catch (error) {
    throw new ConfigError([`Show config at ${configPath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`]);
  }
  return parseShowConfig(raw, configPath);
}
