import fs from 'fs';

/**
 * Parse `KEY=value` lines. Blank lines and `#` comments are skipped,
 * values may contain `=` and may be wrapped in single or double quotes.
 */
export function parseEnvFile(content: string): Record<string, string> {
  const envVars: Record<string, string> = {};

  content.split('\n').forEach(line => {
    const trimmedLine = line.trim();
    if (!trimmedLine || trimmedLine.startsWith('#')) {
      return;
    }

    const [key, ...valueParts] = trimmedLine.split('=');
    if (key && valueParts.length > 0) {
      let value = valueParts.join('=').trim();
      if ((value.startsWith('"') && value.endsWith('"')) ||
          (value.startsWith("'") && value.endsWith("'"))) {
        value = value.slice(1, -1);
      }
      envVars[key.trim()] = value;
    }
  });

  return envVars;
}

/**
 * Merge a .env file into `env` without overriding variables that are already set.
 * Returns the keys that were applied; a missing file applies nothing.
 */
export function loadEnvFile(filePath: string, env: NodeJS.ProcessEnv = process.env): string[] {
  if (!fs.existsSync(filePath)) {
    return [];
  }

  const applied: string[] = [];
  for (const [key, value] of Object.entries(parseEnvFile(fs.readFileSync(filePath, 'utf8')))) {
    if (env[key] === undefined) {
      env[key] = value;
      applied.push(key);
    }
  }
  return applied;
}
