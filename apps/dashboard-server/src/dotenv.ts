import fs from 'node:fs';

function unquote(value: string): string {
  const first = value[0];
  if ((first === '"' || first === "'") && value.length >= 2 && value.endsWith(first)) {
    return value.slice(1, -1);
  }
  return value;
}

/** Parses `KEY=value` lines. `export ` prefixes, blank lines and `#` comments are ignored. */
export function parseDotenv(content: string): Record<string, string> {
  const entries: Record<string, string> = {};
  for (const rawLine of content.split(/\r?\n/)) {
    let line = rawLine.trim();
    if (!line || line.startsWith('#')) continue;
    if (line.startsWith('export ')) line = line.slice('export '.length).trimStart();

    const eq = line.indexOf('=');
    if (eq <= 0) continue;
    const key = line.slice(0, eq).trim();
    let value = line.slice(eq + 1).trim();

    // An unquoted value ends at " #".
    if (!value.startsWith('"') && !value.startsWith("'")) {
      const comment = value.indexOf(' #');
      if (comment >= 0) value = value.slice(0, comment).trimEnd();
    }
    if (key) entries[key] = unquote(value);
  }
  return entries;
}

/** Copies entries from a .env file into `env` without overriding variables already set. */
export function loadDotenvFile(filePath: string, env: NodeJS.ProcessEnv): number {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf8');
  } catch {
    return 0;
  }

  let applied = 0;
  for (const [key, value] of Object.entries(parseDotenv(content))) {
    if (env[key] !== undefined) continue;
    env[key] = value;
    applied += 1;
  }
  return applied;
}
