import path from 'node:path';
import { parseArgs } from 'node:util';

import { loadDotenvFile } from './dotenv.js';

function usage(): string {
  return [
    'Usage:',
    '  prdash [--host 127.0.0.1] [--port 8080] [--allow-remote] [--reset-db]',
    '',
    'Notes:',
    '  - Configuration comes from PRDASH_* environment variables (a .env file in the working directory is read first).',
    '  - By default, the server binds to 127.0.0.1 and mutating endpoints are restricted to localhost.',
    '  - Pass --allow-remote (or set PRDASH_ALLOW_REMOTE=1) to allow issue actions and manual polls from other hosts.',
    '  - --reset-db deletes the local pull-request database before the first poll.',
  ].join('\n');
}

export async function main(argv: string[]): Promise<void> {
  // Load .env before importing server code so PRDASH_* settings are visible to the config loader.
  loadDotenvFile(path.resolve(process.cwd(), '.env'), process.env);

  const { startServer } = await import('./server.js');

  const { values } = parseArgs({
    args: argv,
    options: {
      host: { type: 'string' },
      port: { type: 'string' },
      'allow-remote': { type: 'boolean' },
      'reset-db': { type: 'boolean' },
      help: { type: 'boolean' },
    },
    allowPositionals: true,
  });

  if (values.help) {
    console.log(usage());
    return;
  }

  const host = String(values.host ?? '127.0.0.1');
  const port = Number(values.port ?? 8080);
  if (!Number.isInteger(port) || port <= 0) throw new Error(`invalid port: ${values.port}`);

  await startServer({
    host,
    port,
    allowRemote: Boolean(values['allow-remote'] ?? false),
    resetDb: Boolean(values['reset-db'] ?? false),
  });
}

main(process.argv.slice(2)).catch((err) => {
  console.error(err instanceof Error ? err.stack ?? err.message : String(err));
  process.exitCode = 1;
});
