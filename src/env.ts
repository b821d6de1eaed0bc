import { readFileSync, existsSync } from 'node:fs';
import path from 'node:path';

/**
 * Parse dotenv text.
 *
 * - KEY=VALUE lines, optional `export ` prefix
 * - `#` comments; inline only after unquoted values
 * - surrounding single or double quotes stripped
 */
export function parseEnvFile(raw: string): Record<string, string> {
  const out: Record<string, string> = {};
  for (const line of raw.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;

    const body = trimmed.startsWith('export ') ? trimmed.slice(7).trimStart() : trimmed;
    const eq = body.indexOf('=');
    if (eq === -1) continue;
    const key = body.slice(0, eq).trim();
    if (!key) continue;
    let value = body.slice(eq + 1).trim();

    const quote = value[0];
    if ((quote === '"' || quote === "'") && value.length >= 2 && value.endsWith(quote)) {
      value = value.slice(1, -1);
    } else {
      const hash = value.search(/\s#/);
      if (hash !== -1) value = value.slice(0, hash).trimEnd();
    }
    out[key] = value;
  }
  return out;
}

/**
 * Load .env files into `target` (process.env by default). Keys already set
 * are never overridden, so the real environment wins over files and the
 * first file wins over later ones.
 */
export function loadEnvFiles(
  filenames: string[] = ['.env', '.env.local'],
  cwd: string = process.cwd(),
  target: NodeJS.ProcessEnv = process.env,
): { loaded: string[] } {
  const loaded: string[] = [];

  for (const name of filenames) {
    const filePath = path.join(cwd, name);
    if (!existsSync(filePath)) continue;

    for (const [key, value] of Object.entries(parseEnvFile(readFileSync(filePath, 'utf8')))) {
      if (target[key] === undefined) target[key] = value;
    }
    loaded.push(name);
  }

  return { loaded };
}
