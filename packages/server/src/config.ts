import { existsSync } from 'fs';
import { dirname, join, resolve } from 'path';
import { fileURLToPath } from 'url';

function findDataDir(): string {
  if (process.env.LOADSHEET_DATA_DIR) return resolve(process.env.LOADSHEET_DATA_DIR);

  const __dirname = dirname(fileURLToPath(import.meta.url));
  const candidates = [
    join(process.cwd(), 'data'),
    join(__dirname, '../../../data'), // src -> server -> packages -> root
    join(__dirname, '../../../../data'), // dist/packages/server/src (compiled)
  ];
  for (const dir of candidates) {
    if (existsSync(dir)) return dir;
  }
  return join(process.cwd(), 'data');
}

export const PORT = parseInt(process.env.PORT ?? '3001', 10);

/** Directory holding aircraft/*.json presets */
export const DATA_DIR = findDataDir();
