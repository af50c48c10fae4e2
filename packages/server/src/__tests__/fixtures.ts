import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

/** data/ at the repository root */
export const REPO_DATA_DIR = join(dirname(fileURLToPath(import.meta.url)), '../../../../data');
