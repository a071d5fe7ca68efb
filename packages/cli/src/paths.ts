import { fileURLToPath } from 'node:url';

/**
 * Level files shipped with the CLI (`packages/cli/levels`).
 */
export const BUNDLED_LEVELS_DIR = fileURLToPath(new URL('../levels', import.meta.url));
