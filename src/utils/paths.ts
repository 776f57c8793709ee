import { existsSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

const __dirname = dirname(fileURLToPath(import.meta.url));

/**
 * Resolve a file shipped with the project (templates/, data/).
 * Walks up from this module so the lookup works from src/ and from dist/src/.
 */
export function resolveProjectFile(relativePath: string): string {
    let dir = __dirname;
    for (;;) {
        const candidate = join(dir, relativePath);
        if (existsSync(candidate)) {
            return candidate;
        }
        const parent = dirname(dir);
        if (parent === dir) {
            throw new Error(`Project file not found: ${relativePath}`);
        }
        dir = parent;
    }
}
