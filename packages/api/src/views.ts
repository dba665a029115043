import { fileURLToPath } from 'node:url';
import nunjucks from 'nunjucks';

const VIEWS_DIR = fileURLToPath(new URL('../views', import.meta.url));

export function createViewEnvironment() {
    return new nunjucks.Environment(new nunjucks.FileSystemLoader(VIEWS_DIR), { autoescape: true });
}
