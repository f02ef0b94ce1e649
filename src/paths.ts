/**
 * Code-relative locations. Resolves the same from src/ under tsx and from
 * dist/src/ after a build.
 */

import * as path from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

function findCodeRoot(): string {
  const parent = path.resolve(__dirname, '..');
  return path.basename(parent) === 'dist' ? path.dirname(parent) : parent;
}

export const Paths = {
  codeRoot: findCodeRoot(),
  get config() { return path.join(this.codeRoot, 'config'); },
  get typeGroups() { return path.join(this.config, 'type-groups.json'); }
};
