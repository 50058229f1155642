import fs from 'fs';
import path from 'path';

// A directory holding either of these is treated as the workspace root.
export const WORKSPACE_MARKERS = ['CLAUDE.md', '.env'];

export function findWorkspaceRoot(start: string = process.cwd()): string {
  let current = path.resolve(start);

  while (true) {
    if (WORKSPACE_MARKERS.some((marker) => fs.existsSync(path.join(current, marker)))) {
      return current;
    }

    const parent = path.dirname(current);
    if (parent === current) {
      return path.resolve(start);
    }
    current = parent;
  }
}

export function resolveEnvFilePath(root?: string): string {
  const override = process.env.NEXUS_ENV_FILE;
  if (override && override.trim() !== '') {
    return path.resolve(override);
  }
  return path.join(root ?? findWorkspaceRoot(), '.env');
}
