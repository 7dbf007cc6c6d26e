/** Materializes artifact sets on disk for tool runs and writes final build outputs. */

import fs from 'node:fs';
import path from 'node:path';
import { createArtifactSet, type ArtifactSet, type ComplianceMatrix } from '../models/build.js';

/** Rejects absolute paths and any path escaping the workspace root. */
export function safeRelativePath(filePath: string): string {
  const normalized = path.posix.normalize(filePath.replace(/\\/g, '/'));
  if (path.posix.isAbsolute(normalized) || normalized === '..' || normalized.startsWith('../')) {
    throw new Error(`Artifact path escapes the workspace: ${filePath}`);
  }
  return normalized;
}

export function writeArtifacts(dir: string, artifacts: ArtifactSet): void {
  for (const [filePath, content] of Object.entries(artifacts.files)) {
    const target = path.join(dir, safeRelativePath(filePath));
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, content);
  }
}

/** Re-read the files of `artifacts` from `dir`, picking up in-place edits by tools. */
export function readBack(dir: string, artifacts: ArtifactSet): ArtifactSet {
  const files: Record<string, string> = {};
  for (const filePath of Object.keys(artifacts.files)) {
    const target = path.join(dir, safeRelativePath(filePath));
    files[filePath] = fs.existsSync(target) ? fs.readFileSync(target, 'utf-8') : (artifacts.files[filePath] ?? '');
  }
  return createArtifactSet(files);
}

export class ArtifactWorkspace {
  private root: string;

  /** `root` should sit inside the project so tools resolve its node_modules. */
  constructor(root: string) {
    this.root = root;
  }

  /** Write `artifacts` into a fresh directory, run `fn` there, then remove the directory. */
  async withMaterialized<T>(label: string, artifacts: ArtifactSet, fn: (dir: string) => Promise<T>): Promise<T> {
    fs.mkdirSync(this.root, { recursive: true });
    const prefix = label.replace(/[^a-zA-Z0-9-]/g, '_');
    const dir = fs.mkdtempSync(path.join(this.root, `${prefix}-`));
    try {
      writeArtifacts(dir, artifacts);
      return await fn(dir);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  }
}

/** Write a finished recipe's artifacts and compliance matrix to `<outputDir>/<recipe>/`. */
export function writeRecipeOutput(
  outputDir: string,
  recipe: string,
  artifacts: ArtifactSet,
  compliance: ComplianceMatrix,
): string {
  const dir = path.join(outputDir, recipe);
  fs.rmSync(dir, { recursive: true, force: true });
  fs.mkdirSync(dir, { recursive: true });
  writeArtifacts(dir, artifacts);
  fs.writeFileSync(path.join(dir, 'compliance.json'), JSON.stringify(compliance, null, 2) + '\n');
  return dir;
}
