/**
 * Per-run scratch directory for downloaded segments.
 * Lives next to the output file so the final concat never crosses devices.
 */
import { mkdtemp } from "node:fs/promises";
import * as path from "node:path";
import { ensureDir, removeDir } from "../shared/fs.js";

export const WORKSPACE_PREFIX = ".hls-segments-";

export interface Workspace {
  /** Absolute path of the directory */
  readonly dir: string;
  /** Path of a file inside the workspace */
  pathFor(fileName: string): string;
  /** Removes the directory and everything in it. Safe to call twice. */
  dispose(): Promise<void>;
}

/**
 * Creates a uniquely named workspace beside `outputPath`.
 */
export async function createWorkspace(outputPath: string): Promise<Workspace> {
  const parent = path.dirname(path.resolve(outputPath));
  await ensureDir(parent);

  const baseName = path.basename(outputPath, path.extname(outputPath));
  const dir = await mkdtemp(path.join(parent, `${WORKSPACE_PREFIX}${baseName}-`));

  return {
    dir,
    pathFor: (fileName) => path.join(dir, fileName),
    dispose: () => removeDir(dir),
  };
}

/**
 * Runs `fn` with a fresh workspace and removes it afterwards, whether `fn`
 * resolves or throws.
 */
export async function withWorkspace<T>(
  outputPath: string,
  fn: (workspace: Workspace) => Promise<T>
): Promise<T> {
  const workspace = await createWorkspace(outputPath);
  try {
    return await fn(workspace);
  } finally {
    await workspace.dispose();
  }
}
