/**
 * Locate model assets under an assets directory.
 *
 * Absence is not an error: a missing model means rule-only (mock) mode, a
 * missing grammar means unconstrained sampling.
 */

import { access } from "node:fs/promises";
import { join } from "node:path";

export interface LocatedAssets {
  modelPath: string | null;
  grammarPath: string | null;
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export async function locateModelAssets(
  assetsPath: string,
  modelFileName: string,
  grammarFileName: string,
): Promise<LocatedAssets> {
  const modelPath = join(assetsPath, modelFileName);
  const grammarPath = join(assetsPath, grammarFileName);

  const [hasModel, hasGrammar] = await Promise.all([exists(modelPath), exists(grammarPath)]);

  return {
    modelPath: hasModel ? modelPath : null,
    grammarPath: hasGrammar ? grammarPath : null,
  };
}
