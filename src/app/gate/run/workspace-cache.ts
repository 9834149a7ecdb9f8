import fse from "fs-extra";

/**
 * Copy pre-cached clones (baked into the machine image) into the destination root.
 * Returns how many top-level entries were seeded; 0 when there is no usable cache.
 */
export async function seedFromCache(cacheDir: string | undefined, destinationRoot: string): Promise<number> {
  if (!cacheDir || !(await fse.pathExists(cacheDir))) return 0;

  const entries = await fse.readdir(cacheDir);
  if (entries.length === 0) return 0;

  await fse.ensureDir(destinationRoot);
  await fse.copy(cacheDir, destinationRoot, { overwrite: true, errorOnExist: false });
  return entries.length;
}
