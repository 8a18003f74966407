import { zip } from "zip-a-folder";

/**
 * Zips the contents of a directory. Entries in the archive are relative to
 * `sourcePath`, so the directory itself does not appear in the archive.
 *
 * @param sourcePath The path to the directory to zip.
 * @param destinationPath The path of the zip file to create.
 */
export async function zipDirectory(
  sourcePath: string,
  destinationPath: string,
): Promise<void> {
  await zip(sourcePath, destinationPath);
}
