import type { Entry as ZipEntry, Options as ZipOptions, ZipFile } from "yauzl";
import { open } from "yauzl";
import type { Readable } from "stream";
import { dirname, join } from "path";
import { createWriteStream, ensureDir } from "fs-extra";

// We can't use promisify because it picks up the wrong overload.
export function openZip(
  path: string,
  options: ZipOptions = {},
): Promise<ZipFile> {
  return new Promise((resolve, reject) => {
    open(path, options, (err, zipFile) => {
      if (err) {
        reject(err);
        return;
      }

      resolve(zipFile);
    });
  });
}

export function isDirectoryEntry(entry: ZipEntry): boolean {
  // Directory file names end with '/'
  return /\/$/.test(entry.fileName);
}

export function excludeDirectories(entries: ZipEntry[]): ZipEntry[] {
  return entries.filter((entry) => !isDirectoryEntry(entry));
}

export function readZipEntries(zipFile: ZipFile): Promise<ZipEntry[]> {
  return new Promise((resolve, reject) => {
    const files: ZipEntry[] = [];

    zipFile.readEntry();
    zipFile.on("entry", (entry: ZipEntry) => {
      files.push(entry);

      zipFile.readEntry();
    });

    zipFile.on("end", () => {
      resolve(files);
    });

    zipFile.on("error", (err) => {
      reject(err);
    });
  });
}

function openZipReadStream(
  zipFile: ZipFile,
  entry: ZipEntry,
): Promise<Readable> {
  return new Promise((resolve, reject) => {
    zipFile.openReadStream(entry, (err, readStream) => {
      if (err) {
        reject(err);
        return;
      }

      resolve(readStream);
    });
  });
}

export async function openZipBuffer(
  zipFile: ZipFile,
  entry: ZipEntry,
): Promise<Buffer> {
  const readable = await openZipReadStream(zipFile, entry);
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    readable.on("data", (chunk: Buffer) => {
      chunks.push(chunk);
    });
    readable.on("error", (err) => {
      reject(err);
    });
    readable.on("end", () => {
      resolve(Buffer.concat(chunks));
    });
  });
}

/**
 * Opens the archive at `archivePath`, hands it together with all of its
 * entries to `callback` and closes it again once the callback settles.
 */
export async function withZipEntries<T>(
  archivePath: string,
  callback: (zipFile: ZipFile, entries: ZipEntry[]) => Promise<T>,
): Promise<T> {
  const zipFile = await openZip(archivePath, {
    autoClose: false,
    lazyEntries: true,
  });

  try {
    const entries = await readZipEntries(zipFile);
    return await callback(zipFile, entries);
  } finally {
    zipFile.close();
  }
}

/**
 * Reads a single file from a zip archive as UTF-8 text.
 *
 * @return The contents of the file, or `undefined` if the archive has no entry named `fileName`.
 */
export async function readZipEntryText(
  archivePath: string,
  fileName: string,
): Promise<string | undefined> {
  return withZipEntries(archivePath, async (zipFile, entries) => {
    const entry = entries.find((e) => e.fileName === fileName);
    if (!entry) {
      return undefined;
    }

    const buffer = await openZipBuffer(zipFile, entry);
    return buffer.toString("utf8");
  });
}

async function copyStream(
  readable: Readable,
  path: string,
  mode: number | undefined,
): Promise<void> {
  return new Promise((resolve, reject) => {
    const writeStream = createWriteStream(path, {
      autoClose: true,
      mode,
    });

    readable.on("error", (err) => {
      reject(err);
    });
    writeStream.on("error", (err) => {
      reject(err);
    });
    writeStream.on("finish", () => {
      resolve();
    });

    readable.pipe(writeStream);
  });
}

/**
 * Unzips a single file from a zip archive.
 *
 * @param rootDestinationPath The directory that the archive is extracted into.
 */
async function unzipFile(
  zipFile: ZipFile,
  entry: ZipEntry,
  rootDestinationPath: string,
): Promise<void> {
  const path = join(rootDestinationPath, entry.fileName);

  if (isDirectoryEntry(entry)) {
    await ensureDir(path);
    return;
  }

  // Ensure the directory exists
  await ensureDir(dirname(path));

  const readable = await openZipReadStream(zipFile, entry);

  let mode: number | undefined = entry.externalFileAttributes >>> 16;
  if (mode <= 0) {
    mode = undefined;
  }

  await copyStream(readable, path, mode);
}

/**
 * Sequentially unzips all files from a zip archive, keeping the paths of the
 * entries relative to `destinationPath`.
 */
export async function unzipToDirectory(
  archivePath: string,
  destinationPath: string,
): Promise<void> {
  const zipFile = await openZip(archivePath, {
    autoClose: false,
    strictFileNames: true,
    lazyEntries: true,
  });

  try {
    const entries = await readZipEntries(zipFile);

    for (const entry of entries) {
      await unzipFile(zipFile, entry, destinationPath);
    }
  } finally {
    zipFile.close();
  }
}
