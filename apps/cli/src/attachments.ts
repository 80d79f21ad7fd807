import { access, readFile, writeFile } from 'node:fs/promises';
import { basename, extname, join, resolve, sep } from 'node:path';
import type { AttachmentFile } from '@termmail/shared';

const MAX_FILENAME_LENGTH = 200;

/** Keeps letters, digits, dot, dash and underscore; never empty or dot-only. */
export function sanitizeFilename(filename: string): string {
  const cleaned = basename(filename.replace(/\\/g, '/'))
    .replace(/[^a-zA-Z0-9._-]/g, '_')
    .replace(/\.{2,}/g, '.')
    .replace(/^\.+/, '')
    .substring(0, MAX_FILENAME_LENGTH);
  return cleaned === '' ? 'attachment' : cleaned;
}

export function isPathSafe(outputDir: string, filepath: string): boolean {
  const resolvedOutput = resolve(outputDir);
  const resolvedFile = resolve(filepath);
  return resolvedFile.startsWith(resolvedOutput + sep);
}

async function exists(path: string): Promise<boolean> {
  return access(path).then(
    () => true,
    () => false
  );
}

/** Writes the attachment under `dir`, numbering the name if it is taken. */
export async function saveAttachment(dir: string, file: AttachmentFile): Promise<string> {
  const name = sanitizeFilename(file.filename);
  const ext = extname(name);
  const stem = name.slice(0, name.length - ext.length);
  let target = join(dir, name);
  for (let n = 1; await exists(target); n++) {
    target = join(dir, `${stem}-${n}${ext}`);
  }
  if (!isPathSafe(dir, target)) {
    throw new Error(`Refusing to write outside ${dir}: ${file.filename}`);
  }
  await writeFile(target, file.content);
  return target;
}

/** Path as typed or pasted: quotes stripped, escaped spaces and ~ expanded. */
export function cleanFilePath(raw: string, home = process.env.HOME ?? ''): string {
  let p = raw.trim();
  if ((p.startsWith("'") && p.endsWith("'")) || (p.startsWith('"') && p.endsWith('"'))) {
    p = p.slice(1, -1);
  }
  p = p.replace(/\\ /g, ' ');
  if (p.startsWith('~/')) p = join(home, p.slice(2));
  return p;
}

export async function loadAttachment(path: string): Promise<AttachmentFile> {
  return {
    filename: basename(path),
    mimeType: 'application/octet-stream',
    content: await readFile(path),
  };
}
