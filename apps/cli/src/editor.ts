import { spawn } from 'node:child_process';
import { readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { v4 as uuidv4 } from 'uuid';

/** Lets the user edit text and returns what they saved. */
export type Editor = (text: string) => Promise<string>;

/**
 * Editor backed by an external program. The command may carry arguments
 * ("code --wait") and runs through the shell with the terminal attached.
 */
export function externalEditor(command: string): Editor {
  return async (text) => {
    const file = join(tmpdir(), `termmail-${uuidv4()}.eml`);
    await writeFile(file, text, { encoding: 'utf8', mode: 0o600 });
    try {
      await run(`${command} "${file}"`);
      return await readFile(file, 'utf8');
    } finally {
      await rm(file, { force: true });
    }
  };
}

function run(commandLine: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const child = spawn(commandLine, { shell: true, stdio: 'inherit' });
    child.once('error', reject);
    child.once('exit', (code, signal) => {
      if (code === 0) resolve();
      else reject(new Error(`Editor exited with ${signal ?? `code ${code}`}`));
    });
  });
}
