import fs from 'fs/promises';
import os from 'os';
import path from 'path';

export interface TestWorkspace {
  root: string;
  write(relativePath: string, contents: string): Promise<string>;
  writeJson(relativePath: string, value: unknown): Promise<string>;
  read(relativePath: string): Promise<string>;
  readJson(relativePath: string): Promise<unknown>;
  exists(relativePath: string): Promise<boolean>;
  dispose(): Promise<void>;
}

export async function createWorkspace(prefix = 'lexiforge-cli-'): Promise<TestWorkspace> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
  const resolve = (relativePath: string) => path.join(root, relativePath);

  const write = async (relativePath: string, contents: string) => {
    const filePath = resolve(relativePath);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, contents, 'utf8');
    return filePath;
  };

  return {
    root,
    write,
    writeJson: (relativePath, value) => write(relativePath, `${JSON.stringify(value, null, 2)}\n`),
    read: (relativePath) => fs.readFile(resolve(relativePath), 'utf8'),
    readJson: async (relativePath) => JSON.parse(await fs.readFile(resolve(relativePath), 'utf8')),
    exists: async (relativePath) => {
      try {
        await fs.access(resolve(relativePath));
        return true;
      } catch {
        return false;
      }
    },
    dispose: () => fs.rm(root, { recursive: true, force: true }),
  };
}

export interface LexiEntryFixture {
  key: string;
  language: string;
  value: string | Record<string, string>;
  status?: string;
  comment?: string;
  custom?: Record<string, string>;
}

/** A `.lexi.json` document; status defaults to translated. */
export function lexiDocument(entries: LexiEntryFixture[], metadata: Record<string, string> = {}) {
  return {
    version: 1,
    metadata,
    entries: entries.map((entry) => ({ ...entry, status: entry.status ?? 'translated' })),
  };
}
