import { appendFile, mkdir, readdir, readFile, stat } from 'node:fs/promises';

export interface FileSystem {
  readText(path: string): Promise<string>;
  readJSON<T>(path: string): Promise<T>;
  appendText(path: string, content: string): Promise<void>;
  exists(path: string): Promise<boolean>;
  list(dir: string): Promise<string[]>;
  /** Paths below `dir` at any depth, relative to it. */
  listTree(dir: string): Promise<string[]>;
  mkdir(path: string): Promise<void>;
}

export class NodeFileSystem implements FileSystem {
  async readText(filePath: string): Promise<string> {
    return readFile(filePath, 'utf8');
  }

  async readJSON<T>(filePath: string): Promise<T> {
    return JSON.parse(await this.readText(filePath)) as T;
  }

  async appendText(filePath: string, content: string): Promise<void> {
    await appendFile(filePath, content, 'utf8');
  }

  async exists(filePath: string): Promise<boolean> {
    try {
      await stat(filePath);
      return true;
    } catch {
      return false;
    }
  }

  async list(dir: string): Promise<string[]> {
    return readdir(dir);
  }

  async listTree(dir: string): Promise<string[]> {
    return readdir(dir, { recursive: true });
  }

  async mkdir(dirPath: string): Promise<void> {
    await mkdir(dirPath, { recursive: true });
  }
}

export class MockFileSystem implements FileSystem {
  private files = new Map<string, string>();

  async readText(filePath: string): Promise<string> {
    const content = this.files.get(filePath);
    if (content === undefined) throw new Error(`ENOENT: ${filePath}`);
    return content;
  }

  async readJSON<T>(filePath: string): Promise<T> {
    return JSON.parse(await this.readText(filePath)) as T;
  }

  async appendText(filePath: string, content: string): Promise<void> {
    this.files.set(filePath, (this.files.get(filePath) ?? '') + content);
  }

  async exists(filePath: string): Promise<boolean> {
    if (this.files.has(filePath)) return true;
    const prefix = filePath.endsWith('/') ? filePath : `${filePath}/`;
    return [...this.files.keys()].some((k) => k.startsWith(prefix));
  }

  async list(dir: string): Promise<string[]> {
    const names = new Set<string>();
    for (const rest of await this.listTree(dir)) {
      const first = rest.split('/')[0];
      if (first) names.add(first);
    }
    return [...names].sort();
  }

  async listTree(dir: string): Promise<string[]> {
    const prefix = dir.endsWith('/') ? dir : `${dir}/`;
    return [...this.files.keys()]
      .filter((key) => key.startsWith(prefix))
      .map((key) => key.slice(prefix.length))
      .sort();
  }

  async mkdir(_path: string): Promise<void> {}

  setFile(filePath: string, content: string): void {
    this.files.set(filePath, content);
  }
}
