import { mkdir, readFile, readdir, rename, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { SourceProject } from '../model.js';

export interface ExportSnapshot {
  /** Snapshot schema version. */
  version: 1;
  exportedAt: string;
  project: SourceProject;
}

function stamp(d: Date) {
  return d.toISOString().replace(/[:.]/g, '-');
}

/** Exported projects on disk: `<dir>/exports/<projectId>-<timestamp>.json`. */
export class ExportStore {
  constructor(private dir = path.join(process.cwd(), '.migrate')) {}

  exportsDir() {
    return path.join(this.dir, 'exports');
  }

  async save(project: SourceProject, at = new Date()): Promise<string> {
    await mkdir(this.exportsDir(), { recursive: true });
    const file = path.join(this.exportsDir(), `${project.id}-${stamp(at)}.json`);
    const snapshot: ExportSnapshot = { version: 1, exportedAt: at.toISOString(), project };
    const tmp = file + '.tmp';
    await writeFile(tmp, JSON.stringify(snapshot, null, 2) + '\n', 'utf8');
    await rename(tmp, file);
    return file;
  }

  /** Snapshot files for one project, oldest first. */
  async list(projectId: string): Promise<string[]> {
    let names: string[];
    try {
      names = await readdir(this.exportsDir());
    } catch {
      return [];
    }
    return names
      .filter((n) => n.startsWith(`${projectId}-`) && n.endsWith('.json'))
      .sort()
      .map((n) => path.join(this.exportsDir(), n));
  }

  async load(file: string): Promise<ExportSnapshot> {
    return JSON.parse(await readFile(file, 'utf8')) as ExportSnapshot;
  }

  async latest(projectId: string): Promise<ExportSnapshot | undefined> {
    const files = await this.list(projectId);
    const last = files[files.length - 1];
    return last ? this.load(last) : undefined;
  }
}
