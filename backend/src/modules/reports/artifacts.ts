import { readdir, rm, stat } from 'node:fs/promises';
import { basename, join } from 'node:path';
import {
  REPORT_FORMATS,
  REPORT_KINDS,
  REPORT_SCOPES,
  type ReportArtifactInfo,
  type ReportKind,
  type ReportScope,
} from '../../types/index.js';
import { writeFileAtomic } from '../../services/atomicWrite.js';
import { isObject } from '../collectors/coerce.js';

const NAME_RE = new RegExp(
  `^network_blueprint_(${REPORT_KINDS.join('|')})_(${REPORT_SCOPES.join('|')})_(\\d{8}-\\d{6})\\.([a-z]+)$`,
);

function isKind(value: string): value is ReportKind {
  return (REPORT_KINDS as readonly string[]).includes(value);
}

function isScope(value: string): value is ReportScope {
  return (REPORT_SCOPES as readonly string[]).includes(value);
}

/** `20240501-020000` (UTC) */
export function artifactStamp(date: Date): string {
  const iso = date.toISOString();
  return `${iso.slice(0, 4)}${iso.slice(5, 7)}${iso.slice(8, 10)}-${iso.slice(11, 13)}${iso.slice(14, 16)}${iso.slice(17, 19)}`;
}

function stampToIso(stamp: string): string {
  return `${stamp.slice(0, 4)}-${stamp.slice(4, 6)}-${stamp.slice(6, 8)}T${stamp.slice(9, 11)}:${stamp.slice(11, 13)}:${stamp.slice(13, 15)}Z`;
}

export interface ParsedArtifactName {
  kind: ReportKind;
  scope: ReportScope;
  stamp: string;
  format: string;
}

export function parseArtifactName(name: string): ParsedArtifactName | null {
  const m = NAME_RE.exec(name);
  if (!m) return null;
  const [, kind, scope, stamp, format] = m;
  if (!isKind(kind) || !isScope(scope) || REPORT_FORMATS[kind] !== format) return null;
  return { kind, scope, stamp, format };
}

/**
 * Report files under one directory. Every generation writes new
 * timestamped files; "latest" is the newest stamp per (kind, scope).
 */
export class ArtifactStore {
  constructor(readonly dir: string) {}

  fileName(kind: ReportKind, scope: ReportScope, generatedAt: Date): string {
    return `network_blueprint_${kind}_${scope}_${artifactStamp(generatedAt)}.${REPORT_FORMATS[kind]}`;
  }

  async write(kind: ReportKind, scope: ReportScope, content: string, generatedAt: Date): Promise<string> {
    const name = this.fileName(kind, scope, generatedAt);
    await writeFileAtomic(join(this.dir, name), content);
    return name;
  }

  /** Every artifact on disk, newest first. */
  async list(): Promise<ReportArtifactInfo[]> {
    let names: string[];
    try {
      names = await readdir(this.dir);
    } catch (err) {
      if (isObject(err) && err.code === 'ENOENT') return [];
      throw err;
    }

    const out: ReportArtifactInfo[] = [];
    for (const name of names) {
      const parsed = parseArtifactName(name);
      if (!parsed) continue;
      const st = await stat(join(this.dir, name));
      if (!st.isFile()) continue;
      out.push({
        name,
        kind: parsed.kind,
        scope: parsed.scope,
        format: parsed.format,
        generated_at: stampToIso(parsed.stamp),
        size_bytes: st.size,
        mtime: st.mtime.toISOString(),
      });
    }
    return out.sort((a, b) => {
      if (a.generated_at !== b.generated_at) return a.generated_at < b.generated_at ? 1 : -1;
      return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
    });
  }

  /** Newest artifact per (kind, scope), in kind then scope order. */
  async latest(): Promise<ReportArtifactInfo[]> {
    const newest = new Map<string, ReportArtifactInfo>();
    for (const a of await this.list()) {
      const key = `${a.kind}|${a.scope}`;
      if (!newest.has(key)) newest.set(key, a);
    }
    const out: ReportArtifactInfo[] = [];
    for (const kind of REPORT_KINDS) {
      for (const scope of REPORT_SCOPES) {
        const a = newest.get(`${kind}|${scope}`);
        if (a) out.push(a);
      }
    }
    return out;
  }

  /** Delete all but the newest `keep` artifacts of (kind, scope). */
  async prune(kind: ReportKind, scope: ReportScope, keep: number): Promise<string[]> {
    const matching = (await this.list()).filter((a) => a.kind === kind && a.scope === scope);
    const stale = matching.slice(Math.max(keep, 1));
    for (const a of stale) {
      await rm(join(this.dir, a.name), { force: true });
    }
    return stale.map((a) => a.name);
  }

  /**
   * Absolute path of a downloadable artifact, or null when the name is not
   * a plain artifact file name (blocks path traversal).
   */
  resolve(name: string): string | null {
    if (basename(name) !== name || !parseArtifactName(name)) return null;
    return join(this.dir, name);
  }
}
