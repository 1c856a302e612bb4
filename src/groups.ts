import { DigestKey, FilePath, GroupEntry, GroupsSnapshot } from "./types";

/**
 * Groups paths by content digest and numbers the groups.
 *
 * A digest seen for the first time gets the next free number. After any
 * removal every surviving digest is renumbered 1..N in lexical digest order,
 * so numbers stay dense but may change for groups the removal never touched.
 * Only groups with two or more paths expose a label.
 */
export class GroupIndex {
  private readonly groups = new Map<DigestKey, Set<FilePath>>();
  private readonly ids = new Map<DigestKey, number>();
  private readonly digestOf = new Map<FilePath, DigestKey>();

  /** Number of distinct digests, singletons included */
  get size(): number {
    return this.groups.size;
  }

  record(filePath: FilePath, digest: DigestKey): void {
    const previous = this.digestOf.get(filePath);
    if (previous === digest) {
      return;
    }

    let emptied = false;
    if (previous !== undefined) {
      emptied = this.detach(filePath, previous);
    }

    let paths = this.groups.get(digest);
    if (!paths) {
      paths = new Set();
      this.groups.set(digest, paths);
    }
    paths.add(filePath);
    this.digestOf.set(filePath, digest);

    if (emptied) {
      this.compact();
    } else if (!this.ids.has(digest)) {
      this.ids.set(digest, this.ids.size + 1);
    }
  }

  /**
   * Retracts paths from their groups, drops groups left empty and renumbers
   * the survivors. Unknown paths are ignored.
   */
  remove(filePaths: Iterable<FilePath>): void {
    for (const filePath of filePaths) {
      const digest = this.digestOf.get(filePath);
      if (digest !== undefined) {
        this.detach(filePath, digest);
      }
    }
    this.compact();
  }

  clear(): void {
    this.groups.clear();
    this.ids.clear();
    this.digestOf.clear();
  }

  snapshot(): GroupsSnapshot {
    const view = new Map<DigestKey, GroupEntry>();
    for (const digest of this.groups.keys()) {
      view.set(digest, this.entry(digest));
    }
    return view;
  }

  groupOf(filePath: FilePath): GroupEntry | undefined {
    const digest = this.digestOf.get(filePath);
    return digest === undefined ? undefined : this.entry(digest);
  }

  labelFor(filePath: FilePath): string | undefined {
    return this.groupOf(filePath)?.label;
  }

  /** Groups holding more than one path, ordered by group id. */
  duplicateGroups(): GroupEntry[] {
    const result: GroupEntry[] = [];
    for (const [digest, paths] of this.groups) {
      if (paths.size > 1) {
        result.push(this.entry(digest));
      }
    }
    return result.sort((a, b) => a.groupId - b.groupId);
  }

  private entry(digest: DigestKey): GroupEntry {
    const paths = new Set(this.groups.get(digest));
    const groupId = this.ids.get(digest) ?? 0;
    return {
      digest,
      groupId,
      paths,
      label: paths.size > 1 ? `Group ${groupId}` : undefined
    };
  }

  // Returns true when the path was the last member of its group.
  private detach(filePath: FilePath, digest: DigestKey): boolean {
    this.digestOf.delete(filePath);
    const paths = this.groups.get(digest);
    if (!paths) {
      return false;
    }
    paths.delete(filePath);
    if (paths.size > 0) {
      return false;
    }
    this.groups.delete(digest);
    this.ids.delete(digest);
    return true;
  }

  private compact(): void {
    const digests = [...this.groups.keys()].sort();
    digests.forEach((digest, index) => this.ids.set(digest, index + 1));
  }
}
