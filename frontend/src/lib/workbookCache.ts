/**
 * Promise memo keyed by source identity. Entries live until `invalidate`;
 * a rejected load is dropped so the next request retries it.
 */
export class WorkbookCache<T> {
  private readonly entries = new Map<string, Promise<T>>();

  load(key: string, loader: () => Promise<T>): Promise<T> {
    const hit = this.entries.get(key);
    if (hit) return hit;

    const pending = loader();
    this.entries.set(key, pending);
    pending.catch(() => {
      if (this.entries.get(key) === pending) this.entries.delete(key);
    });
    return pending;
  }

  invalidate(key: string): boolean {
    return this.entries.delete(key);
  }
}

/** A picked file is the same file only while its name, size and mtime all match. */
export function fileKey(file: Pick<File, "name" | "size" | "lastModified">): string {
  return `file:${file.name}:${file.size}:${file.lastModified}`;
}

export function urlKey(url: string): string {
  return `url:${url}`;
}
