import { useEffect, useState } from "react";
import { errorMessage } from "@/lib/errors";
import type { LoadedWorkbook } from "@/lib/types";
import { parseWorkbook } from "@/lib/workbook";
import { WorkbookCache, fileKey, urlKey } from "@/lib/workbookCache";

export type WorkbookSource =
  | { kind: "url"; url: string }
  | { kind: "file"; file: File };

export function sourceKey(source: WorkbookSource): string {
  return source.kind === "file" ? fileKey(source.file) : urlKey(source.url);
}

export function sourceLabel(source: WorkbookSource): string {
  return source.kind === "file" ? source.file.name : source.url;
}

async function readSource(source: WorkbookSource): Promise<ArrayBuffer> {
  if (source.kind === "file") return source.file.arrayBuffer();
  const r = await fetch(source.url);
  if (!r.ok) throw new Error(`${r.status} ${r.statusText}`);
  return r.arrayBuffer();
}

/**
 * Loads the workbook for `source` through `cache`. Bumping `revision` re-runs the
 * effect, which only re-reads if the caller invalidated the entry first.
 * Results of a superseded source are ignored, never aborted: the cached promise
 * may be shared with the next mount.
 */
export function useWorkbook(source: WorkbookSource | null, cache: WorkbookCache<LoadedWorkbook>, revision = 0) {
  const [data, setData] = useState<LoadedWorkbook | null>(null);
  const [loading, setLoading] = useState<boolean>(false);
  const [err, setErr] = useState<string | null>(null);

  useEffect(() => {
    let live = true;
    if (!source) { setData(null); setErr(null); setLoading(false); return; }
    const current = source;

    setData(null);
    setErr(null);
    setLoading(true);
    cache.load(sourceKey(current), () => readSource(current).then(parseWorkbook))
      .then(wb => { if (live) setData(wb); })
      .catch(e => {
        if (!live) return;
        console.error(`Failed to load workbook ${sourceLabel(current)}`, e);
        setErr(errorMessage(e));
      })
      .finally(() => { if (live) setLoading(false); });

    return () => { live = false; };
  }, [source, cache, revision]);

  return { data, loading, err } as const;
}
