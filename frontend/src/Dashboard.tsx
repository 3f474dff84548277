import React, { useEffect, useMemo, useState } from "react";
import { Download } from "lucide-react";
import { Card, CardContent, CardHeader, CardTitle } from "@/components/ui/card";
import { Button } from "@/components/ui/button";
import { Input } from "@/components/ui/input";
import { Select, SelectTrigger, SelectContent, SelectItem, SelectValue } from "@/components/ui/select";
import { CardStat } from "@/components/common/CardStat";
import { Notice } from "@/components/common/Notice";
import { SectionTitle } from "@/components/common/SectionTitle";
import { LoadChart } from "@/components/charts/LoadChart";
import { SimultaneousChart } from "@/components/charts/SimultaneousChart";
import { SimultaneousTable } from "@/components/SimultaneousTable";
import { WorkbookPicker } from "@/components/WorkbookPicker";
import { analyzeBuilding } from "@/lib/analysis";
import { toLoadPoints } from "@/lib/chartData";
import { CONFIG } from "@/lib/config";
import { exportFileName, toSimultaneousCsv } from "@/lib/csv";
import { downloadText } from "@/lib/download";
import { formatTimestamp } from "@/lib/format";
import { parseThreshold } from "@/lib/threshold";
import type { LoadedWorkbook, LoadReport } from "@/lib/types";
import { useWorkbook, sourceKey, sourceLabel, type WorkbookSource } from "@/lib/useWorkbook";
import { WorkbookCache } from "@/lib/workbookCache";

const initialSource: WorkbookSource | null = CONFIG.workbookUrl ? { kind: "url", url: CONFIG.workbookUrl } : null;

function reportLine(r: LoadReport): string | null {
  const parts: string[] = [];
  if (r.invalidTimestamps > 0) parts.push(`${r.invalidTimestamps} row(s) with an unreadable timestamp`);
  if (r.duplicateTimestamps > 0) parts.push(`${r.duplicateTimestamps} repeated timestamp(s), first kept`);
  return parts.length ? `"${r.sheet}": skipped ${parts.join(" and ")}.` : null;
}

function LoadSummary({ workbook }: { workbook: LoadedWorkbook }) {
  const { schema, reports } = workbook;
  const skipped = reports.map(reportLine).filter((l): l is string => l !== null);
  const oneSided = [
    ...schema.chwOnly.map((b) => `${b} (CHW only)`),
    ...schema.mthwOnly.map((b) => `${b} (MTHW only)`),
  ];

  return (
    <div className="space-y-2">
      {skipped.map((line) => <Notice key={line} tone="info">{line}</Notice>)}
      {oneSided.length > 0 ? (
        <Notice tone="info">Not in both sheets, so not listed: {oneSided.join(", ")}.</Notice>
      ) : null}
      {schema.ambiguous.length > 0 ? (
        <Notice tone="warning">
          These building names contain a CHW/MTHW token, so their columns may be mislabelled:{" "}
          {schema.ambiguous.join(", ")}.
        </Notice>
      ) : null}
    </div>
  );
}

export default function Dashboard() {
  const cache = useMemo(() => new WorkbookCache<LoadedWorkbook>(), []);
  const [source, setSource] = useState<WorkbookSource | null>(initialSource);
  const [revision, setRevision] = useState(0);
  const { data: workbook, loading, err } = useWorkbook(source, cache, revision);

  const [selected, setSelected] = useState<string | null>(null);
  const [thresholdText, setThresholdText] = useState(String(CONFIG.threshold.default));
  const [threshold, setThreshold] = useState<number>(CONFIG.threshold.default);
  const [thresholdErr, setThresholdErr] = useState<string | null>(null);

  const buildings = useMemo(() => workbook?.schema.buildings ?? [], [workbook]);

  useEffect(() => {
    if (buildings.length === 0) return;
    if (!selected || !buildings.some(b => b.building === selected)) setSelected(buildings[0].building);
  }, [buildings, selected]);

  const columns = useMemo(
    () => buildings.find(b => b.building === selected) ?? null,
    [buildings, selected]
  );

  const analysis = useMemo(
    () => (workbook && columns ? analyzeBuilding(workbook, columns, threshold) : null),
    [workbook, columns, threshold]
  );

  const points = useMemo(() => (analysis ? toLoadPoints(analysis.rows) : []), [analysis]);

  const onThresholdChange = (raw: string) => {
    setThresholdText(raw);
    const parsed = parseThreshold(raw);
    if (parsed.ok) {
      setThreshold(parsed.value);
      setThresholdErr(null);
    } else {
      setThresholdErr(parsed.error);
    }
  };

  const reload = () => {
    if (!source) return;
    cache.invalidate(sourceKey(source));
    setRevision(r => r + 1);
  };

  const outFile = analysis ? exportFileName(analysis.building) : null;
  const span = analysis && analysis.rows.length > 0
    ? `${formatTimestamp(analysis.rows[0].timestamp).slice(0, 10)} → ${formatTimestamp(analysis.rows[analysis.rows.length - 1].timestamp).slice(0, 10)}`
    : "—";

  let body: React.ReactNode;
  if (!source) {
    body = <Notice tone="info">Open a workbook with "{CONFIG.sheets.CHW}" and "{CONFIG.sheets.MTHW}" sheets to begin.</Notice>;
  } else if (loading) {
    body = <Notice tone="info">Loading {sourceLabel(source)}…</Notice>;
  } else if (err) {
    body = <Notice tone="error">{err}</Notice>;
  } else if (!workbook) {
    body = null;
  } else if (buildings.length === 0) {
    body = (
      <div className="space-y-2">
        <LoadSummary workbook={workbook} />
        <Notice tone="warning">
          No building has both a "&lt;Building&gt; CHW {CONFIG.unitSuffix}" column in "{CONFIG.sheets.CHW}" and a
          "&lt;Building&gt; MTHW {CONFIG.unitSuffix}" column in "{CONFIG.sheets.MTHW}". Nothing to analyze.
        </Notice>
      </div>
    );
  } else {
    body = (
      <>
        <LoadSummary workbook={workbook} />

        {/* Controls */}
        <div className="grid grid-cols-1 md:grid-cols-2 gap-6">
          <div className="space-y-2">
            <SectionTitle>Select Building</SectionTitle>
            <Select className="w-full" value={selected ?? ""} onValueChange={setSelected}>
              <SelectTrigger>
                <SelectValue placeholder="Choose a building" />
              </SelectTrigger>
              <SelectContent>
                {buildings.map(b => (
                  <SelectItem key={b.building} value={b.building}>{b.building}</SelectItem>
                ))}
              </SelectContent>
            </Select>
            {selected ? <Notice tone="success">Selected building: <strong>{selected}</strong></Notice> : null}
          </div>

          <div className="space-y-2">
            <SectionTitle>Threshold Adjustment</SectionTitle>
            <label htmlFor="threshold" className="block text-sm text-muted-foreground">
              kBTU/h threshold for determining system "on" status
            </label>
            <Input
              id="threshold"
              type="number"
              inputMode="numeric"
              className="w-full"
              min={CONFIG.threshold.min}
              max={CONFIG.threshold.max}
              step={CONFIG.threshold.step}
              value={thresholdText}
              aria-invalid={thresholdErr !== null}
              onChange={(e) => onThresholdChange(e.target.value)}
            />
            {thresholdErr
              ? <Notice tone="error">{thresholdErr} Still using {threshold} kBTU/h.</Notice>
              : <Notice tone="info">Using threshold: <strong>{threshold} kBTU/h</strong></Notice>}
          </div>
        </div>

        {analysis ? (
          <>
            {/* Summary */}
            <SectionTitle description="Hours where both CHW and MTHW loads are strictly above the threshold.">
              Simultaneous Heating + Cooling Summary
            </SectionTitle>
            <div className="grid grid-cols-2 md:grid-cols-4 gap-4">
              <CardStat title="Total hours detected" value={String(analysis.simultaneousHours)} />
              <CardStat title="Hours in both sheets" value={String(analysis.joinedHours)} hint={span} />
              <CardStat title="CHW on" value={String(analysis.chwOnHours)} hint="hours above threshold" />
              <CardStat title="MTHW on" value={String(analysis.mthwOnHours)} hint="hours above threshold" />
            </div>

            <Card className="shadow-sm">
              <CardHeader>
                <div className="flex items-center justify-between gap-2">
                  <CardTitle>Simultaneous hours</CardTitle>
                  {outFile ? (
                    <Button
                      variant="outline"
                      onClick={() => downloadText(outFile, toSimultaneousCsv(analysis.simultaneous))}
                    >
                      <Download className="w-4 h-4" />
                      Download CSV
                    </Button>
                  ) : null}
                </div>
              </CardHeader>
              <CardContent className="space-y-3">
                <SimultaneousTable rows={analysis.simultaneous} />
                {outFile ? <div className="text-xs text-muted-foreground">Output file: <code>{outFile}</code></div> : null}
              </CardContent>
            </Card>

            {/* Time series */}
            <div className="grid grid-cols-1 xl:grid-cols-2 gap-6">
              <Card className="shadow-sm">
                <CardHeader><CardTitle>{analysis.building} — CHW Load</CardTitle></CardHeader>
                <CardContent>
                  <LoadChart data={points} series="chw" name="CHW Load" threshold={threshold} />
                </CardContent>
              </Card>
              <Card className="shadow-sm">
                <CardHeader><CardTitle>{analysis.building} — MTHW Load</CardTitle></CardHeader>
                <CardContent>
                  <LoadChart data={points} series="mthw" name="MTHW Load" threshold={threshold} />
                </CardContent>
              </Card>
            </div>

            <Card className="shadow-sm">
              <CardHeader><CardTitle>{analysis.building} — Simultaneous Heating + Cooling</CardTitle></CardHeader>
              <CardContent>
                <SimultaneousChart data={points} threshold={threshold} />
              </CardContent>
            </Card>
          </>
        ) : null}
      </>
    );
  }

  return (
    <div className="min-h-screen bg-white text-neutral-900">
      <div className="mx-auto max-w-6xl p-6 space-y-6">
        <div className="flex flex-wrap items-center justify-between gap-4">
          <div>
            <h1 className="text-2xl font-bold tracking-tight">Simultaneous Heating + Cooling Analyzer</h1>
            {source ? <div className="text-sm text-muted-foreground">{sourceLabel(source)}</div> : null}
          </div>
          <WorkbookPicker
            sourceLabel={source ? sourceLabel(source) : null}
            loading={loading}
            onPick={(file) => setSource({ kind: "file", file })}
            onReload={reload}
          />
        </div>
        {body}
      </div>
    </div>
  );
}
