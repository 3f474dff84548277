import * as React from "react";
import { Table, TableBody, TableCaption, TableCell, TableHead, TableHeader, TableRow } from "@/components/ui/table";
import { formatTimestamp, num } from "@/lib/format";
import type { JoinedRow } from "@/lib/types";

export const SimultaneousTable = React.memo(function SimultaneousTable({ rows }: { rows: JoinedRow[] }) {
  return (
    <div className="max-h-[360px] overflow-auto">
      <Table>
        <TableHeader>
          <TableRow>
            <TableHead>datetime</TableHead>
            <TableHead className="text-right">CHW (kbtuh)</TableHead>
            <TableHead className="text-right">MTHW (kbtuh)</TableHead>
          </TableRow>
        </TableHeader>
        <TableBody>
          {rows.map((r) => (
            <TableRow key={r.timestamp}>
              <TableCell>{formatTimestamp(r.timestamp)}</TableCell>
              <TableCell className="text-right">{num(r.chw)}</TableCell>
              <TableCell className="text-right">{num(r.mthw)}</TableCell>
            </TableRow>
          ))}
        </TableBody>
        {rows.length === 0 ? <TableCaption>No hours above the threshold on both loops.</TableCaption> : null}
      </Table>
    </div>
  );
});
