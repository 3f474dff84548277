import * as React from "react";
import { FileSpreadsheet, RefreshCw } from "lucide-react";
import { Button } from "@/components/ui/button";

type Props = {
  sourceLabel: string | null;
  loading: boolean;
  onPick: (file: File) => void;
  onReload: () => void;
};

export function WorkbookPicker({ sourceLabel, loading, onPick, onReload }: Props) {
  const inputRef = React.useRef<HTMLInputElement>(null);

  return (
    <div className="flex items-center gap-2">
      <input
        ref={inputRef}
        type="file"
        accept=".xlsx,.xlsm,.xls"
        className="hidden"
        onChange={(e) => {
          const file = e.target.files?.[0];
          if (file) onPick(file);
          e.target.value = ""; // picking the same file again still fires
        }}
      />
      <Button variant="outline" onClick={() => inputRef.current?.click()} disabled={loading}>
        <FileSpreadsheet className="h-4 w-4" />
        {sourceLabel ? "Change workbook" : "Open workbook"}
      </Button>
      <Button variant="outline" onClick={onReload} disabled={loading || !sourceLabel} title="Re-read the workbook">
        <RefreshCw className={"h-4 w-4 " + (loading ? "animate-spin" : "")} />
        Reload
      </Button>
    </div>
  );
}
