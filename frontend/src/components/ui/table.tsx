import * as React from "react";

const cx = (base: string, extra?: string) => (extra ? `${base} ${extra}` : base);

export function Table({ className, ...p }: React.HTMLAttributes<HTMLTableElement>) {
  return <table {...p} className={cx("w-full border-collapse text-sm", className)} />;
}
export function TableHeader({ className, ...p }: React.HTMLAttributes<HTMLTableSectionElement>) {
  return <thead {...p} className={cx("sticky top-0 bg-white", className)} />;
}
export function TableBody(p: React.HTMLAttributes<HTMLTableSectionElement>) { return <tbody {...p} />; }
export function TableRow({ className, ...p }: React.HTMLAttributes<HTMLTableRowElement>) {
  return <tr {...p} className={cx("border-b border-neutral-100", className)} />;
}
export function TableHead({ className, ...p }: React.ThHTMLAttributes<HTMLTableCellElement>) {
  return <th {...p} className={cx("px-3 py-2 text-left font-medium text-muted-foreground", className)} />;
}
export function TableCell({ className, ...p }: React.TdHTMLAttributes<HTMLTableCellElement>) {
  return <td {...p} className={cx("px-3 py-1.5 tabular-nums", className)} />;
}
export function TableCaption({ className, ...p }: React.HTMLAttributes<HTMLTableCaptionElement>) {
  return <caption {...p} className={cx("caption-bottom pt-3 text-xs text-muted-foreground", className)} />;
}
