import * as React from "react";
import { AlertTriangle, CheckCircle2, Info, XCircle, type LucideIcon } from "lucide-react";

export type NoticeTone = "success" | "info" | "warning" | "error";

const TONES: Record<NoticeTone, { icon: LucideIcon; className: string }> = {
  success: { icon: CheckCircle2, className: "border-green-200 bg-green-50 text-green-900" },
  info: { icon: Info, className: "border-sky-200 bg-sky-50 text-sky-900" },
  warning: { icon: AlertTriangle, className: "border-amber-200 bg-amber-50 text-amber-900" },
  error: { icon: XCircle, className: "border-red-200 bg-red-50 text-red-900" },
};

export const Notice: React.FC<{ tone: NoticeTone; children: React.ReactNode }> = ({ tone, children }) => {
  const { icon: Icon, className } = TONES[tone];
  return (
    <div role={tone === "error" ? "alert" : "status"} className={"flex items-start gap-2 rounded-md border px-3 py-2 text-sm " + className}>
      <Icon className="mt-0.5 h-4 w-4 shrink-0" />
      <div>{children}</div>
    </div>
  );
};
