import * as React from "react";

export function Card({ className, ...p }: React.HTMLAttributes<HTMLDivElement>) {
  return <div {...p} className={"rounded-xl border border-neutral-200 bg-white " + (className ?? "")} />;
}
export function CardHeader({ className, ...p }: React.HTMLAttributes<HTMLDivElement>) {
  return <div {...p} className={"flex flex-col gap-1 p-4 " + (className ?? "")} />;
}
export function CardTitle({ className, ...p }: React.HTMLAttributes<HTMLHeadingElement>) {
  return <h3 {...p} className={"font-semibold leading-none tracking-tight " + (className ?? "")} />;
}
export function CardContent({ className, ...p }: React.HTMLAttributes<HTMLDivElement>) {
  return <div {...p} className={"p-4 pt-0 " + (className ?? "")} />;
}
