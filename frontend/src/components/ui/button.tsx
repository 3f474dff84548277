import * as React from "react";

type Variant = "default" | "outline";

const VARIANTS: Record<Variant, string> = {
  default: "bg-neutral-900 text-white hover:bg-neutral-800",
  outline: "border border-neutral-300 bg-white hover:bg-neutral-50",
};

export function Button({
  variant = "default",
  className,
  type = "button",
  ...p
}: React.ButtonHTMLAttributes<HTMLButtonElement> & { variant?: Variant }) {
  return (
    <button
      {...p}
      type={type}
      className={
        "inline-flex items-center gap-2 rounded-md px-3 py-2 text-sm font-medium disabled:pointer-events-none disabled:opacity-50 " +
        VARIANTS[variant] + " " + (className ?? "")
      }
    />
  );
}
