import * as React from "react";

export const Input = React.forwardRef<HTMLInputElement, React.InputHTMLAttributes<HTMLInputElement>>(
  function Input({ className, ...p }, ref) {
    return (
      <input
        ref={ref}
        {...p}
        className={"rounded-md border border-neutral-300 px-3 py-2 text-sm aria-[invalid=true]:border-red-500 " + (className ?? "")}
      />
    );
  },
);
