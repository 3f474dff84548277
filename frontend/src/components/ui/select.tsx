import * as React from "react";

// shadcn-shaped API over a native <select>: Select reads its SelectItem / SelectValue children.
type SelectItemProps = { value: string; children: React.ReactNode };
type SelectValueProps = { placeholder?: string };

export function Select({
  value,
  onValueChange,
  children,
  className,
  id,
  disabled,
}: {
  value?: string;
  onValueChange?: (v: string) => void;
  children?: React.ReactNode;
  className?: string;
  id?: string;
  disabled?: boolean;
}) {
  const items = React.useMemo(() => collectItems(children), [children]);
  const placeholder = React.useMemo(() => findPlaceholder(children), [children]);

  return (
    <select
      id={id}
      disabled={disabled}
      value={value ?? ""}
      onChange={(e) => onValueChange?.(e.target.value)}
      className={"rounded-md border border-neutral-300 bg-white px-3 py-2 text-sm " + (className ?? "")}
    >
      {!value && placeholder ? (
        <option value="" disabled>
          {placeholder}
        </option>
      ) : null}

      {items.map((it) => (
        <option key={it.value} value={it.value}>
          {it.label}
        </option>
      ))}
    </select>
  );
}

export function SelectTrigger(p: { children?: React.ReactNode }) { return <>{p.children}</>; }
export function SelectContent(p: { children?: React.ReactNode }) { return <>{p.children}</>; }
export function SelectItem({ value, children }: SelectItemProps) {
  return <option value={value}>{children}</option>;
}
export function SelectValue({ placeholder }: SelectValueProps) {
  return <span data-placeholder={placeholder} />;
}

function collectItems(node: React.ReactNode): { value: string; label: React.ReactNode }[] {
  const out: { value: string; label: React.ReactNode }[] = [];
  walk(node, (el) => {
    if (el.type === SelectItem && React.isValidElement<SelectItemProps>(el)) {
      out.push({ value: el.props.value, label: el.props.children });
    }
  });
  return out;
}

function findPlaceholder(node: React.ReactNode): string | undefined {
  let ph: string | undefined;
  walk(node, (el) => {
    if (el.type === SelectValue && React.isValidElement<SelectValueProps>(el)) {
      ph = el.props.placeholder ?? ph;
    }
  });
  return ph;
}

function walk(node: React.ReactNode, fn: (el: React.ReactElement<{ children?: React.ReactNode }>) => void) {
  React.Children.forEach(node, (child) => {
    if (!React.isValidElement<{ children?: React.ReactNode }>(child)) return;
    fn(child);
    if (child.props.children) walk(child.props.children, fn);
  });
}
